/**
 * SubscriptionRegistry Unit Tests
 */

import { describe, it, expect, beforeEach } from "vitest";
import { asMarketId, asRootMarketId } from "../core/enums";
import {
  SubscriptionRegistry,
  planSubscriptions,
  type RegistryChange,
} from "../subscriptions/registry";
import { makeTopic } from "./helpers/fixtures";

const market = (id: number) => ({ kind: "market" as const, id: asMarketId(id) });

describe("planSubscriptions", () => {
  it("should subscribe a binary topic to every channel by market id", () => {
    expect(planSubscriptions(makeTopic(2764))).toEqual([
      { channel: "market.last.price", target: { kind: "market", id: 2764 } },
      { channel: "market.last.trade", target: { kind: "market", id: 2764 } },
      { channel: "market.depth.diff", target: { kind: "market", id: 2764 } },
    ]);
  });

  it("should subscribe a categorical topic to last price by root market id", () => {
    expect(planSubscriptions(makeTopic(61, { outcome_type: "categorical" }))).toEqual([
      { channel: "market.last.price", target: { kind: "root", id: 61 } },
    ]);
  });
});

describe("SubscriptionRegistry", () => {
  let registry: SubscriptionRegistry;

  beforeEach(() => {
    registry = new SubscriptionRegistry();
  });

  it("should add idempotently", () => {
    expect(registry.add("market.last.price", market(1))).toBe(true);
    expect(registry.add("market.last.price", market(1))).toBe(false);
    expect(registry.size).toBe(1);
    expect(registry.has("market.last.price", market(1))).toBe(true);
  });

  it("should tell market and root targets apart", () => {
    registry.add("market.last.price", market(5));
    registry.add("market.last.price", { kind: "root", id: asRootMarketId(5) });

    expect(registry.size).toBe(2);
  });

  it("should remove idempotently", () => {
    registry.add("market.last.trade", market(1));

    expect(registry.remove("market.last.trade", market(1))).toBe(true);
    expect(registry.remove("market.last.trade", market(1))).toBe(false);
    expect(registry.size).toBe(0);
  });

  it("should return a frozen snapshot unaffected by later changes", () => {
    registry.add("market.last.price", market(1));
    const snapshot = registry.snapshot();
    registry.add("market.last.price", market(2));
    registry.remove("market.last.price", market(1));

    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(snapshot).toEqual([{ channel: "market.last.price", target: { kind: "market", id: 1 } }]);
    expect(registry.snapshot()).toEqual([
      { channel: "market.last.price", target: { kind: "market", id: 2 } },
    ]);
  });

  it("should add and remove a topic's full plan", () => {
    const topic = makeTopic(10);

    expect(registry.addTopic(topic)).toBe(3);
    expect(registry.addTopic(topic)).toBe(0);
    expect(registry.removeTopic(topic)).toBe(3);
    expect(registry.size).toBe(0);
  });

  it("should notify listeners of actual changes only", () => {
    const changes: RegistryChange[] = [];
    const unsubscribe = registry.onChange((change) => changes.push(change));

    registry.add("market.depth.diff", market(3));
    registry.add("market.depth.diff", market(3));
    registry.remove("market.depth.diff", market(3));
    unsubscribe();
    registry.add("market.depth.diff", market(4));

    expect(changes.map((c) => c.type)).toEqual(["added", "removed"]);
    expect(changes[0].subscription).toEqual({
      channel: "market.depth.diff",
      target: { kind: "market", id: 3 },
    });
  });
});
