// src/subscriptions/registry.ts
// Authoritative set of desired stream subscriptions, independent of any connection

import { CHANNELS, asRootMarketId, type Channel } from "../core/enums";
import type { Topic } from "../core/topic";
import {
  subscriptionKey,
  type Subscription,
  type SubscriptionTarget,
} from "../core/subscription";

export type RegistryChange =
  | { type: "added"; subscription: Subscription }
  | { type: "removed"; subscription: Subscription };

export type RegistryListener = (change: RegistryChange) => void;

/**
 * Topic fields the subscription plan depends on
 */
export type SubscribableTopic = Pick<Topic, "market_id" | "outcome_type">;

/**
 * Subscriptions a topic needs.
 * A categorical topic is its own root market and only publishes last price
 * under rootMarketId; everything else gets every channel by market id.
 */
export function planSubscriptions(topic: SubscribableTopic): Subscription[] {
  if (topic.outcome_type === "categorical") {
    return [
      {
        channel: "market.last.price",
        target: { kind: "root", id: asRootMarketId(topic.market_id) },
      },
    ];
  }

  return CHANNELS.map((channel) => ({
    channel,
    target: { kind: "market", id: topic.market_id },
  }));
}

/**
 * SubscriptionRegistry
 *
 * Insertion-ordered and deduplicated by (channel, target). Outlives any
 * physical connection; the stream connection reads a snapshot of it on
 * every (re)connect.
 */
export class SubscriptionRegistry {
  private entries: Map<string, Subscription> = new Map();
  private listeners: Set<RegistryListener> = new Set();

  get size(): number {
    return this.entries.size;
  }

  has(channel: Channel, target: SubscriptionTarget): boolean {
    return this.entries.has(subscriptionKey(channel, target));
  }

  /**
   * Returns true when the pair was not already registered
   */
  add(channel: Channel, target: SubscriptionTarget): boolean {
    const key = subscriptionKey(channel, target);
    if (this.entries.has(key)) return false;

    const subscription: Subscription = Object.freeze({
      channel,
      target: Object.freeze({ ...target }),
    });
    this.entries.set(key, subscription);
    this.emit({ type: "added", subscription });
    return true;
  }

  /**
   * Returns true when the pair was registered
   */
  remove(channel: Channel, target: SubscriptionTarget): boolean {
    const key = subscriptionKey(channel, target);
    const subscription = this.entries.get(key);
    if (!subscription) return false;

    this.entries.delete(key);
    this.emit({ type: "removed", subscription });
    return true;
  }

  /**
   * Consistent point-in-time copy
   */
  snapshot(): readonly Subscription[] {
    return Object.freeze(Array.from(this.entries.values()));
  }

  /** Number of subscriptions newly added */
  addTopic(topic: SubscribableTopic): number {
    let added = 0;
    for (const { channel, target } of planSubscriptions(topic)) {
      if (this.add(channel, target)) added++;
    }
    return added;
  }

  /** Number of subscriptions removed */
  removeTopic(topic: SubscribableTopic): number {
    let removed = 0;
    for (const { channel, target } of planSubscriptions(topic)) {
      if (this.remove(channel, target)) removed++;
    }
    return removed;
  }

  onChange(listener: RegistryListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private emit(change: RegistryChange): void {
    for (const listener of this.listeners) {
      listener(change);
    }
  }
}
