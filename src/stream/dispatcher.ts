// src/stream/dispatcher.ts
// Classifies inbound frames and applies them to the EntityStore

import type { IWebSocketHandler } from "../adapters/base/websocket-handler";
import { OutcomeSide } from "../core/enums";
import {
  assertNever,
  type InboundMessage,
  type InboundMessageType,
  type PriceUpdate,
  type TradeUpdate,
} from "../core/messages";
import type { Topic, TopicPatch } from "../core/topic";
import { MalformedMessageError, UnknownEntityError } from "../errors";
import { noopStreamObserver, type StreamObserver } from "../services/stream-observer";
import type { EntityStore } from "../store/entity-store";

export type DispatchOutcome =
  | "applied"
  | "control"
  | "malformed"
  | "unknown_entity"
  | "depth_diff";

export interface DispatcherStats {
  received: number;
  applied: number;
  control: number;
  malformed: number;
  unknownEntity: number;
  depthDiffs: number;
  byType: Record<InboundMessageType, number>;
}

export interface MessageDispatcherOptions {
  observer?: StreamObserver;
  now?: () => Date;
}

// Volume is summed from decimal strings; rounding keeps 100 + 8.5 at 108.5
const VOLUME_SCALE = 1e8;

export function addVolume(current: number, amount: string): number {
  return Math.round((current + Number(amount)) * VOLUME_SCALE) / VOLUME_SCALE;
}

// ============================================================
// Apply rules
// ============================================================

export function pricePatch(message: PriceUpdate, updatedAt: string): TopicPatch {
  if (message.outcomeSide === OutcomeSide.YES) {
    return { yes_price: message.price, last_price: message.price, updated_at: updatedAt };
  }
  return { no_price: message.price, updated_at: updatedAt };
}

export function tradePatch(current: Readonly<Topic>, message: TradeUpdate, updatedAt: string): TopicPatch {
  const sidePrice: TopicPatch =
    message.outcomeSide === OutcomeSide.YES
      ? { yes_price: message.price }
      : { no_price: message.price };

  return {
    ...sidePrice,
    last_price: message.price,
    volume: addVolume(current.volume, message.amount),
    updated_at: updatedAt,
  };
}

/**
 * MessageDispatcher
 *
 * Runs synchronously on the socket's message path, so updates for one
 * market land in the order they arrived. Never throws: bad frames are
 * counted and handed to the observer.
 */
export class MessageDispatcher {
  private counters: DispatcherStats = createEmptyStats();
  private readonly observer: StreamObserver;
  private readonly now: () => Date;

  constructor(
    private readonly store: EntityStore,
    private readonly handler: Pick<IWebSocketHandler, "parseMessage">,
    options: MessageDispatcherOptions = {}
  ) {
    this.observer = options.observer ?? noopStreamObserver;
    this.now = options.now ?? (() => new Date());
  }

  dispatch(raw: string): DispatchOutcome {
    this.counters.received++;

    const parsed = this.handler.parseMessage(raw);
    switch (parsed.type) {
      case "pong":
      case "ack":
        this.counters.control++;
        return "control";
      case "malformed":
        this.counters.malformed++;
        this.observer.onMalformedMessage(
          new MalformedMessageError(parsed.reason, parsed.msgType, raw)
        );
        return "malformed";
      case "message":
        return this.route(parsed.message);
      default:
        return assertNever(parsed);
    }
  }

  stats(): DispatcherStats {
    return { ...this.counters, byType: { ...this.counters.byType } };
  }

  resetStats(): void {
    this.counters = createEmptyStats();
  }

  private route(message: InboundMessage): DispatchOutcome {
    this.counters.byType[message.type]++;

    if (!this.store.has(message.marketId)) {
      this.counters.unknownEntity++;
      this.observer.onUnknownEntity(new UnknownEntityError(message.marketId, message.type));
      return "unknown_entity";
    }

    const updatedAt = this.now().toISOString();

    switch (message.type) {
      case "market.last.price":
        this.store.applyMutation(message.marketId, () => pricePatch(message, updatedAt));
        this.counters.applied++;
        return "applied";
      case "market.last.trade":
        this.store.applyMutation(message.marketId, (current) =>
          tradePatch(current, message, updatedAt)
        );
        this.counters.applied++;
        return "applied";
      case "market.depth.diff":
        // No order book is kept; depth diffs never change topic fields
        this.counters.depthDiffs++;
        this.observer.onDepthDiff(message);
        return "depth_diff";
      default:
        return assertNever(message);
    }
  }
}

function createEmptyStats(): DispatcherStats {
  return {
    received: 0,
    applied: 0,
    control: 0,
    malformed: 0,
    unknownEntity: 0,
    depthDiffs: 0,
    byType: {
      "market.last.price": 0,
      "market.last.trade": 0,
      "market.depth.diff": 0,
    },
  };
}
