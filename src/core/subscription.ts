// src/core/subscription.ts
// Desired stream subscriptions

import type { Channel, MarketId, RootMarketId } from "./enums";

export type SubscriptionTarget =
  | { kind: "market"; id: MarketId }
  | { kind: "root"; id: RootMarketId };

export interface Subscription {
  channel: Channel;
  target: SubscriptionTarget;
}

export type SubscriptionAction = "SUBSCRIBE" | "UNSUBSCRIBE";

/**
 * Stable identity of a (channel, target) pair
 */
export function subscriptionKey(channel: Channel, target: SubscriptionTarget): string {
  return `${channel}|${target.kind}:${target.id}`;
}
