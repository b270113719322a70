// src/core/messages.ts
// Canonical inbound stream messages (closed union, discriminated by `type`)

import type { DepthSide, MarketId, OutcomeSide, TradeSide } from "./enums";

interface MessageBase {
  marketId: MarketId;
  tokenId: string;
  outcomeSide: OutcomeSide;
}

/** market.last.price */
export interface PriceUpdate extends MessageBase {
  type: "market.last.price";
  price: string;
}

/** market.last.trade */
export interface TradeUpdate extends MessageBase {
  type: "market.last.trade";
  side: TradeSide;
  price: string;
  shares: string;
  amount: string;
}

/** market.depth.diff - consumed for observability only, no book is retained */
export interface DepthDiff extends MessageBase {
  type: "market.depth.diff";
  side: DepthSide;
  price: string;
  size: string;
}

export type InboundMessage = PriceUpdate | TradeUpdate | DepthDiff;

export type InboundMessageType = InboundMessage["type"];

/**
 * Result of parsing one raw frame off the socket
 */
export type ParsedFrame =
  | { type: "message"; message: InboundMessage }
  | { type: "pong" }
  | { type: "ack"; code: number | null; msg: string | null }
  | { type: "malformed"; reason: string; msgType: string | null };

export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}
