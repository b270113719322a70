// src/core/enums.ts
// Core enums and identifier types for the topic stream

// ============================================================
// BRANDED TYPES
// These prevent mixing different ID types at compile time
// ============================================================

declare const __brand: unique symbol;
type Brand<T, TBrand extends string> = T & { [__brand]: TBrand };

/**
 * Market ID - numeric venue identifier, the store key for a topic
 * Example: 2764
 */
export type MarketId = Brand<number, "MarketId">;

/**
 * Root market ID - groups the child markets of a categorical topic
 */
export type RootMarketId = Brand<number, "RootMarketId">;

export function asMarketId(id: number): MarketId {
  return id as MarketId;
}

export function asRootMarketId(id: number): RootMarketId {
  return id as RootMarketId;
}

/**
 * Parse a path/query identifier into a MarketId.
 * Accepts only canonical positive integers ("2764", not "02764" or "2764.0").
 */
export function parseMarketId(raw: string): MarketId | null {
  if (!/^[1-9]\d{0,15}$/.test(raw)) return null;
  const value = Number(raw);
  return Number.isSafeInteger(value) ? asMarketId(value) : null;
}

// ============================================================
// MARKET ENUMS
// ============================================================

export const OUTCOME_TYPES = ["binary", "scalar", "categorical"] as const;
export type OutcomeType = (typeof OUTCOME_TYPES)[number];

/**
 * Which binary result a price or trade pertains to (wire encoding)
 */
export const OutcomeSide = {
  YES: 1,
  NO: 2,
} as const;
export type OutcomeSide = (typeof OutcomeSide)[keyof typeof OutcomeSide];

export type TradeSide = "Buy" | "Sell";

export type DepthSide = "bids" | "asks";

// ============================================================
// STREAM CHANNELS
// ============================================================

export const CHANNELS = [
  "market.last.price",
  "market.last.trade",
  "market.depth.diff",
] as const;
export type Channel = (typeof CHANNELS)[number];

/**
 * Connection lifecycle states, owned by StreamConnection
 */
export const CONNECTION_STATES = [
  "disconnected",
  "connecting",
  "subscribing",
  "active",
  "reconnecting",
] as const;
export type ConnectionState = (typeof CONNECTION_STATES)[number];
