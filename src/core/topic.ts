// src/core/topic.ts
// Canonical topic record held by the EntityStore

import type { MarketId, OutcomeType } from "./enums";

/**
 * Descriptive fields, populated once from the initial snapshot.
 * Streaming updates never touch these.
 */
export interface TopicStatic {
  id: string;
  market_id: MarketId;
  question: string;
  description: string | null;
  categories: readonly string[];
  outcome_type: OutcomeType;
  end_date: string | null;    // ISO 8601
  created_at: string | null;  // ISO 8601
  slug: string | null;
}

/**
 * Fields overwritten by streaming updates.
 * Prices stay as the venue's decimal strings so "0.80" round-trips unchanged.
 */
export interface TopicLive {
  last_price: string | null;
  yes_price: string | null;
  no_price: string | null;
  volume: number;
  liquidity: string | null;
  updated_at: string;         // ISO 8601
}

export interface Topic extends TopicStatic, TopicLive {
  /** Incremented once per applied mutation */
  version: number;
}

/**
 * What a mutation function may change
 */
export type TopicPatch = Partial<TopicLive>;
