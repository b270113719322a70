// src/adapters/opinion/normalizers.ts
// Functions to convert Opinion REST markets to canonical topics

import { OUTCOME_TYPES, asMarketId, type OutcomeType } from "../../core/enums";
import type { Topic } from "../../core/topic";
import { OpinionMarketSchema, type OpinionMarket } from "./types";

const DECIMAL = /^\d+(\.\d+)?$/;

/**
 * Positive integer id from a number or numeric string
 */
export function normalizeMarketId(raw: number | string | undefined): number | null {
  if (raw === undefined) return null;
  const value = typeof raw === "number" ? raw : Number(raw.trim());
  return Number.isSafeInteger(value) && value > 0 ? value : null;
}

/**
 * Non-negative decimal string ("0.85"), or null for anything else
 */
export function normalizeDecimal(raw: string | number | null | undefined): string | null {
  if (raw === null || raw === undefined) return null;
  if (typeof raw === "number") {
    return Number.isFinite(raw) && raw >= 0 ? String(raw) : null;
  }
  const trimmed = raw.trim();
  return DECIMAL.test(trimmed) ? trimmed : null;
}

export function normalizeVolume(raw: string | number | null | undefined): number {
  if (raw === null || raw === undefined) return 0;
  const value = typeof raw === "number" ? raw : Number(raw);
  return Number.isFinite(value) && value >= 0 ? value : 0;
}

/**
 * ISO 8601 string from an ISO string or epoch (seconds or milliseconds)
 */
export function normalizeDate(raw: string | number | null | undefined): string | null {
  if (raw === null || raw === undefined || raw === "") return null;
  let date: Date;
  if (typeof raw === "number") {
    // Anything below 1e12 is taken as seconds
    date = new Date(raw < 1e12 ? raw * 1000 : raw);
  } else {
    date = new Date(Date.parse(raw));
  }
  // Outside the representable range toISOString() would throw
  return Number.isNaN(date.getTime()) ? null : date.toISOString();
}

export function normalizeOutcomeType(raw: string | null | undefined): OutcomeType {
  const value = raw?.trim().toLowerCase();
  return OUTCOME_TYPES.find((type) => type === value) ?? "binary";
}

function normalizeCategories(raw: unknown[] | null | undefined): string[] {
  if (!raw) return [];
  return raw
    .filter((category): category is string => typeof category === "string")
    .map((category) => category.trim())
    .filter((category) => category.length > 0);
}

/**
 * Normalize one REST market. Returns null when the record has no usable
 * id or question.
 */
export function normalizeOpinionMarket(market: OpinionMarket, now: Date = new Date()): Topic | null {
  const marketId = normalizeMarketId(market.id ?? market.marketId);
  const question = (market.question ?? market.title ?? "").trim();
  if (marketId === null || question.length === 0) {
    return null;
  }

  return {
    id: String(marketId),
    market_id: asMarketId(marketId),
    question,
    description: market.description ?? null,
    categories: normalizeCategories(market.categories),
    outcome_type: normalizeOutcomeType(market.outcomeType),
    end_date: normalizeDate(market.endDate),
    created_at: normalizeDate(market.createdAt),
    slug: market.slug ?? null,
    last_price: normalizeDecimal(market.lastPrice),
    yes_price: normalizeDecimal(market.yesPrice),
    no_price: normalizeDecimal(market.noPrice),
    volume: normalizeVolume(market.volume),
    liquidity: normalizeDecimal(market.liquidity),
    updated_at: now.toISOString(),
    version: 1,
  };
}

/**
 * Validate and normalize an untyped REST entry
 */
export function parseOpinionMarket(raw: unknown, now: Date = new Date()): Topic | null {
  const result = OpinionMarketSchema.safeParse(raw);
  return result.success ? normalizeOpinionMarket(result.data, now) : null;
}
