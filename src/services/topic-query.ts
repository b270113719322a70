// src/services/topic-query.ts
// Read-side queries over the EntityStore: filter, sort, paginate, search, get-by-id

import { OUTCOME_TYPES, parseMarketId, type OutcomeType } from "../core/enums";
import type { Topic } from "../core/topic";
import { InvalidFilterError, TopicNotFoundError } from "../errors";
import type { EntityStore } from "../store/entity-store";
import type { SearchIndex } from "../store/search-index";

// ============================================================
// Query Types
// ============================================================

export const SORT_FIELDS = ["end_date", "created_at", "volume", "last_price", "updated_at"] as const;
export type SortField = (typeof SORT_FIELDS)[number];

export type SortOrder = "asc" | "desc";

export interface NumericRange {
  min?: number;
  max?: number;
}

export interface DateRange {
  start?: string;
  end?: string;
}

/**
 * All present criteria must hold (conjunction)
 */
export interface TopicFilter {
  end_date_range?: DateRange;
  outcome_types?: readonly string[];
  /** Case-insensitive; matches when any category overlaps */
  categories?: readonly string[];
  /** Matches when any keyword appears in the question */
  keywords?: readonly string[];
  /** Excludes when any keyword appears in the question */
  exclude_keywords?: readonly string[];
  /** Applies to last_price */
  price_range?: NumericRange;
  volume_range?: NumericRange;
  created_after?: string;
}

export interface TopicSort {
  field?: string;
  order?: string;
}

export interface PaginationInput {
  limit?: number;
  offset?: number;
}

export interface TopicPage {
  items: Topic[];
  total: number;
  limit: number;
  offset: number;
}

export type GetTopicResult =
  | { ok: true; topic: Topic }
  | { ok: false; error: TopicNotFoundError };

export interface QueryLimits {
  defaultLimit: number;
  maxLimit: number;
  searchMaxLimit: number;
}

export const DEFAULT_QUERY_LIMITS: QueryLimits = {
  defaultLimit: 50,
  maxLimit: 200,
  searchMaxLimit: 100,
};

// ============================================================
// Compiled query (validated, ready to evaluate)
// ============================================================

interface CompiledFilter {
  endDateStart: number | null;
  endDateEnd: number | null;
  outcomeTypes: Set<OutcomeType> | null;
  categories: Set<string> | null;
  keywords: string[] | null;
  excludeKeywords: string[] | null;
  priceMin: number | null;
  priceMax: number | null;
  volumeMin: number | null;
  volumeMax: number | null;
  createdAfter: number | null;
}

interface CompiledSort {
  field: SortField;
  order: SortOrder;
}

function isSortField(value: string): value is SortField {
  return SORT_FIELDS.some((field) => field === value);
}

function isOutcomeType(value: string): value is OutcomeType {
  return OUTCOME_TYPES.some((type) => type === value);
}

function parseDate(parameter: string, value: string | undefined): number | null {
  if (value === undefined) return null;
  const ms = Date.parse(value);
  if (Number.isNaN(ms)) {
    throw new InvalidFilterError(parameter, "not a valid date", value);
  }
  return ms;
}

function checkNumber(parameter: string, value: number | undefined): number | null {
  if (value === undefined) return null;
  if (!Number.isFinite(value)) {
    throw new InvalidFilterError(parameter, "not a finite number", value);
  }
  return value;
}

function lowerList(values: readonly string[] | undefined): string[] | null {
  if (!values || values.length === 0) return null;
  const lowered = values.map((v) => v.trim().toLowerCase()).filter((v) => v.length > 0);
  return lowered.length > 0 ? lowered : null;
}

export function compileFilter(filter: TopicFilter = {}): CompiledFilter {
  const endDateStart = parseDate("end_date_range.start", filter.end_date_range?.start);
  const endDateEnd = parseDate("end_date_range.end", filter.end_date_range?.end);
  if (endDateStart !== null && endDateEnd !== null && endDateStart > endDateEnd) {
    throw new InvalidFilterError("end_date_range", "start is after end", filter.end_date_range);
  }

  let outcomeTypes: Set<OutcomeType> | null = null;
  if (filter.outcome_types && filter.outcome_types.length > 0) {
    outcomeTypes = new Set();
    for (const raw of filter.outcome_types) {
      const value = raw.toLowerCase();
      if (!isOutcomeType(value)) {
        throw new InvalidFilterError("outcome_types", `unknown outcome type '${raw}'`, raw);
      }
      outcomeTypes.add(value);
    }
  }

  const priceMin = checkNumber("price_range.min", filter.price_range?.min);
  const priceMax = checkNumber("price_range.max", filter.price_range?.max);
  if (priceMin !== null && priceMax !== null && priceMin > priceMax) {
    throw new InvalidFilterError("price_range", "min is greater than max", filter.price_range);
  }

  const volumeMin = checkNumber("volume_range.min", filter.volume_range?.min);
  const volumeMax = checkNumber("volume_range.max", filter.volume_range?.max);
  if (volumeMin !== null && volumeMax !== null && volumeMin > volumeMax) {
    throw new InvalidFilterError("volume_range", "min is greater than max", filter.volume_range);
  }

  const categories = lowerList(filter.categories);

  return {
    endDateStart,
    endDateEnd,
    outcomeTypes,
    categories: categories ? new Set(categories) : null,
    keywords: lowerList(filter.keywords),
    excludeKeywords: lowerList(filter.exclude_keywords),
    priceMin,
    priceMax,
    volumeMin,
    volumeMax,
    createdAfter: parseDate("created_after", filter.created_after),
  };
}

export function compileSort(sort: TopicSort = {}): CompiledSort {
  const field = sort.field ?? "end_date";
  if (!isSortField(field)) {
    throw new InvalidFilterError("sort.field", `must be one of ${SORT_FIELDS.join(", ")}`, field);
  }
  const order = (sort.order ?? "asc").toLowerCase();
  if (order !== "asc" && order !== "desc") {
    throw new InvalidFilterError("sort.order", "must be asc or desc", sort.order);
  }
  return { field, order };
}

// ============================================================
// Evaluation
// ============================================================

function inRange(value: number, min: number | null, max: number | null): boolean {
  if (min !== null && value < min) return false;
  if (max !== null && value > max) return false;
  return true;
}

export function matchesFilter(topic: Topic, filter: CompiledFilter): boolean {
  if (filter.endDateStart !== null || filter.endDateEnd !== null) {
    if (topic.end_date === null) return false;
    const endDate = Date.parse(topic.end_date);
    if (Number.isNaN(endDate) || !inRange(endDate, filter.endDateStart, filter.endDateEnd)) {
      return false;
    }
  }

  if (filter.outcomeTypes && !filter.outcomeTypes.has(topic.outcome_type)) {
    return false;
  }

  if (filter.categories) {
    const wanted = filter.categories;
    if (!topic.categories.some((category) => wanted.has(category.toLowerCase()))) {
      return false;
    }
  }

  if (filter.keywords || filter.excludeKeywords) {
    const question = topic.question.toLowerCase();
    if (filter.keywords && !filter.keywords.some((k) => question.includes(k))) return false;
    if (filter.excludeKeywords && filter.excludeKeywords.some((k) => question.includes(k))) {
      return false;
    }
  }

  if (filter.priceMin !== null || filter.priceMax !== null) {
    if (topic.last_price === null) return false;
    if (!inRange(Number(topic.last_price), filter.priceMin, filter.priceMax)) return false;
  }

  if (!inRange(topic.volume, filter.volumeMin, filter.volumeMax)) {
    return false;
  }

  if (filter.createdAfter !== null) {
    if (topic.created_at === null) return false;
    const createdAt = Date.parse(topic.created_at);
    if (Number.isNaN(createdAt) || createdAt <= filter.createdAfter) return false;
  }

  return true;
}

function sortValue(topic: Topic, field: SortField): number | null {
  switch (field) {
    case "volume":
      return topic.volume;
    case "last_price":
      return topic.last_price === null ? null : Number(topic.last_price);
    case "end_date":
    case "created_at":
    case "updated_at": {
      const raw = topic[field];
      if (raw === null) return null;
      const ms = Date.parse(raw);
      return Number.isNaN(ms) ? null : ms;
    }
  }
}

/**
 * Nulls last in both orders; ties broken by market_id ascending
 */
export function compareTopics(a: Topic, b: Topic, sort: CompiledSort): number {
  const av = sortValue(a, sort.field);
  const bv = sortValue(b, sort.field);

  if (av === null || bv === null) {
    if (av !== null) return -1;
    if (bv !== null) return 1;
  } else if (av !== bv) {
    return sort.order === "asc" ? av - bv : bv - av;
  }
  return a.market_id - b.market_id;
}

// ============================================================
// QueryEngine
// ============================================================

/**
 * QueryEngine
 *
 * Stateless over the store: every call works on a point-in-time copy from
 * getAll(), so concurrent stream writes never show up half-applied.
 */
export class QueryEngine {
  constructor(
    private readonly store: EntityStore,
    private readonly index: SearchIndex,
    private readonly limits: QueryLimits = DEFAULT_QUERY_LIMITS
  ) {}

  list(filter: TopicFilter = {}, sort: TopicSort = {}, pagination: PaginationInput = {}): TopicPage {
    // Validate everything before reading the store
    const compiledFilter = compileFilter(filter);
    const compiledSort = compileSort(sort);
    const { limit, offset } = this.resolvePagination(pagination);

    const matched = this.store
      .getAll()
      .filter((topic) => matchesFilter(topic, compiledFilter))
      .sort((a, b) => compareTopics(a, b, compiledSort));

    return {
      items: matched.slice(offset, offset + limit),
      total: matched.length,
      limit,
      offset,
    };
  }

  getById(id: string): GetTopicResult {
    const marketId = parseMarketId(id);
    const topic = marketId !== null ? this.store.get(marketId) : undefined;
    if (!topic) {
      return { ok: false, error: new TopicNotFoundError(id) };
    }
    return { ok: true, topic };
  }

  /**
   * Ids come from the index and are resolved against the store at call time
   */
  search(query: string, limit?: number, fuzzy = true): Topic[] {
    const effectiveLimit = this.resolveSearchLimit(limit);

    const topics: Topic[] = [];
    for (const id of this.index.search(query, { fuzzy })) {
      const topic = this.store.get(id);
      if (topic) topics.push(topic);
      if (topics.length >= effectiveLimit) break;
    }
    return topics;
  }

  /**
   * Limit a search call with this argument actually applies
   */
  resolveSearchLimit(limit?: number): number {
    return this.clampLimit("limit", limit ?? this.limits.searchMaxLimit, this.limits.searchMaxLimit);
  }

  private resolvePagination(pagination: PaginationInput): { limit: number; offset: number } {
    const offset = pagination.offset ?? 0;
    if (!Number.isInteger(offset) || offset < 0) {
      throw new InvalidFilterError("offset", "must be a non-negative integer", offset);
    }
    const limit = this.clampLimit(
      "limit",
      pagination.limit ?? this.limits.defaultLimit,
      this.limits.maxLimit
    );
    return { limit, offset };
  }

  private clampLimit(parameter: string, value: number, max: number): number {
    if (!Number.isInteger(value)) {
      throw new InvalidFilterError(parameter, "must be an integer", value);
    }
    return Math.min(Math.max(value, 1), max);
  }
}
