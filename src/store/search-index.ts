// src/store/search-index.ts
// Inverted keyword index over topic text, kept in step with the EntityStore

import type { MarketId } from "../core/enums";
import type { Topic } from "../core/topic";
import type { EntityStore, StoreEvent } from "./entity-store";

export interface SearchOptions {
  fuzzy?: boolean;
  limit?: number;
}

export interface SearchIndexOptions {
  /** Upper bound on edit distance for fuzzy matches */
  maxEditDistance?: number;
  /** Minimum query token length for prefix matches */
  minPrefixLength?: number;
}

export interface SearchHit {
  id: MarketId;
  score: number;
}

const EXACT_SCORE = 3;
const PREFIX_SCORE = 2;

const TOKEN_SPLIT = /[^\p{L}\p{N}]+/u;

/**
 * Lowercase word tokens of a text ("Will BTC hit $100k?" → will, btc, hit, 100k)
 */
export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(TOKEN_SPLIT)
    .filter((token) => token.length > 0);
}

/**
 * Levenshtein distance, giving up once it exceeds `max`.
 * Returns max + 1 when the bound is exceeded.
 */
export function boundedEditDistance(a: string, b: string, max: number): number {
  if (Math.abs(a.length - b.length) > max) return max + 1;
  if (a === b) return 0;

  let previous = Array.from({ length: b.length + 1 }, (_, i) => i);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    let rowMin = i;
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      const value = Math.min(previous[j] + 1, current[j - 1] + 1, previous[j - 1] + cost);
      current.push(value);
      if (value < rowMin) rowMin = value;
    }
    if (rowMin > max) return max + 1;
    previous = current;
  }
  const distance = previous[b.length];
  return distance > max ? max + 1 : distance;
}

/**
 * SearchIndex
 *
 * token → set of market ids. Holds keys only; every hit is checked against
 * the store before it is returned. Text fields are static, so only snapshot
 * upserts reindex; price mutations leave the index alone.
 */
export class SearchIndex {
  private postings: Map<string, Set<MarketId>> = new Map();
  private docTokens: Map<MarketId, Set<string>> = new Map();
  private readonly maxEditDistance: number;
  private readonly minPrefixLength: number;
  private readonly detach: () => void;

  constructor(
    private readonly store: EntityStore,
    options: SearchIndexOptions = {}
  ) {
    this.maxEditDistance = options.maxEditDistance ?? 2;
    this.minPrefixLength = options.minPrefixLength ?? 3;

    for (const topic of store.getAll()) {
      this.indexTopic(topic);
    }
    this.detach = store.onChange((event) => this.handleStoreEvent(event));
  }

  get tokenCount(): number {
    return this.postings.size;
  }

  /**
   * Edit distance allowed for a query token of the given length
   */
  allowedDistance(tokenLength: number): number {
    if (tokenLength < 4) return 0;
    if (tokenLength < 8) return Math.min(1, this.maxEditDistance);
    return Math.min(2, this.maxEditDistance);
  }

  /**
   * Ranked ids for a query. Every query token has to match (exactly, or
   * by prefix / edit distance in fuzzy mode).
   */
  search(query: string, options: SearchOptions = {}): MarketId[] {
    return this.searchWithScores(query, options).map((hit) => hit.id);
  }

  searchWithScores(query: string, options: SearchOptions = {}): SearchHit[] {
    const queryTokens = [...new Set(tokenize(query))];
    if (queryTokens.length === 0) return [];

    let totals: Map<MarketId, number> | null = null;

    for (const queryToken of queryTokens) {
      const matches = options.fuzzy
        ? this.fuzzyMatches(queryToken)
        : this.exactMatches(queryToken);

      if (totals === null) {
        totals = matches;
      } else {
        const narrowed = new Map<MarketId, number>();
        for (const [id, score] of totals) {
          const tokenScore = matches.get(id);
          if (tokenScore !== undefined) narrowed.set(id, score + tokenScore);
        }
        totals = narrowed;
      }

      if (totals.size === 0) return [];
    }

    const hits: SearchHit[] = [];
    for (const [id, score] of totals ?? []) {
      if (this.store.has(id)) hits.push({ id, score });
    }

    hits.sort((a, b) => b.score - a.score || a.id - b.id);

    return options.limit !== undefined ? hits.slice(0, Math.max(0, options.limit)) : hits;
  }

  dispose(): void {
    this.detach();
    this.postings.clear();
    this.docTokens.clear();
  }

  private exactMatches(queryToken: string): Map<MarketId, number> {
    const matches = new Map<MarketId, number>();
    for (const id of this.postings.get(queryToken) ?? []) {
      matches.set(id, EXACT_SCORE);
    }
    return matches;
  }

  private fuzzyMatches(queryToken: string): Map<MarketId, number> {
    const matches = this.exactMatches(queryToken);
    const maxDistance = this.allowedDistance(queryToken.length);
    const allowPrefix = queryToken.length >= this.minPrefixLength;

    for (const [token, ids] of this.postings) {
      if (token === queryToken) continue;

      let score = 0;
      if (allowPrefix && token.startsWith(queryToken)) {
        score = PREFIX_SCORE;
      } else if (maxDistance > 0) {
        const distance = boundedEditDistance(queryToken, token, maxDistance);
        if (distance <= maxDistance) score = 1 / (1 + distance);
      }
      if (score === 0) continue;

      for (const id of ids) {
        const best = matches.get(id) ?? 0;
        if (score > best) matches.set(id, score);
      }
    }

    return matches;
  }

  private handleStoreEvent(event: StoreEvent): void {
    // Mutations only carry prices/volume; text is fixed at upsert
    if (event.type === "upsert") {
      this.indexTopic(event.topic);
    }
  }

  private indexTopic(topic: Topic): void {
    const tokens = new Set(
      tokenize(
        [topic.question, topic.description ?? "", topic.categories.join(" "), topic.slug ?? ""].join(" ")
      )
    );

    const previous = this.docTokens.get(topic.market_id);
    if (previous) {
      for (const token of previous) {
        if (tokens.has(token)) continue;
        const ids = this.postings.get(token);
        ids?.delete(topic.market_id);
        if (ids && ids.size === 0) this.postings.delete(token);
      }
    }

    for (const token of tokens) {
      let ids = this.postings.get(token);
      if (!ids) {
        ids = new Set();
        this.postings.set(token, ids);
      }
      ids.add(topic.market_id);
    }

    this.docTokens.set(topic.market_id, tokens);
  }
}
