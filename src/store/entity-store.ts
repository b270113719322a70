// src/store/entity-store.ts
// Authoritative in-memory store of the latest state per topic

import type { MarketId } from "../core/enums";
import type { Topic, TopicPatch } from "../core/topic";

export type MutationFn = (current: Readonly<Topic>) => TopicPatch | null;

export type StoreEvent =
  | { type: "upsert"; topic: Topic; previous: Topic | undefined }
  | { type: "mutation"; topic: Topic; previous: Topic };

export type StoreListener = (event: StoreEvent) => void;

/**
 * EntityStore
 *
 * Each record is a frozen object that is replaced wholesale on every write,
 * so a reader holding a reference (or iterating getAll()) always sees one
 * complete version of the record. Writes to different markets touch
 * different map slots and never wait on each other.
 */
export class EntityStore {
  private topics: Map<MarketId, Topic> = new Map();
  private listeners: Set<StoreListener> = new Set();

  get size(): number {
    return this.topics.size;
  }

  has(id: MarketId): boolean {
    return this.topics.has(id);
  }

  get(id: MarketId): Topic | undefined {
    return this.topics.get(id);
  }

  /**
   * Point-in-time copy of all records
   */
  getAll(): Topic[] {
    return Array.from(this.topics.values());
  }

  /**
   * Insert a topic from the initial snapshot.
   * For a known id the static fields already held are kept and only the
   * snapshot's live fields are taken.
   */
  upsertStatic(topic: Topic): Topic {
    const previous = this.topics.get(topic.market_id);

    const next: Topic = previous
      ? freezeTopic({
          ...previous,
          last_price: topic.last_price ?? previous.last_price,
          yes_price: topic.yes_price ?? previous.yes_price,
          no_price: topic.no_price ?? previous.no_price,
          liquidity: topic.liquidity ?? previous.liquidity,
          volume: topic.volume,
          updated_at: topic.updated_at,
          version: previous.version + 1,
        })
      : freezeTopic({ ...topic, version: topic.version || 1 });

    this.topics.set(next.market_id, next);
    this.emit({ type: "upsert", topic: next, previous });
    return next;
  }

  /**
   * Atomic read-modify-write of one record.
   * No-op (returns undefined) when the id is absent or fn returns null.
   * Null values in the patch are ignored: live fields are never cleared.
   */
  applyMutation(id: MarketId, fn: MutationFn): Topic | undefined {
    const current = this.topics.get(id);
    if (!current) {
      return undefined;
    }

    const patch = fn(current);
    if (!patch) {
      return current;
    }

    const next = freezeTopic({
      ...current,
      last_price: patch.last_price ?? current.last_price,
      yes_price: patch.yes_price ?? current.yes_price,
      no_price: patch.no_price ?? current.no_price,
      liquidity: patch.liquidity ?? current.liquidity,
      volume: patch.volume ?? current.volume,
      updated_at: patch.updated_at ?? current.updated_at,
      version: current.version + 1,
    });

    this.topics.set(id, next);
    this.emit({ type: "mutation", topic: next, previous: current });
    return next;
  }

  /**
   * Register a listener for derived structures (search index, metrics).
   * Returns an unsubscribe function.
   */
  onChange(listener: StoreListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private emit(event: StoreEvent): void {
    for (const listener of this.listeners) {
      listener(event);
    }
  }
}

function freezeTopic(topic: Topic): Topic {
  return Object.freeze({ ...topic, categories: Object.freeze([...topic.categories]) });
}
