// src/services/topic-loader.ts
// Initial snapshot load: REST markets → EntityStore + SubscriptionRegistry

import type { IMetadataProvider, SnapshotFetchOptions } from "../adapters/base/metadata-provider";
import type { EntityStore } from "../store/entity-store";
import type { SubscriptionRegistry } from "../subscriptions/registry";
import { logger as defaultLogger, type Logger } from "../utils/logger";

export interface LoadSummary {
  loaded: number;
  skipped: number;
  pages: number;
  subscriptionsAdded: number;
  durationMs: number;
}

/**
 * Fetch the venue's active markets, upsert them and register their
 * subscriptions. Upstream failures propagate to the caller.
 */
export async function loadInitialTopics(
  provider: IMetadataProvider,
  store: EntityStore,
  registry: SubscriptionRegistry,
  options: SnapshotFetchOptions = {},
  log: Logger = defaultLogger
): Promise<LoadSummary> {
  const startTime = Date.now();
  const snapshot = await provider.fetchSnapshot(options);

  let subscriptionsAdded = 0;
  for (const topic of snapshot.topics) {
    store.upsertStatic(topic);
    subscriptionsAdded += registry.addTopic(topic);
  }

  const summary: LoadSummary = {
    loaded: snapshot.topics.length,
    skipped: snapshot.skipped,
    pages: snapshot.pages,
    subscriptionsAdded,
    durationMs: Date.now() - startTime,
  };

  log.info(
    "Loader",
    `Loaded ${summary.loaded} topics from ${provider.venue} (${summary.skipped} skipped, ${summary.pages} pages, ${summary.subscriptionsAdded} subscriptions) in ${summary.durationMs}ms`
  );
  return summary;
}
