// src/adapters/base/metadata-provider.ts
// Snapshot provider interface for loading topic metadata from a venue's REST API

import type { Topic } from "../../core/topic";

/**
 * Snapshot fetch options
 */
export interface SnapshotFetchOptions {
  /** Markets requested per page */
  pageSize?: number;
  /** Stop once this many markets have been read */
  maxMarkets?: number;
  /** Timeout per page request in milliseconds */
  timeoutMs?: number;
}

export interface SnapshotResult {
  topics: Topic[];
  /** Entries dropped because they had no usable id or question */
  skipped: number;
  pages: number;
}

/**
 * Metadata provider interface
 * Each venue implements this to normalize its market listing into topics.
 */
export interface IMetadataProvider {
  readonly venue: string;

  /**
   * Page through the venue's active markets.
   * Rejects with UpstreamError on HTTP failure or timeout.
   */
  fetchSnapshot(options?: SnapshotFetchOptions): Promise<SnapshotResult>;
}

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;
