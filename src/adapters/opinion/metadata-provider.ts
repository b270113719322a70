// src/adapters/opinion/metadata-provider.ts
// Opinion metadata provider - fetches the initial market snapshot from the REST API

import type { Topic } from "../../core/topic";
import { UpstreamError } from "../../errors";
import type {
  FetchFn,
  IMetadataProvider,
  SnapshotFetchOptions,
  SnapshotResult,
} from "../base/metadata-provider";
import { parseOpinionMarket } from "./normalizers";
import { OpinionMarketsPageSchema, type OpinionMarketsPage } from "./types";

export const DEFAULT_OPINION_API_URL = "https://proxy.opinion.trade:8443/openapi";

export interface OpinionMetadataProviderOptions {
  baseUrl?: string;
  apiKey?: string;
  fetch?: FetchFn;
}

/**
 * Opinion metadata provider
 * GET {baseUrl}/markets?limit&offset&active=true with Bearer auth
 */
export class OpinionMetadataProvider implements IMetadataProvider {
  readonly venue = "opinion";

  private readonly baseUrl: string;
  private readonly apiKey: string | undefined;
  private readonly fetchFn: FetchFn;

  constructor(options: OpinionMetadataProviderOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_OPINION_API_URL).replace(/\/+$/, "");
    this.apiKey = options.apiKey;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
  }

  async fetchSnapshot(options: SnapshotFetchOptions = {}): Promise<SnapshotResult> {
    const pageSize = options.pageSize ?? 100;
    const maxMarkets = options.maxMarkets ?? 500;
    const timeoutMs = options.timeoutMs ?? 30000;

    const topics: Topic[] = [];
    const seen = new Set<number>();
    let skipped = 0;
    let pages = 0;
    let offset = 0;
    const now = new Date();

    while (offset < maxMarkets) {
      const limit = Math.min(pageSize, maxMarkets - offset);
      const page = await this.fetchPage(limit, offset, timeoutMs);
      pages++;

      for (const raw of page.markets) {
        const topic = parseOpinionMarket(raw, now);
        if (!topic || seen.has(topic.market_id)) {
          skipped++;
          continue;
        }
        seen.add(topic.market_id);
        topics.push(topic);
      }

      if (page.markets.length < limit) break;
      offset += page.markets.length;
    }

    return { topics, skipped, pages };
  }

  private async fetchPage(limit: number, offset: number, timeoutMs: number): Promise<OpinionMarketsPage> {
    const params = new URLSearchParams({
      limit: String(limit),
      offset: String(offset),
      active: "true",
    });
    const url = `${this.baseUrl}/markets?${params.toString()}`;

    const headers: Record<string, string> = { Accept: "application/json" };
    if (this.apiKey) {
      headers.Authorization = `Bearer ${this.apiKey}`;
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    let response: Response;
    try {
      response = await this.fetchFn(url, { headers, signal: controller.signal });
    } catch (error) {
      const reason = controller.signal.aborted
        ? `timed out after ${timeoutMs}ms`
        : error instanceof Error
          ? error.message
          : String(error);
      throw new UpstreamError(`Market snapshot request failed: ${reason}`);
    } finally {
      clearTimeout(timeoutId);
    }

    if (!response.ok) {
      const body = await response.text();
      throw new UpstreamError(`Market snapshot request returned ${response.status}`, response.status, body);
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      throw new UpstreamError(`Market snapshot response is not JSON: ${String(error)}`, response.status);
    }

    const parsed = OpinionMarketsPageSchema.safeParse(payload);
    if (!parsed.success) {
      throw new UpstreamError("Market snapshot response has an unexpected shape", response.status);
    }
    return parsed.data;
  }
}
