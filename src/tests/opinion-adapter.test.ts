/**
 * Opinion REST Adapter Tests
 *
 * Normalizers, the paging metadata provider against an in-process fetch,
 * and the initial load into store and registry.
 */

import { describe, it, expect } from "vitest";
import type { IMetadataProvider } from "../adapters/base/metadata-provider";
import { OpinionMetadataProvider } from "../adapters/opinion/metadata-provider";
import {
  normalizeDate,
  normalizeDecimal,
  normalizeMarketId,
  normalizeOutcomeType,
  parseOpinionMarket,
} from "../adapters/opinion/normalizers";
import { UpstreamError } from "../errors";
import { loadInitialTopics } from "../services/topic-loader";
import { EntityStore } from "../store/entity-store";
import { SubscriptionRegistry } from "../subscriptions/registry";
import { Logger } from "../utils/logger";
import { FIXED_TIME, makeTopic } from "./helpers/fixtures";

const BASE_URL = "https://api.example.test/openapi";

interface RecordedRequest {
  url: string;
  headers: Record<string, string>;
}

function fakeFetch(responses: Array<() => Response>) {
  const requests: RecordedRequest[] = [];
  const fetchFn = async (input: string, init?: RequestInit): Promise<Response> => {
    const headers: Record<string, string> = {};
    new Headers(init?.headers).forEach((value, key) => {
      headers[key] = value;
    });
    requests.push({ url: input, headers });
    const next = responses.shift();
    if (!next) throw new Error(`unexpected request ${input}`);
    return next();
  };
  return { fetchFn, requests };
}

const json = (body: unknown, status = 200) => () =>
  new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });

describe("normalizers", () => {
  it("should accept positive integer ids from numbers or strings", () => {
    expect(normalizeMarketId(2764)).toBe(2764);
    expect(normalizeMarketId(" 12 ")).toBe(12);
    expect(normalizeMarketId("0")).toBeNull();
    expect(normalizeMarketId("abc")).toBeNull();
    expect(normalizeMarketId(1.5)).toBeNull();
    expect(normalizeMarketId(undefined)).toBeNull();
  });

  it("should keep decimal strings verbatim", () => {
    expect(normalizeDecimal("0.80")).toBe("0.80");
    expect(normalizeDecimal(0.5)).toBe("0.5");
    expect(normalizeDecimal("-1")).toBeNull();
    expect(normalizeDecimal("abc")).toBeNull();
    expect(normalizeDecimal(null)).toBeNull();
  });

  it("should read epoch seconds, epoch milliseconds and ISO strings", () => {
    expect(normalizeDate(1767225600)).toBe("2026-01-01T00:00:00.000Z");
    expect(normalizeDate(1767225600000)).toBe("2026-01-01T00:00:00.000Z");
    expect(normalizeDate("2026-01-01T00:00:00Z")).toBe("2026-01-01T00:00:00.000Z");
    expect(normalizeDate("")).toBeNull();
    expect(normalizeDate("soon")).toBeNull();
  });

  it("should return null for dates outside the representable range", () => {
    expect(normalizeDate(1e16)).toBeNull();
    expect(normalizeDate(-1e20)).toBeNull();
    expect(normalizeDate(Number.NaN)).toBeNull();
    expect(normalizeDate("+999999-01-01T00:00:00Z")).toBeNull();
    expect(parseOpinionMarket({ id: 1, question: "Far out?", endDate: 1e16 })).toMatchObject({
      market_id: 1,
      end_date: null,
    });
  });

  it("should default unknown outcome types to binary", () => {
    expect(normalizeOutcomeType(" Categorical ")).toBe("categorical");
    expect(normalizeOutcomeType("ladder")).toBe("binary");
    expect(normalizeOutcomeType(undefined)).toBe("binary");
  });

  it("should normalize a full REST market", () => {
    const topic = parseOpinionMarket(
      {
        marketId: "2764",
        title: "  Will BTC close above 150k?  ",
        categories: ["Crypto", 5, " "],
        outcomeType: "binary",
        endDate: 1767225600,
        volume: "1234.5",
        lastPrice: "0.62",
        yesPrice: 0.62,
        extra: "ignored",
      },
      new Date(FIXED_TIME)
    );

    expect(topic).toEqual({
      id: "2764",
      market_id: 2764,
      question: "Will BTC close above 150k?",
      description: null,
      categories: ["Crypto"],
      outcome_type: "binary",
      end_date: "2026-01-01T00:00:00.000Z",
      created_at: null,
      slug: null,
      last_price: "0.62",
      yes_price: "0.62",
      no_price: null,
      volume: 1234.5,
      liquidity: null,
      updated_at: FIXED_TIME,
      version: 1,
    });
  });

  it("should drop entries without an id or a question", () => {
    expect(parseOpinionMarket({ id: 5 })).toBeNull();
    expect(parseOpinionMarket({ question: "Orphan?" })).toBeNull();
    expect(parseOpinionMarket({ id: true, question: "Bad id?" })).toBeNull();
    expect(parseOpinionMarket("junk")).toBeNull();
  });
});

describe("OpinionMetadataProvider", () => {
  it("should page until the market cap and dedupe by id", async () => {
    const { fetchFn, requests } = fakeFetch([
      json({ markets: [{ id: 1, question: "One?" }, { id: 2, question: "Two?" }] }),
      json({ markets: [{ id: 1, question: "One again?" }, { id: 9 }] }),
      json({ markets: [{ id: 3, question: "Three?" }] }),
    ]);
    const provider = new OpinionMetadataProvider({ baseUrl: `${BASE_URL}/`, apiKey: "test-key", fetch: fetchFn });

    const result = await provider.fetchSnapshot({ pageSize: 2, maxMarkets: 5 });

    expect(result.topics.map((t) => t.market_id)).toEqual([1, 2, 3]);
    expect(result.skipped).toBe(2);
    expect(result.pages).toBe(3);
    expect(requests.map((r) => r.url)).toEqual([
      `${BASE_URL}/markets?limit=2&offset=0&active=true`,
      `${BASE_URL}/markets?limit=2&offset=2&active=true`,
      `${BASE_URL}/markets?limit=1&offset=4&active=true`,
    ]);
    expect(requests[0].headers).toEqual({
      accept: "application/json",
      authorization: "Bearer test-key",
    });
  });

  it("should keep loading when one market carries an out-of-range date", async () => {
    const { fetchFn } = fakeFetch([
      json({
        markets: [
          { id: 1, question: "Good?" },
          { id: 2, question: "Bad date?", endDate: 1e16, createdAt: 1e16 },
          { id: 3, question: "Also good?", endDate: 1767225600 },
        ],
      }),
    ]);
    const provider = new OpinionMetadataProvider({ baseUrl: BASE_URL, fetch: fetchFn });

    const result = await provider.fetchSnapshot();

    expect(result.topics.map((t) => [t.market_id, t.end_date])).toEqual([
      [1, null],
      [2, null],
      [3, "2026-01-01T00:00:00.000Z"],
    ]);
    expect(result.skipped).toBe(0);
  });

  it("should stop at the first short page", async () => {
    const { fetchFn, requests } = fakeFetch([json({ markets: [{ id: 7, question: "Seven?" }], total: 1 })]);
    const provider = new OpinionMetadataProvider({ baseUrl: BASE_URL, fetch: fetchFn });

    const result = await provider.fetchSnapshot();

    expect(result).toMatchObject({ skipped: 0, pages: 1 });
    expect(requests).toHaveLength(1);
    expect(requests[0].headers).toEqual({ accept: "application/json" });
  });

  it("should treat a missing markets array as an empty page", async () => {
    const { fetchFn } = fakeFetch([json({})]);
    const provider = new OpinionMetadataProvider({ baseUrl: BASE_URL, fetch: fetchFn });

    expect(await provider.fetchSnapshot()).toEqual({ topics: [], skipped: 0, pages: 1 });
  });

  it("should raise UpstreamError on a non-ok status", async () => {
    const { fetchFn } = fakeFetch([() => new Response("boom", { status: 500 })]);
    const provider = new OpinionMetadataProvider({ baseUrl: BASE_URL, fetch: fetchFn });

    const error = await provider.fetchSnapshot().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(UpstreamError);
    expect(error).toMatchObject({
      message: "Market snapshot request returned 500",
      details: { status: 500, body: "boom" },
      retryable: true,
    });
  });

  it("should raise UpstreamError on a network failure", async () => {
    const provider = new OpinionMetadataProvider({
      baseUrl: BASE_URL,
      fetch: () => Promise.reject(new Error("ECONNREFUSED")),
    });

    await expect(provider.fetchSnapshot()).rejects.toThrow("Market snapshot request failed: ECONNREFUSED");
  });

  it("should raise UpstreamError on a body that is not JSON", async () => {
    const { fetchFn } = fakeFetch([() => new Response("<html>", { status: 200 })]);
    const provider = new OpinionMetadataProvider({ baseUrl: BASE_URL, fetch: fetchFn });

    await expect(provider.fetchSnapshot()).rejects.toThrow("Market snapshot response is not JSON");
  });

  it("should raise UpstreamError on an unexpected shape", async () => {
    const { fetchFn } = fakeFetch([json({ markets: "none" })]);
    const provider = new OpinionMetadataProvider({ baseUrl: BASE_URL, fetch: fetchFn });

    await expect(provider.fetchSnapshot()).rejects.toThrow("Market snapshot response has an unexpected shape");
  });
});

describe("loadInitialTopics", () => {
  it("should upsert every topic and register its subscriptions", async () => {
    const provider: IMetadataProvider = {
      venue: "test",
      fetchSnapshot: async () => ({
        topics: [makeTopic(1), makeTopic(2, { outcome_type: "categorical" })],
        skipped: 1,
        pages: 1,
      }),
    };
    const store = new EntityStore();
    const registry = new SubscriptionRegistry();

    const summary = await loadInitialTopics(provider, store, registry, {}, new Logger("error"));

    // binary: three channels, categorical: one root price channel
    expect(summary).toMatchObject({ loaded: 2, skipped: 1, pages: 1, subscriptionsAdded: 4 });
    expect(store.size).toBe(2);
    expect(registry.size).toBe(4);
  });

  it("should propagate upstream failures", async () => {
    const provider: IMetadataProvider = {
      venue: "test",
      fetchSnapshot: () => Promise.reject(new UpstreamError("down", 503)),
    };

    await expect(
      loadInitialTopics(provider, new EntityStore(), new SubscriptionRegistry(), {}, new Logger("error"))
    ).rejects.toBeInstanceOf(UpstreamError);
  });
});
