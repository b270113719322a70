/**
 * HTTP API Tests
 *
 * Exercises the hono app in process through app.request().
 */

import { describe, it, expect, beforeEach } from "vitest";
import { createApp } from "../app";
import type { ConnectionStatus } from "../core/connection";
import { QueryEngine } from "../services/topic-query";
import { EntityStore } from "../store/entity-store";
import { SearchIndex } from "../store/search-index";
import type { DispatcherStats } from "../stream/dispatcher";
import { Logger } from "../utils/logger";
import { makeTopic } from "./helpers/fixtures";

const DISPATCHER_STATS: DispatcherStats = {
  received: 10,
  applied: 7,
  control: 2,
  malformed: 1,
  unknownEntity: 0,
  depthDiffs: 0,
  byType: { "market.last.price": 5, "market.last.trade": 2, "market.depth.diff": 0 },
};

function makeStatus(state: ConnectionStatus["state"]): ConnectionStatus {
  return {
    state,
    url: "wss://ws.opinion.trade/",
    connectedAt: null,
    lastMessageAt: null,
    msSinceLastMessage: null,
    reconnectAttempts: 0,
    subscriptions: 6,
    heartbeatIntervalMs: 30000,
    recentTransitions: [],
  };
}

interface Envelope {
  success: boolean;
  data?: unknown;
  error?: { code: string; message: string; details?: Record<string, unknown> };
  meta: { timestamp: string; request_id: string; latency_ms: number };
}

function isEnvelope(value: unknown): value is Envelope {
  return typeof value === "object" && value !== null && "success" in value && "meta" in value;
}

async function readEnvelope(res: Response): Promise<Envelope> {
  const body: unknown = await res.json();
  if (!isEnvelope(body)) {
    throw new Error(`not an envelope: ${JSON.stringify(body)}`);
  }
  return body;
}

describe("HTTP API", () => {
  let store: EntityStore;
  let state: ConnectionStatus["state"];
  let app: ReturnType<typeof createApp>;

  beforeEach(() => {
    store = new EntityStore();
    store.upsertStatic(
      makeTopic(2764, {
        question: "Will Bitcoin hit 150k in 2026?",
        end_date: "2026-12-31T00:00:00.000Z",
        volume: 300,
        last_price: "0.30",
      })
    );
    store.upsertStatic(
      makeTopic(2765, {
        question: "Will the Fed cut rates in March?",
        end_date: "2026-03-20T00:00:00.000Z",
        volume: 900,
        last_price: "0.55",
      })
    );
    state = "active";
    const index = new SearchIndex(store);
    app = createApp({
      query: new QueryEngine(store, index),
      connectionStatus: () => makeStatus(state),
      dispatcherStats: () => DISPATCHER_STATS,
      cacheSize: () => store.size,
      log: new Logger("error"),
    });
  });

  describe("GET /health", () => {
    it("should report healthy while the stream is active, unwrapped", async () => {
      const res = await app.request("/health");

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        status: "healthy",
        websocket: makeStatus("active"),
        cache_size: 2,
        dispatcher: DISPATCHER_STATS,
      });
    });

    it("should report degraded otherwise", async () => {
      state = "reconnecting";
      const res = await app.request("/health");
      const body: unknown = await res.json();

      expect(body).toMatchObject({ status: "degraded" });
    });
  });

  it("GET / should return the service banner in an envelope", async () => {
    const res = await app.request("/");
    const body = await readEnvelope(res);

    expect(body.success).toBe(true);
    expect(body.data).toEqual({ name: "topic-stream", version: "0.1.0", docs: "/api/v1/topics" });
    expect(typeof body.meta.latency_ms).toBe("number");
  });

  it("should echo the request id", async () => {
    const res = await app.request("/", { headers: { "X-Request-Id": "req-123" } });
    const body = await readEnvelope(res);

    expect(res.headers.get("X-Request-Id")).toBe("req-123");
    expect(body.meta.request_id).toBe("req-123");
  });

  describe("GET /api/v1/topics", () => {
    it("should list topics sorted by end date", async () => {
      const res = await app.request("/api/v1/topics");
      const body = await readEnvelope(res);

      expect(res.status).toBe(200);
      expect(body.data).toMatchObject({
        items: [{ id: "2765" }, { id: "2764" }],
        total: 2,
        limit: 50,
        offset: 0,
      });
    });

    it("should apply order_by, order and the date window", async () => {
      const res = await app.request(
        "/api/v1/topics?order_by=volume&order=desc&end_date_after=2026-01-01T00:00:00Z&limit=1"
      );
      const body = await readEnvelope(res);

      expect(body.data).toMatchObject({ items: [{ id: "2765" }], total: 2, limit: 1 });
    });

    it("should reject an unknown order_by with 400", async () => {
      const res = await app.request("/api/v1/topics?order_by=popularity");
      const body = await readEnvelope(res);

      expect(res.status).toBe(400);
      expect(body.success).toBe(false);
      expect(body.error?.code).toBe("INVALID_FIELD");
    });

    it("should reject an inverted date window with INVALID_FILTER", async () => {
      const res = await app.request(
        "/api/v1/topics?end_date_after=2026-06-01T00:00:00Z&end_date_before=2026-01-01T00:00:00Z"
      );
      const body = await readEnvelope(res);

      expect(res.status).toBe(400);
      expect(body.error?.code).toBe("INVALID_FILTER");
      expect(body.error?.details?.parameter).toBe("end_date_range");
    });
  });

  describe("GET /api/v1/topics/search", () => {
    it("should find topics fuzzily by default", async () => {
      const res = await app.request("/api/v1/topics/search?q=Bitcon");
      const body = await readEnvelope(res);

      expect(body.data).toMatchObject({ items: [{ id: "2764" }], total: 1, limit: 100, offset: 0 });
    });

    it("should honour fuzzy=false", async () => {
      const res = await app.request("/api/v1/topics/search?q=Bitcon&fuzzy=false");
      const body = await readEnvelope(res);

      expect(body.data).toEqual({ items: [], total: 0, limit: 100, offset: 0 });
    });

    it("should require q", async () => {
      const res = await app.request("/api/v1/topics/search");

      expect(res.status).toBe(400);
      expect((await readEnvelope(res)).error?.code).toBe("INVALID_FIELD");
    });

    it("should reject a limit above 100", async () => {
      const res = await app.request("/api/v1/topics/search?q=fed&limit=101");

      expect(res.status).toBe(400);
    });
  });

  describe("POST /api/v1/topics/filter", () => {
    const post = (body: unknown) =>
      app.request("/api/v1/topics/filter", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(body),
      });

    it("should filter, sort and paginate", async () => {
      const res = await post({
        filters: { keywords: ["will"], price_range: { min: "0.5" } },
        sort: { field: "volume", order: "desc" },
        pagination: { limit: 10, offset: 0 },
      });
      const body = await readEnvelope(res);

      expect(res.status).toBe(200);
      expect(body.data).toMatchObject({ items: [{ id: "2765" }], total: 1, limit: 10, offset: 0 });
    });

    it("should accept min_volume / max_volume", async () => {
      const res = await post({ filters: { min_volume: 500 } });
      const body = await readEnvelope(res);

      expect(body.data).toMatchObject({ items: [{ id: "2765" }], total: 1 });
    });

    it("should treat an empty body as no filter", async () => {
      const res = await post({});
      const body = await readEnvelope(res);

      expect(body.data).toMatchObject({ total: 2, limit: 50, offset: 0 });
    });

    it("should reject min above max with INVALID_FILTER", async () => {
      const res = await post({ filters: { volume_range: { min: 10, max: 1 } } });
      const body = await readEnvelope(res);

      expect(res.status).toBe(400);
      expect(body.error?.code).toBe("INVALID_FILTER");
    });

    it("should reject unknown fields", async () => {
      const res = await post({ filters: { colour: "blue" } });

      expect(res.status).toBe(400);
      expect((await readEnvelope(res)).error?.code).toBe("INVALID_FIELD");
    });
  });

  describe("GET /api/v1/topics/:id", () => {
    it("should return the topic", async () => {
      const res = await app.request("/api/v1/topics/2764");
      const body = await readEnvelope(res);

      expect(res.status).toBe(200);
      expect(body.data).toMatchObject({
        id: "2764",
        market_id: 2764,
        question: "Will Bitcoin hit 150k in 2026?",
        last_price: "0.30",
      });
    });

    it("should return 404 TOPIC_NOT_FOUND for an unknown id", async () => {
      const res = await app.request("/api/v1/topics/1");
      const body = await readEnvelope(res);

      expect(res.status).toBe(404);
      expect(body.error).toMatchObject({
        code: "TOPIC_NOT_FOUND",
        message: "Topic not found: 1",
      });
    });
  });

  it("should return ROUTE_NOT_FOUND for unknown paths", async () => {
    const res = await app.request("/api/v2/nothing");
    const body = await readEnvelope(res);

    expect(res.status).toBe(404);
    expect(body.error?.code).toBe("ROUTE_NOT_FOUND");
  });
});
