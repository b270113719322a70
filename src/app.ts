// src/app.ts
// HTTP surface: health, banner and the v1 topic API

import { Hono } from "hono";
import { cors } from "hono/cors";
import type { ConnectionStatus } from "./core/connection";
import { NotFoundError, toAPIError } from "./errors";
import { errorEnvelope, responseWrapper, type AppEnv } from "./middleware/response-wrapper";
import { createApiV1 } from "./routes/api-v1";
import type { QueryEngine } from "./services/topic-query";
import type { DispatcherStats } from "./stream/dispatcher";
import { logger as defaultLogger, type Logger } from "./utils/logger";

export const SERVICE_NAME = "topic-stream";
export const SERVICE_VERSION = "0.1.0";

export interface AppDependencies {
  query: QueryEngine;
  /** Live connection status, read on every /health call */
  connectionStatus: () => ConnectionStatus;
  dispatcherStats: () => DispatcherStats;
  cacheSize: () => number;
  log?: Logger;
}

export interface HealthReport {
  status: "healthy" | "degraded";
  websocket: ConnectionStatus;
  cache_size: number;
  dispatcher: DispatcherStats;
}

export function createApp(deps: AppDependencies) {
  const log = deps.log ?? defaultLogger;
  const app = new Hono<AppEnv>();

  app.use(
    "*",
    cors({
      origin: (origin) => origin || "*",
      allowMethods: ["GET", "POST", "OPTIONS"],
      allowHeaders: ["Content-Type", "X-Request-Id"],
    })
  );
  app.use("*", responseWrapper());

  app.get("/", (c) =>
    c.json({
      name: SERVICE_NAME,
      version: SERVICE_VERSION,
      docs: "/api/v1/topics",
    })
  );

  // Unwrapped: load balancers read the raw body
  app.get("/health", (c) => {
    const websocket = deps.connectionStatus();
    const report: HealthReport = {
      status: websocket.state === "active" ? "healthy" : "degraded",
      websocket,
      cache_size: deps.cacheSize(),
      dispatcher: deps.dispatcherStats(),
    };
    return c.json(report);
  });

  app.route("/api/v1", createApiV1({ query: deps.query }));

  app.notFound((c) => {
    return errorEnvelope(c, new NotFoundError("ROUTE_NOT_FOUND", "Route", `${c.req.method} ${c.req.path}`));
  });

  app.onError((error, c) => {
    const apiError = toAPIError(error);
    if (apiError.status >= 500) {
      log.error("API", `${c.req.method} ${c.req.path} failed:`, error);
    } else {
      log.debug("API", `${c.req.method} ${c.req.path} -> ${apiError.code}: ${apiError.message}`);
    }
    return errorEnvelope(c, apiError);
  });

  return app;
}
