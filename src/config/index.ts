// src/config/index.ts
// Environment configuration loader

import { z } from "zod";
import { ConfigurationError } from "../errors";
import { LOG_LEVELS, type LogLevel } from "../utils/logger";

const intFromEnv = (fallback: number, min = 0) =>
  z
    .string()
    .optional()
    .transform((v) => (v === undefined || v.trim() === "" ? String(fallback) : v))
    .pipe(z.coerce.number().int().min(min));

/**
 * Raw environment schema. Unknown variables are ignored.
 */
export const EnvSchema = z.object({
  HOST: z.string().default("0.0.0.0"),
  PORT: intFromEnv(8000, 1),
  LOG_LEVEL: z
    .string()
    .default("info")
    .transform((v) => v.toLowerCase())
    .pipe(z.enum(LOG_LEVELS)),

  OPINION_API_KEY: z.string().default(""),
  OPINION_API_URL: z.string().url().default("https://proxy.opinion.trade:8443/openapi"),
  OPINION_WS_API_KEY: z.string().default(""),
  OPINION_WS_URL: z.string().url().default("wss://ws.opinion.trade"),
  OPINION_WS_HEARTBEAT_INTERVAL_MS: intFromEnv(30000, 1000),
  CONNECT_TIMEOUT_MS: intFromEnv(15000, 100),
  RECONNECT_BASE_DELAY_MS: intFromEnv(1000, 1),
  MAX_RECONNECT_DELAY_MS: intFromEnv(60000, 1),

  SNAPSHOT_PAGE_SIZE: intFromEnv(100, 1),
  SNAPSHOT_MAX_MARKETS: intFromEnv(500, 1),
  SNAPSHOT_TIMEOUT_MS: intFromEnv(30000, 100),

  DEFAULT_LIMIT: intFromEnv(50, 1),
  MAX_LIMIT: intFromEnv(200, 1),
  SEARCH_MAX_LIMIT: intFromEnv(100, 1),
});

export interface AppConfig {
  host: string;
  port: number;
  logLevel: LogLevel;
  upstream: {
    apiKey: string;
    restUrl: string;
    pageSize: number;
    maxMarkets: number;
    timeoutMs: number;
  };
  stream: {
    apiKey: string;
    url: string;
    heartbeatIntervalMs: number;
    connectTimeoutMs: number;
    reconnectBaseDelayMs: number;
    maxReconnectDelayMs: number;
  };
  query: {
    defaultLimit: number;
    maxLimit: number;
    searchMaxLimit: number;
  };
}

/**
 * Parse configuration from environment variables
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const keys = [...new Set(result.error.issues.map((issue) => String(issue.path[0])))];
    throw new ConfigurationError(keys);
  }

  const raw = result.data;

  if (raw.MAX_RECONNECT_DELAY_MS < raw.RECONNECT_BASE_DELAY_MS) {
    throw new ConfigurationError(
      ["MAX_RECONNECT_DELAY_MS"],
      "MAX_RECONNECT_DELAY_MS must not be below RECONNECT_BASE_DELAY_MS"
    );
  }
  if (raw.DEFAULT_LIMIT > raw.MAX_LIMIT) {
    throw new ConfigurationError(["DEFAULT_LIMIT"], "DEFAULT_LIMIT must not exceed MAX_LIMIT");
  }

  return {
    host: raw.HOST,
    port: raw.PORT,
    logLevel: raw.LOG_LEVEL,
    upstream: {
      apiKey: raw.OPINION_API_KEY,
      restUrl: raw.OPINION_API_URL.replace(/\/+$/, ""),
      pageSize: raw.SNAPSHOT_PAGE_SIZE,
      maxMarkets: raw.SNAPSHOT_MAX_MARKETS,
      timeoutMs: raw.SNAPSHOT_TIMEOUT_MS,
    },
    stream: {
      apiKey: raw.OPINION_WS_API_KEY,
      url: raw.OPINION_WS_URL,
      heartbeatIntervalMs: raw.OPINION_WS_HEARTBEAT_INTERVAL_MS,
      connectTimeoutMs: raw.CONNECT_TIMEOUT_MS,
      reconnectBaseDelayMs: raw.RECONNECT_BASE_DELAY_MS,
      maxReconnectDelayMs: raw.MAX_RECONNECT_DELAY_MS,
    },
    query: {
      defaultLimit: raw.DEFAULT_LIMIT,
      maxLimit: raw.MAX_LIMIT,
      searchMaxLimit: raw.SEARCH_MAX_LIMIT,
    },
  };
}
