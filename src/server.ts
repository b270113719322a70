// src/server.ts
// Process entrypoint: wire the sync engine, load the snapshot, serve HTTP

import { serve } from "@hono/node-server";
import { OpinionMetadataProvider } from "./adapters/opinion/metadata-provider";
import { OpinionWebSocketHandler } from "./adapters/opinion/websocket-handler";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { isAPIError } from "./errors";
import { LoggingStreamObserver } from "./services/stream-observer";
import { loadInitialTopics } from "./services/topic-loader";
import { QueryEngine } from "./services/topic-query";
import { EntityStore } from "./store/entity-store";
import { SearchIndex } from "./store/search-index";
import { MessageDispatcher } from "./stream/dispatcher";
import { StreamConnection } from "./stream/stream-connection";
import { WebSocketTransport } from "./stream/transport";
import { SubscriptionRegistry } from "./subscriptions/registry";
import { logger } from "./utils/logger";

async function main(): Promise<void> {
  const config = loadConfig();
  logger.setLevel(config.logLevel);

  const store = new EntityStore();
  const index = new SearchIndex(store);
  const registry = new SubscriptionRegistry();
  const observer = new LoggingStreamObserver(logger);

  const handler = new OpinionWebSocketHandler({
    url: config.stream.url,
    heartbeatIntervalMs: config.stream.heartbeatIntervalMs,
    reconnectBaseDelayMs: config.stream.reconnectBaseDelayMs,
    maxReconnectDelayMs: config.stream.maxReconnectDelayMs,
    connectionTimeoutMs: config.stream.connectTimeoutMs,
  });
  const dispatcher = new MessageDispatcher(store, handler, { observer });
  const connection = new StreamConnection({
    handler,
    transport: new WebSocketTransport(),
    registry,
    onFrame: (raw) => dispatcher.dispatch(raw),
    apiKey: config.stream.apiKey || undefined,
    observer,
  });

  const provider = new OpinionMetadataProvider({
    baseUrl: config.upstream.restUrl,
    apiKey: config.upstream.apiKey || undefined,
  });

  try {
    await loadInitialTopics(
      provider,
      store,
      registry,
      {
        pageSize: config.upstream.pageSize,
        maxMarkets: config.upstream.maxMarkets,
        timeoutMs: config.upstream.timeoutMs,
      },
      logger
    );
  } catch (error) {
    // Serve whatever the stream delivers; /health reports an empty cache
    logger.error("Server", "Initial snapshot failed:", isAPIError(error) ? error.toJSON() : error);
  }

  await connection.start();

  const query = new QueryEngine(store, index, config.query);
  const app = createApp({
    query,
    connectionStatus: () => connection.status(),
    dispatcherStats: () => dispatcher.stats(),
    cacheSize: () => store.size,
    log: logger,
  });

  const server = serve({ fetch: app.fetch, hostname: config.host, port: config.port }, (info) => {
    logger.info("Server", `Listening on http://${info.address}:${info.port}`);
  });

  let shuttingDown = false;
  const shutdown = (signal: string): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info("Server", `${signal} received, shutting down`);

    connection
      .stop()
      .then(() => {
        index.dispose();
        server.close((error) => {
          if (error) {
            logger.error("Server", "Error closing HTTP server:", error);
            process.exitCode = 1;
          }
          logger.info("Server", "Shutdown complete");
        });
      })
      .catch((error: unknown) => {
        logger.error("Server", "Shutdown failed:", error);
        process.exit(1);
      });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((error: unknown) => {
  logger.error("Server", "Fatal startup error:", isAPIError(error) ? error.toJSON() : error);
  process.exit(1);
});
