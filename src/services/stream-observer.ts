// src/services/stream-observer.ts
// Observability sink for the stream connection and dispatcher

import type { StateTransition } from "../core/connection";
import type { DepthDiff } from "../core/messages";
import type { SubscriptionAction } from "../core/subscription";
import type { MalformedMessageError, TransportError, UnknownEntityError } from "../errors";
import { logger as defaultLogger, type Logger } from "../utils/logger";

/**
 * Structured events raised by the sync engine.
 * Core modules report here instead of writing to the console.
 */
export interface StreamObserver {
  onStateChange(transition: StateTransition): void;
  onReconnectScheduled(attempt: number, delayMs: number, cause: TransportError): void;
  onSubscriptionsSent(action: SubscriptionAction, count: number): void;
  onMalformedMessage(error: MalformedMessageError): void;
  onUnknownEntity(error: UnknownEntityError): void;
  onDepthDiff(message: DepthDiff): void;
}

export const noopStreamObserver: StreamObserver = {
  onStateChange: () => {},
  onReconnectScheduled: () => {},
  onSubscriptionsSent: () => {},
  onMalformedMessage: () => {},
  onUnknownEntity: () => {},
  onDepthDiff: () => {},
};

// Unknown-entity frames are expected (the stream covers markets we never
// loaded), so only every Nth one is logged
const UNKNOWN_ENTITY_LOG_EVERY = 100;

/**
 * Observer that writes to the shared logger
 */
export class LoggingStreamObserver implements StreamObserver {
  private unknownEntityCount = 0;

  constructor(private readonly log: Logger = defaultLogger) {}

  onStateChange(transition: StateTransition): void {
    const suffix = transition.reason ? ` (${transition.reason})` : "";
    const line = `${transition.from} -> ${transition.to}${suffix}`;
    if (transition.to === "reconnecting") {
      this.log.warn("Stream", line);
    } else {
      this.log.info("Stream", line);
    }
  }

  onReconnectScheduled(attempt: number, delayMs: number, cause: TransportError): void {
    this.log.warn(
      "Stream",
      `Reconnect attempt ${attempt} in ${Math.round(delayMs)}ms: ${cause.message}`
    );
  }

  onSubscriptionsSent(action: SubscriptionAction, count: number): void {
    this.log.info("Stream", `${action} sent for ${count} subscription(s)`);
  }

  onMalformedMessage(error: MalformedMessageError): void {
    this.log.warn("Dispatcher", error.message, error.details);
  }

  onUnknownEntity(error: UnknownEntityError): void {
    this.unknownEntityCount++;
    if (this.unknownEntityCount % UNKNOWN_ENTITY_LOG_EVERY === 1) {
      this.log.debug(
        "Dispatcher",
        `${error.message} (${this.unknownEntityCount} unknown-entity frames so far)`
      );
    }
  }

  onDepthDiff(message: DepthDiff): void {
    this.log.debug(
      "Dispatcher",
      `depth diff market=${message.marketId} side=${message.side} price=${message.price} size=${message.size}`
    );
  }
}
