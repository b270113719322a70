// src/tests/helpers/fixtures.ts
// Shared test fixtures: topic builder, in-process transport, recording observer

import type { StateTransition } from "../../core/connection";
import { asMarketId } from "../../core/enums";
import type { DepthDiff } from "../../core/messages";
import type { SubscriptionAction } from "../../core/subscription";
import type { Topic } from "../../core/topic";
import type { MalformedMessageError, TransportError, UnknownEntityError } from "../../errors";
import type { StreamObserver } from "../../services/stream-observer";
import type { Transport, TransportHandlers, TransportSocket } from "../../stream/transport";

export const FIXED_TIME = "2026-01-01T00:00:00.000Z";

export function makeTopic(id: number, overrides: Partial<Omit<Topic, "id" | "market_id">> = {}): Topic {
  return {
    id: String(id),
    market_id: asMarketId(id),
    question: `Topic ${id}`,
    description: null,
    categories: [],
    outcome_type: "binary",
    end_date: null,
    created_at: null,
    slug: null,
    last_price: null,
    yes_price: null,
    no_price: null,
    volume: 0,
    liquidity: null,
    updated_at: FIXED_TIME,
    version: 1,
    ...overrides,
  };
}

/**
 * Socket driven by the test. Handlers keep firing after close() so the
 * connection's own stale-socket guard is what gets exercised.
 */
export class FakeSocket implements TransportSocket {
  readonly sent: string[] = [];
  closed = false;

  constructor(
    readonly url: string,
    private readonly handlers: TransportHandlers
  ) {}

  send(data: string): void {
    if (this.closed) {
      throw new Error("socket closed");
    }
    this.sent.push(data);
  }

  close(): void {
    this.closed = true;
  }

  open(): void {
    this.handlers.onOpen();
  }

  receive(data: string): void {
    this.handlers.onMessage(data);
  }

  drop(code = 1006, reason = ""): void {
    this.handlers.onClose(code, reason);
  }

  fail(error: Error): void {
    this.handlers.onError(error);
  }
}

export class FakeTransport implements Transport {
  readonly sockets: FakeSocket[] = [];

  connect(url: string, handlers: TransportHandlers): FakeSocket {
    const socket = new FakeSocket(url, handlers);
    this.sockets.push(socket);
    return socket;
  }

  get last(): FakeSocket {
    const socket = this.sockets[this.sockets.length - 1];
    if (!socket) {
      throw new Error("no socket opened yet");
    }
    return socket;
  }
}

/**
 * Observer that keeps everything it is told
 */
export class RecordingObserver implements StreamObserver {
  readonly transitions: StateTransition[] = [];
  readonly reconnects: { attempt: number; delayMs: number; cause: TransportError }[] = [];
  readonly subscriptionsSent: { action: SubscriptionAction; count: number }[] = [];
  readonly malformed: MalformedMessageError[] = [];
  readonly unknownEntities: UnknownEntityError[] = [];
  readonly depthDiffs: DepthDiff[] = [];

  onStateChange(transition: StateTransition): void {
    this.transitions.push(transition);
  }

  onReconnectScheduled(attempt: number, delayMs: number, cause: TransportError): void {
    this.reconnects.push({ attempt, delayMs, cause });
  }

  onSubscriptionsSent(action: SubscriptionAction, count: number): void {
    this.subscriptionsSent.push({ action, count });
  }

  onMalformedMessage(error: MalformedMessageError): void {
    this.malformed.push(error);
  }

  onUnknownEntity(error: UnknownEntityError): void {
    this.unknownEntities.push(error);
  }

  onDepthDiff(message: DepthDiff): void {
    this.depthDiffs.push(message);
  }
}
