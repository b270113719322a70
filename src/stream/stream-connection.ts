// src/stream/stream-connection.ts
// Lifecycle of the single upstream WebSocket: connect, subscribe, heartbeat, reconnect

import type { IWebSocketHandler, WebSocketConfig } from "../adapters/base/websocket-handler";
import {
  isValidTransition,
  type ConnectionStatus,
  type StateTransition,
} from "../core/connection";
import type { ConnectionState } from "../core/enums";
import type { Subscription, SubscriptionAction } from "../core/subscription";
import { APIError, TransportError } from "../errors";
import { noopStreamObserver, type StreamObserver } from "../services/stream-observer";
import type { RegistryChange, SubscriptionRegistry } from "../subscriptions/registry";
import { RingBuffer } from "../utils/ring-buffer";
import type { Transport, TransportSocket } from "./transport";

// ============================================================
// Options
// ============================================================

export interface StreamConnectionOptions {
  handler: IWebSocketHandler;
  transport: Transport;
  registry: SubscriptionRegistry;
  /** Receives every inbound frame, synchronously and in wire order */
  onFrame: (raw: string) => void;
  apiKey?: string;
  observer?: StreamObserver;
  /** Defaults to 2 × heartbeat interval + 5000 */
  livenessTimeoutMs?: number;
  historySize?: number;
  /** Injectable for deterministic jitter in tests */
  random?: () => number;
}

const DEFAULT_HISTORY_SIZE = 50;

/**
 * min(base·2^(attempt-1) + jitter, max), jitter uniform in [0, 0.5·base·2^(attempt-1))
 */
export function computeBackoffDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  random: () => number = Math.random
): number {
  const exponential = baseDelayMs * Math.pow(2, Math.max(0, attempt - 1));
  const jitter = exponential * 0.5 * random();
  return Math.min(exponential + jitter, maxDelayMs);
}

/**
 * Redact the api key before a URL is reported anywhere
 */
function redactUrl(url: string): string {
  try {
    const parsed = new URL(url);
    if (parsed.searchParams.has("apikey")) {
      parsed.searchParams.set("apikey", "***");
    }
    return parsed.toString();
  } catch {
    return url;
  }
}

// ============================================================
// StreamConnection
// ============================================================

/**
 * StreamConnection
 *
 * Owns the connection state. Every socket gets a generation number; handlers
 * of a superseded or stopped socket see a stale generation and return
 * without touching anything, so nothing fires after stop() resolves.
 */
export class StreamConnection {
  private state: ConnectionState = "disconnected";
  private readonly config: WebSocketConfig;
  private readonly livenessTimeoutMs: number;
  private readonly observer: StreamObserver;
  private readonly random: () => number;
  private readonly history: RingBuffer<StateTransition>;

  private socket: TransportSocket | null = null;
  private generation = 0;
  private stopped = true;

  private connectTimer: ReturnType<typeof setTimeout> | null = null;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private heartbeatTimer: ReturnType<typeof setInterval> | null = null;

  private connectedAt: number | null = null;
  private lastMessageAt: number | null = null;
  private reconnectAttempts = 0;

  private pendingStart: (() => void) | null = null;
  private detachRegistry: (() => void) | null = null;

  constructor(private readonly options: StreamConnectionOptions) {
    this.config = options.handler.getConfig();
    this.livenessTimeoutMs =
      options.livenessTimeoutMs ?? this.config.heartbeatIntervalMs * 2 + 5000;
    this.observer = options.observer ?? noopStreamObserver;
    this.random = options.random ?? Math.random;
    this.history = new RingBuffer(options.historySize ?? DEFAULT_HISTORY_SIZE);
  }

  get currentState(): ConnectionState {
    return this.state;
  }

  /**
   * Begin connecting. Resolves once the first attempt has either reached
   * `active` or failed and scheduled a retry. Transport failures never reject.
   */
  start(): Promise<void> {
    if (!this.stopped) {
      return Promise.resolve();
    }
    this.stopped = false;
    this.detachRegistry = this.options.registry.onChange((change) =>
      this.handleRegistryChange(change)
    );

    return new Promise<void>((resolve) => {
      this.pendingStart = resolve;
      this.openSocket();
    });
  }

  /**
   * Tear down the socket and every timer. Idempotent.
   */
  async stop(): Promise<void> {
    if (this.stopped) {
      return;
    }
    this.stopped = true;
    this.generation++;

    this.detachRegistry?.();
    this.detachRegistry = null;
    this.clearTimers();
    this.closeSocket("client stop");

    if (this.state !== "disconnected") {
      this.transition("disconnected", "stopped");
    }
    this.connectedAt = null;
    this.settleStart();
  }

  status(): ConnectionStatus {
    const now = Date.now();
    return {
      state: this.state,
      url: redactUrl(this.connectUrl()),
      connectedAt: this.connectedAt !== null ? new Date(this.connectedAt).toISOString() : null,
      lastMessageAt: this.lastMessageAt !== null ? new Date(this.lastMessageAt).toISOString() : null,
      msSinceLastMessage: this.lastMessageAt !== null ? now - this.lastMessageAt : null,
      reconnectAttempts: this.reconnectAttempts,
      subscriptions: this.options.registry.size,
      heartbeatIntervalMs: this.config.heartbeatIntervalMs,
      recentTransitions: this.history.getAll(),
    };
  }

  // ============================================================
  // Connect / subscribe
  // ============================================================

  private connectUrl(): string {
    return this.options.handler.buildConnectUrl({ apiKey: this.options.apiKey });
  }

  private openSocket(): void {
    this.transition("connecting");
    const generation = ++this.generation;

    this.connectTimer = setTimeout(() => {
      this.connectTimer = null;
      this.fail(
        generation,
        new TransportError(`Connection timeout after ${this.config.connectionTimeoutMs}ms`)
      );
    }, this.config.connectionTimeoutMs);

    try {
      this.socket = this.options.transport.connect(this.connectUrl(), {
        onOpen: () => this.handleOpen(generation),
        onMessage: (data) => this.handleMessage(generation, data),
        onClose: (code, reason) =>
          this.fail(
            generation,
            new TransportError(`Socket closed: code=${code}, reason=${reason || "none"}`)
          ),
        onError: (error) => this.fail(generation, new TransportError("Socket error", error)),
      });
    } catch (error) {
      this.fail(generation, new TransportError("Failed to open socket", error));
    }
  }

  private handleOpen(generation: number): void {
    if (generation !== this.generation) return;
    this.clearConnectTimer();

    this.transition("subscribing");
    const snapshot = this.options.registry.snapshot();
    try {
      this.sendSubscriptions(snapshot, "SUBSCRIBE");
    } catch (error) {
      this.fail(generation, new TransportError("Failed to send subscriptions", error));
      return;
    }

    const now = Date.now();
    this.connectedAt = now;
    this.touch(now);
    this.reconnectAttempts = 0;
    this.transition("active", `${snapshot.length} subscriptions`);
    this.startHeartbeat(generation);
    this.settleStart();
  }

  private sendSubscriptions(
    subscriptions: readonly Subscription[],
    action: SubscriptionAction
  ): void {
    const socket = this.socket;
    if (!socket || subscriptions.length === 0) return;

    for (const subscription of subscriptions) {
      socket.send(this.options.handler.buildSubscriptionMessage(subscription, action));
    }
    this.observer.onSubscriptionsSent(action, subscriptions.length);
  }

  private handleRegistryChange(change: RegistryChange): void {
    // Anything added before `active` is covered by the snapshot sent on open
    if (this.state !== "active") return;

    const action: SubscriptionAction = change.type === "added" ? "SUBSCRIBE" : "UNSUBSCRIBE";
    try {
      this.sendSubscriptions([change.subscription], action);
    } catch (error) {
      this.fail(this.generation, new TransportError(`Failed to send ${action}`, error));
    }
  }

  // ============================================================
  // Inbound frames / liveness
  // ============================================================

  private handleMessage(generation: number, data: string): void {
    if (generation !== this.generation) return;
    this.touch(Date.now());
    this.options.onFrame(data);
  }

  /** lastMessageAt only moves forward */
  private touch(now: number): void {
    if (this.lastMessageAt === null || now > this.lastMessageAt) {
      this.lastMessageAt = now;
    }
  }

  private startHeartbeat(generation: number): void {
    this.stopHeartbeat();
    const heartbeat = this.options.handler.buildHeartbeatMessage();

    this.heartbeatTimer = setInterval(() => {
      if (generation !== this.generation) return;

      const silentFor = Date.now() - (this.lastMessageAt ?? 0);
      if (silentFor > this.livenessTimeoutMs) {
        this.fail(
          generation,
          new TransportError(`No inbound frame for ${silentFor}ms (limit ${this.livenessTimeoutMs}ms)`)
        );
        return;
      }

      if (heartbeat === null) return;
      try {
        this.socket?.send(heartbeat);
      } catch (error) {
        this.fail(generation, new TransportError("Failed to send heartbeat", error));
      }
    }, this.config.heartbeatIntervalMs);
  }

  private stopHeartbeat(): void {
    if (this.heartbeatTimer !== null) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
  }

  // ============================================================
  // Failure / reconnect
  // ============================================================

  private fail(generation: number, cause: TransportError): void {
    if (this.stopped || generation !== this.generation) return;

    // Invalidate every handler of the failed socket before anything else
    this.generation++;
    this.clearTimers();
    this.closeSocket("reconnecting");
    this.connectedAt = null;

    this.transition("reconnecting", cause.message);
    this.reconnectAttempts++;

    const delay = computeBackoffDelay(
      this.reconnectAttempts,
      this.config.reconnectBaseDelayMs,
      this.config.maxReconnectDelayMs,
      this.random
    );
    this.observer.onReconnectScheduled(this.reconnectAttempts, delay, cause);

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      if (this.stopped) return;
      this.openSocket();
    }, delay);

    this.settleStart();
  }

  private closeSocket(reason: string): void {
    const socket = this.socket;
    this.socket = null;
    socket?.close(1000, reason);
  }

  private clearConnectTimer(): void {
    if (this.connectTimer !== null) {
      clearTimeout(this.connectTimer);
      this.connectTimer = null;
    }
  }

  private clearTimers(): void {
    this.clearConnectTimer();
    this.stopHeartbeat();
    if (this.reconnectTimer !== null) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }

  private settleStart(): void {
    const resolve = this.pendingStart;
    this.pendingStart = null;
    resolve?.();
  }

  // ============================================================
  // State machine
  // ============================================================

  private transition(to: ConnectionState, reason?: string): void {
    const from = this.state;
    if (!isValidTransition(from, to)) {
      throw new APIError("INTERNAL_ERROR", `Invalid connection transition ${from} -> ${to}`, {
        from,
        to,
      });
    }

    this.state = to;
    const record: StateTransition = { from, to, at: new Date().toISOString() };
    if (reason !== undefined) record.reason = reason;
    this.history.push(record);
    this.observer.onStateChange(record);
  }
}
