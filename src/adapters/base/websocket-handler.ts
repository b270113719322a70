// src/adapters/base/websocket-handler.ts
// WebSocket handler interface for venue-specific framing

import type { ParsedFrame } from "../../core/messages";
import type { Subscription, SubscriptionAction } from "../../core/subscription";

/**
 * WebSocket configuration for a venue
 */
export interface WebSocketConfig {
  url: string;
  heartbeatIntervalMs: number;
  reconnectBaseDelayMs: number;
  maxReconnectDelayMs: number;
  connectionTimeoutMs: number;
}

/**
 * WebSocket handler interface
 * Each venue implements this to build outbound frames and parse inbound ones.
 * The connection itself stays venue-agnostic.
 */
export interface IWebSocketHandler {
  /** Venue this handler is for */
  readonly venue: string;

  getConfig(): WebSocketConfig;

  /**
   * Build the URL to dial, including credentials when the venue takes them in the query
   */
  buildConnectUrl(credentials: { apiKey?: string }): string;

  /**
   * Build a SUBSCRIBE/UNSUBSCRIBE frame for one subscription
   */
  buildSubscriptionMessage(subscription: Subscription, action: SubscriptionAction): string;

  /**
   * Build heartbeat frame, or null if the venue needs none
   */
  buildHeartbeatMessage(): string | null;

  /**
   * Parse one raw frame. Never throws: invalid input comes back as `malformed`.
   */
  parseMessage(rawMessage: string): ParsedFrame;
}

/**
 * Base class for WebSocket handlers with common functionality
 */
export abstract class BaseWebSocketHandler implements IWebSocketHandler {
  abstract readonly venue: string;

  abstract getConfig(): WebSocketConfig;
  abstract buildSubscriptionMessage(subscription: Subscription, action: SubscriptionAction): string;
  abstract parseMessage(rawMessage: string): ParsedFrame;
  abstract buildHeartbeatMessage(): string | null;

  buildConnectUrl(credentials: { apiKey?: string }): string {
    const url = new URL(this.getConfig().url);
    if (credentials.apiKey) {
      url.searchParams.set("apikey", credentials.apiKey);
    }
    return url.toString();
  }
}
