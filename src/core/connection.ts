// src/core/connection.ts
// Connection lifecycle types shared by the stream connection and its observers

import type { ConnectionState } from "./enums";

/**
 * Allowed moves of the connection state machine
 */
export const STATE_TRANSITIONS: Readonly<Record<ConnectionState, readonly ConnectionState[]>> = {
  disconnected: ["connecting"],
  connecting: ["subscribing", "reconnecting", "disconnected"],
  subscribing: ["active", "reconnecting", "disconnected"],
  active: ["reconnecting", "disconnected"],
  reconnecting: ["connecting", "disconnected"],
};

export function isValidTransition(from: ConnectionState, to: ConnectionState): boolean {
  return STATE_TRANSITIONS[from].includes(to);
}

export interface StateTransition {
  from: ConnectionState;
  to: ConnectionState;
  at: string;         // ISO 8601
  reason?: string;
}

/**
 * Snapshot returned by StreamConnection.status()
 */
export interface ConnectionStatus {
  state: ConnectionState;
  url: string;
  connectedAt: string | null;
  lastMessageAt: string | null;
  msSinceLastMessage: number | null;
  reconnectAttempts: number;
  subscriptions: number;
  heartbeatIntervalMs: number;
  recentTransitions: StateTransition[];
}
