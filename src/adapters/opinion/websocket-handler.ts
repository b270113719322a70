// src/adapters/opinion/websocket-handler.ts
// Opinion WebSocket frame builder and parser

import { asMarketId } from "../../core/enums";
import type { InboundMessage, ParsedFrame } from "../../core/messages";
import type { Subscription, SubscriptionAction } from "../../core/subscription";
import { InboundFrameSchema, KNOWN_MSG_TYPES, type InboundFrame } from "../../schemas/stream";
import { BaseWebSocketHandler, type WebSocketConfig } from "../base/websocket-handler";
import type { OpinionHeartbeatFrame, OpinionSubscribeFrame } from "./types";

export const DEFAULT_OPINION_WS_URL = "wss://ws.opinion.trade";

export interface OpinionWebSocketOptions {
  url?: string;
  heartbeatIntervalMs?: number;
  reconnectBaseDelayMs?: number;
  maxReconnectDelayMs?: number;
  connectionTimeoutMs?: number;
}

/**
 * Opinion WebSocket handler
 *
 * Outbound: {"action":"SUBSCRIBE","channel":"market.last.price","marketId":2764}
 *           {"action":"HEARTBEAT"}
 * Inbound:  {"msgType":"market.last.price","marketId":2764,"tokenId":"..","outcomeSide":1,"price":"0.85"}
 */
export class OpinionWebSocketHandler extends BaseWebSocketHandler {
  readonly venue = "opinion";

  private readonly config: WebSocketConfig;

  constructor(options: OpinionWebSocketOptions = {}) {
    super();
    this.config = {
      url: options.url ?? DEFAULT_OPINION_WS_URL,
      heartbeatIntervalMs: options.heartbeatIntervalMs ?? 30000,
      reconnectBaseDelayMs: options.reconnectBaseDelayMs ?? 1000,
      maxReconnectDelayMs: options.maxReconnectDelayMs ?? 60000,
      connectionTimeoutMs: options.connectionTimeoutMs ?? 15000,
    };
  }

  getConfig(): WebSocketConfig {
    return { ...this.config };
  }

  buildSubscriptionMessage(subscription: Subscription, action: SubscriptionAction): string {
    const { channel, target } = subscription;
    const frame: OpinionSubscribeFrame =
      target.kind === "root"
        ? { action, channel, rootMarketId: target.id }
        : { action, channel, marketId: target.id };
    return JSON.stringify(frame);
  }

  buildHeartbeatMessage(): string {
    const frame: OpinionHeartbeatFrame = { action: "HEARTBEAT" };
    return JSON.stringify(frame);
  }

  /**
   * Parse incoming frame into the canonical union.
   * Control frames (PONG, acks) are recognised before schema validation.
   */
  parseMessage(rawMessage: string): ParsedFrame {
    const trimmed = rawMessage.trim();

    if (trimmed.toUpperCase() === "PONG") {
      return { type: "pong" };
    }

    if (!trimmed.startsWith("{")) {
      return { type: "malformed", reason: "non-JSON frame", msgType: null };
    }

    let payload: unknown;
    try {
      payload = JSON.parse(trimmed);
    } catch (error) {
      return { type: "malformed", reason: `invalid JSON: ${String(error)}`, msgType: null };
    }

    if (typeof payload !== "object" || payload === null || Array.isArray(payload)) {
      return { type: "malformed", reason: "frame is not an object", msgType: null };
    }

    const msgType = "msgType" in payload ? payload.msgType : undefined;

    if (msgType === undefined) {
      // Subscription/heartbeat acknowledgement: {"code":200,"msg":"..."}
      if ("code" in payload || "msg" in payload) {
        const code = "code" in payload && typeof payload.code === "number" ? payload.code : null;
        const msg = "msg" in payload && typeof payload.msg === "string" ? payload.msg : null;
        return { type: "ack", code, msg };
      }
      return { type: "malformed", reason: "missing msgType", msgType: null };
    }

    if (typeof msgType !== "string") {
      return { type: "malformed", reason: "msgType is not a string", msgType: null };
    }

    if (msgType.toUpperCase() === "PONG") {
      return { type: "pong" };
    }

    if (!KNOWN_MSG_TYPES.has(msgType)) {
      return { type: "malformed", reason: `unknown msgType '${msgType}'`, msgType };
    }

    const result = InboundFrameSchema.safeParse(payload);
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join(".") || "frame"}: ${issue.message}`)
        .join("; ");
      return { type: "malformed", reason: issues, msgType };
    }

    return { type: "message", message: toInboundMessage(result.data) };
  }
}

/**
 * Wire frame → canonical message
 */
export function toInboundMessage(frame: InboundFrame): InboundMessage {
  const base = {
    marketId: asMarketId(frame.marketId),
    tokenId: frame.tokenId,
    outcomeSide: frame.outcomeSide,
  };

  switch (frame.msgType) {
    case "market.last.price":
      return { ...base, type: frame.msgType, price: frame.price };
    case "market.last.trade":
      return {
        ...base,
        type: frame.msgType,
        side: frame.side,
        price: frame.price,
        shares: frame.shares,
        amount: frame.amount,
      };
    case "market.depth.diff":
      return { ...base, type: frame.msgType, side: frame.side, price: frame.price, size: frame.size };
  }
}
