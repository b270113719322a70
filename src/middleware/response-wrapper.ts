// src/middleware/response-wrapper.ts
// Response standardization middleware

import { randomUUID } from "node:crypto";
import type { Context, Next } from "hono";
import { ERROR_STATUS, toAPIError, type ErrorCode } from "../errors";

// ============================================================
// Response Envelope Types
// ============================================================

export interface APIResponseMeta {
  timestamp: string;
  request_id: string;
  latency_ms: number;
}

export interface APISuccessResponse<T> {
  success: true;
  data: T;
  meta: APIResponseMeta;
}

export interface APIErrorResponse {
  success: false;
  error: {
    code: ErrorCode;
    message: string;
    details?: Record<string, unknown>;
  };
  meta: APIResponseMeta;
}

export type APIResponse<T> = APISuccessResponse<T> | APIErrorResponse;

/**
 * Per-request values shared with route handlers and the error handler
 */
export type RequestVariables = {
  requestId: string;
  startTime: number;
};

export type AppEnv = { Variables: RequestVariables };

function buildMeta(c: Context<AppEnv>): APIResponseMeta {
  const startTime = c.get("startTime") ?? Date.now();
  return {
    timestamp: new Date().toISOString(),
    request_id: c.get("requestId") ?? randomUUID(),
    latency_ms: Date.now() - startTime,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ============================================================
// Response Wrapper Middleware
// ============================================================

/**
 * Middleware that wraps JSON responses in a standard envelope
 * and adds timing/tracing headers.
 *
 * Envelope format:
 * {
 *   success: boolean,
 *   data: T (on success) | undefined,
 *   error: { code, message, details } (on error),
 *   meta: { timestamp, request_id, latency_ms }
 * }
 *
 * Thrown errors are not caught here; the app's onError renders them
 * through errorEnvelope() so they get the same shape.
 */
export function responseWrapper(options?: {
  /** Paths to skip wrapping */
  skipPaths?: string[];
  /** Custom request ID header name */
  requestIdHeader?: string;
}) {
  const skipPaths = options?.skipPaths ?? ["/health"];
  const requestIdHeader = options?.requestIdHeader ?? "X-Request-Id";

  return async (c: Context<AppEnv>, next: Next) => {
    const requestId = c.req.header(requestIdHeader) || randomUUID();
    c.set("requestId", requestId);
    c.set("startTime", Date.now());
    c.header(requestIdHeader, requestId);

    const path = new URL(c.req.url).pathname;
    if (skipPaths.some((skip) => path.startsWith(skip))) {
      await next();
      return;
    }

    await next();

    const meta = buildMeta(c);
    c.header("X-Response-Time", `${meta.latency_ms}ms`);

    const contentType = c.res.headers.get("Content-Type") || "";
    if (!contentType.includes("application/json")) {
      return;
    }

    let body: unknown;
    try {
      body = await c.res.clone().json();
    } catch {
      // Not valid JSON, leave untouched
      return;
    }

    // Error envelopes from onError already carry meta
    if (isRecord(body) && "success" in body) {
      return;
    }

    const status = c.res.status;
    const headers = new Headers(c.res.headers);
    headers.delete("Content-Length");

    let wrapped: APIResponse<unknown>;
    if (status >= 400) {
      const errorBody = isRecord(body) ? body : {};
      wrapped = {
        success: false,
        error: {
          code:
            typeof errorBody.code === "string" && isErrorCode(errorBody.code)
              ? errorBody.code
              : "INTERNAL_ERROR",
          message: typeof errorBody.message === "string" ? errorBody.message : "An error occurred",
          details: isRecord(errorBody.details) ? errorBody.details : undefined,
        },
        meta,
      };
    } else {
      wrapped = { success: true, data: body, meta };
    }

    c.res = new Response(JSON.stringify(wrapped), { status, headers });
  };
}

// ============================================================
// Helper Functions
// ============================================================

function isErrorCode(value: string): value is ErrorCode {
  return Object.hasOwn(ERROR_STATUS, value);
}

/**
 * Render any thrown error as an error envelope with its mapped status
 */
export function errorEnvelope(c: Context<AppEnv>, error: unknown): Response {
  const apiError = toAPIError(error);
  const body: APIErrorResponse = {
    success: false,
    error: {
      code: apiError.code,
      message: apiError.message,
      details: apiError.code === "INTERNAL_ERROR" ? undefined : apiError.details,
    },
    meta: buildMeta(c),
  };
  return c.json(body, apiError.status);
}
