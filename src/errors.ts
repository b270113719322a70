// src/errors.ts
// Typed error hierarchy for consistent API and stream error handling

/**
 * Error codes for programmatic error handling
 */
export type ErrorCode =
  // Validation errors
  | "MISSING_FIELD"
  | "INVALID_FIELD"
  | "INVALID_FILTER"
  // Resource errors
  | "TOPIC_NOT_FOUND"
  | "ROUTE_NOT_FOUND"
  // Stream errors (contained inside the connection/dispatcher boundary)
  | "MALFORMED_MESSAGE"
  | "UNKNOWN_ENTITY"
  | "TRANSPORT_FAILURE"
  // Network/External
  | "UPSTREAM_ERROR"
  | "TIMEOUT"
  // Internal
  | "CONFIGURATION_ERROR"
  | "INTERNAL_ERROR";

/**
 * HTTP status for each error code
 */
export type ErrorStatus = 400 | 404 | 500 | 502 | 503 | 504;

export const ERROR_STATUS: Record<ErrorCode, ErrorStatus> = {
  MISSING_FIELD: 400,
  INVALID_FIELD: 400,
  INVALID_FILTER: 400,
  TOPIC_NOT_FOUND: 404,
  ROUTE_NOT_FOUND: 404,
  MALFORMED_MESSAGE: 500,
  UNKNOWN_ENTITY: 500,
  TRANSPORT_FAILURE: 503,
  UPSTREAM_ERROR: 502,
  TIMEOUT: 504,
  CONFIGURATION_ERROR: 500,
  INTERNAL_ERROR: 500,
};

/**
 * Base API error class with error codes
 */
export class APIError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
    public readonly retryable: boolean = false
  ) {
    super(message);
    this.name = "APIError";
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, APIError);
    }
  }

  get status(): ErrorStatus {
    return ERROR_STATUS[this.code];
  }

  toJSON(): {
    error: string;
    code: ErrorCode;
    message: string;
    details?: Record<string, unknown>;
    retryable: boolean;
  } {
    return {
      error: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
      retryable: this.retryable,
    };
  }
}

/**
 * Validation errors - malformed request data
 */
export class ValidationError extends APIError {
  constructor(
    code: ErrorCode,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(code, message, details, false);
    this.name = "ValidationError";
  }
}

/**
 * Invalid field value
 */
export class InvalidFieldError extends ValidationError {
  constructor(
    field: string,
    value: unknown,
    expected?: string
  ) {
    const msg = expected
      ? `Invalid value for '${field}': expected ${expected}`
      : `Invalid value for field '${field}'`;
    super("INVALID_FIELD", msg, { field, value, expected });
    this.name = "InvalidFieldError";
  }
}

/**
 * Filter, sort or pagination parameter that cannot be evaluated
 * (inverted range, unknown sort field, unparseable date).
 * Raised before any store access.
 */
export class InvalidFilterError extends ValidationError {
  constructor(parameter: string, reason: string, value?: unknown) {
    super("INVALID_FILTER", `Invalid filter parameter '${parameter}': ${reason}`, {
      parameter,
      reason,
      value,
    });
    this.name = "InvalidFilterError";
  }
}

/**
 * Resource not found errors
 */
export class NotFoundError extends APIError {
  constructor(code: ErrorCode, resource: string, identifier: string) {
    super(code, `${resource} not found: ${identifier}`, {
      resource,
      identifier,
    });
    this.name = "NotFoundError";
  }
}

export class TopicNotFoundError extends NotFoundError {
  constructor(id: string) {
    super("TOPIC_NOT_FOUND", "Topic", id);
    this.name = "TopicNotFoundError";
  }
}

/**
 * Frame that could not be parsed or failed schema validation
 */
export class MalformedMessageError extends APIError {
  constructor(reason: string, msgType: string | null, sample?: string) {
    super("MALFORMED_MESSAGE", `Malformed stream message: ${reason}`, {
      msgType,
      sample: sample?.slice(0, 200),
    });
    this.name = "MalformedMessageError";
  }
}

/**
 * Valid message for a market that is not in the store
 */
export class UnknownEntityError extends APIError {
  constructor(marketId: number, msgType: string) {
    super("UNKNOWN_ENTITY", `No topic for market ${marketId}`, { marketId, msgType });
    this.name = "UnknownEntityError";
  }
}

/**
 * Connection drop, connect timeout or heartbeat timeout
 */
export class TransportError extends APIError {
  constructor(message: string, originalError?: unknown) {
    super(
      "TRANSPORT_FAILURE",
      message,
      {
        originalError: originalError instanceof Error ? originalError.message : originalError,
      },
      true
    );
    this.name = "TransportError";
  }
}

/**
 * Upstream REST API error (initial snapshot)
 */
export class UpstreamError extends APIError {
  constructor(message: string, status?: number, body?: string) {
    super("UPSTREAM_ERROR", message, { status, body: body?.slice(0, 500) }, true);
    this.name = "UpstreamError";
  }
}

/**
 * Configuration error - invalid or missing environment variables
 */
export class ConfigurationError extends APIError {
  constructor(invalidKeys: string[], message?: string) {
    super(
      "CONFIGURATION_ERROR",
      message ?? `Invalid configuration: ${invalidKeys.join(", ")}`,
      { invalidKeys },
      false
    );
    this.name = "ConfigurationError";
  }
}

/**
 * Check if an error is an APIError
 */
export function isAPIError(error: unknown): error is APIError {
  return error instanceof APIError;
}

/**
 * Convert any error to an APIError
 */
export function toAPIError(error: unknown): APIError {
  if (isAPIError(error)) {
    return error;
  }
  if (error instanceof Error) {
    return new APIError("INTERNAL_ERROR", error.message, {
      stack: error.stack,
    });
  }
  return new APIError("INTERNAL_ERROR", String(error));
}
