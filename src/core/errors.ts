/**
 * Error Classes for order-sync
 * Structured error handling with error codes
 */

/**
 * Error codes for categorizing errors
 */
export enum ErrorCode {
  // Configuration errors (1xxx)
  CONFIG_INVALID = "E1000",
  CONFIG_NOT_FOUND = "E1001",

  // Source / registry errors (2xxx)
  SOURCE_READ_FAILED = "E2000",
  SOURCE_ROW_INVALID = "E2001",
  REGISTRY_INVALID = "E2002",
  PRODUCT_NOT_MAPPED = "E2003",

  // Validation errors (3xxx)
  VALIDATION_REQUIRED_MISSING = "E3000",
  VALIDATION_DUPLICATE_IDENTITY = "E3001",
  VALIDATION_BLOCKED_BY_POLICY = "E3002",

  // Identity store errors (4xxx)
  STORE_UNAVAILABLE = "E4000",
  STORE_READ_FAILED = "E4001",
  STORE_WRITE_FAILED = "E4002",
  STORE_CORRUPT = "E4003",

  // Remote tracker errors (5xxx)
  TRACKER_UNREACHABLE = "E5000",
  TRACKER_REJECTED = "E5001",
  TRACKER_NOT_FOUND = "E5002",
  TRACKER_CONFLICT = "E5003",
  TRACKER_RATE_LIMITED = "E5004",
  TRACKER_TIMEOUT = "E5005",
  TRACKER_PROJECT_NOT_FOUND = "E5006",
  TRACKER_TYPE_NOT_FOUND = "E5007",

  // Reconciliation errors (6xxx)
  RECONCILE_RETRIES_EXHAUSTED = "E6000",
  RECONCILE_ORDER_FAILED = "E6001",
  RECONCILE_CANCELLED = "E6002",

  // General errors (9xxx)
  UNKNOWN_ERROR = "E9000",
  INVALID_ARGUMENT = "E9001",
}

/**
 * Base error class for all order-sync errors
 */
export class SyncError extends Error {
  public readonly code: ErrorCode;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "SyncError";
    this.code = code;
    this.timestamp = new Date();
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      stack: this.stack,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.name}: ${this.message}`;
  }
}

export class ConfigurationError extends SyncError {
  constructor(message: string, code: ErrorCode = ErrorCode.CONFIG_INVALID, context?: Record<string, unknown>) {
    super(message, code, context);
    this.name = "ConfigurationError";
  }
}

/**
 * Source reader and product registry errors
 */
export class SourceError extends SyncError {
  constructor(message: string, code: ErrorCode = ErrorCode.SOURCE_READ_FAILED, context?: Record<string, unknown>) {
    super(message, code, context);
    this.name = "SourceError";
  }
}

/**
 * Raised by identity-store backends whenever the backing storage cannot
 * answer. A lookup that fails must surface as this error, never as "not found".
 */
export class IdentityStoreError extends SyncError {
  constructor(message: string, code: ErrorCode = ErrorCode.STORE_UNAVAILABLE, context?: Record<string, unknown>) {
    super(message, code, context);
    this.name = "IdentityStoreError";
  }
}

/**
 * Remote tracker errors
 */
export class TrackerError extends SyncError {
  public readonly status: number;
  public readonly retryAfterMs?: number;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.TRACKER_REJECTED,
    context?: Record<string, unknown> & { status?: number; retryAfterMs?: number }
  ) {
    super(message, code, context);
    this.name = "TrackerError";
    this.status = context?.status ?? 0;
    this.retryAfterMs = context?.retryAfterMs;
  }

  toString(): string {
    const status = this.status ? ` (HTTP ${this.status})` : "";
    return `[${this.code}] ${this.name}: ${this.message}${status}`;
  }
}

export class CallTimeoutError extends SyncError {
  public readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number) {
    super(message, ErrorCode.TRACKER_TIMEOUT, { timeoutMs });
    this.name = "CallTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class ReconciliationError extends SyncError {
  constructor(message: string, code: ErrorCode = ErrorCode.RECONCILE_ORDER_FAILED, context?: Record<string, unknown>) {
    super(message, code, context);
    this.name = "ReconciliationError";
  }
}

// =============================================================================
// Helpers
// =============================================================================

export function isSyncError(error: unknown): error is SyncError {
  return error instanceof SyncError;
}

/**
 * Normalizes anything thrown into an Error instance
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Short human-readable form used in per-order error lists
 */
export function describeError(error: unknown): string {
  if (isSyncError(error)) return error.toString();
  return toError(error).message;
}
