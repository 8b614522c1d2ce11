import type { Milliseconds } from "@screensync/clock"

export type SyncErrorCode =
  | "network_failure"
  | "stale_data"
  | "reconciliation_mismatch"
  | "timeout"
  | "invalid_config"

/**
 * Structured metadata attached to errors (cache keys, mutation ids, limits).
 */
export type SyncErrorContext = Readonly<Record<string, unknown>>

export type SyncErrorOptions = Readonly<{
  code: SyncErrorCode
  context?: SyncErrorContext
  cause?: unknown
  isRetryable?: boolean
  isOperational?: boolean
}>

/**
 * Serialized error shape for logs and UI error surfaces. JSON.stringify-safe.
 */
export type SerializedSyncError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  isRetryable: boolean
  timestamp: string
  cause?: SerializedSyncError
}>

export class SyncError extends Error {
  readonly code: SyncErrorCode
  readonly context: SyncErrorContext
  readonly isRetryable: boolean
  readonly isOperational: boolean
  readonly timestamp: Date

  constructor(message: string, options: SyncErrorOptions) {
    super(message, { cause: options.cause })

    this.name = "SyncError"
    this.code = options.code
    this.context = Object.freeze({ ...options.context })
    this.isRetryable = options.isRetryable ?? false
    this.isOperational = options.isOperational ?? true
    this.timestamp = new Date()

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SyncError)
    }
  }

  /** A remote call threw or rejected. */
  static networkFailure(key: string, cause: unknown): SyncError {
    return new SyncError(`Remote call for "${key}" failed: ${describe(cause)}`, {
      code: "network_failure",
      context: { key },
      cause,
      isRetryable: true,
    })
  }

  /** The cache was consulted, held nothing, and fetching was not allowed. */
  static staleData(key: string): SyncError {
    return new SyncError(`No cached value for "${key}" and fetching is disallowed`, {
      code: "stale_data",
      context: { key },
      isRetryable: true,
    })
  }

  /** A confirmation arrived for an optimistic entry that is no longer tracked. */
  static reconciliationMismatch(mutationId: string): SyncError {
    return new SyncError(`No optimistic entry "${mutationId}" left to reconcile`, {
      code: "reconciliation_mismatch",
      context: { mutationId },
    })
  }

  static timeout(key: string, timeoutMs: Milliseconds): SyncError {
    return new SyncError(`Remote call for "${key}" timed out after ${timeoutMs}ms`, {
      code: "timeout",
      context: { key, timeoutMs },
      isRetryable: true,
    })
  }

  static invalidConfig(details: string): SyncError {
    return new SyncError(`Configuration validation failed:\n${details}`, {
      code: "invalid_config",
      isOperational: false,
    })
  }

  toJSON(): SerializedSyncError {
    return serializeSyncError(this)
  }
}

export function isSyncError(value: unknown): value is SyncError {
  return value instanceof SyncError
}

/**
 * Normalize any thrown value to a SyncError.
 *
 * - SyncError passes through unchanged
 * - anything else becomes a `network_failure` for `key`, with the value as cause
 */
export function toSyncError(err: unknown, key: string): SyncError {
  if (err instanceof SyncError) return err

  return SyncError.networkFailure(key, err)
}

export function serializeSyncError(err: unknown): SerializedSyncError {
  if (err instanceof SyncError) {
    return {
      name: err.name,
      code: err.code,
      message: err.message,
      context: { ...err.context },
      isRetryable: err.isRetryable,
      timestamp: err.timestamp.toISOString(),
      ...(err.cause !== undefined && { cause: serializeSyncError(err.cause) }),
    }
  }

  if (err instanceof Error) {
    return {
      name: err.name,
      code: "unknown",
      message: err.message,
      context: {},
      isRetryable: false,
      timestamp: new Date().toISOString(),
      ...(err.cause !== undefined && { cause: serializeSyncError(err.cause) }),
    }
  }

  return {
    name: "NonErrorThrown",
    code: "unknown",
    message: typeof err === "string" ? err : "Unknown error",
    context: typeof err === "string" ? {} : { value: err },
    isRetryable: false,
    timestamp: new Date().toISOString(),
  }
}

function describe(cause: unknown): string {
  if (cause instanceof Error) return cause.message
  if (typeof cause === "string") return cause

  return "Unknown error"
}
