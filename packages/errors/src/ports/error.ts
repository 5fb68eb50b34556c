/**
 * Error codes are lowercase snake_case identifiers, e.g. `backend_unavailable`.
 */
export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to an error (keys, patterns, ids).
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode

  readonly context: ErrorContext

  /** `true` when repeating the operation later may succeed. */
  readonly isRetryable: boolean

  /**
   * `true` for expected runtime failures (backend down, corrupt payload),
   * `false` for programmer errors and broken invariants.
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * JSON-safe error shape used by loggers and transports.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
