/** Machine-readable error code, e.g. `connection_error`. */
export type ErrorCode = Lowercase<string>

/**
 * Structured data carried alongside an error (namespace, key, channel...).
 * Frozen on construction.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode

  readonly context: ErrorContext

  /** `true` when the same call may succeed if repeated (e.g. a dropped connection). */
  readonly isRetryable: boolean

  /**
   * `true` for expected runtime failures (store unreachable, lock timeout),
   * `false` for misuse of the API (calling an operation before `init()`).
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * JSON-safe shape of an error, for log sinks and transport.
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
