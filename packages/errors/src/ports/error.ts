/**
 * Machine-readable error code, e.g. `"coercion_failed"`.
 */
export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to an error: the offending key, the source
 * kind, the raw input. Keeps the message free of string munging.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode

  readonly context: ErrorContext

  /** `true` if trying again without changing anything might succeed */
  readonly isRetryable: boolean

  /**
   * `true` for expected failures caused by the outside world (bad input, a
   * missing setting, an unreadable file); `false` for programmer errors.
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  /**
   * See {@link https://developer.mozilla.org/en-US/docs/Web/JavaScript/Reference/Global_Objects/Error/cause Error.cause}
   */
  readonly cause?: unknown
}

/**
 * JSON-safe error shape for logs and diagnostics output.
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
