/**
 * Machine-readable error code. Codes are lowercase snake_case,
 * e.g. `config_required_missing`.
 */
export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to an error (variable names, raw values, file paths).
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode

  readonly context: ErrorContext

  /**
   * Whether this is an expected runtime failure (bad input, missing file)
   * rather than a programmer error.
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  /**
   * Underlying cause
   *
   * See {@link https://developer.mozilla.org/en-US/docs/Web/JavaScript/Reference/Global_Objects/Error/cause Error.cause}
   */
  readonly cause?: unknown
}
