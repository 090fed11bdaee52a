/**
 * Core error types with categorization
 * Errors are categorized to determine handling strategy:
 * - logical: Bad data/config for a single record, log and continue
 * - fatal: Critical failures, stop immediately
 */

export type ErrorCategory = "logical" | "fatal"

/**
 * Base error class for all components
 */
export abstract class ComponentError extends Error {
  abstract readonly _tag: string
  abstract readonly category: ErrorCategory

  constructor(
    message: string,
    readonly cause?: unknown
  ) {
    super(message)
    this.name = this.constructor.name

    // Maintain proper stack trace for where our error was thrown (only in V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  /**
   * Check if error is fatal (should stop pipeline)
   */
  get isFatal(): boolean {
    return this.category === "fatal"
  }

  /**
   * Get appropriate log level for this error
   */
  get logLevel(): "debug" | "warn" | "error" {
    switch (this.category) {
      case "logical":
        return "warn"  // Bad records are expected, but worth surfacing
      case "fatal":
        return "error"
    }
  }
}

/**
 * Raised while configuring a stage: a configured field is missing from the
 * input schema or is not a string. Fatal for the deployment.
 */
export class ConfigurationError extends ComponentError {
  readonly _tag = "ConfigurationError"
  readonly category: ErrorCategory = "fatal"

  constructor(
    message: string,
    readonly field?: string,
    cause?: unknown
  ) {
    super(message, cause)
  }
}

/**
 * Raised while transforming a single record
 */
export class TransformError extends ComponentError {
  readonly _tag = "TransformError"
  readonly category: ErrorCategory = "logical"

  constructor(
    message: string,
    readonly field: string,
    cause?: unknown
  ) {
    super(message, cause)
  }
}

/**
 * Render any failure as a single line of text
 */
export const describeError = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message
  }
  if (typeof error === "string") {
    return error
  }
  if (error !== null && typeof error === "object" && "_tag" in error) {
    const tag = String(error._tag)
    return "message" in error ? `${tag}: ${String(error.message)}` : tag
  }
  return error !== null && typeof error === "object"
    ? JSON.stringify(error)
    : String(error)
}
