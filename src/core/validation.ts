/**
 * Configuration validation using Effect Schema
 */
import * as Schema from "effect/Schema"
import { Effect } from "effect"
import { ComponentError, type ErrorCategory } from "./errors.js"

export class ValidationError extends ComponentError {
  readonly _tag = "ValidationError"
  readonly category: ErrorCategory = "logical"

  constructor(
    message: string,
    cause?: unknown
  ) {
    super(message, cause)
  }
}

/**
 * Validate a value against a schema
 */
export const validate = <A, I>(
  schema: Schema.Schema<A, I>,
  value: unknown,
  context: string
): Effect.Effect<A, ValidationError> =>
  Effect.gen(function* () {
    const result = yield* Schema.decodeUnknown(schema)(value).pipe(
      Effect.mapError((error) => {
        const message = `Invalid ${context}: ${error.message}`
        return new ValidationError(message, error)
      })
    )
    return result
  })

/**
 * Common validation schemas
 */

// Positive integer
export const PositiveInt = Schema.Int.pipe(Schema.positive())

// Non-negative integer
export const NonNegativeInt = Schema.Int.pipe(Schema.nonNegative())

// Non-empty string
export const NonEmptyString = Schema.String.pipe(
  Schema.minLength(1, {
    message: () => "String cannot be empty"
  })
)

// A comma separated list of names, or a YAML list of them
export const FieldList = Schema.Union(Schema.String, Schema.Array(Schema.String))
