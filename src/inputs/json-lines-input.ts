/**
 * JSON Lines Input - Reads one record per line from a file
 */
import { Effect, Stream } from "effect"
import * as Schema from "effect/Schema"
import * as fs from "node:fs/promises"
import type { Input, Message } from "../core/types.js"
import { createMessage } from "../core/types.js"
import { createRecord } from "../core/record.js"
import { type RecordSchema, RecordSchemaSchema, inferSchema } from "../core/schema.js"
import { ComponentError, type ErrorCategory } from "../core/errors.js"
import { validate, NonEmptyString } from "../core/validation.js"
import { parseJson } from "../core/json.js"

export interface JsonLinesInputConfig {
  readonly path: string
  readonly schema?: RecordSchema  // Static schema shared by every record
}

export class JsonLinesInputError extends ComponentError {
  readonly _tag = "JsonLinesInputError"
  readonly category: ErrorCategory = "fatal"

  constructor(
    message: string,
    readonly path: string,
    readonly line?: number,
    cause?: unknown
  ) {
    super(message, cause)
  }
}

/**
 * Validation schema for JSON Lines Input configuration
 */
export const JsonLinesInputConfigSchema = Schema.Struct({
  path: NonEmptyString,
  schema: Schema.optional(RecordSchemaSchema),
})

const isValueMap = (value: unknown): value is Record<string, unknown> =>
  value !== null && typeof value === "object" && !Array.isArray(value)

/**
 * Parse a single line into a message
 */
const parseLine = (
  config: JsonLinesInputConfig,
  text: string,
  line: number
): Effect.Effect<Message, JsonLinesInputError> =>
  Effect.gen(function* () {
    const parsed = yield* Effect.try({
      try: () => parseJson(text),
      catch: (error) =>
        new JsonLinesInputError(
          `Invalid JSON at ${config.path}:${line}`,
          config.path,
          line,
          error
        ),
    })

    if (!isValueMap(parsed)) {
      return yield* Effect.fail(
        new JsonLinesInputError(
          `Expected a JSON object at ${config.path}:${line}`,
          config.path,
          line
        )
      )
    }

    const schema = config.schema ?? inferSchema("record", parsed)

    return createMessage(createRecord(schema, parsed), {
      source: "json-lines-input",
      path: config.path,
      line,
    })
  })

/**
 * Create JSON Lines Input component
 *
 * @example
 * ```typescript
 * const input = createJsonLinesInput({
 *   path: "./people.jsonl",
 *   schema: {
 *     name: "person",
 *     fields: [{ name: "name", type: "string" }]
 *   }
 * })
 * ```
 */
export const createJsonLinesInput = (
  config: JsonLinesInputConfig
): Input<JsonLinesInputError> => {
  // Validate configuration synchronously
  Effect.runSync(
    validate(JsonLinesInputConfigSchema, config, "JSON Lines Input configuration").pipe(
      Effect.orDie
    )
  )

  const readLines = Effect.tryPromise({
    try: () => fs.readFile(config.path, "utf-8"),
    catch: (error) =>
      new JsonLinesInputError(`Cannot read file: ${config.path}`, config.path, undefined, error),
  }).pipe(
    Effect.map((content) =>
      content
        .split(/\r?\n/)
        .map((text, index) => ({ text, line: index + 1 }))
        .filter(({ text }) => text.trim().length > 0)
    )
  )

  const stream = Stream.fromEffect(readLines).pipe(
    Stream.flatMap((lines) => Stream.fromIterable(lines)),
    Stream.mapEffect(({ text, line }) => parseLine(config, text, line))
  )

  return {
    name: "json-lines-input",
    schema: config.schema,
    stream,
  }
}
