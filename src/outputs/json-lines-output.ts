/**
 * JSON Lines Output - Writes each record as one JSON line to a file or stdout
 */
import { Console, Effect } from "effect"
import * as Schema from "effect/Schema"
import * as fs from "node:fs/promises"
import type { Output, Message } from "../core/types.js"
import { orderedValues } from "../core/record.js"
import { ComponentError, type ErrorCategory } from "../core/errors.js"
import { validate, NonEmptyString } from "../core/validation.js"
import { stringifyJson } from "../core/json.js"

export interface JsonLinesOutputConfig {
  readonly path?: string  // Omit to write to stdout
}

export class JsonLinesOutputError extends ComponentError {
  readonly _tag = "JsonLinesOutputError"
  readonly category: ErrorCategory = "fatal"

  constructor(message: string, cause?: unknown) {
    super(message, cause)
  }
}

/**
 * Validation schema for JSON Lines Output configuration
 */
export const JsonLinesOutputConfigSchema = Schema.Struct({
  path: Schema.optional(NonEmptyString),
})

/**
 * Serialize a message's record values in schema order
 */
export const toJsonLine = (msg: Message): Effect.Effect<string, JsonLinesOutputError> =>
  Effect.try({
    try: () => stringifyJson(orderedValues(msg.record)),
    catch: (error) =>
      new JsonLinesOutputError(`Cannot serialize message ${msg.id}`, error),
  })

/**
 * Create JSON Lines Output
 * The target file is truncated when the output is created.
 */
export const createJsonLinesOutput = (
  config: JsonLinesOutputConfig = {}
): Effect.Effect<Output<JsonLinesOutputError>, JsonLinesOutputError> =>
  Effect.gen(function* () {
    yield* validate(JsonLinesOutputConfigSchema, config, "JSON Lines Output configuration").pipe(
      Effect.mapError((error) => new JsonLinesOutputError(error.message, error))
    )

    const path = config.path
    let written = 0

    if (path !== undefined) {
      yield* Effect.tryPromise({
        try: () => fs.writeFile(path, "", "utf-8"),
        catch: (error) => new JsonLinesOutputError(`Cannot open file: ${path}`, error),
      })
    }

    return {
      name: "json-lines-output",

      send: (msg: Message) =>
        Effect.gen(function* () {
          const line = yield* toJsonLine(msg)

          if (path === undefined) {
            yield* Console.log(line)
          } else {
            yield* Effect.tryPromise({
              try: () => fs.appendFile(path, `${line}\n`, "utf-8"),
              catch: (error) =>
                new JsonLinesOutputError(`Cannot write to file: ${path}`, error),
            })
          }
          written++
        }),

      close: () =>
        Effect.log(`JSON Lines output closing after ${written} records`),
    }
  })
