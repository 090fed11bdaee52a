/**
 * Configuration loader and validator using Effect Schema
 */
import { Effect, pipe } from "effect"
import * as S from "effect/Schema"
import * as yaml from "yaml"
import * as fs from "node:fs/promises"
import { RecordSchemaSchema } from "./schema.js"
import { FieldList } from "./validation.js"

/**
 * Custom errors for config loading
 */
export class FileReadError {
  readonly _tag = "FileReadError"
  constructor(readonly path: string, readonly cause: unknown) {}
}

export class YamlParseError {
  readonly _tag = "YamlParseError"
  constructor(readonly message: string, readonly cause?: unknown) {}
}

export class ConfigValidationError {
  readonly _tag = "ConfigValidationError"
  constructor(readonly message: string) {}
}

/**
 * Schema for JSON Lines Input configuration
 */
const JsonLinesInputSchema = S.Struct({
  path: S.String,
  schema: S.optional(RecordSchemaSchema),
})

/**
 * Schema for Generate Input configuration (testing)
 */
const GenerateInputSchema = S.Struct({
  count: S.Number,
  interval: S.optional(S.Number),
  template: S.Record({ key: S.String, value: S.Unknown }),
  start_index: S.optional(S.Number),
  schema: S.optional(RecordSchemaSchema),
})

/**
 * Input configuration - detects type by key
 */
const InputConfigSchema = S.Struct({
  json_lines: S.optional(JsonLinesInputSchema),
  generate: S.optional(GenerateInputSchema),
})

/**
 * Schema for String Case Processor
 */
const StringCaseProcessorSchema = S.Struct({
  upper_fields: S.optional(S.NullOr(FieldList)),
  lower_fields: S.optional(S.NullOr(FieldList)),
})

/**
 * Schema for Logging Processor
 */
const LogProcessorSchema = S.Struct({
  level: S.optional(S.Literal("debug", "info", "warn", "error")),
  include_values: S.optional(S.Boolean),
})

/**
 * Processor configuration - each processor is an object with its type as key
 */
const ProcessorConfigSchema = S.Struct({
  string_case: S.optional(StringCaseProcessorSchema),
  log: S.optional(LogProcessorSchema),
})

/**
 * Schema for JSON Lines Output configuration
 */
const JsonLinesOutputSchema = S.Struct({
  path: S.optional(S.String),
})

/**
 * Schema for Capture Output configuration (testing)
 */
const CaptureOutputSchema = S.Struct({
  max_messages: S.optional(S.Number),
})

/**
 * Output configuration - detects type by key
 */
const OutputConfigSchema = S.Struct({
  json_lines: S.optional(JsonLinesOutputSchema),
  capture: S.optional(CaptureOutputSchema),
})

/**
 * Complete pipeline configuration schema
 */
export const PipelineConfigSchema = S.Struct({
  input: InputConfigSchema,
  pipeline: S.optional(
    S.Struct({
      threads: S.optional(S.Int.pipe(S.positive())),
      processors: S.optional(S.Array(ProcessorConfigSchema)),
    })
  ),
  output: OutputConfigSchema,
})

/**
 * TypeScript type inferred from schema
 */
export type PipelineConfig = S.Schema.Type<typeof PipelineConfigSchema>
export type InputConfig = S.Schema.Type<typeof InputConfigSchema>
export type ProcessorConfig = S.Schema.Type<typeof ProcessorConfigSchema>
export type OutputConfig = S.Schema.Type<typeof OutputConfigSchema>

/**
 * Interpolate environment variables in strings
 * Supports ${VAR_NAME} syntax
 */
export const interpolateEnvVars = (value: unknown): unknown => {
  if (typeof value === "string") {
    return value.replace(/\$\{([^}]+)\}/g, (_, varName: string) => {
      return process.env[varName] || ""
    })
  }

  if (Array.isArray(value)) {
    return value.map(interpolateEnvVars)
  }

  if (value !== null && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value).map(([k, v]) => [k, interpolateEnvVars(v)])
    )
  }

  return value
}

/**
 * Parse and validate YAML configuration text
 */
export const parseConfig = (
  content: string
): Effect.Effect<PipelineConfig, YamlParseError | ConfigValidationError> =>
  Effect.gen(function* () {
    const rawConfig = yield* Effect.try({
      try: (): unknown => yaml.parse(content),
      catch: (error) =>
        new YamlParseError("Failed to parse YAML", error),
    })

    // Interpolate environment variables
    const interpolated = interpolateEnvVars(rawConfig)

    // Validate with schema
    return yield* pipe(
      S.decodeUnknown(PipelineConfigSchema)(interpolated),
      Effect.mapError(
        (error) =>
          new ConfigValidationError(
            `Schema validation failed: ${error.message}`
          )
      )
    )
  })

/**
 * Load and parse YAML configuration file
 */
export const loadConfig = (
  path: string
): Effect.Effect<PipelineConfig, FileReadError | YamlParseError | ConfigValidationError> =>
  Effect.gen(function* () {
    const content = yield* Effect.tryPromise({
      try: () => fs.readFile(path, "utf-8"),
      catch: (error) => new FileReadError(path, error),
    })

    return yield* parseConfig(content)
  })
