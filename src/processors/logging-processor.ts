/**
 * Logging Processor - Logs each record passing through the pipeline
 */
import { Effect, LogLevel } from "effect"
import type { Processor, Message } from "../core/types.js"
import { orderedValues } from "../core/record.js"
import { stringifyJson } from "../core/json.js"

export type LogProcessorLevel = "debug" | "info" | "warn" | "error"

export interface LoggingProcessorConfig {
  readonly level?: LogProcessorLevel
  readonly includeValues?: boolean  // Log the record values (default: true)
}

const LOG_LEVELS: Record<LogProcessorLevel, LogLevel.LogLevel> = {
  debug: LogLevel.Debug,
  info: LogLevel.Info,
  warn: LogLevel.Warning,
  error: LogLevel.Error,
}

/**
 * Render a record as indented JSON text, schema name first
 */
export const describeRecord = (msg: Message, includeValues: boolean): string =>
  stringifyJson(
    {
      schema: msg.record.schema.name,
      fields: msg.record.schema.fields.map((field) => field.name),
      metadata: msg.metadata,
      ...(includeValues ? { values: orderedValues(msg.record) } : {}),
    },
    2
  )

/**
 * Create a logging processor
 * The record is passed on untouched; message id and correlation id are
 * attached as log annotations.
 */
export const createLoggingProcessor = (
  config: LoggingProcessorConfig = {}
): Processor => {
  const level = LOG_LEVELS[config.level ?? "info"]
  const includeValues = config.includeValues ?? true

  return {
    name: "logging-processor",
    process: (msg: Message): Effect.Effect<Message> =>
      Effect.sync(() => describeRecord(msg, includeValues)).pipe(
        Effect.flatMap((text) => Effect.logWithLevel(level, `Record: ${text}`)),
        Effect.annotateLogs({
          messageId: msg.id,
          correlationId: msg.correlationId ?? "none",
        }),
        Effect.as(msg)
      ),
  }
}
