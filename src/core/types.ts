/**
 * Core types and interfaces for the pipeline system
 */
import { Effect, Option, Stream } from "effect"
import { randomUUID } from "node:crypto"
import type { StructuredRecord } from "./record.js"
import type { RecordSchema } from "./schema.js"
import type { ConfigurationError } from "./errors.js"

/**
 * Message flowing through the pipeline
 * Wraps one structured record with metadata and tracing information
 */
export interface Message {
  readonly id: string
  readonly record: StructuredRecord
  readonly metadata: Record<string, unknown>
  readonly timestamp: number
  readonly correlationId?: string
}

/**
 * Input produces a Stream of messages
 * `schema` is set when every record shares a schema known before the run
 */
export interface Input<E = never, R = never> {
  readonly name: string
  readonly schema?: RecordSchema
  readonly stream: Stream.Stream<Message, E, R>
  readonly close?: () => Effect.Effect<void, never, never>
}

/**
 * Processor transforms messages
 * Can produce zero, one or multiple messages from a single input
 */
export interface Processor<E = never, R = never> {
  readonly name: string
  /**
   * Called once before any record is processed. Receives the input schema
   * when it is known statically and returns the output schema.
   */
  readonly configure?: (
    schema: Option.Option<RecordSchema>
  ) => Effect.Effect<Option.Option<RecordSchema>, ConfigurationError>
  readonly process: (
    msg: Message
  ) => Effect.Effect<Message | Message[], E, R>
  readonly close?: () => Effect.Effect<void, never, never>
}

/**
 * Output consumes messages and sends them to external systems
 */
export interface Output<E = never, R = never> {
  readonly name: string
  readonly send: (msg: Message) => Effect.Effect<void, E, R>
  readonly close?: () => Effect.Effect<void, never, never>
}

/**
 * Backpressure configuration for pipeline execution
 */
export interface BackpressureConfig {
  readonly maxConcurrentMessages?: number  // Max concurrent message processing (default: 10)
  readonly maxConcurrentOutputs?: number   // Max concurrent output sends (default: 5)
}

/**
 * Pipeline configuration combining input, processors, and output
 */
export interface Pipeline<E = never, R = never> {
  readonly name: string
  readonly input: Input<E, R>
  readonly processors: ReadonlyArray<Processor<E, R>>
  readonly output: Output<E, R>
  readonly backpressure?: BackpressureConfig
}

/**
 * Statistics from pipeline execution
 */
export interface PipelineStats {
  readonly processed: number
  readonly failed: number
  readonly duration: number
  readonly startTime: number
  readonly endTime: number
}

/**
 * Pipeline execution result
 */
export interface PipelineResult {
  readonly success: boolean
  readonly stats: PipelineStats
  readonly errors?: ReadonlyArray<unknown>
}

/**
 * Helper to create a message
 */
export const createMessage = (
  record: StructuredRecord,
  metadata: Record<string, unknown> = {}
): Message => ({
  id: randomUUID(),
  record,
  metadata,
  timestamp: Date.now(),
})
