/**
 * Pipeline orchestration using Effect.js
 */
import { Effect, Option, Stream, pipe, Ref } from "effect"
import type { Message, Pipeline, PipelineStats, PipelineResult } from "./types.js"
import type { RecordSchema } from "./schema.js"
import { ComponentError, ConfigurationError, describeError } from "./errors.js"

/**
 * Log a failure at the level its category asks for
 */
const logFailure = (context: string, error: unknown): Effect.Effect<void> => {
  const text = `${context}: ${describeError(error)}`
  const level = error instanceof ComponentError ? error.logLevel : "error"
  switch (level) {
    case "debug":
      return Effect.logDebug(text)
    case "warn":
      return Effect.logWarning(text)
    case "error":
      return Effect.logError(text)
  }
}

/**
 * Close processors first, then input, then output
 */
const closeAll = <E, R>(pipeline: Pipeline<E, R>): Effect.Effect<void> =>
  Effect.gen(function* () {
    for (const processor of pipeline.processors) {
      if (processor.close) {
        yield* processor.close()
      }
    }
    if (pipeline.input.close) {
      yield* pipeline.input.close()
    }
    if (pipeline.output.close) {
      yield* pipeline.output.close()
    }
  })

/**
 * Configure every stage once, before any record is read.
 * The input's static schema (if any) flows through each processor, which may
 * reject it or hand a schema on to the next stage.
 */
export const configurePipeline = <E, R>(
  pipeline: Pipeline<E, R>
): Effect.Effect<Option.Option<RecordSchema>, ConfigurationError> =>
  Effect.reduce(
    pipeline.processors,
    Option.fromNullable(pipeline.input.schema),
    (schema, processor) =>
      processor.configure
        ? processor.configure(schema).pipe(
            Effect.tap(() =>
              Effect.logDebug(`Configured ${processor.name}`)
            )
          )
        : Effect.succeed(schema)
  )

/**
 * Run a pipeline
 * Orchestrates the flow: Configure → Input → Processors → Output
 */
export const run = <E, R>(
  pipeline: Pipeline<E, R>
): Effect.Effect<PipelineResult, ConfigurationError, R> => {
  return Effect.gen(function* () {
    yield* Effect.log(`Configuring pipeline: ${pipeline.name}`)

    // A configuration failure is fatal for the whole deployment
    const outputSchema = yield* configurePipeline(pipeline).pipe(
      Effect.tapError((error) =>
        Effect.zipRight(
          logFailure("Pipeline configuration failed", error),
          closeAll(pipeline)
        )
      )
    )

    yield* Effect.logDebug(
      Option.match(outputSchema, {
        onNone: () => "Output schema is resolved at runtime",
        onSome: (schema) => `Output schema: ${JSON.stringify(schema)}`,
      })
    )

    // Initialize stats
    const statsRef = yield* Ref.make({
      processed: 0,
      failed: 0,
      startTime: Date.now(),
    })

    const errorsRef = yield* Ref.make<unknown[]>([])

    // Get backpressure config
    const maxConcurrentMessages = pipeline.backpressure?.maxConcurrentMessages ?? 10
    const maxConcurrentOutputs = pipeline.backpressure?.maxConcurrentOutputs ?? 5

    yield* Effect.log(`Starting pipeline: ${pipeline.name}`)

    // Execute pipeline
    yield* pipe(
      pipeline.input.stream,

      // Apply processors with concurrency control
      Stream.mapEffect(
        (msg: Message) =>
          pipe(
            // Apply each processor in sequence
            Effect.reduce(
              pipeline.processors,
              Array.of<Message>(msg),
              (messages, processor) =>
                pipe(
                  Effect.forEach(
                    messages,
                    (m) => processor.process(m),
                    { concurrency: 1 }
                  ),
                  Effect.map((results) => results.flat())
                )
            ),

            // Send each message to output with backpressure
            Effect.flatMap((messages) =>
              Effect.forEach(
                messages,
                (out) =>
                  pipe(
                    pipeline.output.send(out),
                    Effect.tap(() =>
                      Ref.update(statsRef, (s) => ({
                        ...s,
                        processed: s.processed + 1,
                      }))
                    )
                  ),
                { concurrency: maxConcurrentOutputs, discard: true }
              )
            ),

            // Handle errors per message; fatal errors stop the stream
            Effect.catchAll((error) =>
              Effect.gen(function* () {
                yield* Ref.update(statsRef, (s) => ({
                  ...s,
                  failed: s.failed + 1,
                }))
                yield* Ref.update(errorsRef, (errors) => [...errors, error])
                yield* logFailure(`Message ${msg.id} failed`, error)
                if (error instanceof ComponentError && error.isFatal) {
                  return yield* Effect.fail(error)
                }
              })
            ),

            // Add span for telemetry
            Effect.withSpan("process-message", {
              attributes: { messageId: msg.id },
            })
          ),
        { concurrency: maxConcurrentMessages }
      ),

      // Drain the stream
      Stream.runDrain,

      // Handle stream errors
      Effect.catchAll((error) =>
        Effect.gen(function* () {
          yield* Effect.logError(`Pipeline stream error: ${describeError(error)}`)
          yield* Ref.update(errorsRef, (errors) =>
            errors.includes(error) ? errors : [...errors, error]
          )
        })
      )
    )

    // Finalize stats
    const stats = yield* Ref.get(statsRef)
    const errors = yield* Ref.get(errorsRef)

    const endTime = Date.now()
    const finalStats: PipelineStats = {
      processed: stats.processed,
      failed: stats.failed,
      duration: endTime - stats.startTime,
      startTime: stats.startTime,
      endTime,
    }

    yield* Effect.log(
      `Pipeline completed: ${finalStats.processed} processed, ${finalStats.failed} failed in ${finalStats.duration}ms`
    )

    yield* closeAll(pipeline)

    return {
      success: errors.length === 0,
      stats: finalStats,
      errors: errors.length > 0 ? errors : undefined,
    }
  })
}

/**
 * Create a pipeline from configuration
 */
export const create = <E, R>(config: {
  name: string
  input: Pipeline<E, R>["input"]
  processors: Pipeline<E, R>["processors"]
  output: Pipeline<E, R>["output"]
  backpressure?: Pipeline<E, R>["backpressure"]
}): Pipeline<E, R> => config
