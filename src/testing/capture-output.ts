/**
 * Capture Output - Collects messages in memory for testing assertions
 * Used for validating inputs and processors without external dependencies
 */
import { Effect, Ref } from "effect";
import type { Output, Message } from "../core/types.js";
import { orderedValues } from "../core/record.js";

export interface CaptureOutputConfig {
  readonly maxMessages?: number; // Limit captured messages (default: 10000)
}

/**
 * Capture Output instance with methods to retrieve captured messages
 */
export interface CaptureOutput extends Output {
  getMessages: () => Effect.Effect<readonly Message[]>;

  /**
   * Record values of every captured message, in schema order
   */
  getValues: () => Effect.Effect<readonly Record<string, unknown>[]>;

  getCount: () => Effect.Effect<number>;

  clear: () => Effect.Effect<void>;
}

/**
 * Create Capture Output
 *
 * @example
 * ```typescript
 * const output = await Effect.runPromise(createCaptureOutput())
 *
 * // ... run pipeline with capture output ...
 *
 * const values = await Effect.runPromise(output.getValues())
 * expect(values[0]).toEqual({ name: "ALICE" })
 * ```
 */
export const createCaptureOutput = (
  config: CaptureOutputConfig = {},
): Effect.Effect<CaptureOutput> =>
  Effect.gen(function* () {
    const maxMessages = config.maxMessages ?? 10000;
    const messagesRef = yield* Ref.make<Message[]>([]);

    return {
      name: "capture-output",

      send: (message: Message) =>
        Effect.gen(function* () {
          const messages = yield* Ref.get(messagesRef);

          if (messages.length >= maxMessages) {
            yield* Effect.logWarning(
              `Capture output reached max capacity (${maxMessages}). Dropping message.`,
            );
            return;
          }

          yield* Ref.update(messagesRef, (msgs) => [...msgs, message]);
          yield* Effect.logDebug(`Captured message: ${message.id}`);
        }),

      getMessages: () => Ref.get(messagesRef),

      getValues: () =>
        Ref.get(messagesRef).pipe(
          Effect.map((msgs) => msgs.map((msg) => orderedValues(msg.record))),
        ),

      getCount: () =>
        Ref.get(messagesRef).pipe(Effect.map((msgs) => msgs.length)),

      clear: () => Ref.set(messagesRef, []),

      // Messages stay available after close for assertions
      close: () =>
        Ref.get(messagesRef).pipe(
          Effect.flatMap((msgs) =>
            Effect.log(`Capture output closing with ${msgs.length} captured messages`),
          ),
        ),
    };
  });
