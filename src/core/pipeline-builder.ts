/**
 * Pipeline Builder - Constructs pipeline from configuration
 */
import { Effect } from "effect";
import type {
  PipelineConfig,
  InputConfig,
  ProcessorConfig,
  OutputConfig,
} from "./config-loader.js";
import type { Pipeline, Input, Processor, Output } from "./types.js";
import { type ComponentError, describeError } from "./errors.js";
import { createJsonLinesInput } from "../inputs/json-lines-input.js";
import { createStringCaseProcessor } from "../processors/string-case-processor.js";
import { createLoggingProcessor } from "../processors/logging-processor.js";
import { createJsonLinesOutput } from "../outputs/json-lines-output.js";
// Testing utilities
import { createGenerateInput } from "../testing/generate-input.js";
import { createCaptureOutput } from "../testing/capture-output.js";

export class BuildError {
  readonly _tag = "BuildError";
  constructor(
    readonly message: string,
    readonly cause?: unknown,
  ) {}
}

/**
 * Run a component factory that validates its configuration by throwing
 */
const construct = <A>(
  component: string,
  factory: () => A,
): Effect.Effect<A, BuildError> =>
  Effect.try({
    try: factory,
    catch: (error) =>
      new BuildError(`Cannot build ${component}: ${describeError(error)}`, error),
  });

/**
 * Build input from configuration
 */
const buildInput = (
  config: InputConfig,
): Effect.Effect<Input<ComponentError>, BuildError> => {
  const jsonLines = config.json_lines;
  if (jsonLines) {
    return construct("json_lines input", () =>
      createJsonLinesInput({
        path: jsonLines.path,
        schema: jsonLines.schema,
      }),
    );
  }

  // Testing utility: generate input
  const generate = config.generate;
  if (generate) {
    return construct("generate input", () =>
      createGenerateInput({
        count: generate.count,
        interval: generate.interval,
        template: generate.template,
        startIndex: generate.start_index,
        schema: generate.schema,
      }),
    );
  }

  return Effect.fail(new BuildError("No valid input configuration found"));
};

/**
 * Build processor from configuration
 */
const buildProcessor = (
  config: ProcessorConfig,
): Effect.Effect<Processor<ComponentError>, BuildError> => {
  const stringCase = config.string_case;
  if (stringCase) {
    return construct("string_case processor", () =>
      createStringCaseProcessor({
        upperFields: stringCase.upper_fields,
        lowerFields: stringCase.lower_fields,
      }),
    );
  }

  if (config.log) {
    return Effect.succeed(
      createLoggingProcessor({
        level: config.log.level,
        includeValues: config.log.include_values,
      }),
    );
  }

  return Effect.fail(new BuildError("No valid processor configuration found"));
};

/**
 * Build output from configuration
 */
const buildOutput = (
  config: OutputConfig,
): Effect.Effect<Output<ComponentError>, BuildError> => {
  if (config.json_lines) {
    return createJsonLinesOutput({ path: config.json_lines.path }).pipe(
      Effect.mapError(
        (error) =>
          new BuildError(`Cannot build json_lines output: ${error.message}`, error),
      ),
    );
  }

  // Testing utility: capture output
  if (config.capture) {
    return createCaptureOutput({
      maxMessages: config.capture.max_messages,
    });
  }

  return Effect.fail(new BuildError("No valid output configuration found"));
};

const inputType = (config: InputConfig): string =>
  config.json_lines ? "json_lines" : config.generate ? "generate" : "unknown";

const outputType = (config: OutputConfig): string =>
  config.json_lines ? "json_lines" : config.capture ? "capture" : "unknown";

/**
 * Build complete pipeline from configuration
 */
export const buildPipeline = (
  config: PipelineConfig,
  debug = false,
): Effect.Effect<Pipeline<ComponentError>, BuildError> => {
  return Effect.gen(function* () {
    if (debug) {
      yield* Effect.logDebug(
        `buildPipeline received config: ${JSON.stringify(config, null, 2)}`,
      );
    }

    const input = yield* buildInput(config.input);

    const processorConfigs = config.pipeline?.processors || [];
    const processors = yield* Effect.forEach(processorConfigs, buildProcessor, {
      concurrency: 1,
    });

    const output = yield* buildOutput(config.output);

    return {
      name: `${inputType(config.input)}-to-${outputType(config.output)}`,
      input,
      processors,
      output,
      // Records keep their input order unless more threads are requested
      backpressure: {
        maxConcurrentMessages: config.pipeline?.threads ?? 1,
      },
    };
  });
};
