#!/usr/bin/env node
/**
 * CLI entry point for running and validating pipelines
 */
import { Effect, Logger, LogLevel, Option } from "effect";
import { NodeRuntime } from "@effect/platform-node";
import { loadConfig } from "./core/config-loader.js";
import { buildPipeline } from "./core/pipeline-builder.js";
import { configurePipeline, run } from "./core/pipeline.js";
import { formatFieldType } from "./core/schema.js";
import { describeError } from "./core/errors.js";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { dirname, join } from "node:path";

// Get package version
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJson: unknown = JSON.parse(
  readFileSync(join(__dirname, "../package.json"), "utf-8"),
);
const appVersion =
  packageJson !== null &&
  typeof packageJson === "object" &&
  "version" in packageJson
    ? String(packageJson.version)
    : "unknown";

class CliError {
  readonly _tag = "CliError";
  constructor(readonly message: string) {}
}

/**
 * Show help message
 */
function showHelp() {
  console.log(`
fieldcase v${appVersion}

Uppercase or lowercase configured string fields of structured records

Usage:
  fieldcase <command> [options]

Commands:
  run <config-file>        Run a pipeline from a YAML configuration file
  validate <config-file>   Build and configure a pipeline without running it

Options:
  -h, --help          Show this help message
  -v, --version       Show version information
  --debug             Enable debug logging

Examples:
  fieldcase run configs/people.yaml
  fieldcase run configs/people.yaml --debug
  fieldcase validate configs/people.yaml
`);
}

/**
 * Load a config file and build its pipeline
 */
const preparePipeline = (configPath: string, debugMode: boolean) =>
  Effect.gen(function* () {
    yield* Effect.log(`Loading configuration from: ${configPath}`);
    const config = yield* loadConfig(configPath);
    yield* Effect.log(`Configuration loaded successfully`);

    const pipeline = yield* buildPipeline(config, debugMode);
    yield* Effect.log(
      `Pipeline built successfully with ${pipeline.processors.length} processors`,
    );
    return pipeline;
  });

/**
 * Main CLI function
 */
const main = Effect.gen(function* () {
  const args = process.argv.slice(2);

  // Handle help flag
  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    showHelp();
    return;
  }

  // Handle version flag
  if (args.includes("--version") || args.includes("-v")) {
    console.log(`fieldcase v${appVersion}`);
    return;
  }

  const debugMode = args.includes("--debug");
  const command = args[0];

  if (command !== "run" && command !== "validate") {
    console.error(`Error: Unknown command '${command}'`);
    console.error('Run "fieldcase --help" for usage information.');
    return yield* Effect.fail(new CliError("Invalid command"));
  }

  // Get config file path (filter out flags)
  const configPath = args.slice(1).find((arg) => !arg.startsWith("--"));
  if (!configPath) {
    console.error("Error: Missing config file argument");
    console.error(`Usage: fieldcase ${command} <config-file.yaml>`);
    return yield* Effect.fail(new CliError("Missing config file"));
  }

  const pipeline = yield* preparePipeline(configPath, debugMode);

  if (command === "validate") {
    const schema = yield* configurePipeline(pipeline);
    yield* Option.match(schema, {
      onNone: () =>
        Effect.log("✓ Pipeline is valid, schema is resolved at runtime"),
      onSome: (outputSchema) =>
        Effect.log(
          `✓ Pipeline is valid, output schema '${outputSchema.name}': ${outputSchema.fields
            .map((field) => `${field.name}: ${formatFieldType(field.type)}`)
            .join(", ")}`,
        ),
    });
    return;
  }

  yield* Effect.log("Starting pipeline execution...");
  const result = yield* run(pipeline);

  // Display results
  if (result.success) {
    yield* Effect.log("✓ Pipeline completed successfully!");
    yield* Effect.log(`  Processed: ${result.stats.processed} records`);
    yield* Effect.log(`  Failed: ${result.stats.failed} records`);
    yield* Effect.log(`  Duration: ${result.stats.duration}ms`);
  } else {
    yield* Effect.logError("✗ Pipeline failed!");
    if (result.errors) {
      yield* Effect.logError(`  Errors: ${result.errors.length}`);
      for (const error of result.errors) {
        yield* Effect.logError(`    - ${describeError(error)}`);
      }
    }
    return yield* Effect.fail(new CliError("Pipeline execution failed"));
  }
}).pipe(
  Effect.catchAll((error) =>
    Effect.gen(function* () {
      let errorMessage: string;

      switch (error._tag) {
        case "ConfigValidationError":
          errorMessage = `Configuration validation failed\n${error.message.replace("Schema validation failed:", "").trim()}`;
          break;
        case "FileReadError":
          errorMessage = `Cannot read file: ${error.path}`;
          break;
        case "YamlParseError":
          errorMessage = `Invalid YAML syntax: ${describeError(error.cause)}`;
          break;
        default:
          errorMessage = `${error._tag}: ${error.message}`;
      }

      yield* Effect.logError(`Fatal error: ${errorMessage}`);
      process.exit(1);
    }),
  ),
);

// Run the CLI
const debugMode = process.argv.includes("--debug");
NodeRuntime.runMain(
  main.pipe(
    Logger.withMinimumLogLevel(debugMode ? LogLevel.Debug : LogLevel.Info),
  ),
);
