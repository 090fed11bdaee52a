/**
 * Main entry point - exports public API
 */

// Core
export * from "./core/types.js"
export * from "./core/schema.js"
export * from "./core/record.js"
export * from "./core/pipeline.js"
export * from "./core/config-loader.js"
export * from "./core/pipeline-builder.js"
export * from "./core/errors.js"
export * from "./core/metrics.js"
export * from "./core/validation.js"
export * from "./core/json.js"

// Inputs
export * from "./inputs/json-lines-input.js"

// Processors
export * from "./processors/string-case-processor.js"
export * from "./processors/logging-processor.js"

// Outputs
export * from "./outputs/json-lines-output.js"

// Testing Utilities (for building tests and examples)
export * from "./testing/index.js"
