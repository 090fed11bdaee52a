import { describe, it, expect } from "vitest"
import {
  ComponentError,
  ConfigurationError,
  TransformError,
  describeError,
} from "../../../src/core/errors.js"
import { ValidationError } from "../../../src/core/validation.js"
import { JsonLinesInputError } from "../../../src/inputs/json-lines-input.js"
import { JsonLinesOutputError } from "../../../src/outputs/json-lines-output.js"

describe("Error Categorization", () => {
  describe("ConfigurationError", () => {
    it("should be fatal and logged as an error", () => {
      const error = new ConfigurationError("Field 'x' not found", "x")

      expect(error).toBeInstanceOf(ComponentError)
      expect(error).toBeInstanceOf(Error)
      expect(error._tag).toBe("ConfigurationError")
      expect(error.name).toBe("ConfigurationError")
      expect(error.category).toBe("fatal")
      expect(error.isFatal).toBe(true)
      expect(error.logLevel).toBe("error")
      expect(error.field).toBe("x")
    })

    it("should keep the cause", () => {
      const cause = new Error("bad input")
      const error = new ConfigurationError("Invalid configuration", undefined, cause)

      expect(error.cause).toBe(cause)
      expect(error.field).toBeUndefined()
    })
  })

  describe("TransformError", () => {
    it("should be logical and logged as a warning", () => {
      const error = new TransformError("Field 'x' has no value to convert", "x")

      expect(error._tag).toBe("TransformError")
      expect(error.category).toBe("logical")
      expect(error.isFatal).toBe(false)
      expect(error.logLevel).toBe("warn")
      expect(error.message).toBe("Field 'x' has no value to convert")
    })
  })

  describe("component errors", () => {
    it("should categorize validation errors as logical", () => {
      expect(new ValidationError("Invalid config").category).toBe("logical")
    })

    it("should categorize file errors as fatal", () => {
      const input = new JsonLinesInputError("Invalid JSON at a.jsonl:2", "a.jsonl", 2)
      const output = new JsonLinesOutputError("Cannot write to file: b.jsonl")

      expect(input.isFatal).toBe(true)
      expect(input.line).toBe(2)
      expect(input.path).toBe("a.jsonl")
      expect(output.isFatal).toBe(true)
    })
  })

  describe("describeError()", () => {
    it("should use the message of Error instances", () => {
      expect(describeError(new TransformError("boom", "x"))).toBe("boom")
    })

    it("should pass strings through", () => {
      expect(describeError("plain failure")).toBe("plain failure")
    })

    it("should render tagged errors with their message", () => {
      expect(describeError({ _tag: "BuildError", message: "no input" })).toBe(
        "BuildError: no input"
      )
      expect(describeError({ _tag: "FileReadError", path: "x" })).toBe("FileReadError")
    })

    it("should render other values", () => {
      expect(describeError({ code: 1 })).toBe('{"code":1}')
      expect(describeError(undefined)).toBe("undefined")
      expect(describeError(7)).toBe("7")
    })
  })
})
