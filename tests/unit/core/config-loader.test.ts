import { describe, it, expect, afterEach } from "vitest"
import { Effect } from "effect"
import * as fs from "node:fs/promises"
import * as os from "node:os"
import * as path from "node:path"
import {
  interpolateEnvVars,
  loadConfig,
  parseConfig,
} from "../../../src/core/config-loader.js"

describe("Config Loader", () => {
  describe("interpolateEnvVars()", () => {
    afterEach(() => {
      delete process.env.FIELDCASE_TEST_FIELDS
    })

    it("should replace ${VAR} references in nested values", () => {
      process.env.FIELDCASE_TEST_FIELDS = "name, city"

      expect(
        interpolateEnvVars({
          processors: [{ string_case: { upper_fields: "${FIELDCASE_TEST_FIELDS}" } }],
          count: 3,
        })
      ).toEqual({
        processors: [{ string_case: { upper_fields: "name, city" } }],
        count: 3,
      })
    })

    it("should replace unset variables with an empty string", () => {
      expect(interpolateEnvVars("fields: ${FIELDCASE_TEST_FIELDS}")).toBe("fields: ")
    })
  })

  describe("parseConfig()", () => {
    it("should parse a complete pipeline configuration", async () => {
      const config = await Effect.runPromise(
        parseConfig(`
input:
  json_lines:
    path: ./people.jsonl
    schema:
      name: person
      fields:
        - { name: name, type: string }
        - { name: city, type: [string, "null"] }
pipeline:
  threads: 2
  processors:
    - string_case:
        upper_fields: name
        lower_fields: [city]
    - log:
        level: debug
        include_values: false
output:
  json_lines:
    path: ./out.jsonl
`)
      )

      expect(config.input.json_lines).toEqual({
        path: "./people.jsonl",
        schema: {
          name: "person",
          fields: [
            { name: "name", type: "string" },
            { name: "city", type: ["string", "null"] },
          ],
        },
      })
      expect(config.pipeline?.threads).toBe(2)
      expect(config.pipeline?.processors).toEqual([
        { string_case: { upper_fields: "name", lower_fields: ["city"] } },
        { log: { level: "debug", include_values: false } },
      ])
      expect(config.output.json_lines).toEqual({ path: "./out.jsonl" })
    })

    it("should accept a processor with empty field lists", async () => {
      const config = await Effect.runPromise(
        parseConfig(`
input:
  generate:
    count: 1
    template: { name: x }
pipeline:
  processors:
    - string_case:
        upper_fields:
output:
  capture: {}
`)
      )

      expect(config.pipeline?.processors).toEqual([
        { string_case: { upper_fields: null } },
      ])
    })

    it("should fail on invalid YAML", async () => {
      const error = await Effect.runPromise(
        Effect.flip(parseConfig("input: [unclosed"))
      )

      expect(error._tag).toBe("YamlParseError")
    })

    it("should fail when field lists are not strings", async () => {
      const error = await Effect.runPromise(
        Effect.flip(
          parseConfig(`
input:
  generate:
    count: 1
    template: { name: x }
pipeline:
  processors:
    - string_case:
        upper_fields: 42
output:
  capture: {}
`)
        )
      )

      expect(error._tag).toBe("ConfigValidationError")
      expect(error.message).toMatch(/^Schema validation failed:/)
    })

    it("should fail on unknown schema field types", async () => {
      const error = await Effect.runPromise(
        Effect.flip(
          parseConfig(`
input:
  json_lines:
    path: in.jsonl
    schema:
      fields:
        - { name: when, type: timestamp }
output:
  capture: {}
`)
        )
      )

      expect(error._tag).toBe("ConfigValidationError")
    })
  })

  describe("loadConfig()", () => {
    let dir: string | undefined

    afterEach(async () => {
      if (dir) {
        await fs.rm(dir, { recursive: true, force: true })
        dir = undefined
      }
    })

    it("should read and parse a config file", async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), "fieldcase-config-"))
      const file = path.join(dir, "pipeline.yaml")
      await fs.writeFile(
        file,
        "input:\n  generate:\n    count: 2\n    template: { name: x }\noutput:\n  capture: {}\n"
      )

      const config = await Effect.runPromise(loadConfig(file))

      expect(config.input.generate?.count).toBe(2)
      expect(config.output.capture).toEqual({})
    })

    it("should fail with FileReadError for a missing file", async () => {
      const error = await Effect.runPromise(
        Effect.flip(loadConfig("/nonexistent/fieldcase/pipeline.yaml"))
      )

      expect(error._tag).toBe("FileReadError")
      if (error._tag === "FileReadError") {
        expect(error.path).toBe("/nonexistent/fieldcase/pipeline.yaml")
      }
    })
  })
})
