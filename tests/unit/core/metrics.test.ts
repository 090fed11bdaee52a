import { describe, it, expect, beforeEach } from "vitest"
import { Effect } from "effect"
import {
  MetricsAccumulator,
  emitStageMetrics,
  type StageMetrics,
} from "../../../src/core/metrics.js"

describe("Metrics Collection", () => {
  describe("MetricsAccumulator", () => {
    let accumulator: MetricsAccumulator

    beforeEach(() => {
      accumulator = new MetricsAccumulator("test-stage")
    })

    it("should initialize with zero values", () => {
      const metrics = accumulator.getMetrics()

      expect(metrics.component).toBe("test-stage")
      expect(metrics.recordsIn).toBe(0)
      expect(metrics.recordsOut).toBe(0)
      expect(metrics.fieldsChanged).toBe(0)
      expect(metrics.errorsEncountered).toBe(0)
      expect(metrics.timestamp).toBeGreaterThan(0)
    })

    it("should record transformed records and changed fields", () => {
      accumulator.recordTransformed(2)
      accumulator.recordTransformed(0)
      accumulator.recordTransformed(3)

      const metrics = accumulator.getMetrics()

      expect(metrics.recordsIn).toBe(3)
      expect(metrics.recordsOut).toBe(3)
      expect(metrics.fieldsChanged).toBe(5)
    })

    it("should default changed fields to zero", () => {
      accumulator.recordTransformed()

      expect(accumulator.getMetrics().fieldsChanged).toBe(0)
    })

    it("should count errors as input without output", () => {
      accumulator.recordTransformed(1)
      accumulator.recordError()
      accumulator.recordError()

      const metrics = accumulator.getMetrics()

      expect(metrics.recordsIn).toBe(3)
      expect(metrics.recordsOut).toBe(1)
      expect(metrics.errorsEncountered).toBe(2)
    })

    it("should reset all counters", () => {
      accumulator.recordTransformed(4)
      accumulator.recordError()
      accumulator.reset()

      const metrics = accumulator.getMetrics()

      expect(metrics.recordsIn).toBe(0)
      expect(metrics.recordsOut).toBe(0)
      expect(metrics.fieldsChanged).toBe(0)
      expect(metrics.errorsEncountered).toBe(0)
    })
  })

  describe("emitStageMetrics()", () => {
    it("should emit without failing", async () => {
      const metrics: StageMetrics = {
        component: "test-stage",
        timestamp: Date.now(),
        recordsIn: 10,
        recordsOut: 9,
        fieldsChanged: 18,
        errorsEncountered: 1,
      }

      await expect(Effect.runPromise(emitStageMetrics(metrics))).resolves.toBeUndefined()
    })
  })
})
