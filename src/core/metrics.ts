/**
 * Core metrics collection utilities
 * Metrics are emitted via structured logging for observability
 */
import { Effect } from "effect"

/**
 * Snapshot of a stage's counters
 */
export interface StageMetrics {
  readonly component: string
  readonly timestamp: number
  readonly recordsIn: number
  readonly recordsOut: number
  readonly fieldsChanged: number
  readonly errorsEncountered: number
}

/**
 * Metrics accumulator for tracking stage operations
 */
export class MetricsAccumulator {
  private recordsIn = 0
  private recordsOut = 0
  private fieldsChanged = 0
  private errorsEncountered = 0

  constructor(private readonly componentName: string) {}

  /**
   * Record a successfully transformed record
   */
  recordTransformed(fieldsChanged: number = 0): void {
    this.recordsIn++
    this.recordsOut++
    this.fieldsChanged += fieldsChanged
  }

  /**
   * Record a record that failed to transform
   */
  recordError(): void {
    this.recordsIn++
    this.errorsEncountered++
  }

  getMetrics(): StageMetrics {
    return {
      component: this.componentName,
      timestamp: Date.now(),
      recordsIn: this.recordsIn,
      recordsOut: this.recordsOut,
      fieldsChanged: this.fieldsChanged,
      errorsEncountered: this.errorsEncountered,
    }
  }

  /**
   * Reset all counters
   */
  reset(): void {
    this.recordsIn = 0
    this.recordsOut = 0
    this.fieldsChanged = 0
    this.errorsEncountered = 0
  }
}

/**
 * Emit stage metrics via structured logging
 */
export const emitStageMetrics = (
  metrics: StageMetrics
): Effect.Effect<void, never, never> =>
  Effect.logInfo("Stage metrics", {
    component: metrics.component,
    recordsIn: metrics.recordsIn,
    recordsOut: metrics.recordsOut,
    fieldsChanged: metrics.fieldsChanged,
    errorsEncountered: metrics.errorsEncountered,
    timestamp: metrics.timestamp,
  })
