import type { CommandExecutor } from './executor.js'
import type { HarnessReporter } from './reporter.js'
import type { HarnessStage, StageContext, StageResult } from './stage.js'

/**
 * Final harness run data.
 */
export interface HarnessRunResult {
  /** Results of the stages that ran, in order. */
  readonly stages: readonly StageResult[]
  /** First diagnostic produced, or null when every stage passed. */
  readonly diagnostic: string | null
  /** Process-style exit code derived from the diagnostic. */
  readonly exitCode: 0 | 1
  /** Run start timestamp in Unix milliseconds. */
  readonly startedAt: number
  /** Run finish timestamp in Unix milliseconds. */
  readonly finishedAt: number
  /** Total run duration in milliseconds. */
  readonly durationMs: number
}

/**
 * Runtime options used by the harness runner.
 */
export interface HarnessRunOptions {
  /** Stages to execute in order. */
  readonly stages: readonly HarnessStage[]
  /** Context shared by every stage. */
  readonly context: StageContext
  /** Command executor implementation. */
  readonly executor: CommandExecutor
  /** Optional reporters for lifecycle hooks. */
  readonly reporters?: readonly HarnessReporter[]
  /** Time source injection for deterministic tests. */
  readonly now?: () => number
}
