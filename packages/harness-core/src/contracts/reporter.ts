import type { HarnessRunResult } from './run.js'
import type { HarnessStage, StageContext, StageResult } from './stage.js'

/**
 * Event hooks for harness run reporting.
 */
export interface HarnessReporter {
  /**
   * Called once before any stage starts.
   *
   * @param stages Stages scheduled for execution.
   * @param context Working directory and environment every stage shares.
   */
  onHarnessStart?(stages: readonly HarnessStage[], context: StageContext): Promise<void> | void

  /**
   * Called before a single stage starts.
   *
   * @param stage Stage definition.
   * @param index Zero-based stage index.
   */
  onStageStart?(stage: HarnessStage, index: number): Promise<void> | void

  /**
   * Called after a stage completes.
   *
   * @param result Stage result.
   * @param index Zero-based stage index.
   */
  onStageComplete?(result: StageResult, index: number): Promise<void> | void

  /**
   * Called once after the run completes.
   *
   * @param result Harness run result.
   */
  onHarnessComplete?(result: HarnessRunResult): Promise<void> | void
}
