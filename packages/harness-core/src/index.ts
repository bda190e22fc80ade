export type {
  CommandExecutionRequest,
  CommandExecutionResult,
  CommandExecutor,
} from './contracts/executor.js'
export type { HarnessReporter } from './contracts/reporter.js'
export type { HarnessRunOptions, HarnessRunResult } from './contracts/run.js'
export type {
  Diagnostic,
  HarnessStage,
  StageCommand,
  StageContext,
  StageExecutionOutput,
  StageMetric,
  StageResult,
  StageStatus,
} from './contracts/stage.js'
export { StageOutcome } from './contracts/stage.js'

export { createNodeCommandExecutor } from './execution/nodeCommandExecutor.js'
export { createHarnessRunner, HarnessRunner } from './runner/harnessRunner.js'
