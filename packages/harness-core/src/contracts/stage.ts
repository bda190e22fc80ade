/**
 * Terminal status of a harness stage.
 */
export type StageStatus = 'passed' | 'failed'

/**
 * Failure text produced by a stage. Null or empty means the stage passed.
 */
export type Diagnostic = string | null

/**
 * Outcome of evaluating one stage.
 */
export type StageOutcome =
  | { readonly type: 'passed' }
  | { readonly type: 'failed'; readonly diagnostic: string }

const passedOutcome = (): StageOutcome => ({ type: 'passed' })

const failedOutcome = (diagnostic: string): StageOutcome => ({ type: 'failed', diagnostic })

export const StageOutcome = {
  Passed: passedOutcome,

  Failed: failedOutcome,

  /**
   * Lifts an optional diagnostic into an outcome.
   *
   * @param diagnostic Diagnostic returned by a stage evaluator.
   * @returns Failed outcome for non-empty text, passed otherwise.
   */
  fromDiagnostic: (diagnostic: Diagnostic): StageOutcome =>
    diagnostic ? failedOutcome(diagnostic) : passedOutcome(),
}

/**
 * Shared values threaded through every stage of one run.
 */
export interface StageContext {
  /** Working directory every stage process runs in. */
  readonly workingDirectory: string
  /** Environment additions for every stage process. */
  readonly env?: Readonly<Record<string, string>>
}

/**
 * Command line a stage launches.
 */
export interface StageCommand {
  /** Executable name or path. */
  readonly command: string
  /** Positional arguments. */
  readonly args: readonly string[]
}

/**
 * Immutable definition of one harness stage.
 */
export interface HarnessStage {
  /** Stable machine identifier. */
  readonly id: string
  /** Human readable label used in output. */
  readonly name: string

  /**
   * Builds the command this stage launches.
   *
   * @param context Run context.
   * @returns Executable and arguments.
   */
  command(context: StageContext): StageCommand

  /**
   * Inspects captured process output for a failure.
   *
   * @param output Captured process output.
   * @returns Diagnostic text, or null when the stage passed.
   */
  evaluate(output: StageExecutionOutput): Diagnostic

  /**
   * Extracts a metric shown next to the stage result.
   *
   * @param output Captured process output.
   * @returns Metric, or null when the output carries none.
   */
  measure?(output: StageExecutionOutput): StageMetric | null
}

/**
 * Structured metric extracted from stage output.
 */
export interface StageMetric {
  /** Human-readable metric label. */
  readonly label: string
  /** Numeric metric value. */
  readonly value: number
}

/**
 * Captured process output data for one stage execution.
 */
export interface StageExecutionOutput {
  /** Exit code returned by the process, or null when unavailable. */
  readonly exitCode: number | null
  /** Termination signal if process ended by signal. */
  readonly signal: NodeJS.Signals | null
  /** Captured stdout content. */
  readonly stdout: string
  /** Captured stderr content. */
  readonly stderr: string
}

/**
 * Result object returned for each executed stage.
 */
export interface StageResult {
  /** Stage identifier copied from the stage definition. */
  readonly id: string
  /** Stage display name copied from the stage definition. */
  readonly name: string
  /** Final status. */
  readonly status: StageStatus
  /** Failure text, present only for failed stages. */
  readonly diagnostic?: string
  /** Stage start timestamp in Unix milliseconds. */
  readonly startedAt: number
  /** Stage finish timestamp in Unix milliseconds. */
  readonly finishedAt: number
  /** Total stage duration in milliseconds. */
  readonly durationMs: number
  /** Captured process output. */
  readonly output: StageExecutionOutput
  /** Metric reported by the stage's `measure`, when it has one. */
  readonly metric: StageMetric | null
}
