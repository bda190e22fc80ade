import type { CommandExecutionResult } from '../contracts/executor.js'
import type { HarnessRunOptions, HarnessRunResult } from '../contracts/run.js'
import {
  StageOutcome,
  type HarnessStage,
  type StageCommand,
  type StageResult,
} from '../contracts/stage.js'

/**
 * Sequential stage engine: runs each stage in order and stops at the first
 * diagnostic.
 */
export class HarnessRunner {
  private readonly options: Required<Pick<HarnessRunOptions, 'now'>> &
    Omit<HarnessRunOptions, 'now'>

  /**
   * Creates a harness runner.
   *
   * @param options Runtime options.
   */
  public constructor(options: HarnessRunOptions) {
    this.options = {
      ...options,
      now: options.now ?? Date.now,
    }
  }

  /**
   * Executes the configured stages until one fails.
   *
   * @returns Final harness result.
   */
  public async run(): Promise<HarnessRunResult> {
    const runStartedAt = this.options.now()
    const stageResults: StageResult[] = []
    let diagnostic: string | null = null

    await this.emitHarnessStart()

    for (const [index, stage] of this.options.stages.entries()) {
      await this.emitStageStart(stage, index)

      const stageResult = await this.executeStage(stage)
      stageResults.push(stageResult)

      await this.emitStageComplete(stageResult, index)

      if (stageResult.diagnostic !== undefined) {
        diagnostic = stageResult.diagnostic
        break
      }
    }

    const runFinishedAt = this.options.now()

    const result: HarnessRunResult = {
      stages: stageResults,
      diagnostic,
      exitCode: diagnostic === null ? 0 : 1,
      startedAt: runStartedAt,
      finishedAt: runFinishedAt,
      durationMs: runFinishedAt - runStartedAt,
    }

    await this.emitHarnessComplete(result)

    return result
  }

  private async executeStage(stage: HarnessStage): Promise<StageResult> {
    const startedAt = this.options.now()
    const { context } = this.options
    const stageCommand = stage.command(context)

    const execution = await this.options.executor({
      command: stageCommand.command,
      args: stageCommand.args,
      cwd: context.workingDirectory,
      env: context.env,
    })

    const outcome = execution.error
      ? StageOutcome.Failed(formatStartFailure(stage, stageCommand, execution.error))
      : StageOutcome.fromDiagnostic(stage.evaluate(execution))

    return this.buildStageResult(stage, outcome, startedAt, execution)
  }

  private buildStageResult(
    stage: HarnessStage,
    outcome: StageOutcome,
    startedAt: number,
    output: CommandExecutionResult
  ): StageResult {
    const finishedAt = this.options.now()
    const metric = stage.measure?.(output) ?? null

    return {
      id: stage.id,
      name: stage.name,
      status: outcome.type,
      ...(outcome.type === 'failed' ? { diagnostic: outcome.diagnostic } : {}),
      startedAt,
      finishedAt,
      durationMs: finishedAt - startedAt,
      output: {
        exitCode: output.exitCode,
        signal: output.signal,
        stdout: output.stdout,
        stderr: output.stderr,
      },
      metric,
    }
  }

  private async emitHarnessStart(): Promise<void> {
    const reporters = this.options.reporters ?? []
    for (const reporter of reporters) {
      await reporter.onHarnessStart?.(this.options.stages, this.options.context)
    }
  }

  private async emitStageStart(stage: HarnessStage, index: number): Promise<void> {
    const reporters = this.options.reporters ?? []
    for (const reporter of reporters) {
      await reporter.onStageStart?.(stage, index)
    }
  }

  private async emitStageComplete(result: StageResult, index: number): Promise<void> {
    const reporters = this.options.reporters ?? []
    for (const reporter of reporters) {
      await reporter.onStageComplete?.(result, index)
    }
  }

  private async emitHarnessComplete(result: HarnessRunResult): Promise<void> {
    const reporters = this.options.reporters ?? []
    for (const reporter of reporters) {
      await reporter.onHarnessComplete?.(result)
    }
  }
}

/**
 * Creates a harness runner instance.
 *
 * @param options Runtime options.
 * @returns Harness runner.
 */
export const createHarnessRunner = (options: HarnessRunOptions): HarnessRunner => {
  return new HarnessRunner(options)
}

const formatStartFailure = (
  stage: HarnessStage,
  stageCommand: StageCommand,
  error: Error
): string => {
  return `${stage.name}: failed to start ${stageCommand.command}: ${error.message}`
}
