import type {
  HarnessReporter,
  HarnessRunResult,
  HarnessStage,
  StageContext,
  StageResult,
} from '@samplecheck/harness-core'

/**
 * Options for the pretty console reporter.
 */
export interface PrettyReporterOptions {
  /** Sample name shown in the header line. */
  readonly sample: string
  /** Emits stdout/stderr also for passing stages. */
  readonly verbose: boolean
}

/**
 * Compact console reporter with failure-focused detail output.
 */
export class PrettyReporter implements HarnessReporter {
  private readonly options: PrettyReporterOptions

  /**
   * Creates a pretty reporter.
   *
   * @param options Reporter options.
   */
  public constructor(options: PrettyReporterOptions) {
    this.options = options
  }

  /**
   * Handles harness start.
   *
   * @param stages Harness stages.
   * @param context Shared stage context.
   */
  public onHarnessStart(stages: readonly HarnessStage[], context: StageContext): void {
    process.stdout.write(
      colorize(`sample-check: ${this.options.sample} (${stages.length} stages)\n`, 'blue')
    )
    process.stdout.write(colorize(`   build directory: ${context.workingDirectory}\n`, 'blue'))
  }

  /**
   * Handles stage start.
   *
   * @param stage Current stage.
   */
  public onStageStart(stage: HarnessStage): void {
    process.stdout.write(colorize(`-> ${stage.name}\n`, 'blue'))
  }

  /**
   * Handles stage completion.
   *
   * @param result Stage result.
   */
  public onStageComplete(result: StageResult): void {
    const duration = `${result.durationMs}ms`
    if (result.status === 'passed') {
      const metricText = result.metric ? ` (${result.metric.value} ${result.metric.label})` : ''
      process.stdout.write(colorize(`✓ ${result.name} ${duration}${metricText}\n`, 'green'))
      if (this.options.verbose) {
        this.printOutput(result)
      }
      return
    }

    process.stdout.write(colorize(`✗ ${result.name} failed (${duration})\n`, 'red'))
    this.printOutput(result)
  }

  /**
   * Handles harness completion.
   *
   * @param result Harness result.
   */
  public onHarnessComplete(result: HarnessRunResult): void {
    process.stdout.write('\n')
    process.stdout.write(
      `Summary: stages=${result.stages.length} duration=${result.durationMs}ms\n`
    )

    if (result.diagnostic === null) {
      process.stdout.write(colorize('Result: ✅ PASS\n', 'green'))
      return
    }

    process.stdout.write(colorize('Result: FAIL\n', 'red'))
  }

  private printOutput(result: StageResult): void {
    const stdout = result.output.stdout.trim()
    const stderr = result.output.stderr.trim()

    if (stdout) {
      process.stdout.write(colorize('  stdout:\n', 'yellow'))
      process.stdout.write(indent(stdout))
      process.stdout.write('\n')
    }

    if (stderr) {
      process.stdout.write(colorize('  stderr:\n', 'yellow'))
      process.stdout.write(indent(stderr))
      process.stdout.write('\n')
    }

    // diagnostics that are not process output, such as a spawn failure
    const diagnostic = result.diagnostic?.trim()
    if (diagnostic && diagnostic !== stdout && diagnostic !== stderr) {
      process.stdout.write(colorize('  diagnostic:\n', 'yellow'))
      process.stdout.write(indent(diagnostic))
      process.stdout.write('\n')
    }
  }
}

const indent = (text: string): string => {
  return text
    .split('\n')
    .map((line) => `    ${line}`)
    .join('\n')
}

const colorize = (text: string, color: 'red' | 'green' | 'yellow' | 'blue'): string => {
  const colors: Record<'red' | 'green' | 'yellow' | 'blue', string> = {
    red: '\x1b[31m',
    green: '\x1b[32m',
    yellow: '\x1b[33m',
    blue: '\x1b[34m',
  }

  return `${colors[color]}${text}\x1b[0m`
}
