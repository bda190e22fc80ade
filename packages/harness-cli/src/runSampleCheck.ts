import { resolve } from 'node:path'

import {
  createHarnessRunner,
  createNodeCommandExecutor,
  type CommandExecutor,
  type HarnessRunResult,
} from '@samplecheck/harness-core'

import { ensureSampleBuildPath, getBuildFlag } from './config/buildPaths.js'
import { loadSampleCheckConfig } from './config/loadConfig.js'
import type { CliOutputFormat } from './config/types.js'
import { PrettyReporter } from './reporters/prettyReporter.js'
import { CL_GEMM_INST_SAMPLE, createClGemmInstStages } from './samples/clGemmInst.js'

/**
 * Runtime options for a CLI execution.
 */
export interface RunSampleCheckOptions {
  /** Base working directory. */
  readonly cwd: string
  /** Optional explicit config path. */
  readonly configPath?: string
  /** Optional cmake build type override. */
  readonly buildType?: string
  /** Output format selection. */
  readonly format: CliOutputFormat
  /** Indicates the format came from a CLI flag and wins over config. */
  readonly formatProvided?: true
  /** Verbose output mode. */
  readonly verbose: boolean
  /** Executor override; defaults to the Node.js process executor. */
  readonly executor?: CommandExecutor
}

/**
 * Runs the cl_gemm_inst pipeline once and prints the outcome.
 *
 * @param options CLI runtime options.
 * @returns Run result.
 */
export const runSampleCheck = async (options: RunSampleCheckOptions): Promise<HarnessRunResult> => {
  const { config } = await loadSampleCheckConfig(options.cwd, options.configPath)

  const format = options.formatProvided
    ? options.format
    : (config.output?.format ?? options.format)
  const verbose = options.verbose || (config.output?.verbose ?? false)
  const rootPath = config.rootPath ? resolve(options.cwd, config.rootPath) : options.cwd
  const buildType = getBuildFlag({ cli: options.buildType, config: config.buildType })

  const workingDirectory = await ensureSampleBuildPath(rootPath, CL_GEMM_INST_SAMPLE)
  const stages = createClGemmInstStages({ buildType })

  const runner = createHarnessRunner({
    stages,
    context: { workingDirectory, env: config.env },
    executor: options.executor ?? createNodeCommandExecutor(),
    reporters:
      format === 'pretty' ? [new PrettyReporter({ sample: CL_GEMM_INST_SAMPLE, verbose })] : [],
  })

  const result = await runner.run()
  printResult(result, format)

  return result
}

const printResult = (result: HarnessRunResult, format: CliOutputFormat): void => {
  if (format === 'plain' && result.diagnostic !== null) {
    process.stdout.write(`${result.diagnostic}\n`)
  }
}
