import { join } from 'node:path'

import type { Diagnostic, HarnessStage, StageExecutionOutput } from '@samplecheck/harness-core'

import { hasCollectedSamples, measureSampleCount } from '../parsers/sampleCountParser.js'

/** Sample directory name under `samples/`. */
export const CL_GEMM_INST_SAMPLE = 'cl_gemm_inst'

/** Matrix size passed to the benchmark. */
export const CL_GEMM_INST_SIZE = '1024'

/** Iteration count passed to the benchmark. */
export const CL_GEMM_INST_REPEAT = '1'

export const CONFIGURE_ERROR_MARKER = 'CMake Error'
export const BUILD_ERROR_MARKER = 'error'
export const CORRECTNESS_MARKER = ' CORRECT'
export const EMPTY_STDOUT_DIAGNOSTIC = 'stdout is empty'

/**
 * Options for the cl_gemm_inst stage list.
 */
export interface ClGemmInstStageOptions {
  /** Value passed as `-DCMAKE_BUILD_TYPE`. */
  readonly buildType: string
}

/**
 * Flags cmake output as failed only when stderr carries the exact-case marker.
 *
 * @param output Captured cmake output.
 * @returns Full stderr on failure, null otherwise.
 */
export const detectConfigureFailure = (output: StageExecutionOutput): Diagnostic => {
  if (output.stderr && output.stderr.includes(CONFIGURE_ERROR_MARKER)) {
    return output.stderr
  }

  return null
}

/**
 * Flags make output as failed when stderr mentions "error" in any case.
 *
 * Any word containing the marker matches, so a warning about "terror.c" fails
 * the build too.
 *
 * @param output Captured make output.
 * @returns Full stderr on failure, null otherwise.
 */
export const detectBuildFailure = (output: StageExecutionOutput): Diagnostic => {
  if (output.stderr && output.stderr.toLowerCase().includes(BUILD_ERROR_MARKER)) {
    return output.stderr
  }

  return null
}

/**
 * Validates benchmark output.
 *
 * Checks run in order: any stderr, empty stdout, missing correctness marker,
 * then the collected sample count.
 *
 * @param output Captured benchmark output.
 * @returns Diagnostic for the first failed check, null otherwise.
 */
export const detectRunFailure = (output: StageExecutionOutput): Diagnostic => {
  if (output.stderr) {
    return output.stderr
  }

  if (!output.stdout) {
    return EMPTY_STDOUT_DIAGNOSTIC
  }

  if (!output.stdout.includes(CORRECTNESS_MARKER)) {
    return output.stdout
  }

  if (!hasCollectedSamples(output.stdout)) {
    return output.stdout
  }

  return null
}

/**
 * Creates the configure, build and run stages for cl_gemm_inst.
 *
 * @param options Stage options.
 * @returns Ordered stage list.
 */
export const createClGemmInstStages = (
  options: ClGemmInstStageOptions
): readonly HarnessStage[] => {
  return [
    {
      id: 'configure',
      name: 'Configure',
      command: () => ({
        command: 'cmake',
        args: [`-DCMAKE_BUILD_TYPE=${options.buildType}`, '..'],
      }),
      evaluate: detectConfigureFailure,
    },
    {
      id: 'build',
      name: 'Build',
      command: () => ({ command: 'make', args: [] }),
      evaluate: detectBuildFailure,
    },
    {
      id: 'run',
      name: 'Run',
      command: (context) => ({
        command: join(context.workingDirectory, CL_GEMM_INST_SAMPLE),
        args: [CL_GEMM_INST_SIZE, CL_GEMM_INST_REPEAT],
      }),
      evaluate: detectRunFailure,
      measure: measureSampleCount,
    },
  ]
}
