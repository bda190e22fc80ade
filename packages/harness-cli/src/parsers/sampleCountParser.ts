import type { StageExecutionOutput, StageMetric } from '@samplecheck/harness-core'

const SAMPLES_LINE_PREFIX = 'Samples collected:'
const SAMPLES_LINE_TOKENS = 7
const SAMPLES_COUNT_TOKEN = 2

/**
 * Extracts the sample count from benchmark output.
 *
 * Only the first line starting with `Samples collected:` is consulted. A line
 * with other than seven whitespace separated tokens ends the scan with a count
 * of zero.
 *
 * @param stdout Captured benchmark stdout.
 * @returns Parsed sample count, or 0 when absent or malformed.
 */
export const parseSampleCount = (stdout: string): number => {
  for (const line of stdout.split('\n')) {
    if (!line.startsWith(SAMPLES_LINE_PREFIX)) {
      continue
    }

    const tokens = line.split(/\s+/u).filter((token) => token.length > 0)
    if (tokens.length !== SAMPLES_LINE_TOKENS) {
      return 0
    }

    return parseCountToken(tokens[SAMPLES_COUNT_TOKEN])
  }

  return 0
}

/**
 * Checks whether benchmark output reports at least one collected sample.
 *
 * @param stdout Captured benchmark stdout.
 * @returns True when the parsed sample count is positive.
 */
export const hasCollectedSamples = (stdout: string): boolean => {
  return parseSampleCount(stdout) > 0
}

/**
 * Reports the sample count of benchmark output as a stage metric.
 *
 * @param output Captured benchmark output.
 * @returns Sample count metric, or null when no samples line was printed.
 */
export const measureSampleCount = (output: StageExecutionOutput): StageMetric | null => {
  const hasSamplesLine = output.stdout
    .split('\n')
    .some((line) => line.startsWith(SAMPLES_LINE_PREFIX))
  if (!hasSamplesLine) {
    return null
  }

  return {
    label: 'samples_collected',
    value: parseSampleCount(output.stdout),
  }
}

const parseCountToken = (token: string | undefined): number => {
  if (token === undefined || !/^[+-]?\d+$/u.test(token)) {
    return 0
  }

  return Number.parseInt(token, 10)
}
