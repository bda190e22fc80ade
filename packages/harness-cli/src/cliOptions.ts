import { resolve } from 'node:path'

import { CLI_OUTPUT_FORMATS, type CliOutputFormat } from './config/types.js'

/**
 * Parsed CLI runtime options.
 */
export interface CliOptions {
  /** Absolute repository root used for config lookup and sample paths. */
  readonly cwd: string
  /** Optional explicit config file path. */
  readonly configPath?: string
  /** Optional cmake build type override. */
  readonly buildType?: string
  /** Selected output format. */
  readonly format: CliOutputFormat
  /** Indicates whether output format was explicitly set via CLI flag. */
  readonly formatProvided?: true
  /** Emits full output for passing stages when true. */
  readonly verbose: boolean
  /** Prints usage and exits when true. */
  readonly help: boolean
}

/**
 * Parses process arguments for the sample-check CLI.
 *
 * @param argv Raw argument list excluding node and script path.
 * @param baseCwd Base working directory.
 * @returns Parsed CLI options.
 * @throws Error when an argument is invalid.
 */
export const parseCliOptions = (argv: readonly string[], baseCwd: string): CliOptions => {
  let configPath: string | undefined
  let buildType: string | undefined
  let format: CliOutputFormat = 'plain'
  let formatProvided = false
  let verbose = false
  let help = false
  let cwd = baseCwd

  for (let index = 0; index < argv.length; index += 1) {
    const argument = argv[index]
    if (!argument) {
      continue
    }

    if (argument === '--help' || argument === '-h') {
      help = true
      continue
    }

    if (argument === '--verbose') {
      verbose = true
      continue
    }

    if (argument === '--format') {
      format = parseFormat(requireValue(argv, index, '--format'))
      formatProvided = true
      index += 1
      continue
    }

    if (argument.startsWith('--format=')) {
      format = parseFormat(requireInlineValue(argument, '--format'))
      formatProvided = true
      continue
    }

    if (argument === '--config') {
      configPath = requireValue(argv, index, '--config')
      index += 1
      continue
    }

    if (argument.startsWith('--config=')) {
      configPath = requireInlineValue(argument, '--config')
      continue
    }

    if (argument === '--build-type') {
      buildType = requireValue(argv, index, '--build-type')
      index += 1
      continue
    }

    if (argument.startsWith('--build-type=')) {
      buildType = requireInlineValue(argument, '--build-type')
      continue
    }

    if (argument === '--cwd') {
      cwd = resolve(baseCwd, requireValue(argv, index, '--cwd'))
      index += 1
      continue
    }

    if (argument.startsWith('--cwd=')) {
      cwd = resolve(baseCwd, requireInlineValue(argument, '--cwd'))
      continue
    }

    throw new Error(`Unknown argument: ${argument}`)
  }

  return {
    cwd,
    configPath,
    buildType,
    format,
    ...(formatProvided ? { formatProvided: true as const } : {}),
    verbose,
    help,
  }
}

/**
 * Returns help text for the sample-check CLI.
 *
 * @returns Human-readable usage text.
 */
export const getCliHelpText = (): string => {
  return [
    'Usage: sample-check [options]',
    '',
    'Configures, builds and runs the cl_gemm_inst sample, then validates its output.',
    'Prints nothing on success and the first failure diagnostic otherwise.',
    '',
    'Options:',
    '  --cwd <path>          Repository root containing samples/ (default: current directory)',
    '  --config <path>       Config file path (default: sample-check.config.ts or .json)',
    '  --build-type <type>   cmake build type (default: Release)',
    '  --format <type>       Output format: plain | pretty (default: plain)',
    '  --verbose             Show stdout/stderr for passing stages (pretty format)',
    '  -h, --help            Show this help',
  ].join('\n')
}

const requireValue = (argv: readonly string[], index: number, flag: string): string => {
  const nextValue = argv[index + 1]
  if (!nextValue) {
    throw new Error(`${flag} requires a value`)
  }

  return nextValue
}

const requireInlineValue = (argument: string, flag: string): string => {
  const value = argument.slice(`${flag}=`.length)
  if (!value) {
    throw new Error(`${flag} requires a value`)
  }

  return value
}

const parseFormat = (value: string): CliOutputFormat => {
  const format = CLI_OUTPUT_FORMATS.find((candidate) => candidate === value)
  if (!format) {
    throw new Error('--format must be "plain" or "pretty"')
  }

  return format
}
