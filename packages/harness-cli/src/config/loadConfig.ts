import { access, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { dirname, resolve } from 'node:path'
import { pathToFileURL } from 'node:url'

import ts from 'typescript'

import { CLI_OUTPUT_FORMATS, type CliOutputFormat, type SampleCheckConfig } from './types.js'

/** Config file names looked up in the working directory, in order. */
export const CONFIG_FILE_NAMES = ['sample-check.config.ts', 'sample-check.config.json'] as const

/**
 * Loaded config with the file it came from.
 */
export interface LoadedSampleCheckConfig {
  /** Parsed config; empty when no file was found. */
  readonly config: SampleCheckConfig
  /** Absolute config path, or null when defaults are used. */
  readonly configFilePath: string | null
}

/**
 * Loads and validates a sample-check config file.
 *
 * Without an explicit path a missing config file is not an error.
 *
 * @param cwd Base working directory.
 * @param configPath Optional explicit config file path.
 * @returns Parsed config with resolved metadata.
 * @throws Error when an explicit config is missing, or a config is invalid.
 */
export const loadSampleCheckConfig = async (
  cwd: string,
  configPath?: string
): Promise<LoadedSampleCheckConfig> => {
  const resolvedConfigPath = await resolveConfigPath(cwd, configPath)
  if (!resolvedConfigPath) {
    return { config: {}, configFilePath: null }
  }

  const loadedConfig = await loadConfigByExtension(resolvedConfigPath)
  const config = parseSampleCheckConfig(loadedConfig)

  return {
    config,
    configFilePath: resolvedConfigPath,
  }
}

const resolveConfigPath = async (cwd: string, configPath?: string): Promise<string | null> => {
  if (configPath) {
    const explicitPath = resolve(cwd, configPath)
    if (!(await fileExists(explicitPath))) {
      throw new Error(`Config file not found: ${explicitPath}`)
    }
    return explicitPath
  }

  for (const fileName of CONFIG_FILE_NAMES) {
    const candidate = resolve(cwd, fileName)
    if (await fileExists(candidate)) {
      return candidate
    }
  }

  return null
}

const fileExists = async (filePath: string): Promise<boolean> => {
  try {
    await access(filePath)
    return true
  } catch {
    return false
  }
}

const loadConfigByExtension = async (configFilePath: string): Promise<unknown> => {
  if (configFilePath.endsWith('.json')) {
    const content = await readFile(configFilePath, 'utf8')
    return JSON.parse(content) as unknown
  }

  if (configFilePath.endsWith('.ts')) {
    return await loadTypeScriptConfig(configFilePath)
  }

  throw new Error(`Unsupported config extension: ${configFilePath}`)
}

const loadTypeScriptConfig = async (configFilePath: string): Promise<unknown> => {
  const source = await readFile(configFilePath, 'utf8')
  const transpiled = ts.transpileModule(source, {
    compilerOptions: {
      module: ts.ModuleKind.ESNext,
      target: ts.ScriptTarget.ES2022,
      esModuleInterop: true,
    },
    fileName: configFilePath,
    reportDiagnostics: true,
  })

  if (transpiled.diagnostics && transpiled.diagnostics.length > 0) {
    const message = ts.formatDiagnosticsWithColorAndContext(transpiled.diagnostics, {
      getCurrentDirectory: (): string => dirname(configFilePath),
      getCanonicalFileName: (fileName: string): string => fileName,
      getNewLine: (): string => '\n',
    })
    throw new Error(`Failed to transpile ${configFilePath}\n${message}`)
  }

  const tempDirectory = await mkdtemp(resolve(tmpdir(), 'sample-check-config-'))
  const tempFilePath = resolve(tempDirectory, 'config.mjs')

  try {
    await writeFile(tempFilePath, transpiled.outputText, 'utf8')
    const moduleUrl = `${pathToFileURL(tempFilePath).href}?v=${Date.now()}`
    const loadedModule = (await import(moduleUrl)) as {
      readonly default?: unknown
      readonly config?: unknown
    }

    if (loadedModule.default !== undefined) {
      return loadedModule.default
    }

    if (loadedModule.config !== undefined) {
      return loadedModule.config
    }

    throw new Error(`Config module ${configFilePath} must export default or named "config"`)
  } finally {
    await rm(tempDirectory, { recursive: true, force: true })
  }
}

/**
 * Validates an untyped config value.
 *
 * @param value Raw config value.
 * @returns Typed config.
 * @throws Error naming the first invalid field.
 */
export const parseSampleCheckConfig = (value: unknown): SampleCheckConfig => {
  if (!isRecord(value)) {
    throw new Error('Config must be an object')
  }

  const rootPath = parseOptionalString(value.rootPath, 'rootPath')
  const buildType = parseOptionalNonEmptyString(value.buildType, 'buildType')
  const env = parseOptionalStringRecord(value.env, 'env')
  const output = parseOutputConfig(value.output)

  return {
    rootPath,
    buildType,
    env,
    output,
  }
}

const parseOutputConfig = (value: unknown): SampleCheckConfig['output'] | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (!isRecord(value)) {
    throw new Error('output must be an object')
  }

  const format = parseOptionalFormat(value.format, 'output.format')
  const verbose = parseOptionalBoolean(value.verbose, 'output.verbose')

  return {
    format,
    verbose,
  }
}

const parseOptionalFormat = (value: unknown, path: string): CliOutputFormat | undefined => {
  if (value === undefined) {
    return undefined
  }

  const format = CLI_OUTPUT_FORMATS.find((candidate) => candidate === value)
  if (!format) {
    throw new Error(`${path} must be "plain" or "pretty"`)
  }

  return format
}

const parseOptionalString = (value: unknown, path: string): string | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (typeof value !== 'string') {
    throw new Error(`${path} must be a string`)
  }

  return value
}

const parseOptionalNonEmptyString = (value: unknown, path: string): string | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (typeof value !== 'string' || value.length === 0) {
    throw new Error(`${path} must be a non-empty string`)
  }

  return value
}

const parseOptionalBoolean = (value: unknown, path: string): boolean | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (typeof value !== 'boolean') {
    throw new Error(`${path} must be a boolean`)
  }

  return value
}

const parseOptionalStringRecord = (
  value: unknown,
  path: string
): Readonly<Record<string, string>> | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (!isRecord(value)) {
    throw new Error(`${path} must be an object`)
  }

  const parsed: Record<string, string> = {}

  for (const [key, entryValue] of Object.entries(value)) {
    if (typeof entryValue !== 'string') {
      throw new Error(`${path}.${key} must be a string`)
    }
    parsed[key] = entryValue
  }

  return parsed
}

const isRecord = (value: unknown): value is Record<string, unknown> => {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
