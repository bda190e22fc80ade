import { mkdir } from 'node:fs/promises'
import { resolve } from 'node:path'

/** Build type used when neither the CLI nor the config names one. */
export const DEFAULT_BUILD_TYPE = 'Release'

/**
 * Returns the build directory of a sample.
 *
 * @param rootPath Repository root containing `samples/`.
 * @param sample Sample directory name.
 * @returns Absolute build directory path.
 */
export const getSampleBuildPath = (rootPath: string, sample: string): string => {
  return resolve(rootPath, 'samples', sample, 'build')
}

/**
 * Returns the build directory of a sample, creating it when missing.
 *
 * @param rootPath Repository root containing `samples/`.
 * @param sample Sample directory name.
 * @returns Absolute build directory path.
 */
export const ensureSampleBuildPath = async (rootPath: string, sample: string): Promise<string> => {
  const buildPath = getSampleBuildPath(rootPath, sample)
  await mkdir(buildPath, { recursive: true })
  return buildPath
}

/**
 * Resolves the cmake build type.
 *
 * @param sources Candidate values in priority order.
 * @returns First non-empty value, or the default build type.
 */
export const getBuildFlag = (sources: {
  readonly cli?: string
  readonly config?: string
}): string => {
  return sources.cli || sources.config || DEFAULT_BUILD_TYPE
}
