import { mkdtemp, rm, stat } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { resolve } from 'node:path'

import { afterEach, describe, expect, it } from 'vitest'

import {
  DEFAULT_BUILD_TYPE,
  ensureSampleBuildPath,
  getBuildFlag,
  getSampleBuildPath,
} from '../src/config/buildPaths.js'

const createdDirectories: string[] = []

afterEach(async () => {
  for (const directory of createdDirectories.splice(0)) {
    await rm(directory, { recursive: true, force: true })
  }
})

describe('getSampleBuildPath', () => {
  it('places the build directory below the sample sources', () => {
    const root = resolve('repo')

    expect(getSampleBuildPath(root, 'cl_gemm_inst')).toBe(
      resolve(root, 'samples', 'cl_gemm_inst', 'build')
    )
  })
})

describe('ensureSampleBuildPath', () => {
  it('creates a missing build directory', async () => {
    const root = await mkdtemp(resolve(tmpdir(), 'sample-check-paths-'))
    createdDirectories.push(root)

    const buildPath = await ensureSampleBuildPath(root, 'cl_gemm_inst')
    const info = await stat(buildPath)

    expect(buildPath).toBe(resolve(root, 'samples', 'cl_gemm_inst', 'build'))
    expect(info.isDirectory()).toBe(true)
  })

  it('keeps an existing build directory', async () => {
    const root = await mkdtemp(resolve(tmpdir(), 'sample-check-paths-'))
    createdDirectories.push(root)

    await ensureSampleBuildPath(root, 'cl_gemm_inst')

    await expect(ensureSampleBuildPath(root, 'cl_gemm_inst')).resolves.toBe(
      resolve(root, 'samples', 'cl_gemm_inst', 'build')
    )
  })
})

describe('getBuildFlag', () => {
  it('prefers the CLI value over the config value', () => {
    expect(getBuildFlag({ cli: 'Debug', config: 'RelWithDebInfo' })).toBe('Debug')
  })

  it('falls back to the config value', () => {
    expect(getBuildFlag({ config: 'RelWithDebInfo' })).toBe('RelWithDebInfo')
  })

  it('defaults to a release build', () => {
    expect(getBuildFlag({})).toBe(DEFAULT_BUILD_TYPE)
    expect(DEFAULT_BUILD_TYPE).toBe('Release')
  })
})
