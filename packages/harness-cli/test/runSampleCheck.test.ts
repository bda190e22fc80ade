import { mkdtemp, rm, stat, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { basename, resolve } from 'node:path'

import { afterEach, describe, expect, it, vi } from 'vitest'

import type {
  CommandExecutionRequest,
  CommandExecutionResult,
  CommandExecutor,
} from '@samplecheck/harness-core'

import { runSampleCheck } from '../src/runSampleCheck.js'

const PASSING_STDOUT = 'Results are CORRECT with accuracy: 0\nSamples collected: 12 a b c d\n'

const createdDirectories: string[] = []

afterEach(async () => {
  for (const directory of createdDirectories.splice(0)) {
    await rm(directory, { recursive: true, force: true })
  }
})

const createRoot = async (): Promise<string> => {
  const directory = await mkdtemp(resolve(tmpdir(), 'sample-check-run-'))
  createdDirectories.push(directory)
  return directory
}

const processResult = (stdout: string, stderr = ''): CommandExecutionResult => {
  return {
    durationMs: 1,
    exitCode: 0,
    signal: null,
    stdout,
    stderr,
  }
}

const createToolchainExecutor = (outputs: {
  readonly cmake?: CommandExecutionResult
  readonly make?: CommandExecutionResult
  readonly benchmark?: CommandExecutionResult
}): { executor: CommandExecutor; requests: CommandExecutionRequest[] } => {
  const requests: CommandExecutionRequest[] = []

  const executor: CommandExecutor = async (request) => {
    requests.push(request)
    if (request.command === 'cmake') {
      return outputs.cmake ?? processResult('-- Generating done\n')
    }
    if (request.command === 'make') {
      return outputs.make ?? processResult('[100%] Built target cl_gemm_inst\n')
    }
    if (basename(request.command) === 'cl_gemm_inst') {
      return outputs.benchmark ?? processResult(PASSING_STDOUT)
    }
    throw new Error(`unexpected command ${request.command}`)
  }

  return { executor, requests }
}

const captureStdout = async (callback: () => Promise<unknown>): Promise<string> => {
  const chunks: string[] = []
  const writeSpy = vi
    .spyOn(process.stdout, 'write')
    .mockImplementation((chunk: string | Uint8Array) => {
      chunks.push(typeof chunk === 'string' ? chunk : Buffer.from(chunk).toString('utf8'))
      return true
    })

  try {
    await callback()
  } finally {
    writeSpy.mockRestore()
  }

  return chunks.join('')
}

describe('runSampleCheck', () => {
  it('prints nothing when every stage passes', async () => {
    const root = await createRoot()
    const { executor, requests } = createToolchainExecutor({})
    const buildPath = resolve(root, 'samples', 'cl_gemm_inst', 'build')

    let exitCode: number | undefined
    const output = await captureStdout(async () => {
      const result = await runSampleCheck({ cwd: root, format: 'plain', verbose: false, executor })
      exitCode = result.exitCode
    })

    expect(output).toBe('')
    expect(exitCode).toBe(0)
    expect(requests).toEqual([
      {
        command: 'cmake',
        args: ['-DCMAKE_BUILD_TYPE=Release', '..'],
        cwd: buildPath,
        env: undefined,
      },
      { command: 'make', args: [], cwd: buildPath, env: undefined },
      {
        command: resolve(buildPath, 'cl_gemm_inst'),
        args: ['1024', '1'],
        cwd: buildPath,
        env: undefined,
      },
    ])
    expect((await stat(buildPath)).isDirectory()).toBe(true)
  })

  it('prints the configure diagnostic and skips later stages', async () => {
    const root = await createRoot()
    const cmakeError = 'CMake Error at CMakeLists.txt:12:\n  Could not find OpenCL\n'
    const { executor, requests } = createToolchainExecutor({
      cmake: processResult('', cmakeError),
    })

    const output = await captureStdout(async () => {
      await runSampleCheck({ cwd: root, format: 'plain', verbose: false, executor })
    })

    expect(output).toBe(`${cmakeError}\n`)
    expect(requests.map((request) => request.command)).toEqual(['cmake'])
  })

  it('prints the full benchmark stdout when no samples were collected', async () => {
    const root = await createRoot()
    const stdout = 'Results are CORRECT\nSamples collected: 0 a b c d\n'
    const { executor } = createToolchainExecutor({ benchmark: processResult(stdout) })

    let diagnostic: string | null = null
    const output = await captureStdout(async () => {
      const result = await runSampleCheck({ cwd: root, format: 'plain', verbose: false, executor })
      diagnostic = result.diagnostic
    })

    expect(diagnostic).toBe(stdout)
    expect(output).toBe(`${stdout}\n`)
  })

  it('applies build type, env and root path from the config file', async () => {
    const root = await createRoot()
    await writeFile(
      resolve(root, 'sample-check.config.json'),
      JSON.stringify({ rootPath: 'tools', buildType: 'Debug', env: { LANG: 'C' } }),
      'utf8'
    )
    const { executor, requests } = createToolchainExecutor({})

    await captureStdout(async () => {
      await runSampleCheck({ cwd: root, format: 'plain', verbose: false, executor })
    })

    expect(requests[0]).toEqual({
      command: 'cmake',
      args: ['-DCMAKE_BUILD_TYPE=Debug', '..'],
      cwd: resolve(root, 'tools', 'samples', 'cl_gemm_inst', 'build'),
      env: { LANG: 'C' },
    })
  })

  it('lets the CLI build type win over the config file', async () => {
    const root = await createRoot()
    await writeFile(
      resolve(root, 'sample-check.config.json'),
      JSON.stringify({ buildType: 'Debug' }),
      'utf8'
    )
    const { executor, requests } = createToolchainExecutor({})

    await captureStdout(async () => {
      await runSampleCheck({
        cwd: root,
        buildType: 'RelWithDebInfo',
        format: 'plain',
        verbose: false,
        executor,
      })
    })

    expect(requests[0]?.args).toEqual(['-DCMAKE_BUILD_TYPE=RelWithDebInfo', '..'])
  })

  it('stops after a failed build and reports only the executed stages', async () => {
    const root = await createRoot()
    const { executor, requests } = createToolchainExecutor({
      make: processResult('', 'make: *** [all] Error 2\n'),
    })

    let stages: readonly (readonly [string, string])[] = []
    const output = await captureStdout(async () => {
      const result = await runSampleCheck({ cwd: root, format: 'plain', verbose: false, executor })
      stages = result.stages.map((stage) => [stage.id, stage.status] as const)
    })

    expect(output).toBe('make: *** [all] Error 2\n\n')
    expect(stages).toEqual([
      ['configure', 'passed'],
      ['build', 'failed'],
    ])
    expect(requests.map((request) => request.command)).toEqual(['cmake', 'make'])
  })

  it('uses the config output format unless the CLI sets one', async () => {
    const root = await createRoot()
    await writeFile(
      resolve(root, 'sample-check.config.json'),
      JSON.stringify({ output: { format: 'pretty' } }),
      'utf8'
    )
    const { executor } = createToolchainExecutor({})

    const configFormatOutput = await captureStdout(async () => {
      await runSampleCheck({ cwd: root, format: 'plain', verbose: false, executor })
    })
    const cliFormatOutput = await captureStdout(async () => {
      await runSampleCheck({
        cwd: root,
        format: 'plain',
        formatProvided: true,
        verbose: false,
        executor,
      })
    })

    expect(configFormatOutput).toContain('sample-check: cl_gemm_inst (3 stages)')
    expect(cliFormatOutput).toBe('')
  })
})
