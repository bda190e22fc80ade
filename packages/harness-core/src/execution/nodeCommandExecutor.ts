import { spawn } from 'node:child_process'

import type {
  CommandExecutionRequest,
  CommandExecutionResult,
  CommandExecutor,
} from '../contracts/executor.js'

/**
 * Creates a Node.js process executor.
 *
 * Both output streams are consumed through `data` events while the process
 * runs, so a child filling one pipe never blocks on the other.
 *
 * @returns Command executor implementation.
 */
export const createNodeCommandExecutor = (): CommandExecutor => {
  return async (request: CommandExecutionRequest): Promise<CommandExecutionResult> => {
    const startedAt = Date.now()

    return await new Promise<CommandExecutionResult>((resolve) => {
      const env: NodeJS.ProcessEnv = { ...process.env, ...request.env }
      const child = spawn(request.command, [...request.args], {
        cwd: request.cwd,
        env,
        stdio: ['ignore', 'pipe', 'pipe'],
      })

      let stdout = ''
      let stderr = ''
      let error: Error | undefined
      let settled = false

      const settle = (exitCode: number | null, signal: NodeJS.Signals | null): void => {
        if (settled) {
          return
        }

        settled = true
        resolve({
          durationMs: Date.now() - startedAt,
          exitCode,
          signal,
          stdout,
          stderr,
          error,
        })
      }

      child.stdout.setEncoding('utf8')
      child.stderr.setEncoding('utf8')

      child.stdout.on('data', (chunk: string) => {
        stdout += chunk
      })

      child.stderr.on('data', (chunk: string) => {
        stderr += chunk
      })

      child.on('error', (spawnError: Error) => {
        error = spawnError
        // no pid: the process never started and 'close' may not follow
        if (child.pid === undefined) {
          settle(null, null)
        }
      })

      child.on('close', (exitCode: number | null, signal: NodeJS.Signals | null) => {
        settle(exitCode, signal)
      })
    })
  }
}
