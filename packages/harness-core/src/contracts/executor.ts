import type { StageExecutionOutput } from './stage.js'

/**
 * Input contract for command execution.
 */
export interface CommandExecutionRequest {
  /** Executable to launch, resolved through PATH unless it contains a path separator. */
  readonly command: string
  /** Positional arguments passed verbatim. */
  readonly args: readonly string[]
  /** Working directory used for this process. */
  readonly cwd: string
  /** Environment variables merged over the parent process environment. */
  readonly env?: NodeJS.ProcessEnv
}

/**
 * Output contract from one command execution.
 */
export interface CommandExecutionResult extends StageExecutionOutput {
  /** Total command duration in milliseconds. */
  readonly durationMs: number
  /** Original error object when the process could not be started. */
  readonly error?: Error
}

/**
 * Asynchronous abstraction for command execution.
 *
 * Implementations drain stdout and stderr concurrently and never reject.
 *
 * @param request Execution input data.
 * @returns Command execution result.
 */
export type CommandExecutor = (request: CommandExecutionRequest) => Promise<CommandExecutionResult>
