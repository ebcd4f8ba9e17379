import { spawn } from 'node:child_process'

import type {
  CommandExecutionRequest,
  CommandExecutionResult,
  CommandExecutor,
} from '../contracts/executor.js'
import { resolveEnvironmentReferences } from '../environment/environmentDescriptor.js'

/**
 * Options for the Node.js shell executor.
 */
export interface NodeCommandExecutorOptions {
  /** Environment the shard environment is layered on. Defaults to `process.env`. */
  readonly parentEnv?: NodeJS.ProcessEnv
}

/**
 * Creates a Node.js shell command executor.
 *
 * The shard environment is expanded against the parent environment, so values
 * such as `$HOME/.cargo/bin:$PATH` behave as they would in a CI shell.
 *
 * @param options Executor options.
 * @returns Command executor implementation.
 */
export const createNodeCommandExecutor = (
  options: NodeCommandExecutorOptions = {}
): CommandExecutor => {
  return async (request: CommandExecutionRequest): Promise<CommandExecutionResult> => {
    const startedAt = Date.now()
    const parentEnv = options.parentEnv ?? process.env

    return await new Promise<CommandExecutionResult>((resolve) => {
      if (request.signal.aborted) {
        resolve({
          successful: false,
          timedOut: false,
          cancelled: true,
          durationMs: 0,
          exitCode: null,
          signal: null,
          stdout: '',
          stderr: '',
        })
        return
      }

      const env: NodeJS.ProcessEnv = {
        ...parentEnv,
        ...resolveEnvironmentReferences(request.env, parentEnv),
      }
      const child = spawn(request.command, {
        cwd: request.cwd,
        env,
        shell: true,
        stdio: ['ignore', 'pipe', 'pipe'],
      })

      let stdout = ''
      let stderr = ''
      let timedOut = false
      let cancelled = false
      let error: unknown
      let closed = false

      const timeoutHandle =
        typeof request.timeoutMs === 'number' && request.timeoutMs > 0
          ? setTimeout(() => {
              timedOut = true
              child.kill('SIGTERM')
            }, request.timeoutMs)
          : null

      const onAbort = (): void => {
        cancelled = true
        child.kill('SIGTERM')
      }
      request.signal.addEventListener('abort', onAbort, { once: true })

      child.stdout.on('data', (chunk: Buffer) => {
        stdout += chunk.toString('utf8')
      })

      child.stderr.on('data', (chunk: Buffer) => {
        stderr += chunk.toString('utf8')
      })

      child.on('error', (spawnError: Error) => {
        error = spawnError
      })

      child.on('close', (exitCode: number | null, signal: NodeJS.Signals | null) => {
        if (closed) {
          return
        }

        closed = true
        if (timeoutHandle) {
          clearTimeout(timeoutHandle)
        }
        request.signal.removeEventListener('abort', onAbort)

        const durationMs = Date.now() - startedAt
        const successful = !timedOut && !cancelled && exitCode === 0 && error === undefined

        resolve({
          successful,
          timedOut,
          cancelled,
          durationMs,
          exitCode,
          signal,
          stdout,
          stderr,
          error,
        })
      })
    })
  }
}
