import type {
  CommandExecutionRequest,
  CommandExecutionResult,
  CommandExecutor,
} from '../contracts/executor.js'

/**
 * Wraps an executor so that at most one command runs at a time.
 *
 * Requests queue in call order. A request whose signal fired while it was
 * queued resolves as cancelled without reaching the wrapped executor.
 *
 * @param executor Executor that is not safe for concurrent use.
 * @returns Executor safe for concurrent callers.
 */
export const createSerializedExecutor = (executor: CommandExecutor): CommandExecutor => {
  let tail: Promise<void> = Promise.resolve()

  return async (request: CommandExecutionRequest): Promise<CommandExecutionResult> => {
    const previous = tail
    let release: () => void = () => undefined
    tail = new Promise<void>((resolve) => {
      release = resolve
    })

    try {
      await previous
      if (request.signal.aborted) {
        return createCancelledResult()
      }

      return await executor(request)
    } finally {
      release()
    }
  }
}

const createCancelledResult = (): CommandExecutionResult => {
  return {
    successful: false,
    timedOut: false,
    cancelled: true,
    durationMs: 0,
    exitCode: null,
    signal: null,
    stdout: '',
    stderr: '',
  }
}
