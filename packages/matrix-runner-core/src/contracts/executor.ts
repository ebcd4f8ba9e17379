import type { EnvironmentDescriptor } from '../environment/environmentDescriptor.js'
import type { StepExecutionOutput, StepPhase } from './step.js'

/**
 * Input contract for command execution.
 */
export interface CommandExecutionRequest {
  /** Shell command to execute. */
  readonly command: string
  /** Working directory used for this process. */
  readonly cwd: string
  /** Resolved shard environment; the executor decides how it meets the host environment. */
  readonly env: EnvironmentDescriptor
  /** Optional process timeout in milliseconds. */
  readonly timeoutMs?: number
  /** Fires when the scheduler cancels the shard. */
  readonly signal: AbortSignal
  /** Shard the step belongs to. */
  readonly shardId: string
  readonly phase: StepPhase
}

/**
 * Output contract from one command execution.
 */
export interface CommandExecutionResult extends StepExecutionOutput {
  /** True when command reached timeout handling path. */
  readonly timedOut: boolean
  /** True when the command was stopped because the request signal fired. */
  readonly cancelled?: boolean
  /** Total command duration in milliseconds. */
  readonly durationMs: number
  /** True when command completed successfully. */
  readonly successful: boolean
  /** Original error object for spawn-level failures. */
  readonly error?: unknown
}

/**
 * Asynchronous abstraction for command execution. Must tolerate concurrent calls
 * unless the scheduler is asked to serialize them.
 *
 * @param request Execution input data.
 * @returns Command execution result.
 */
export type CommandExecutor = (request: CommandExecutionRequest) => Promise<CommandExecutionResult>
