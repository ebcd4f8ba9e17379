/**
 * Phase a step belongs to within a shard.
 */
export type StepPhase = 'before_script' | 'script'

/**
 * Terminal status of a single executed step.
 */
export type StepStatus = 'passed' | 'failed' | 'timed_out' | 'cancelled'

/**
 * Failure reason assigned to a non-passing step.
 */
export type StepResultReason = 'command_failed' | 'command_timeout' | 'executor_error' | 'cancelled'

/**
 * Captured process output data for one step execution.
 */
export interface StepExecutionOutput {
  /** Exit code returned by the process, or null when unavailable. */
  readonly exitCode: number | null
  /** Termination signal if process ended by signal. */
  readonly signal: NodeJS.Signals | null
  /** Captured stdout content. */
  readonly stdout: string
  /** Captured stderr content. */
  readonly stderr: string
}

/**
 * Result recorded for each executed step of a shard.
 */
export interface StepResult extends StepExecutionOutput {
  /** Step text as written in the matrix. */
  readonly command: string
  readonly phase: StepPhase
  /** Zero-based position within its phase. */
  readonly index: number
  readonly status: StepStatus
  /** Reason for non-success outcomes. */
  readonly reason?: StepResultReason
  /** Step start timestamp in Unix milliseconds. */
  readonly startedAt: number
  /** Step finish timestamp in Unix milliseconds. */
  readonly finishedAt: number
  readonly durationMs: number
  /** Executor failure message for `executor_error` results. */
  readonly error?: string
}
