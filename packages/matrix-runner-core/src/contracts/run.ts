import type { CommandExecutor } from './executor.js'
import type { Shard } from './matrix.js'
import type { MatrixReporter } from './reporter.js'
import type { StepResult } from './step.js'

/**
 * Terminal status of a shard.
 */
export type ShardStatus = 'passed' | 'failed' | 'skipped'

/**
 * Reason attached to failed or skipped shards.
 */
export type ShardResultReason =
  | 'step_failed'
  | 'step_timeout'
  | 'executor_error'
  | 'cancelled'
  | 'fast_finish'

/**
 * Structured outcome of one shard.
 */
export interface ShardReport {
  readonly id: string
  readonly name: string
  readonly toolchain?: string
  readonly tag?: string
  /** Copied from the shard. */
  readonly allowFailure: boolean
  readonly status: ShardStatus
  readonly reason?: ShardResultReason
  /** True when this report fails the run. */
  readonly blocking: boolean
  /** Executed steps in order; empty for shards that never started. */
  readonly steps: readonly StepResult[]
  /** Start timestamp, or null when the shard never started. */
  readonly startedAt: number | null
  readonly finishedAt: number
  readonly durationMs: number
}

/**
 * Overall run status.
 */
export type RunStatus = 'success' | 'failure'

/**
 * Summary counts for one matrix run.
 */
export interface RunSummary {
  /** Number of shards in the run. */
  readonly total: number
  readonly passed: number
  /** Blocking failures. */
  readonly failed: number
  /** Failures exempted by allow-failure. */
  readonly allowedFailures: number
  readonly skipped: number
  /** Total runtime in milliseconds. */
  readonly durationMs: number
}

/**
 * The single output of a matrix run.
 */
export interface RunVerdict {
  readonly status: RunStatus
  /** Process-style exit code derived from the status. */
  readonly exitCode: 0 | 1
  /** True when fast finish decided the verdict before every shard completed. */
  readonly fastFinished: boolean
  /** Reports in shard order. */
  readonly shards: readonly ShardReport[]
  readonly summary: RunSummary
  /** Run start timestamp in Unix milliseconds. */
  readonly startedAt: number
  /** Run finish timestamp in Unix milliseconds. */
  readonly finishedAt: number
}

/**
 * Early-termination policy.
 */
export interface MatrixRunPolicy {
  /** Decide the verdict as soon as it can no longer change. */
  readonly fastFinish: boolean
}

/**
 * Runtime options used by the matrix scheduler.
 */
export interface MatrixRunOptions {
  /** Expanded shards in matrix order. */
  readonly shards: readonly Shard[]
  /** Command executor implementation. */
  readonly executor: CommandExecutor
  readonly policy: MatrixRunPolicy
  /** Maximum shards in flight; a positive integer or Infinity. Defaults to Infinity. */
  readonly concurrency?: number
  /** Optional reporters for lifecycle hooks. */
  readonly reporters?: readonly MatrixReporter[]
  /** Working directory passed to every step. */
  readonly cwd?: string
  /** Timeout applied to every step execution. */
  readonly stepTimeoutMs?: number
  /** Runs at most one step at a time across all shards when true. */
  readonly serializeExecutor?: boolean
  /** Time source injection for deterministic tests. */
  readonly now?: () => number
}
