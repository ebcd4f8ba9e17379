import type { CommandExecutionResult, CommandExecutor } from '../contracts/executor.js'
import type { Shard } from '../contracts/matrix.js'
import type { ShardReport, ShardResultReason, ShardStatus } from '../contracts/run.js'
import type { StepPhase, StepResult, StepResultReason, StepStatus } from '../contracts/step.js'

/**
 * Collaborators and settings for running one shard.
 */
export interface ShardRunContext {
  /** Command executor implementation. */
  readonly executor: CommandExecutor
  /** Cancellation signal checked before every step and forwarded to the executor. */
  readonly signal: AbortSignal
  /** Working directory passed to every step. */
  readonly cwd: string
  /** Timeout for one step execution. */
  readonly stepTimeoutMs?: number
  /** Time source. */
  readonly now: () => number
  /** Called after each executed step. */
  readonly onStepComplete?: (result: StepResult) => Promise<void> | void
}

interface PlannedStep {
  readonly command: string
  readonly phase: StepPhase
  readonly index: number
}

/**
 * Runs before steps and script steps of a shard in order, stopping at the first
 * step that does not pass.
 *
 * @param shard Shard to run.
 * @param context Executor and runtime settings.
 * @returns Final shard report.
 */
export const runShard = async (shard: Shard, context: ShardRunContext): Promise<ShardReport> => {
  const startedAt = context.now()
  const results: StepResult[] = []

  for (const step of planSteps(shard)) {
    if (context.signal.aborted) {
      return createShardReport(shard, {
        status: 'skipped',
        reason: 'cancelled',
        steps: results,
        startedAt,
        finishedAt: context.now(),
      })
    }

    const result = await executeStep(shard, step, context)
    results.push(result)
    await context.onStepComplete?.(result)

    if (result.status !== 'passed') {
      const cancelled = result.status === 'cancelled'
      return createShardReport(shard, {
        status: cancelled ? 'skipped' : 'failed',
        reason: SHARD_REASON_BY_STEP_REASON[result.reason ?? 'command_failed'],
        steps: results,
        startedAt,
        finishedAt: context.now(),
      })
    }
  }

  return createShardReport(shard, {
    status: 'passed',
    reason: undefined,
    steps: results,
    startedAt,
    finishedAt: context.now(),
  })
}

/**
 * Builds the report for a shard that never started.
 *
 * @param shard Skipped shard.
 * @param reason Why the shard was not run.
 * @param timestamp Decision time.
 * @returns Skipped shard report.
 */
export const createSkippedShardReport = (
  shard: Shard,
  reason: Extract<ShardResultReason, 'cancelled' | 'fast_finish'>,
  timestamp: number
): ShardReport => {
  return createShardReport(shard, {
    status: 'skipped',
    reason,
    steps: [],
    startedAt: null,
    finishedAt: timestamp,
  })
}

const SHARD_REASON_BY_STEP_REASON: Record<StepResultReason, ShardResultReason> = {
  command_failed: 'step_failed',
  command_timeout: 'step_timeout',
  executor_error: 'executor_error',
  cancelled: 'cancelled',
}

const planSteps = (shard: Shard): readonly PlannedStep[] => {
  return [
    ...shard.beforeSteps.map((command, index) => ({
      command,
      phase: 'before_script' as const,
      index,
    })),
    ...shard.steps.map((command, index) => ({ command, phase: 'script' as const, index })),
  ]
}

const executeStep = async (
  shard: Shard,
  step: PlannedStep,
  context: ShardRunContext
): Promise<StepResult> => {
  const startedAt = context.now()

  let execution: CommandExecutionResult
  let rejected = false
  try {
    execution = await context.executor({
      command: step.command,
      cwd: context.cwd,
      env: shard.env,
      timeoutMs: context.stepTimeoutMs,
      signal: context.signal,
      shardId: shard.id,
      phase: step.phase,
    })
  } catch (error: unknown) {
    rejected = true
    execution = {
      successful: false,
      timedOut: false,
      durationMs: 0,
      exitCode: null,
      signal: null,
      stdout: '',
      stderr: '',
      error,
    }
  }

  const { status, reason } = classifyExecution(execution, context.signal, rejected)
  const finishedAt = context.now()

  return {
    command: step.command,
    phase: step.phase,
    index: step.index,
    status,
    reason,
    exitCode: execution.exitCode,
    signal: execution.signal,
    stdout: execution.stdout,
    stderr: execution.stderr,
    startedAt,
    finishedAt,
    durationMs: finishedAt - startedAt,
    ...(reason === 'executor_error' ? { error: formatExecutorError(execution.error) } : {}),
  }
}

const classifyExecution = (
  execution: CommandExecutionResult,
  signal: AbortSignal,
  rejected: boolean
): { status: StepStatus; reason: StepResultReason | undefined } => {
  if (execution.successful) {
    return { status: 'passed', reason: undefined }
  }

  if (execution.cancelled === true || signal.aborted) {
    return { status: 'cancelled', reason: 'cancelled' }
  }

  if (execution.timedOut) {
    return { status: 'timed_out', reason: 'command_timeout' }
  }

  if (rejected || execution.error !== undefined) {
    return { status: 'failed', reason: 'executor_error' }
  }

  return { status: 'failed', reason: 'command_failed' }
}

const formatExecutorError = (error: unknown): string => {
  return error instanceof Error ? `${error.name}: ${error.message}` : String(error)
}

const createShardReport = (
  shard: Shard,
  input: {
    status: ShardStatus
    reason: ShardResultReason | undefined
    steps: readonly StepResult[]
    startedAt: number | null
    finishedAt: number
  }
): ShardReport => {
  return Object.freeze({
    id: shard.id,
    name: shard.name,
    toolchain: shard.toolchain,
    tag: shard.tag,
    allowFailure: shard.allowFailure,
    status: input.status,
    reason: input.reason,
    blocking: input.status === 'failed' && !shard.allowFailure,
    steps: Object.freeze([...input.steps]),
    startedAt: input.startedAt,
    finishedAt: input.finishedAt,
    durationMs: input.startedAt === null ? 0 : input.finishedAt - input.startedAt,
  })
}
