import type { CommandExecutor } from '../contracts/executor.js'
import type { Shard } from '../contracts/matrix.js'
import type {
  MatrixRunOptions,
  RunStatus,
  RunSummary,
  RunVerdict,
  ShardReport,
} from '../contracts/run.js'
import type { StepResult } from '../contracts/step.js'
import { MatrixConfigurationError } from '../errors.js'
import { createSerializedExecutor } from '../execution/serializedExecutor.js'
import { createSkippedShardReport, runShard } from './shardRunner.js'

/**
 * Runs expanded shards with bounded parallelism and reduces their reports to a verdict.
 */
export class MatrixScheduler {
  private readonly options: Required<Pick<MatrixRunOptions, 'concurrency' | 'now' | 'cwd'>> &
    Omit<MatrixRunOptions, 'concurrency' | 'now' | 'cwd'>

  /**
   * Creates a matrix scheduler.
   *
   * @param options Runtime options.
   * @throws MatrixConfigurationError when there are no shards or the concurrency degree
   * is invalid.
   */
  public constructor(options: MatrixRunOptions) {
    if (options.shards.length === 0) {
      throw new MatrixConfigurationError('matrix defines no shards', 'shards')
    }

    const concurrency = options.concurrency ?? Number.POSITIVE_INFINITY
    if (!isValidConcurrency(concurrency)) {
      throw new MatrixConfigurationError(
        `must be a positive integer or unlimited (got ${concurrency})`,
        'concurrency'
      )
    }

    this.options = {
      ...options,
      concurrency,
      now: options.now ?? Date.now,
      cwd: options.cwd ?? process.cwd(),
    }
  }

  /**
   * Executes all shards and aggregates the verdict.
   *
   * @returns Run verdict with reports in shard order.
   */
  public async run(): Promise<RunVerdict> {
    const { shards, policy, concurrency } = this.options
    const runStartedAt = this.options.now()
    const executor = this.options.serializeExecutor
      ? createSerializedExecutor(this.options.executor)
      : this.options.executor

    const reports: (ShardReport | undefined)[] = shards.map(() => undefined)
    const controllers = new Map<number, AbortController>()
    const inFlight = new Map<number, Promise<void>>()
    const hasRequiredShards = shards.some((shard) => !shard.allowFailure)

    let nextPosition = 0
    let decision: RunStatus | null = null

    const launch = (shard: Shard, position: number): void => {
      const controller = new AbortController()
      controllers.set(position, controller)

      const task = this.executeShard(shard, controller.signal, executor)
        .then(async (report) => {
          reports[position] = report
          await this.emitShardComplete(report)
        })
        .finally(() => {
          inFlight.delete(position)
          controllers.delete(position)
        })

      inFlight.set(position, task)
    }

    // A failure verdict leaves in-flight allow-failure shards running to completion.
    const cancelInFlight = (verdict: RunStatus | null = null): void => {
      for (const [position, controller] of controllers) {
        if (verdict === 'failure' && shards[position]?.allowFailure === true) {
          continue
        }
        controller.abort()
      }
    }

    await this.emitRunStart()

    for (;;) {
      while (decision === null && nextPosition < shards.length && inFlight.size < concurrency) {
        const shard = shards[nextPosition]
        if (shard) {
          launch(shard, nextPosition)
        }
        nextPosition += 1
      }

      if (inFlight.size === 0) {
        break
      }

      try {
        await Promise.race(inFlight.values())
      } catch (error: unknown) {
        cancelInFlight()
        await Promise.allSettled(inFlight.values())
        throw error
      }

      if (decision === null && policy.fastFinish) {
        decision = decideEarly(shards, reports, hasRequiredShards)
        if (decision !== null) {
          cancelInFlight(decision)
        }
      }
    }

    const skippedAt = this.options.now()
    for (const [position, shard] of shards.entries()) {
      if (reports[position] !== undefined) {
        continue
      }

      const report = createSkippedShardReport(
        shard,
        decision === 'success' ? 'fast_finish' : 'cancelled',
        skippedAt
      )
      reports[position] = report
      await this.emitShardComplete(report)
    }

    const finalReports = reports.filter((report): report is ShardReport => report !== undefined)
    const runFinishedAt = this.options.now()
    const status: RunStatus = finalReports.some((report) => report.blocking) ? 'failure' : 'success'

    const verdict: RunVerdict = {
      status,
      exitCode: status === 'failure' ? 1 : 0,
      fastFinished: decision !== null,
      shards: finalReports,
      summary: buildSummary(finalReports, runFinishedAt - runStartedAt),
      startedAt: runStartedAt,
      finishedAt: runFinishedAt,
    }

    await this.emitRunComplete(verdict)

    return verdict
  }

  private async executeShard(
    shard: Shard,
    signal: AbortSignal,
    executor: CommandExecutor
  ): Promise<ShardReport> {
    await this.emitShardStart(shard)

    return await runShard(shard, {
      executor,
      signal,
      cwd: this.options.cwd,
      stepTimeoutMs: this.options.stepTimeoutMs,
      now: this.options.now,
      onStepComplete: async (result: StepResult): Promise<void> => {
        await this.emitStepComplete(shard, result)
      },
    })
  }

  private async emitRunStart(): Promise<void> {
    const reporters = this.options.reporters ?? []
    for (const reporter of reporters) {
      await reporter.onRunStart?.(this.options.shards, this.options.policy)
    }
  }

  private async emitShardStart(shard: Shard): Promise<void> {
    const reporters = this.options.reporters ?? []
    for (const reporter of reporters) {
      await reporter.onShardStart?.(shard)
    }
  }

  private async emitStepComplete(shard: Shard, result: StepResult): Promise<void> {
    const reporters = this.options.reporters ?? []
    for (const reporter of reporters) {
      await reporter.onStepComplete?.(shard, result)
    }
  }

  private async emitShardComplete(report: ShardReport): Promise<void> {
    const reporters = this.options.reporters ?? []
    for (const reporter of reporters) {
      await reporter.onShardComplete?.(report)
    }
  }

  private async emitRunComplete(verdict: RunVerdict): Promise<void> {
    const reporters = this.options.reporters ?? []
    for (const reporter of reporters) {
      await reporter.onRunComplete?.(verdict)
    }
  }
}

/**
 * Creates a matrix scheduler instance.
 *
 * @param options Runtime options.
 * @returns Matrix scheduler.
 */
export const createMatrixScheduler = (options: MatrixRunOptions): MatrixScheduler => {
  return new MatrixScheduler(options)
}

/**
 * Runs shards and returns the verdict.
 *
 * @param options Runtime options.
 * @returns Run verdict.
 */
export const runMatrix = async (options: MatrixRunOptions): Promise<RunVerdict> => {
  return await createMatrixScheduler(options).run()
}

const isValidConcurrency = (value: number): boolean => {
  return value === Number.POSITIVE_INFINITY || (Number.isInteger(value) && value > 0)
}

// Fast finish only fixes the verdict while shards are still outstanding.
const decideEarly = (
  shards: readonly Shard[],
  reports: readonly (ShardReport | undefined)[],
  hasRequiredShards: boolean
): RunStatus | null => {
  if (reports.every((report) => report !== undefined)) {
    return null
  }

  if (reports.some((report) => report?.blocking === true)) {
    return 'failure'
  }

  const requiredFinished = shards.every(
    (shard, position) => shard.allowFailure || reports[position] !== undefined
  )

  return hasRequiredShards && requiredFinished ? 'success' : null
}

const buildSummary = (reports: readonly ShardReport[], durationMs: number): RunSummary => {
  const passed = reports.filter((report) => report.status === 'passed').length
  const failed = reports.filter((report) => report.blocking).length
  const allowedFailures = reports.filter(
    (report) => report.status === 'failed' && report.allowFailure
  ).length
  const skipped = reports.filter((report) => report.status === 'skipped').length

  return {
    total: reports.length,
    passed,
    failed,
    allowedFailures,
    skipped,
    durationMs,
  }
}
