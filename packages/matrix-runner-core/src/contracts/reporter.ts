import type { Shard } from './matrix.js'
import type { MatrixRunPolicy, RunVerdict, ShardReport } from './run.js'
import type { StepResult } from './step.js'

/**
 * Event hooks for matrix run reporting. Hooks are awaited in registration order.
 */
export interface MatrixReporter {
  /**
   * Called once before any shard starts.
   *
   * @param shards Shards scheduled for execution.
   * @param policy Active run policy.
   */
  onRunStart?(shards: readonly Shard[], policy: MatrixRunPolicy): Promise<void> | void

  /**
   * Called before a shard executes its first step.
   *
   * @param shard Shard definition.
   */
  onShardStart?(shard: Shard): Promise<void> | void

  /**
   * Called after each executed step.
   *
   * @param shard Owning shard.
   * @param result Step result.
   */
  onStepComplete?(shard: Shard, result: StepResult): Promise<void> | void

  /**
   * Called once per shard when its report is final, including skipped shards.
   *
   * @param report Shard report.
   */
  onShardComplete?(report: ShardReport): Promise<void> | void

  /**
   * Called once after the verdict is decided.
   *
   * @param verdict Run verdict.
   */
  onRunComplete?(verdict: RunVerdict): Promise<void> | void
}
