export type {
  CommandExecutionRequest,
  CommandExecutionResult,
  CommandExecutor,
} from './contracts/executor.js'
export type {
  AllowFailureRule,
  DefaultSteps,
  MatrixDefinition,
  OverrideEntry,
  Shard,
  ShardOrigin,
  ToolchainEntry,
} from './contracts/matrix.js'
export type { MatrixReporter } from './contracts/reporter.js'
export type {
  MatrixRunOptions,
  MatrixRunPolicy,
  RunStatus,
  RunSummary,
  RunVerdict,
  ShardReport,
  ShardResultReason,
  ShardStatus,
} from './contracts/run.js'
export type {
  StepExecutionOutput,
  StepPhase,
  StepResult,
  StepResultReason,
  StepStatus,
} from './contracts/step.js'

export type { EnvironmentDescriptor } from './environment/environmentDescriptor.js'
export {
  createEnvironment,
  environmentContains,
  overlayEnvironment,
  parseEnvironmentAssignment,
  resolveEnvironmentReferences,
} from './environment/environmentDescriptor.js'
export { MatrixConfigurationError } from './errors.js'
export type { NodeCommandExecutorOptions } from './execution/nodeCommandExecutor.js'
export { createNodeCommandExecutor } from './execution/nodeCommandExecutor.js'
export { createSerializedExecutor } from './execution/serializedExecutor.js'
export { deriveShardId, expandMatrix, matchesAllowFailureRule } from './matrix/expandMatrix.js'
export type { RunVerdictDocument } from './reporters/jsonFormatter.js'
export { formatRunVerdictAsJson, toRunVerdictDocument } from './reporters/jsonFormatter.js'
export { createMatrixScheduler, MatrixScheduler, runMatrix } from './runner/matrixScheduler.js'
export type { ShardRunContext } from './runner/shardRunner.js'
export { createSkippedShardReport, runShard } from './runner/shardRunner.js'
