import { resolve } from 'node:path'

import {
  createEnvironment,
  expandMatrix,
  MatrixConfigurationError,
  parseEnvironmentAssignment,
  type AllowFailureRule,
  type EnvironmentDescriptor,
  type MatrixDefinition,
  type MatrixRunPolicy,
  type OverrideEntry,
  type Shard,
  type ToolchainEntry,
} from '@shardrun/matrix-runner-core'

import type { MatrixFileEnvironment, MatrixRunnerConfig } from './types.js'

/**
 * CLI values that take precedence over the description file.
 */
export interface MatrixRunOverrides {
  /** Overrides `matrix.fastFinish`. */
  readonly fastFinish?: boolean
  /** Overrides `parallel`; Infinity means unlimited. */
  readonly parallel?: number
  /** Overrides `stepTimeoutMs`. */
  readonly stepTimeoutMs?: number
  /** Restricts the run to these shard ids. */
  readonly shardIds?: readonly string[]
}

/**
 * Everything the scheduler needs for one run, derived from the description.
 */
export interface MappedMatrixRun {
  readonly definition: MatrixDefinition
  /** Selected shards in matrix order. */
  readonly shards: readonly Shard[]
  /** Working directory for every step. */
  readonly cwd: string
  /** Concurrency degree; Infinity means unlimited. */
  readonly concurrency: number
  readonly stepTimeoutMs?: number
  readonly policy: MatrixRunPolicy
}

/**
 * Maps a loaded description to an expanded, filtered run.
 *
 * @param config Parsed description.
 * @param cwd Base working directory.
 * @param overrides CLI overrides.
 * @returns Run inputs for the scheduler.
 * @throws MatrixConfigurationError when expansion fails or a selected shard id is unknown.
 */
export const mapConfigToMatrix = (
  config: MatrixRunnerConfig,
  cwd: string,
  overrides: MatrixRunOverrides = {}
): MappedMatrixRun => {
  const definition = mapDefinition(config)
  const shards = selectShards(expandMatrix(definition), overrides.shardIds)
  const runCwd = config.cwd ? resolve(cwd, config.cwd) : cwd
  const concurrency =
    overrides.parallel ??
    (config.parallel === 'unlimited' || config.parallel === undefined
      ? Number.POSITIVE_INFINITY
      : config.parallel)

  return {
    definition,
    shards,
    cwd: runCwd,
    concurrency,
    stepTimeoutMs: overrides.stepTimeoutMs ?? config.stepTimeoutMs,
    policy: {
      fastFinish: overrides.fastFinish ?? definition.fastFinish,
    },
  }
}

/**
 * Converts the file model into the core matrix definition.
 *
 * @param config Parsed description.
 * @returns Matrix definition.
 */
export const mapDefinition = (config: MatrixRunnerConfig): MatrixDefinition => {
  const toolchains: ToolchainEntry[] = (config.matrix.toolchains ?? []).map((entry) =>
    typeof entry === 'string' ? { toolchain: entry } : entry
  )

  const include: OverrideEntry[] = (config.matrix.include ?? []).map((entry, index) => ({
    toolchain: entry.toolchain,
    tag: entry.tag,
    name: entry.name,
    env: toEnvironment(entry.env, `matrix.include[${index}].env`),
    beforeSteps: entry.beforeScript,
    steps: entry.script,
    allowFailure: entry.allowFailure,
  }))

  const allowFailures: AllowFailureRule[] = (config.matrix.allowFailures ?? []).map(
    (rule, index) => ({
      toolchain: rule.toolchain,
      tag: rule.tag,
      env: toEnvironment(rule.env, `matrix.allowFailures[${index}].env`),
    })
  )

  return {
    base: toEnvironment(config.env, 'env') ?? createEnvironment(),
    defaultSteps: {
      before: config.beforeScript ?? [],
      script: config.script ?? [],
    },
    toolchains,
    include,
    allowFailures,
    fastFinish: config.matrix.fastFinish ?? false,
    toolchainVariable: config.toolchainVariable,
  }
}

const toEnvironment = (
  value: MatrixFileEnvironment | undefined,
  path: string
): EnvironmentDescriptor | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (isAssignmentList(value)) {
    const variables: Record<string, string> = {}
    for (const [index, assignment] of value.entries()) {
      const [name, variableValue] = parseEnvironmentAssignment(assignment, `${path}[${index}]`)
      variables[name] = variableValue
    }

    return createEnvironment(variables)
  }

  return createEnvironment(value)
}

const isAssignmentList = (value: MatrixFileEnvironment): value is readonly string[] => {
  return Array.isArray(value)
}

const selectShards = (
  shards: readonly Shard[],
  shardIds: readonly string[] | undefined
): readonly Shard[] => {
  if (!shardIds || shardIds.length === 0) {
    return shards
  }

  const knownIds = new Set(shards.map((shard) => shard.id))
  for (const shardId of shardIds) {
    if (!knownIds.has(shardId)) {
      throw new MatrixConfigurationError(
        `unknown shard id "${shardId}" (available: ${[...knownIds].join(', ')})`,
        '--shard'
      )
    }
  }

  const selected = new Set(shardIds)
  return shards.filter((shard) => selected.has(shard.id))
}
