import type {
  AllowFailureRule,
  MatrixDefinition,
  OverrideEntry,
  Shard,
  ShardOrigin,
  ToolchainEntry,
} from '../contracts/matrix.js'
import {
  createEnvironment,
  environmentContains,
  overlayEnvironment,
  type EnvironmentDescriptor,
} from '../environment/environmentDescriptor.js'
import { MatrixConfigurationError } from '../errors.js'

/**
 * Expands a matrix definition into its ordered shard list.
 *
 * Implicit shards (one per toolchain entry) come first in listed order,
 * followed by one shard per include entry in listed order.
 *
 * @param definition Matrix definition.
 * @returns Frozen shards in execution and report order.
 * @throws MatrixConfigurationError for empty matrices, duplicate ids, empty step lists
 * or invalid rules.
 */
export const expandMatrix = (definition: MatrixDefinition): readonly Shard[] => {
  const rules = definition.allowFailures.map(validateRule)
  const drafts: ShardDraft[] = [
    ...definition.toolchains.map((entry, index) => draftImplicitShard(definition, entry, index)),
    ...definition.include.map((entry, index) => draftIncludedShard(definition, entry, index)),
  ]

  if (drafts.length === 0) {
    throw new MatrixConfigurationError('matrix defines no shards', 'matrix')
  }

  const pathsById = new Map<string, string>()
  const shards: Shard[] = []

  for (const [index, draft] of drafts.entries()) {
    const path = formatOriginPath(draft.origin)
    const previousPath = pathsById.get(draft.id)
    if (previousPath !== undefined) {
      throw new MatrixConfigurationError(
        `shard id "${draft.id}" is already defined by ${previousPath}`,
        path
      )
    }
    pathsById.set(draft.id, path)

    if (draft.steps.length === 0) {
      throw new MatrixConfigurationError(`shard "${draft.id}" has no script steps`, path)
    }

    const allowFailure =
      draft.allowFailure || rules.some((rule) => matchesAllowFailureRule(draft, rule))

    shards.push(
      Object.freeze({
        ...draft,
        index,
        allowFailure,
        beforeSteps: Object.freeze([...draft.beforeSteps]),
        steps: Object.freeze([...draft.steps]),
        origin: Object.freeze({ ...draft.origin }),
      })
    )
  }

  return Object.freeze(shards)
}

/**
 * Derives a shard id from its toolchain and tag.
 *
 * @param toolchain Optional toolchain label.
 * @param tag Optional tag.
 * @returns `toolchain/tag`, or whichever of the two is present.
 */
export const deriveShardId = (toolchain?: string, tag?: string): string => {
  if (toolchain && tag) {
    return `${toolchain}/${tag}`
  }

  return toolchain ?? tag ?? ''
}

/**
 * Checks whether a shard matches an allow-failure rule.
 *
 * @param shard Resolved shard attributes.
 * @param rule Rule to evaluate.
 * @returns True when every attribute given by the rule matches.
 */
export const matchesAllowFailureRule = (
  shard: Pick<Shard, 'toolchain' | 'tag' | 'env'>,
  rule: AllowFailureRule
): boolean => {
  if (rule.toolchain !== undefined && rule.toolchain !== shard.toolchain) {
    return false
  }

  if (rule.tag !== undefined && rule.tag !== shard.tag) {
    return false
  }

  if (rule.env !== undefined && !environmentContains(shard.env, rule.env)) {
    return false
  }

  return true
}

type ShardDraft = Omit<Shard, 'index'>

const draftImplicitShard = (
  definition: MatrixDefinition,
  entry: ToolchainEntry,
  index: number
): ShardDraft => {
  const origin: ShardOrigin = { source: 'toolchains', index }
  if (entry.toolchain.length === 0) {
    throw new MatrixConfigurationError(
      'toolchain must be a non-empty string',
      formatOriginPath(origin)
    )
  }

  const id = deriveShardId(entry.toolchain, entry.tag)

  return {
    id,
    name: id,
    toolchain: entry.toolchain,
    tag: entry.tag,
    env: overlayEnvironment(definition.base, toolchainEnvironment(definition, entry.toolchain)),
    beforeSteps: definition.defaultSteps.before,
    steps: definition.defaultSteps.script,
    allowFailure: false,
    origin,
  }
}

const draftIncludedShard = (
  definition: MatrixDefinition,
  entry: OverrideEntry,
  index: number
): ShardDraft => {
  const origin: ShardOrigin = { source: 'include', index }
  const id = deriveShardId(entry.toolchain, entry.tag)
  if (id.length === 0) {
    throw new MatrixConfigurationError(
      'include entries must set a toolchain or a tag',
      formatOriginPath(origin)
    )
  }

  return {
    id,
    name: entry.name ?? id,
    toolchain: entry.toolchain,
    tag: entry.tag,
    env: overlayEnvironment(
      definition.base,
      toolchainEnvironment(definition, entry.toolchain),
      entry.env
    ),
    beforeSteps: entry.beforeSteps ?? definition.defaultSteps.before,
    steps: entry.steps ?? definition.defaultSteps.script,
    allowFailure: entry.allowFailure ?? false,
    origin,
  }
}

const toolchainEnvironment = (
  definition: MatrixDefinition,
  toolchain: string | undefined
): EnvironmentDescriptor | undefined => {
  if (!definition.toolchainVariable || toolchain === undefined) {
    return undefined
  }

  return createEnvironment({ [definition.toolchainVariable]: toolchain })
}

const validateRule = (rule: AllowFailureRule, index: number): AllowFailureRule => {
  const hasEnv = rule.env !== undefined && Object.keys(rule.env).length > 0
  if (rule.toolchain === undefined && rule.tag === undefined && !hasEnv) {
    throw new MatrixConfigurationError(
      'rule must match on toolchain, tag or env',
      `allowFailures[${index}]`
    )
  }

  return rule
}

const formatOriginPath = (origin: ShardOrigin): string => {
  return `${origin.source}[${origin.index}]`
}
