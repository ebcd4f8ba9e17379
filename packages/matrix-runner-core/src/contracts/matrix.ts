import type { EnvironmentDescriptor } from '../environment/environmentDescriptor.js'

/**
 * One toolchain variant listed in the matrix.
 */
export interface ToolchainEntry {
  /** Variant label, for example a release channel. */
  readonly toolchain: string
  /** Optional free-form tag used only for ids and matching. */
  readonly tag?: string
}

/**
 * Explicit `include` entry producing one additional shard.
 */
export interface OverrideEntry {
  /** Optional toolchain label. */
  readonly toolchain?: string
  /** Optional tag, for example a named check. */
  readonly tag?: string
  /** Optional display name; defaults to the shard id. */
  readonly name?: string
  /** Environment patch applied over the base environment. */
  readonly env?: EnvironmentDescriptor
  /** Replaces the default before steps when present. */
  readonly beforeSteps?: readonly string[]
  /** Replaces the default script steps when present. */
  readonly steps?: readonly string[]
  /** Exempts this shard from failing the run. */
  readonly allowFailure?: boolean
}

/**
 * Predicate matching shards by resolved attributes. Every given attribute must match.
 */
export interface AllowFailureRule {
  readonly toolchain?: string
  readonly tag?: string
  /** Variables that must be present with these values in the shard environment. */
  readonly env?: EnvironmentDescriptor
}

/**
 * Step lists used by shards that do not override them.
 */
export interface DefaultSteps {
  readonly before: readonly string[]
  readonly script: readonly string[]
}

/**
 * Declarative matrix consumed by the expander.
 */
export interface MatrixDefinition {
  /** Environment every shard starts from. */
  readonly base: EnvironmentDescriptor
  readonly defaultSteps: DefaultSteps
  /** Implicit shards, one per entry. */
  readonly toolchains: readonly ToolchainEntry[]
  /** Explicit shards appended after the implicit ones. */
  readonly include: readonly OverrideEntry[]
  readonly allowFailures: readonly AllowFailureRule[]
  readonly fastFinish: boolean
  /** When set, shards with a toolchain export it under this variable name. */
  readonly toolchainVariable?: string
}

/**
 * Where a shard was declared in the matrix.
 */
export interface ShardOrigin {
  readonly source: 'toolchains' | 'include'
  readonly index: number
}

/**
 * Fully resolved, immutable job produced by matrix expansion.
 */
export interface Shard {
  /** Unique id derived from toolchain and tag. */
  readonly id: string
  /** Position in the expanded matrix; report order follows it. */
  readonly index: number
  /** Display name. */
  readonly name: string
  readonly toolchain?: string
  readonly tag?: string
  /** Resolved environment. */
  readonly env: EnvironmentDescriptor
  readonly beforeSteps: readonly string[]
  /** Script steps; never empty. */
  readonly steps: readonly string[]
  /** Resolved once at expansion time from the entry and allow-failure rules. */
  readonly allowFailure: boolean
  readonly origin: ShardOrigin
}
