/**
 * Supported output formats for the CLI.
 */
export type CliOutputFormat = 'pretty' | 'json'

/**
 * Environment written either as a map or as a list of `KEY=VALUE` strings.
 */
export type MatrixFileEnvironment = Readonly<Record<string, string>> | readonly string[]

/**
 * Toolchain list entry; a bare string is shorthand for `{ toolchain }`.
 */
export type MatrixFileToolchain =
  | string
  | {
      readonly toolchain: string
      readonly tag?: string
    }

/**
 * Explicit shard declared under `matrix.include`.
 */
export interface MatrixFileIncludeEntry {
  readonly toolchain?: string
  /** Named check, for example `rustfmt`. */
  readonly tag?: string
  /** Display name shown in output. */
  readonly name?: string
  /** Environment patch applied over the top-level env. */
  readonly env?: MatrixFileEnvironment
  /** Replaces the top-level before script when present. */
  readonly beforeScript?: readonly string[]
  /** Replaces the top-level script when present. */
  readonly script?: readonly string[]
  readonly allowFailure?: boolean
}

/**
 * Predicate listed under `matrix.allowFailures`.
 */
export interface MatrixFileAllowFailureRule {
  readonly toolchain?: string
  readonly tag?: string
  /** Variables the shard environment must contain. */
  readonly env?: MatrixFileEnvironment
}

/**
 * Matrix section of the description file.
 */
export interface MatrixFileMatrix {
  /** Implicit shards, one per toolchain. */
  readonly toolchains?: readonly MatrixFileToolchain[]
  readonly include?: readonly MatrixFileIncludeEntry[]
  readonly allowFailures?: readonly MatrixFileAllowFailureRule[]
  /** Decide the verdict as soon as it can no longer change. */
  readonly fastFinish?: boolean
}

/**
 * Top-level matrix description model.
 */
export interface MatrixRunnerConfig {
  /** Base environment for every shard. */
  readonly env?: MatrixFileEnvironment
  /** Default steps run before the script. */
  readonly beforeScript?: readonly string[]
  /** Default script steps. */
  readonly script?: readonly string[]
  readonly matrix: MatrixFileMatrix
  /** Relative or absolute working directory for every step. */
  readonly cwd?: string
  /** Default concurrency degree; a positive integer or `unlimited`. */
  readonly parallel?: number | 'unlimited'
  /** Timeout for one step execution in milliseconds. */
  readonly stepTimeoutMs?: number
  /** Exports each shard's toolchain under this variable name. */
  readonly toolchainVariable?: string
  /** Default output behavior from config. */
  readonly output?: {
    /** Preferred output format. */
    readonly format?: CliOutputFormat
    /** Emits all step output on success when true. */
    readonly verbose?: boolean
  }
}
