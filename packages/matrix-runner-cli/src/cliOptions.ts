import { resolve } from 'node:path'

import type { CliOutputFormat } from './config/types.js'

/**
 * CLI subcommands.
 */
export type CliCommand = 'run' | 'list'

/**
 * Parsed CLI runtime options.
 */
export interface CliOptions {
  /** Selected subcommand; defaults to `run`. */
  readonly command: CliCommand
  /** Absolute working directory for config and execution. */
  readonly cwd: string
  /** Optional explicit matrix description path. */
  readonly configPath?: string
  /** Concurrency degree override; Infinity means unlimited. */
  readonly parallel?: number
  /** Fast-finish override. */
  readonly fastFinish?: boolean
  /** Shard ids selected with `--shard`. */
  readonly shardIds: readonly string[]
  /** Step timeout override in milliseconds. */
  readonly stepTimeoutMs?: number
  /** Selected output format. */
  readonly format: CliOutputFormat
  /** Indicates whether output format was explicitly set via CLI flag. */
  readonly formatProvided?: true
  /** Emits full output for successful steps when true. */
  readonly verbose: boolean
  /** Prints usage and exits when true. */
  readonly help: boolean
}

/**
 * Raised for invalid command-line arguments.
 */
export class CliUsageError extends Error {
  public constructor(message: string) {
    super(message)
    this.name = 'CliUsageError'
  }
}

const VALUE_FLAGS = [
  '--config',
  '--parallel',
  '-j',
  '--shard',
  '--step-timeout',
  '--format',
  '--cwd',
] as const

type ValueFlag = (typeof VALUE_FLAGS)[number]

/**
 * Parses process arguments for the matrix-runner CLI.
 *
 * @param argv Raw argument list excluding node and script path.
 * @param baseCwd Base working directory.
 * @returns Parsed CLI options.
 * @throws CliUsageError when an argument is invalid.
 */
export const parseCliOptions = (argv: readonly string[], baseCwd: string): CliOptions => {
  let command: CliCommand | undefined
  let configPath: string | undefined
  let parallel: number | undefined
  let fastFinish: boolean | undefined
  let stepTimeoutMs: number | undefined
  let format: CliOutputFormat = 'pretty'
  let formatProvided = false
  let verbose = false
  let help = false
  let cwd = baseCwd
  const shardIds: string[] = []

  const setConfigPath = (value: string): void => {
    if (configPath !== undefined) {
      throw new CliUsageError('Matrix description path given more than once')
    }
    configPath = value
  }

  for (let index = 0; index < argv.length; index += 1) {
    const argument = argv[index]
    if (!argument) {
      continue
    }

    if (argument === '--help' || argument === '-h') {
      help = true
      continue
    }

    if (argument === '--verbose') {
      verbose = true
      continue
    }

    if (argument === '--fast-finish') {
      fastFinish = true
      continue
    }

    if (argument === '--no-fast-finish') {
      fastFinish = false
      continue
    }

    const valueFlag = matchValueFlag(argument)
    if (valueFlag) {
      let value = valueFlag.inlineValue
      if (value === undefined) {
        value = argv[index + 1]
        index += 1
      }
      if (!value) {
        throw new CliUsageError(`${valueFlag.flag} requires a value`)
      }

      switch (valueFlag.flag) {
        case '--config':
          setConfigPath(value)
          break
        case '--parallel':
        case '-j':
          parallel = parseParallel(value)
          break
        case '--shard':
          shardIds.push(value)
          break
        case '--step-timeout':
          stepTimeoutMs = parsePositiveInteger(value, '--step-timeout')
          break
        case '--format':
          if (value !== 'pretty' && value !== 'json') {
            throw new CliUsageError('--format must be "pretty" or "json"')
          }
          format = value
          formatProvided = true
          break
        case '--cwd':
          cwd = resolve(baseCwd, value)
          break
      }
      continue
    }

    if (argument.startsWith('-')) {
      throw new CliUsageError(`Unknown argument: ${argument}`)
    }

    if (command === undefined && configPath === undefined && isCliCommand(argument)) {
      command = argument
      continue
    }

    setConfigPath(argument)
  }

  return {
    command: command ?? 'run',
    cwd,
    configPath,
    parallel,
    fastFinish,
    shardIds,
    stepTimeoutMs,
    format,
    ...(formatProvided ? { formatProvided: true as const } : {}),
    verbose,
    help,
  }
}

/**
 * Returns help text for the matrix-runner CLI.
 *
 * @returns Human-readable usage text.
 */
export const getCliHelpText = (): string => {
  return [
    'Usage: matrix-runner [run|list] [path] [options]',
    '',
    'Commands:',
    '  run                   Expand the matrix and run every shard (default)',
    '  list                  Print the expanded shards without running them',
    '',
    'Options:',
    '  --config <path>       Matrix description (default: ci.matrix.ts or ci.matrix.json)',
    '  -j, --parallel <n>    Shards run at once: positive integer or "unlimited"',
    '  --fast-finish         Decide the verdict as soon as it cannot change',
    '  --no-fast-finish      Wait for every shard',
    '  --shard <id>          Run only this shard (repeatable)',
    '  --step-timeout <ms>   Timeout for each step',
    '  --format <type>       Output format: pretty | json (default: pretty)',
    '  --verbose             Show stdout/stderr for successful steps',
    '  --cwd <path>          Base working directory',
    '  -h, --help            Show this help',
    '',
    'Exit codes: 0 success, 1 shard failure, 2 invalid matrix or arguments, 3 internal error',
  ].join('\n')
}

const matchValueFlag = (
  argument: string
): { flag: ValueFlag; inlineValue: string | undefined } | null => {
  for (const flag of VALUE_FLAGS) {
    if (argument === flag) {
      return { flag, inlineValue: undefined }
    }

    if (flag.startsWith('--') && argument.startsWith(`${flag}=`)) {
      return { flag, inlineValue: argument.slice(flag.length + 1) }
    }
  }

  return null
}

const isCliCommand = (value: string): value is CliCommand => {
  return value === 'run' || value === 'list'
}

const parseParallel = (value: string): number => {
  if (value === 'unlimited') {
    return Number.POSITIVE_INFINITY
  }

  return parsePositiveInteger(value, '--parallel')
}

const parsePositiveInteger = (value: string, flag: string): number => {
  const parsed = /^\d+$/u.test(value) ? Number(value) : Number.NaN
  if (!Number.isInteger(parsed) || parsed < 1) {
    const suffix = flag === '--parallel' ? ' or "unlimited"' : ''
    throw new CliUsageError(`${flag} must be a positive integer${suffix}`)
  }

  return parsed
}
