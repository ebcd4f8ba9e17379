import {
  createMatrixScheduler,
  createNodeCommandExecutor,
  formatRunVerdictAsJson,
  type CommandExecutor,
  type Shard,
} from '@shardrun/matrix-runner-core'

import type { CliOptions } from './cliOptions.js'
import { loadMatrixRunnerConfig } from './config/loadConfig.js'
import { mapConfigToMatrix } from './config/mapConfigToMatrix.js'
import type { CliOutputFormat } from './config/types.js'
import { CLI_EXIT_CODES, type CliExitCode } from './exitCodes.js'
import { PrettyReporter } from './reporters/prettyReporter.js'

/**
 * Runtime options for a CLI execution.
 */
export type RunCliMatrixOptions = Omit<CliOptions, 'help'> & {
  /** Replaces the child-process executor, mainly for tests. */
  readonly executor?: CommandExecutor
}

/**
 * Loads the matrix description, then lists or runs its shards.
 *
 * @param options CLI runtime options.
 * @returns Exit code for the run.
 * @throws MatrixConfigurationError when the description is malformed.
 */
export const runCliMatrix = async (options: RunCliMatrixOptions): Promise<CliExitCode> => {
  const loadedConfig = await loadMatrixRunnerConfig(options.cwd, options.configPath)
  const { config } = loadedConfig

  const format = options.formatProvided
    ? options.format
    : (config.output?.format ?? options.format)
  const verbose = options.verbose || (config.output?.verbose ?? false)

  const mappedRun = mapConfigToMatrix(config, options.cwd, {
    fastFinish: options.fastFinish,
    parallel: options.parallel,
    stepTimeoutMs: options.stepTimeoutMs,
    shardIds: options.shardIds,
  })

  if (options.command === 'list') {
    printShards(mappedRun.shards, format)
    return CLI_EXIT_CODES.success
  }

  const scheduler = createMatrixScheduler({
    shards: mappedRun.shards,
    executor: options.executor ?? createNodeCommandExecutor(),
    policy: mappedRun.policy,
    concurrency: mappedRun.concurrency,
    cwd: mappedRun.cwd,
    stepTimeoutMs: mappedRun.stepTimeoutMs,
    reporters: format === 'pretty' ? [new PrettyReporter({ verbose })] : [],
  })

  const verdict = await scheduler.run()
  if (format === 'json') {
    process.stdout.write(`${formatRunVerdictAsJson(verdict)}\n`)
  }

  return verdict.exitCode
}

const printShards = (shards: readonly Shard[], format: CliOutputFormat): void => {
  if (format === 'json') {
    const payload = {
      shards: shards.map((shard) => ({
        id: shard.id,
        name: shard.name,
        toolchain: shard.toolchain,
        tag: shard.tag,
        allowFailure: shard.allowFailure,
        stepCount: countSteps(shard),
        env: shard.env,
      })),
    }
    process.stdout.write(`${JSON.stringify(payload)}\n`)
    return
  }

  process.stdout.write('Shards:\n')
  for (const shard of shards) {
    const suffix = shard.allowFailure ? ' (allowed to fail)' : ''
    process.stdout.write(`- ${shard.id}: ${shard.name} [${countSteps(shard)} steps]${suffix}\n`)
  }
}

const countSteps = (shard: Shard): number => {
  return shard.beforeSteps.length + shard.steps.length
}
