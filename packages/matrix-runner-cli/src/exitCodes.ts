import { MatrixConfigurationError } from '@shardrun/matrix-runner-core'

import { CliUsageError } from './cliOptions.js'

/**
 * Process exit codes of the matrix-runner CLI.
 */
export const CLI_EXIT_CODES = {
  /** Every blocking shard passed. */
  success: 0,
  /** At least one blocking shard failed. */
  shardFailure: 1,
  /** The matrix description or the command line is malformed. */
  invalidConfiguration: 2,
  /** Unexpected error inside the runner. */
  internalError: 3,
} as const

export type CliExitCode = (typeof CLI_EXIT_CODES)[keyof typeof CLI_EXIT_CODES]

/**
 * Maps an error that escaped the CLI to its exit code.
 *
 * @param error Thrown value.
 * @returns `invalidConfiguration` for description and usage errors, `internalError` otherwise.
 */
export const getExitCodeForError = (error: unknown): CliExitCode => {
  if (error instanceof MatrixConfigurationError || error instanceof CliUsageError) {
    return CLI_EXIT_CODES.invalidConfiguration
  }

  return CLI_EXIT_CODES.internalError
}
