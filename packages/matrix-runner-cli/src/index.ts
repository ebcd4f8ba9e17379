export type { CliCommand, CliOptions } from './cliOptions.js'
export { CliUsageError, getCliHelpText, parseCliOptions } from './cliOptions.js'

export type {
  CliOutputFormat,
  MatrixFileAllowFailureRule,
  MatrixFileEnvironment,
  MatrixFileIncludeEntry,
  MatrixFileMatrix,
  MatrixFileToolchain,
  MatrixRunnerConfig,
} from './config/types.js'
export { DEFAULT_CONFIG_FILE_NAMES, loadMatrixRunnerConfig } from './config/loadConfig.js'
export type { MappedMatrixRun, MatrixRunOverrides } from './config/mapConfigToMatrix.js'
export { mapConfigToMatrix, mapDefinition } from './config/mapConfigToMatrix.js'

export type { CliExitCode } from './exitCodes.js'
export { CLI_EXIT_CODES, getExitCodeForError } from './exitCodes.js'
export type { PrettyReporterOptions } from './reporters/prettyReporter.js'
export { PrettyReporter } from './reporters/prettyReporter.js'
export type { RunCliMatrixOptions } from './runMatrix.js'
export { runCliMatrix } from './runMatrix.js'
