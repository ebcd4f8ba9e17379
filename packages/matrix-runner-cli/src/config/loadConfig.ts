import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { dirname, resolve } from 'node:path'
import { pathToFileURL } from 'node:url'

import { MatrixConfigurationError, parseEnvironmentAssignment } from '@shardrun/matrix-runner-core'
import ts from 'typescript'

import type {
  MatrixFileAllowFailureRule,
  MatrixFileEnvironment,
  MatrixFileIncludeEntry,
  MatrixFileMatrix,
  MatrixFileToolchain,
  MatrixRunnerConfig,
} from './types.js'

/**
 * File names probed when no explicit description path is given.
 */
export const DEFAULT_CONFIG_FILE_NAMES = ['ci.matrix.ts', 'ci.matrix.json'] as const

/**
 * Loads and validates a matrix description file.
 *
 * @param cwd Base working directory.
 * @param configPath Optional explicit description path.
 * @returns Parsed config with resolved metadata.
 * @throws MatrixConfigurationError when the description cannot be loaded or is invalid.
 */
export const loadMatrixRunnerConfig = async (
  cwd: string,
  configPath?: string
): Promise<{ config: MatrixRunnerConfig; configFilePath: string }> => {
  const resolvedConfigPath = await resolveConfigPath(cwd, configPath)
  if (!resolvedConfigPath) {
    throw new MatrixConfigurationError(
      `No matrix description found. Expected ${DEFAULT_CONFIG_FILE_NAMES.join(' or ')}`
    )
  }

  const loadedConfig = await loadConfigByExtension(resolvedConfigPath)
  const config = parseMatrixRunnerConfig(loadedConfig)

  return {
    config,
    configFilePath: resolvedConfigPath,
  }
}

const resolveConfigPath = async (cwd: string, configPath?: string): Promise<string | null> => {
  if (configPath) {
    const explicitPath = resolve(cwd, configPath)
    if (!(await isReadable(explicitPath))) {
      throw new MatrixConfigurationError(`Matrix description not found: ${explicitPath}`)
    }

    return explicitPath
  }

  for (const fileName of DEFAULT_CONFIG_FILE_NAMES) {
    const candidate = resolve(cwd, fileName)
    if (await isReadable(candidate)) {
      return candidate
    }
  }

  return null
}

const isReadable = async (filePath: string): Promise<boolean> => {
  try {
    await readFile(filePath, 'utf8')
    return true
  } catch {
    return false
  }
}

const loadConfigByExtension = async (configFilePath: string): Promise<unknown> => {
  if (configFilePath.endsWith('.json')) {
    const content = await readFile(configFilePath, 'utf8')
    try {
      return JSON.parse(content) as unknown
    } catch (error: unknown) {
      const reason = error instanceof Error ? error.message : String(error)
      throw new MatrixConfigurationError(`Failed to parse ${configFilePath}: ${reason}`)
    }
  }

  if (configFilePath.endsWith('.ts')) {
    return await loadTypeScriptConfig(configFilePath)
  }

  throw new MatrixConfigurationError(`Unsupported matrix description extension: ${configFilePath}`)
}

const loadTypeScriptConfig = async (configFilePath: string): Promise<unknown> => {
  const source = await readFile(configFilePath, 'utf8')
  const transpiled = ts.transpileModule(source, {
    compilerOptions: {
      module: ts.ModuleKind.ESNext,
      target: ts.ScriptTarget.ES2022,
      esModuleInterop: true,
    },
    fileName: configFilePath,
    reportDiagnostics: true,
  })

  if (transpiled.diagnostics && transpiled.diagnostics.length > 0) {
    const message = ts.formatDiagnostics(transpiled.diagnostics, {
      getCurrentDirectory: (): string => dirname(configFilePath),
      getCanonicalFileName: (fileName: string): string => fileName,
      getNewLine: (): string => '\n',
    })
    throw new MatrixConfigurationError(`Failed to transpile ${configFilePath}\n${message}`)
  }

  const tempDirectory = await mkdtemp(resolve(tmpdir(), 'matrix-runner-config-'))
  const tempFilePath = resolve(tempDirectory, 'config.mjs')

  try {
    await writeFile(tempFilePath, transpiled.outputText, 'utf8')
    const moduleUrl = `${pathToFileURL(tempFilePath).href}?v=${Date.now()}`
    const loadedModule = (await import(moduleUrl)) as {
      readonly default?: unknown
      readonly config?: unknown
    }

    if (loadedModule.default !== undefined) {
      return unwrapNestedDefault(loadedModule.default)
    }

    if (loadedModule.config !== undefined) {
      return loadedModule.config
    }

    throw new MatrixConfigurationError(
      `Matrix description ${configFilePath} must export default or named "config"`
    )
  } finally {
    await rm(tempDirectory, { recursive: true, force: true })
  }
}

const unwrapNestedDefault = (value: unknown): unknown => {
  if (!isRecord(value)) {
    return value
  }

  if ('default' in value) {
    return value.default
  }

  return value
}

const parseMatrixRunnerConfig = (value: unknown): MatrixRunnerConfig => {
  if (!isRecord(value)) {
    throw new MatrixConfigurationError('Matrix description must be an object')
  }

  const env = parseOptionalEnvironment(value.env, 'env')
  const beforeScript = parseOptionalStringArray(value.beforeScript, 'beforeScript')
  const script = parseOptionalStringArray(value.script, 'script')
  const matrix = parseMatrixSection(value.matrix)
  const cwd = parseOptionalString(value.cwd, 'cwd')
  const parallel = parseOptionalParallel(value.parallel, 'parallel')
  const stepTimeoutMs = parseOptionalPositiveNumber(value.stepTimeoutMs, 'stepTimeoutMs')
  const toolchainVariable = parseOptionalNonEmptyString(
    value.toolchainVariable,
    'toolchainVariable'
  )
  const output = parseOutputConfig(value.output)

  return {
    env,
    beforeScript,
    script,
    matrix,
    cwd,
    parallel,
    stepTimeoutMs,
    toolchainVariable,
    output,
  }
}

const parseMatrixSection = (value: unknown): MatrixFileMatrix => {
  if (!isRecord(value)) {
    throw new MatrixConfigurationError('must be an object', 'matrix')
  }

  const toolchains = parseOptionalArray(value.toolchains, 'matrix.toolchains', parseToolchain)
  const include = parseOptionalArray(value.include, 'matrix.include', parseIncludeEntry)
  const allowFailures = parseOptionalArray(
    value.allowFailures,
    'matrix.allowFailures',
    parseAllowFailureRule
  )
  const fastFinish = parseOptionalBoolean(value.fastFinish, 'matrix.fastFinish')

  return {
    toolchains,
    include,
    allowFailures,
    fastFinish,
  }
}

const parseToolchain = (value: unknown, path: string): MatrixFileToolchain => {
  if (typeof value === 'string') {
    return parseRequiredString(value, path)
  }

  if (!isRecord(value)) {
    throw new MatrixConfigurationError('must be a string or an object', path)
  }

  const toolchain = parseRequiredString(value.toolchain, `${path}.toolchain`)
  const tag = parseOptionalNonEmptyString(value.tag, `${path}.tag`)

  return tag === undefined ? { toolchain } : { toolchain, tag }
}

const parseIncludeEntry = (value: unknown, path: string): MatrixFileIncludeEntry => {
  if (!isRecord(value)) {
    throw new MatrixConfigurationError('must be an object', path)
  }

  const toolchain = parseOptionalNonEmptyString(value.toolchain, `${path}.toolchain`)
  const tag = parseOptionalNonEmptyString(value.tag, `${path}.tag`)
  if (toolchain === undefined && tag === undefined) {
    throw new MatrixConfigurationError('must set toolchain or tag', path)
  }

  const name = parseOptionalNonEmptyString(value.name, `${path}.name`)
  const env = parseOptionalEnvironment(value.env, `${path}.env`)
  const beforeScript = parseOptionalStringArray(value.beforeScript, `${path}.beforeScript`)
  const script = parseOptionalStringArray(value.script, `${path}.script`)
  const allowFailure = parseOptionalBoolean(value.allowFailure, `${path}.allowFailure`)

  return {
    toolchain,
    tag,
    name,
    env,
    beforeScript,
    script,
    allowFailure,
  }
}

const parseAllowFailureRule = (value: unknown, path: string): MatrixFileAllowFailureRule => {
  if (!isRecord(value)) {
    throw new MatrixConfigurationError('must be an object', path)
  }

  const toolchain = parseOptionalNonEmptyString(value.toolchain, `${path}.toolchain`)
  const tag = parseOptionalNonEmptyString(value.tag, `${path}.tag`)
  const env = parseOptionalEnvironment(value.env, `${path}.env`)

  return {
    toolchain,
    tag,
    env,
  }
}

const parseOutputConfig = (value: unknown): MatrixRunnerConfig['output'] | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (!isRecord(value)) {
    throw new MatrixConfigurationError('must be an object', 'output')
  }

  const format = value.format
  if (format !== undefined && format !== 'pretty' && format !== 'json') {
    throw new MatrixConfigurationError('must be "pretty" or "json"', 'output.format')
  }

  const verbose = parseOptionalBoolean(value.verbose, 'output.verbose')

  return {
    format,
    verbose,
  }
}

const parseOptionalParallel = (
  value: unknown,
  path: string
): MatrixRunnerConfig['parallel'] | undefined => {
  if (value === undefined || value === 'unlimited') {
    return value
  }

  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
    throw new MatrixConfigurationError('must be a positive integer or "unlimited"', path)
  }

  return value
}

const parseOptionalEnvironment = (
  value: unknown,
  path: string
): MatrixFileEnvironment | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (Array.isArray(value)) {
    const assignments: string[] = []
    for (const [index, entry] of value.entries()) {
      const entryPath = `${path}[${index}]`
      if (typeof entry !== 'string') {
        throw new MatrixConfigurationError('must be a KEY=VALUE string', entryPath)
      }
      parseEnvironmentAssignment(entry, entryPath)
      assignments.push(entry)
    }

    return assignments
  }

  if (!isRecord(value)) {
    throw new MatrixConfigurationError('must be an object or a list of KEY=VALUE strings', path)
  }

  const parsed: Record<string, string> = {}
  for (const [key, entryValue] of Object.entries(value)) {
    if (typeof entryValue !== 'string') {
      throw new MatrixConfigurationError('must be a string', `${path}.${key}`)
    }
    parsed[key] = entryValue
  }

  return parsed
}

const parseOptionalArray = <T>(
  value: unknown,
  path: string,
  parseEntry: (entry: unknown, entryPath: string) => T
): readonly T[] | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (!Array.isArray(value)) {
    throw new MatrixConfigurationError('must be an array', path)
  }

  return value.map((entry: unknown, index) => parseEntry(entry, `${path}[${index}]`))
}

const parseRequiredString = (value: unknown, path: string): string => {
  if (typeof value !== 'string' || value.length === 0) {
    throw new MatrixConfigurationError('must be a non-empty string', path)
  }

  return value
}

const parseOptionalString = (value: unknown, path: string): string | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (typeof value !== 'string') {
    throw new MatrixConfigurationError('must be a string', path)
  }

  return value
}

const parseOptionalNonEmptyString = (value: unknown, path: string): string | undefined => {
  if (value === undefined) {
    return undefined
  }

  return parseRequiredString(value, path)
}

const parseOptionalPositiveNumber = (value: unknown, path: string): number | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (typeof value !== 'number' || Number.isNaN(value) || value <= 0) {
    throw new MatrixConfigurationError('must be a positive number', path)
  }

  return value
}

const parseOptionalBoolean = (value: unknown, path: string): boolean | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (typeof value !== 'boolean') {
    throw new MatrixConfigurationError('must be a boolean', path)
  }

  return value
}

const parseOptionalStringArray = (value: unknown, path: string): readonly string[] | undefined => {
  return parseOptionalArray(value, path, parseRequiredString)
}

const isRecord = (value: unknown): value is Record<string, unknown> => {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
