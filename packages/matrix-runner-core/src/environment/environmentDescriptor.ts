import { MatrixConfigurationError } from '../errors.js'

/**
 * Immutable variable name to value mapping for one execution context.
 */
export type EnvironmentDescriptor = Readonly<Record<string, string>>

const EMPTY_ENVIRONMENT: EnvironmentDescriptor = Object.freeze({})

const REFERENCE_PATTERN = /\$(?:\{([A-Za-z_][A-Za-z0-9_]*)\}|([A-Za-z_][A-Za-z0-9_]*))/gu

/**
 * Creates a frozen environment descriptor.
 *
 * @param variables Variable map.
 * @returns Frozen copy.
 * @throws MatrixConfigurationError when a variable name is invalid.
 */
export const createEnvironment = (
  variables: Readonly<Record<string, string>> = {}
): EnvironmentDescriptor => {
  const entries = Object.entries(variables)
  if (entries.length === 0) {
    return EMPTY_ENVIRONMENT
  }

  const copy: Record<string, string> = {}
  for (const [name, value] of entries) {
    assertVariableName(name)
    copy[name] = value
  }

  return Object.freeze(copy)
}

/**
 * Overlays descriptors left to right; keys of later overlays win.
 *
 * @param base Base descriptor.
 * @param overlays Descriptors applied on top of the base.
 * @returns New frozen descriptor.
 */
export const overlayEnvironment = (
  base: EnvironmentDescriptor,
  ...overlays: readonly (EnvironmentDescriptor | undefined)[]
): EnvironmentDescriptor => {
  const merged: Record<string, string> = { ...base }
  for (const overlay of overlays) {
    if (!overlay) {
      continue
    }

    // Replaced entries move to the end so their references see the base entries.
    for (const [name, value] of Object.entries(overlay)) {
      delete merged[name]
      merged[name] = value
    }
  }

  return createEnvironment(merged)
}

/**
 * Parses a `KEY=VALUE` assignment as written in CI description lists.
 *
 * @param assignment Raw assignment.
 * @param path Location used in error messages.
 * @returns Name and value pair.
 */
export const parseEnvironmentAssignment = (
  assignment: string,
  path: string
): readonly [name: string, value: string] => {
  const separatorIndex = assignment.indexOf('=')
  if (separatorIndex <= 0) {
    throw new MatrixConfigurationError(`expected KEY=VALUE, got "${assignment}"`, path)
  }

  return [assignment.slice(0, separatorIndex), assignment.slice(separatorIndex + 1)]
}

/**
 * Returns true when every variable of `subset` is present with the same value.
 *
 * @param environment Environment to inspect.
 * @param subset Required variables.
 */
export const environmentContains = (
  environment: EnvironmentDescriptor,
  subset: EnvironmentDescriptor
): boolean => {
  return Object.entries(subset).every(([name, value]) => environment[name] === value)
}

/**
 * Expands `$NAME` and `${NAME}` references against the parent environment.
 *
 * Entries are resolved in declaration order, so a later entry can refer to an
 * earlier one. Unknown references expand to an empty string, as in a shell.
 *
 * @param environment Descriptor whose values may contain references.
 * @param parent Environment the process inherits.
 * @returns Plain record with expanded values.
 */
export const resolveEnvironmentReferences = (
  environment: EnvironmentDescriptor,
  parent: NodeJS.ProcessEnv
): Record<string, string> => {
  const scope: NodeJS.ProcessEnv = { ...parent }
  const resolved: Record<string, string> = {}

  for (const [name, value] of Object.entries(environment)) {
    const expanded = value.replace(
      REFERENCE_PATTERN,
      (_, braced: string | undefined, bare: string | undefined) => {
        const reference = braced ?? bare ?? ''
        return scope[reference] ?? ''
      }
    )
    resolved[name] = expanded
    scope[name] = expanded
  }

  return resolved
}

const assertVariableName = (name: string): void => {
  if (name.length === 0 || name.includes('=')) {
    throw new MatrixConfigurationError(`invalid environment variable name "${name}"`)
  }
}
