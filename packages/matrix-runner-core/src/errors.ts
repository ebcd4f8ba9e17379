/**
 * Raised for any matrix description problem detected before execution starts.
 */
export class MatrixConfigurationError extends Error {
  /** Location of the offending entry, for example `include[1]`. */
  public readonly path: string | undefined

  /**
   * Creates a configuration error.
   *
   * @param message Human-readable description.
   * @param path Optional location of the offending entry.
   */
  public constructor(message: string, path?: string) {
    super(path ? `${path}: ${message}` : message)
    this.name = 'MatrixConfigurationError'
    this.path = path
  }
}
