/** Invalid input detected before any source-control query. */
export class ConfigurationError extends Error {
  /** Name of the offending input. */
  public readonly field: string

  public constructor(field: string, message: string) {
    super(message)
    this.name = 'ConfigurationError'
    this.field = field
  }
}
