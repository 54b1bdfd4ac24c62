import type { SourceControlOperation } from '../../types/source-control-operation'

/** Commit hash or ref of the working tree could not be resolved. */
export class SourceControlError extends Error {
  public readonly operation: SourceControlOperation

  public constructor(
    operation: SourceControlOperation,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options)
    this.name = 'SourceControlError'
    this.operation = operation
  }
}
