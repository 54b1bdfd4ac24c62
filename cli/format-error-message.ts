import { SourceControlError } from '../core/errors/source-control-error'
import { ConfigurationError } from '../core/errors/configuration-error'

/**
 * Describe a failure for the terminal.
 *
 * @param error - Thrown value.
 * @returns Message prefixed with the failing field or operation when known.
 */
export function formatErrorMessage(error: unknown): string {
  if (error instanceof ConfigurationError) {
    return `Invalid ${error.field}: ${error.message}`
  }
  if (error instanceof SourceControlError) {
    return `git ${error.operation} lookup failed: ${error.message}`
  }
  return error instanceof Error ? error.message : String(error)
}
