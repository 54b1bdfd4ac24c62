import { ConfigurationError } from '../errors/configuration-error'

let truthy = new Set(['true', 'True', 'TRUE'])
let falsy = new Set(['false', 'False', 'FALSE'])

/**
 * Parse a boolean option using the YAML 1.2 core schema spellings that
 * workflow inputs accept.
 *
 * @param field - Input name reported on failure.
 * @param value - Raw value.
 * @param fallback - Value used when the input is empty.
 * @returns Parsed boolean.
 */
export function parseBooleanInput(
  field: string,
  value: undefined | boolean | string,
  fallback: boolean,
): boolean {
  if (typeof value === 'boolean') {
    return value
  }

  let text = (value ?? '').trim()
  if (text === '') {
    return fallback
  }
  if (truthy.has(text)) {
    return true
  }
  if (falsy.has(text)) {
    return false
  }

  throw new ConfigurationError(
    field,
    `Invalid boolean "${text}" for ${field}. Expected "true" or "false".`,
  )
}
