import { SPECIAL_BRANCH_CHARACTERS } from '../constants'

/**
 * Replace every `/`, `:`, `@` and `#` with the separator.
 *
 * Case, repeated separators and all other characters are left untouched.
 *
 * @param raw - Branch name.
 * @param separator - Replacement character.
 * @returns Tag-safe branch token.
 */
export function normalizeBranch(raw: string, separator: string): string {
  let result = raw
  for (let character of SPECIAL_BRANCH_CHARACTERS) {
    result = result.split(character).join(separator)
  }
  return result
}
