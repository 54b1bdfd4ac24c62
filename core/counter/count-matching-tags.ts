import { FIELD_SEPARATOR } from '../constants'

/**
 * Count tags made of the prefix, the field separator and a numeric counter.
 *
 * @param tags - Tag names, possibly with duplicates.
 * @param prefix - Tag without counter.
 * @returns Number of distinct matching tags.
 */
export function countMatchingTags(tags: string[], prefix: string): number {
  let start = `${prefix}${FIELD_SEPARATOR}`
  let matches = new Set<string>()

  for (let tag of tags) {
    if (tag.startsWith(start) && /^\d+$/u.test(tag.slice(start.length))) {
      matches.add(tag)
    }
  }

  return matches.size
}
