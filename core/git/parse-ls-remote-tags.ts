/**
 * Read tag names from `git ls-remote --tags --refs` output.
 *
 * @param output - Lines of `<sha>\trefs/tags/<name>`.
 * @returns Tag names.
 */
export function parseLsRemoteTags(output: string): string[] {
  let tags: string[] = []

  for (let line of output.split(/\r?\n/u)) {
    let reference = line.split('\t')[1]?.trim()
    if (reference?.startsWith('refs/tags/')) {
      tags.push(reference.slice('refs/tags/'.length))
    }
  }

  return tags
}
