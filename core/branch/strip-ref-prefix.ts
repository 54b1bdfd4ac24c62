/**
 * Remove the ref namespace from a ref name.
 *
 * `refs/heads/feature/login` and `refs/remotes/origin/feature/login` both
 * become `feature/login`; names outside those namespaces are returned as is.
 *
 * @param reference - Ref or branch name.
 * @returns Branch or tag name.
 */
export function stripRefPrefix(reference: string): string {
  return reference.replace(/^refs\/(?:heads|tags|remotes\/[^/]+)\//u, '')
}
