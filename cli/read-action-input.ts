/**
 * Read a workflow input from the environment (`INPUT_<NAME>`).
 *
 * @param name - Input name as declared in the workflow.
 * @param env - Environment variables.
 * @returns Trimmed value, undefined when unset or blank.
 */
export function readActionInput(
  name: string,
  env: NodeJS.ProcessEnv,
): undefined | string {
  let value = env[`INPUT_${name.replace(/ /gu, '_').toUpperCase()}`]
  if (value === undefined || value.trim() === '') {
    return undefined
  }
  return value.trim()
}
