/**
 * Read the value of a flag from raw command line arguments.
 *
 * `cac` turns numeric-looking values into numbers (`--custom-tag 1.10` would
 * become `1.1`), so string options are taken from the arguments verbatim.
 * Both `--flag value` and `--flag=value` are recognized; the last occurrence
 * wins.
 *
 * @param args - Arguments after the executable and script path.
 * @param flag - Flag including the leading dashes.
 * @returns Flag value or undefined when the flag is absent.
 */
export function readRawOption(
  args: string[],
  flag: string,
): undefined | string {
  let value: undefined | string

  for (let [index, argument] of args.entries()) {
    if (argument === '--') {
      break
    }
    if (argument.startsWith(`${flag}=`)) {
      value = argument.slice(flag.length + 1)
    } else if (argument === flag) {
      let next = args[index + 1]
      value = next === undefined || next.startsWith('--') ? '' : next
    }
  }

  return value
}
