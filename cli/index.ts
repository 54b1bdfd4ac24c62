import { createSpinner } from 'nanospinner'
import pc from 'picocolors'
import cac from 'cac'

import { createGitSourceControl } from '../core/git/create-git-source-control'
import { createTagRequest } from '../core/config/create-tag-request'
import { writeActionOutputs } from './write-action-outputs'
import { formatErrorMessage } from './format-error-message'
import { collectTagInput } from './collect-tag-input'
import { readActionInput } from './read-action-input'
import { printTagResult } from './print-tag-result'
import { generateTag } from '../core/generate-tag'
import { readRawOption } from './read-raw-option'
import { version } from '../package.json'

/** CLI Options. */
interface CLIOptions {
  /** Print the result as a single JSON document. */
  json?: boolean
}

/** Run the CLI. */
export function run(): void {
  let cli = cac('image-tag')

  cli
    .help()
    .version(version)
    .option('--service-name <name>', 'Service name prepended to the tag')
    .option('--custom-tag <tag>', 'Use this tag verbatim')
    .option(
      '--tag-format <format>',
      'Field order (default: service-date-branch-counter)',
    )
    .option('--max-length <length>', 'Maximum tag length (default: 63)')
    .option(
      '--include-counter <boolean>',
      'Append a counter for *-counter formats (default: true)',
    )
    .option('--branch-ref <ref>', 'Branch or ref (default: $GITHUB_REF)')
    .option(
      '--pull-request-ref <ref>',
      'Pull request head ref (default: $GITHUB_HEAD_REF)',
    )
    .option(
      '--branch-separator <char>',
      'Replacement for / : @ # in branch names (default: -)',
    )
    .option('--remote <name>', 'Remote queried for tags (default: origin)')
    .option('--date <date>', 'Run date as YYYY-MM-DD (default: today, UTC)')
    .option('--cwd <directory>', 'Repository directory')
    .option('--json', 'Print the result as JSON')
    .command('', 'Generate an image tag for the current build')
    .action((options: CLIOptions) => {
      let json = options.json === true
      let spinner =
        json ? null : createSpinner('Generating image tag...').start()

      try {
        /**
         * String flags are read verbatim, numeric-looking tags must survive
         * untouched.
         */
        let args = process.argv.slice(2)

        let request = createTagRequest(collectTagInput(args, process.env))
        let sourceControl = createGitSourceControl({
          remote:
            readRawOption(args, '--remote') ||
            readActionInput('remote', process.env),
          cwd: readRawOption(args, '--cwd') || process.cwd(),
        })

        let result = generateTag(request, { sourceControl })

        spinner?.success(`Generated ${pc.yellow(result.tag)}`)
        printTagResult(result, json)

        if (writeActionOutputs(result, process.env) && !json) {
          console.info(pc.gray('Outputs written to $GITHUB_OUTPUT\n'))
        }
      } catch (error) {
        spinner?.error('Failed')
        console.error(pc.redBright('\nError:'), formatErrorMessage(error))
        process.exit(1)
      }
    })

  cli.parse()
}
