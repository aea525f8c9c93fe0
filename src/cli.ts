import { cac } from 'cac'
import { chartCommand } from './commands/chart.js'
import type { GitClient } from './core/git.js'
import { ExitCode, Git2GanttError, InvalidArgsError } from './types/errors.js'
import { createLogger, type Logger } from './utils/logger.js'

export const VERSION = '0.1.0'

const DEFAULT_TITLE = 'git2gantt output'
const DEFAULT_DESCRIPTION = 'Development'

interface Context {
  json: boolean
  quiet: boolean
  debug: boolean
  logger: Logger
}

function toBoolean(value: unknown): boolean {
  return value === true
}

export interface RunOptions {
  createGit?: (root: string) => GitClient
}

function toOptionalString(value: unknown): string | undefined {
  if (typeof value === 'string') return value
  if (typeof value === 'number') return String(value)
  return undefined
}

/**
 * cac's parser turns number-like values into numbers before any option
 * `type` applies (`007` arrives as 7), so text options take the value
 * exactly as written on the command line.
 */
export function readTextOption(
  argv: readonly string[],
  names: readonly string[],
  parsed: unknown,
): string | undefined {
  if (typeof parsed !== 'number') {
    return toOptionalString(parsed)
  }
  let raw: string | undefined
  for (let index = 0; index < argv.length; index++) {
    const arg = argv[index]
    if (arg === '--') {
      break
    }
    for (const name of names) {
      if (arg === name && index + 1 < argv.length) {
        raw = argv[index + 1]
      } else if (arg.startsWith(`${name}=`)) {
        raw = arg.slice(name.length + 1)
      }
    }
  }
  return raw ?? String(parsed)
}

export function parseFuzz(value: unknown): number {
  const parsed =
    typeof value === 'number'
      ? value
      : typeof value === 'string' && /^\d+$/.test(value.trim())
        ? Number.parseInt(value, 10)
        : Number.NaN
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgsError(`fuzz must be a non-negative integer, got ${String(value)}`)
  }
  return parsed
}

function toPathList(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return []
  }
  return value.map((entry: unknown) => String(entry))
}

function buildContext(options: Record<string, unknown>): Context {
  const json = toBoolean(options.json)
  const quiet = toBoolean(options.quiet)
  const debug = toBoolean(options.debug)

  return {
    json,
    quiet,
    debug,
    logger: createLogger({ json, quiet, debug }),
  }
}

function printJson(data: unknown): void {
  process.stdout.write(`${JSON.stringify(data)}\n`)
}

function isCacError(error: unknown): error is Error {
  return error instanceof Error && error.name === 'CACError'
}

async function executeWithHandling(ctx: Context, handler: () => Promise<void>): Promise<void> {
  try {
    await handler()
  } catch (error) {
    const failure = isCacError(error) ? new InvalidArgsError(error.message) : error
    if (failure instanceof Git2GanttError) {
      if (ctx.json) {
        printJson({ status: 'error', code: failure.code, message: failure.message })
      } else {
        ctx.logger.error(failure.message)
      }
      process.exitCode = failure.code
    } else {
      console.error(failure)
      process.exitCode = 1
    }
  }
}

export async function run(argv: string[], runOptions: RunOptions = {}): Promise<void> {
  const cli = cac('git2gantt')
  cli.option('--json', 'Print chart data as JSON')
  cli.option('--quiet', 'Suppress logs')
  cli.option('--debug', 'Enable debug logs')

  cli
    .command('[...repositories]', 'Render commit history as a Mermaid gantt chart')
    .option('-a, --author <author>', 'Only count commits by this author')
    .option('-d, --description <text>', 'Label for every session bar', {
      default: DEFAULT_DESCRIPTION,
    })
    .option('-e, --every-branch', 'Include commits from every branch')
    .option('-f, --fuzz <days>', 'Extra non-working days tolerated inside a session', {
      default: 0,
    })
    .option('-t, --title <title>', 'Chart title', { default: DEFAULT_TITLE })
    .action(async (repositories: unknown, options: Record<string, unknown>) => {
      const ctx = buildContext(options)
      const result = await chartCommand({
        repositories: toPathList(repositories),
        title: readTextOption(argv, ['-t', '--title'], options.title) ?? DEFAULT_TITLE,
        description:
          readTextOption(argv, ['-d', '--description'], options.description) ?? DEFAULT_DESCRIPTION,
        author: readTextOption(argv, ['-a', '--author'], options.author),
        everyBranch: toBoolean(options.everyBranch),
        fuzz: parseFuzz(options.fuzz),
        logger: ctx.logger,
        createGit: runOptions.createGit,
      })
      if (ctx.json) {
        printJson({ status: result.status, code: result.code, data: result.data })
      } else {
        process.stdout.write(result.text)
      }
      process.exitCode = ExitCode.OK
    })

  cli.help()
  cli.version(VERSION)

  const parsed = cli.parse(['', '', ...argv], { run: false })
  const ctx = buildContext(parsed.options)
  await executeWithHandling(ctx, async () => {
    await cli.runMatchedCommand()
  })
}
