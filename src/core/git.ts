import { execFile } from 'node:child_process'
import { promisify } from 'node:util'

const execFileAsync = promisify(execFile)

export interface GitClientOptions {
  /** Repository root; git runs with this as its working directory. */
  cwd: string
}

export interface GitExecOptions {
  trim?: boolean
}

export interface GitExecResult {
  stdout: string
  stderr: string
}

export class GitError extends Error {
  readonly args: readonly string[]
  readonly exitCode: number | null
  readonly stdout: string
  readonly stderr: string

  constructor(
    args: readonly string[],
    exitCode: number | null,
    stdout: string,
    stderr: string,
    options?: { cause?: unknown },
  ) {
    super(`git ${args.join(' ')} (exit code ${exitCode ?? 'unknown'})`, options)
    this.name = 'GitError'
    this.args = args
    this.exitCode = exitCode
    this.stdout = stdout
    this.stderr = stderr
  }
}

export interface GitClient {
  readonly cwd: string
  exec(args: readonly string[], options?: GitExecOptions): Promise<GitExecResult>
}

const DEFAULT_MAX_BUFFER = 10 * 1024 * 1024

function stripTrailingNewline(value: string): string {
  if (value.endsWith('\r\n')) {
    return value.slice(0, -2)
  }
  if (value.endsWith('\n')) {
    return value.slice(0, -1)
  }
  return value
}

function readOutput(error: object, key: 'stdout' | 'stderr'): string {
  const value: unknown = Reflect.get(error, key)
  return typeof value === 'string' ? value : ''
}

// execFile rejects with the buffered output attached. A numeric code is
// git's exit status; a string code (ENOENT, EACCES) means git never ran.
function toGitError(args: readonly string[], error: unknown, trim: boolean): GitError | null {
  if (!error || typeof error !== 'object' || !('stdout' in error) || !('stderr' in error)) {
    return null
  }
  const code: unknown = Reflect.get(error, 'code')
  const stdout = readOutput(error, 'stdout')
  let stderr = readOutput(error, 'stderr')
  if (!stderr && typeof code === 'string' && error instanceof Error) {
    stderr = error.message
  }
  return new GitError(
    args,
    typeof code === 'number' ? code : null,
    trim ? stripTrailingNewline(stdout) : stdout,
    trim ? stripTrailingNewline(stderr) : stderr,
    { cause: error },
  )
}

export function createGitClient({ cwd }: GitClientOptions): GitClient {
  return {
    cwd,
    async exec(args, options = {}) {
      const trim = options.trim ?? true
      try {
        const { stdout, stderr } = await execFileAsync('git', [...args], {
          encoding: 'utf8',
          maxBuffer: DEFAULT_MAX_BUFFER,
          cwd,
        })

        return {
          stdout: trim ? stripTrailingNewline(stdout) : stdout,
          stderr: trim ? stripTrailingNewline(stderr) : stderr,
        }
      } catch (error) {
        const gitError = toGitError(args, error, trim)
        if (gitError) {
          throw gitError
        }
        throw error
      }
    },
  }
}
