export enum ExitCode {
  OK = 0,
  INVALID_PATH = 1,
  INVALID_ARGS = 2,
  HISTORY_FETCH_FAILED = 3,
}

export class Git2GanttError extends Error {
  readonly code: ExitCode
  readonly context?: Record<string, unknown>

  constructor(message: string, code: ExitCode, context?: Record<string, unknown>) {
    super(message)
    this.name = 'Git2GanttError'
    this.code = code
    this.context = context
  }
}

export class NoSuchPathError extends Git2GanttError {
  constructor(path: string) {
    super(`no such path: ${path}`, ExitCode.INVALID_PATH, { path })
    this.name = 'NoSuchPathError'
  }
}

export class NotARepositoryError extends Git2GanttError {
  constructor(path: string) {
    super(`not a git repository: ${path}`, ExitCode.INVALID_PATH, { path })
    this.name = 'NotARepositoryError'
  }
}

export class InvalidArgsError extends Git2GanttError {
  constructor(message: string) {
    super(message, ExitCode.INVALID_ARGS)
    this.name = 'InvalidArgsError'
  }
}

export class HistoryFetchFailedError extends Git2GanttError {
  constructor(repository: string, detail: string) {
    const suffix = detail ? `: ${detail}` : ''
    super(`failed to read history of ${repository}${suffix}`, ExitCode.HISTORY_FETCH_FAILED, {
      repository,
    })
    this.name = 'HistoryFetchFailedError'
  }
}
