export interface LoggerOptions {
  json?: boolean
  quiet?: boolean
  debug?: boolean
}

export interface Logger {
  info(message: string): void
  warn(message: string): void
  error(message: string): void
  debug(message: string): void
}

// stdout carries the chart, so every level goes to stderr.
const stderrLogger: Logger = {
  info: (message) => console.error(message),
  warn: (message) => console.error(`warning: ${message}`),
  error: (message) => console.error(message),
  debug: (message) => console.error(`[debug] ${message}`),
}

export function createLogger(options: LoggerOptions, sink: Logger = stderrLogger): Logger {
  const muted = Boolean(options.json || options.quiet)
  return {
    info(message) {
      if (!muted) {
        sink.info(message)
      }
    },
    warn(message) {
      if (!muted) {
        sink.warn(message)
      }
    },
    error(message) {
      sink.error(message)
    },
    debug(message) {
      if (options.debug && !options.json) {
        sink.debug(message)
      }
    },
  }
}
