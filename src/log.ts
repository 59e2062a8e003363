/**
 * Progress logging on stderr. stdout is reserved for the JSON result, so
 * nothing here ever writes there.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'silent'

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, silent: 100 }

let threshold: LogLevel = 'info'

export function setLogLevel(level: LogLevel): void {
  threshold = level
}

export interface Logger {
  debug(message: string): void
  info(message: string): void
  warn(message: string): void
}

export function createLogger(scope: string): Logger {
  const write = (level: Exclude<LogLevel, 'silent'>, message: string): void => {
    if (RANK[level] < RANK[threshold]) return
    const tag = level === 'info' ? '' : ` ${level.toUpperCase()}`
    console.error(`[${scope}]${tag} ${message}`)
  }
  return {
    debug: message => write('debug', message),
    info: message => write('info', message),
    warn: message => write('warn', message)
  }
}
