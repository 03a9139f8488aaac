/**
 * Console logger for the advisor client.
 *
 * Development builds print everything; other builds keep warnings and
 * errors only, so a deployed page still reports failed requests.
 */

type Level = 'debug' | 'info' | 'warn' | 'error'

const PREFIX = '[cycle-advisor]'

export function shouldLog(level: Level, mode: string = import.meta.env.MODE): boolean {
  if (mode === 'test') return false
  return mode === 'development' || level === 'warn' || level === 'error'
}

function write(level: Level) {
  return (...args: unknown[]) => {
    if (shouldLog(level)) {
      console[level](PREFIX, ...args)
    }
  }
}

export const logger = {
  debug: write('debug'),
  info: write('info'),
  warn: write('warn'),
  error: write('error'),
}
