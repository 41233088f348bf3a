// tagged console logging, e.g. "[SCRAPER] [euw1] collected 50/50"
// context is bound explicitly with child(), never picked up implicitly

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

export type LogContext = Record<string, string | number | undefined>

export interface Logger {
  readonly level: LogLevel
  debug(message: string, ...details: unknown[]): void
  info(message: string, ...details: unknown[]): void
  warn(message: string, ...details: unknown[]): void
  error(message: string, ...details: unknown[]): void
  child(context: LogContext): Logger
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER
}

function levelFromEnv(): LogLevel {
  const raw = (process.env.LOG_LEVEL || 'info').toLowerCase()
  return isLogLevel(raw) ? raw : 'info'
}

function formatContext(context: LogContext): string {
  const parts: string[] = []
  for (const [key, value] of Object.entries(context)) {
    if (value === undefined) continue
    // platform reads better bare, everything else as key=value
    parts.push(key === 'platform' ? `[${value}]` : `[${key}=${value}]`)
  }
  return parts.length > 0 ? ' ' + parts.join(' ') : ''
}

export function createLogger(tag: string, context: LogContext = {}, level: LogLevel = levelFromEnv()): Logger {
  const threshold = LEVEL_ORDER[level]
  const prefix = `[${tag}]${formatContext(context)}`

  const enabled = (at: LogLevel) => LEVEL_ORDER[at] >= threshold

  return {
    level,
    debug: (message, ...details) => {
      if (enabled('debug')) console.debug(`${prefix} ${message}`, ...details)
    },
    info: (message, ...details) => {
      if (enabled('info')) console.log(`${prefix} ${message}`, ...details)
    },
    warn: (message, ...details) => {
      if (enabled('warn')) console.warn(`${prefix} ${message}`, ...details)
    },
    error: (message, ...details) => {
      if (enabled('error')) console.error(`${prefix} ${message}`, ...details)
    },
    child: extra => createLogger(tag, { ...context, ...extra }, level),
  }
}
