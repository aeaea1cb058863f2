/**
 * logger.ts
 * ----------
 * Tiny, dependency-free logger for the SDK.
 * - Levels: trace, debug, info, warn, error, silent
 * - ISO timestamps
 * - Hierarchical prefixes via logger.child("scope")
 * - Configurable global level (NEO_LOG_LEVEL) and handler sink
 */

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'silent'] as const

export type LogLevelName = (typeof LOG_LEVELS)[number]

const LEVELS: Record<LogLevelName, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  silent: 99
}

export interface LogMeta {
  ts: Date
  level: LogLevelName
  prefix: string[]
}

export type LogHandler = (meta: LogMeta, ...args: unknown[]) => void

export function isLogLevel(x: unknown): x is LogLevelName {
  return typeof x === 'string' && (LOG_LEVELS as readonly string[]).includes(x)
}

function initialLevel(): LogLevelName {
  const fromEnv = typeof process !== 'undefined' ? process.env.NEO_LOG_LEVEL : undefined
  return isLogLevel(fromEnv) ? fromEnv : 'info'
}

let currentLevel: LogLevelName = initialLevel()

function tsISO(d: Date): string {
  return d.toISOString().replace(/\.\d{3}Z$/, 'Z')
}

/* ------------------------------- Default Sink ------------------------------ */

const consoleHandler: LogHandler = (meta, ...args) => {
  const tag = meta.prefix.length ? `[${meta.prefix.join(':')}]` : ''
  const head = `${tsISO(meta.ts)} ${meta.level.toUpperCase()}`
  const line = tag ? `${head} ${tag}` : head

  switch (meta.level) {
    case 'trace':
    case 'debug':
      console.debug(line, ...args)
      break
    case 'info':
      console.info(line, ...args)
      break
    case 'warn':
      console.warn(line, ...args)
      break
    case 'error':
      console.error(line, ...args)
      break
    case 'silent':
      break
  }
}

let handler: LogHandler = consoleHandler

/* --------------------------------- Logger --------------------------------- */

export interface ILogger {
  level(): LogLevelName
  setLevel(lvl: LogLevelName): void

  trace(...args: unknown[]): void
  debug(...args: unknown[]): void
  info(...args: unknown[]): void
  warn(...args: unknown[]): void
  error(...args: unknown[]): void

  /** Create a child logger with an extra prefix scope segment. */
  child(scope: string): ILogger

  /** Start a timer; the returned fn logs the elapsed time at debug and returns it (ms). */
  time(label?: string): () => number
}

class Logger implements ILogger {
  private readonly prefix: string[]

  constructor(prefix?: string[]) {
    this.prefix = prefix ? [...prefix] : []
  }

  level(): LogLevelName {
    return currentLevel
  }

  setLevel(lvl: LogLevelName): void {
    setGlobalLogLevel(lvl)
  }

  private emit(level: LogLevelName, args: unknown[]) {
    if (LEVELS[level] < LEVELS[currentLevel]) return
    handler({ ts: new Date(), level, prefix: this.prefix }, ...args)
  }

  trace = (...args: unknown[]) => this.emit('trace', args)
  debug = (...args: unknown[]) => this.emit('debug', args)
  info = (...args: unknown[]) => this.emit('info', args)
  warn = (...args: unknown[]) => this.emit('warn', args)
  error = (...args: unknown[]) => this.emit('error', args)

  child(scope: string): ILogger {
    return new Logger(scope ? [...this.prefix, scope] : this.prefix)
  }

  time(label = 'timer'): () => number {
    const t0 = performance.now()
    return () => {
      const ms = performance.now() - t0
      this.debug(`${label} +${ms.toFixed(2)}ms`)
      return ms
    }
  }
}

/* ----------------------------- Global Controls ---------------------------- */

export function setGlobalLogLevel(lvl: LogLevelName): void {
  currentLevel = lvl
}

export function getGlobalLogLevel(): LogLevelName {
  return currentLevel
}

export function setLogHandler(h: LogHandler | null): void {
  handler = h ?? consoleHandler
}

/* --------------------------------- Factory -------------------------------- */

let rootLogger: ILogger | null = null

/** Get the root logger (singleton). */
export function getLogger(): ILogger {
  if (!rootLogger) rootLogger = new Logger(['neo'])
  return rootLogger
}

/** Convenience: scoped child from root. */
export function logger(scope?: string): ILogger {
  return scope ? getLogger().child(scope) : getLogger()
}
