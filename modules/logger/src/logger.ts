import * as fs from 'fs'
import { format } from 'logform'
import { errorLike } from 'misc'
import * as path from 'path'
import jsonStringify from 'safe-stable-stringify'
import * as winston from 'winston'

const criticalityLegend: Record<Criticality, number> = {
  high: 0,
  moderate: 100,
  low: 200,
}

export type Criticality = 'high' | 'moderate' | 'low'

/**
 * Logging and console presentation for the factory. Everything goes to the log file; `print()`, `warn()` and
 * `error()` are also shown to the user.
 */
export interface Logger {
  print(message: string, criticality?: Criticality): void
  warn(message: string, ...rest: unknown[]): void
  info(message: string, ...rest: unknown[]): void
  debug(message: string, ...rest: unknown[]): void
  error(message: string, err: unknown, ...rest: unknown[]): void
}

class NopLogger implements Logger {
  print(_message: string) {
    // noop
  }

  warn(_message: string, ..._rest: unknown[]) {
    // noop
  }

  info(_message: string, ..._rest: unknown[]) {
    // noop
  }

  debug(_message: string, ..._rest: unknown[]) {
    // noop
  }

  error(_message: string, _err: unknown, ..._rest: unknown[]) {
    // noop
  }
}

export function createNopLogger(): Logger {
  return new NopLogger()
}

/**
 * Creates a logger writing to `logFile` (truncated if non-empty) and to `uiStream`.
 *
 * @param pickiness the least critical `print()` message that still reaches the UI stream.
 */
export function createDefaultLogger(
  logFile: string,
  pickiness: Criticality,
  logLevel?: Level,
  uiStream?: NodeJS.WritableStream,
): Logger {
  const stat = fs.statSync(logFile, { throwIfNoEntry: false })
  if (stat && stat.size > 0) {
    fs.rmSync(logFile, { force: true })
  }
  return new FileLogger(logFile, pickiness, logLevel, uiStream)
}

class FileLogger implements Logger {
  private readonly logger: winston.Logger
  private readonly pickiness

  constructor(
    logFile: string,
    pickinessLevel: Criticality,
    logLevel: Level = 'info',
    uiStream: NodeJS.WritableStream = process.stdout,
  ) {
    if (!path.isAbsolute(logFile)) {
      throw new Error(`logFile must be absolute: ${logFile}`)
    }
    this.logger = newLogger(logFile, logLevel, uiStream)
    this.pickiness = criticalityLegend[pickinessLevel]
  }

  print(message: string, messageCriticality: Criticality = 'moderate') {
    const messageLevel = criticalityLegend[messageCriticality]
    if (messageLevel <= this.pickiness) {
      this.logger.info(message, { ui: true })
    }
  }

  warn(message: string, ...rest: unknown[]) {
    this.logger.warn(message, { ...collectMeta(rest), ui: true })
  }

  info(message: string, ...rest: unknown[]) {
    this.logger.info(message, collectMeta(rest))
  }

  debug(message: string, ...rest: unknown[]) {
    this.logger.debug(message, collectMeta(rest))
  }

  error(message: string, err: unknown, ...rest: unknown[]) {
    const { message: reason, stack } = errorLike(err)
    this.logger.error(message, { ...collectMeta(rest), reason: reason ?? String(err), stack, ui: true })
  }
}

// winston merges only the first metadata argument into the log entry, so several are folded into one.
function collectMeta(rest: unknown[]): Record<string, unknown> {
  const ret: Record<string, unknown> = {}
  const loose: unknown[] = []
  for (const at of rest) {
    if (typeof at === 'object' && at !== null && !Array.isArray(at)) {
      Object.assign(ret, at)
    } else {
      loose.push(at)
    }
  }
  if (loose.length) {
    ret.args = loose
  }
  return ret
}

const joinTokens = (...tokens: unknown[]) =>
  tokens
    .map(t => (typeof t === 'string' ? t.trim() : undefined))
    .filter(Boolean)
    .join(' ')

const finalFormat = format.printf(info => {
  let stringifiedRest: string | undefined = jsonStringify(
    Object.assign({}, info, {
      level: undefined,
      message: undefined,
      timestamp: undefined,
      stack: undefined,
      ui: undefined,
    }),
  )
  if (stringifiedRest === '{}') {
    stringifiedRest = ''
  }

  return joinTokens(info.timestamp, `[${info.level}]`, info.message, stringifiedRest, info.stack)
})

const filterUi = format(info => {
  if (!info.ui) {
    return false
  }

  return info
})

const uiPrefixes: Record<string, string> = {
  error: '[x]',
  warn: '[!]',
  info: '[*]',
}

const formatUi = format.printf(info => {
  const reason = typeof info.reason === 'string' ? `(${info.reason})` : undefined
  return joinTokens(uiPrefixes[info.level], info.message, reason)
})

type Level = 'error' | 'warn' | 'info' | 'debug'
const levels: Record<Level, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
}

function newLogger(logFile: string, level: Level, uiStream: NodeJS.WritableStream): winston.Logger {
  return winston.createLogger({
    level: 'debug',
    levels,
    defaultMeta: undefined,
    transports: [
      new winston.transports.File({
        filename: logFile,
        level,
        format: format.combine(format.timestamp(), format.errors({ stack: true }), finalFormat),
      }),
      // Only entries marked as "ui" reach the console.
      new winston.transports.Stream({
        stream: uiStream,
        level: 'info',
        format: format.combine(format.errors({ stack: true }), filterUi(), formatUi),
      }),
    ],
  })
}
