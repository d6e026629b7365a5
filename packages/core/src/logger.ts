/**
 * Logging
 * One pino root logger per process, with a child per module.
 *
 * @module logger
 */

import { pino, type Logger, type LoggerOptions } from 'pino'

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent'

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some((level) => level === value)
}

function initialLevel(): LogLevel {
  const fromEnv = process.env.HEARTH_LOG_LEVEL
  return isLogLevel(fromEnv) ? fromEnv : 'info'
}

function createRootLogger(level: LogLevel): Logger {
  const options: LoggerOptions = { name: 'hearth', level }

  // Pretty output only for humans; JSON lines otherwise
  if (level !== 'silent' && process.stdout.isTTY) {
    options.transport = {
      target: 'pino-pretty',
      options: {
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname',
      },
    }
  }

  return pino(options)
}

const rootLogger = createRootLogger(initialLevel())
const moduleLoggers = new Map<string, Logger>()

/**
 * Get the logger for a module. Repeated calls return the same child.
 */
export function createLogger(module: string): Logger {
  let logger = moduleLoggers.get(module)
  if (!logger) {
    logger = rootLogger.child({ module })
    moduleLoggers.set(module, logger)
  }
  return logger
}

/**
 * Change the level of the root logger and every module logger handed out so far.
 */
export function setLogLevel(level: LogLevel): void {
  rootLogger.level = level
  for (const logger of moduleLoggers.values()) {
    logger.level = level
  }
}

export function getLogLevel(): LogLevel {
  const level = rootLogger.level
  return isLogLevel(level) ? level : 'info'
}
