/**
 * Application logger
 *
 * One winston root logger per process; components log through child loggers
 * tagged with their component name.
 */

import winston from 'winston'
import { config } from '../config/env.js'

export type Logger = winston.Logger

// Human-readable lines in development, JSON in production
const consoleFormat =
  config.nodeEnv === 'production'
    ? winston.format.json()
    : winston.format.combine(
        winston.format.colorize(),
        winston.format.printf(({ timestamp, level, message, component, service: _service, ...meta }) => {
          const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : ''
          return `${String(timestamp)} [${level}] ${String(component ?? 'app')}: ${String(message)}${metaStr}`
        }),
      )

const rootLogger = winston.createLogger({
  level: config.logLevel,
  silent: config.nodeEnv === 'test',
  format: winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
    winston.format.errors({ stack: true }),
  ),
  defaultMeta: { service: 'tickwork' },
  transports: [new winston.transports.Console({ format: consoleFormat })],
})

export function createLogger(component: string): Logger {
  return rootLogger.child({ component })
}

/**
 * Flatten an unknown thrown value into log metadata
 */
export function errorMeta(error: unknown): { error: string; stack?: string } {
  if (error instanceof Error) {
    return { error: error.message, stack: error.stack }
  }
  return { error: String(error) }
}
