/**
 * Structured logger — pino-backed `log.info(tag, msg)` facade.
 *
 * NODE_ENV=production emits newline-delimited JSON. Development pipes through
 * pino-pretty. Under Vitest the level defaults to `silent`.
 *
 * Usage:
 *   import { log } from './logger.js'
 *   log.info('scanner', `Scanned ${n} addresses`)
 *   log.error('collector', 'Report fetch failed', err)
 */

import pino from 'pino'

const isProduction = process.env.NODE_ENV === 'production'
const isTest = !!process.env.VITEST

function buildTransport(): pino.TransportSingleOptions | undefined {
  if (isProduction || isTest) return undefined
  return {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'HH:MM:ss.l',
      ignore: 'pid,hostname',
    },
  }
}

const baseLogger = pino({
  level: process.env.LOG_LEVEL ?? (isTest ? 'silent' : isProduction ? 'info' : 'debug'),
  transport: buildTransport(),
})

export const log = {
  debug(tag: string, msg: string, extra?: Record<string, unknown>) {
    baseLogger.debug({ tag, ...extra }, msg)
  },
  info(tag: string, msg: string, extra?: Record<string, unknown>) {
    baseLogger.info({ tag, ...extra }, msg)
  },
  warn(tag: string, msg: string, extra?: unknown) {
    if (extra !== undefined) {
      baseLogger.warn({ tag, error: extra instanceof Error ? extra.message : String(extra) }, msg)
    } else {
      baseLogger.warn({ tag }, msg)
    }
  },
  error(tag: string, msg: string, extra?: unknown) {
    if (extra instanceof Error) {
      baseLogger.error({ tag, err: extra }, msg)
    } else if (extra !== undefined) {
      baseLogger.error({ tag, error: String(extra) }, msg)
    } else {
      baseLogger.error({ tag }, msg)
    }
  },
}
