import type { Database } from 'better-sqlite3'
import { Hono } from 'hono'
import { logger } from 'hono/logger'
import { AppError, ErrorCodes, errorResponse } from './errors.js'
import { log } from './logger.js'
import type { MechanismRegistry } from './mechanisms/base.js'
import { createHealthRoute } from './routes/health.js'
import { createScoresRoute } from './routes/scores.js'

type ErrorStatus = 400 | 401 | 403 | 404 | 409 | 422 | 429 | 500 | 502 | 503

const ERROR_STATUSES: readonly ErrorStatus[] = [400, 401, 403, 404, 409, 422, 429, 500, 502, 503]

function toErrorStatus(code: number): ErrorStatus {
  return ERROR_STATUSES.find((s) => s === code) ?? 500
}

export interface AppDeps {
  registry: MechanismRegistry
  db?: Database | null
  requestLogging?: boolean
}

export function createApp(deps: AppDeps): Hono {
  const app = new Hono()

  if (deps.requestLogging) app.use('*', logger())

  app.route('/health', createHealthRoute({ registry: deps.registry, db: deps.db }))
  app.route('/scores', createScoresRoute(deps.registry))

  app.notFound((c) => c.json(errorResponse(ErrorCodes.NOT_FOUND, 'Not found'), 404))

  app.onError((err, c) => {
    if (err instanceof AppError) {
      return c.json(err.toJSON(), toErrorStatus(err.statusCode))
    }
    log.error('http', 'Unhandled error', err)
    return c.json(errorResponse(ErrorCodes.INTERNAL_ERROR, 'Internal server error'), 500)
  })

  return app
}
