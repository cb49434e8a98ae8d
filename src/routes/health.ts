import type { Database } from 'better-sqlite3'
import { Hono } from 'hono'
import { CLIENT_VERSION } from '../config/constants.js'
import { countCachedScores } from '../db/queries.js'
import { jobStats } from '../jobs/jobStats.js'
import type { MechanismRegistry, MechanismStatus } from '../mechanisms/base.js'

/**
 * Cache the health payload for CACHE_TTL_MS so frequent health checks do not hit
 * SQLite while a cycle is committing. Uptime is refreshed on every request.
 */
const CACHE_TTL_MS = 10_000

export interface HealthPayload {
  status: 'ok'
  version: string
  uptime: number
  database: { cachedScores: number | null }
  mechanisms: MechanismStatus[]
  jobs: {
    mechanisms: Record<number, { lastRun: string | null; cycles: number; failures: number; lastDurationMs: number }>
    weightPublisher: { lastRun: string | null; submissions: number; failures: number }
    cacheCleanup: { lastRun: string | null; evicted: number }
  }
}

export interface HealthDeps {
  registry: MechanismRegistry
  db?: Database | null
  now?: () => number
}

export function createHealthRoute(deps: HealthDeps): Hono {
  const now = deps.now ?? Date.now
  const startTime = now()
  let cachedPayload: HealthPayload | null = null
  let cachedAt = 0

  function buildHealthPayload(at: number): HealthPayload {
    const mechanisms: HealthPayload['jobs']['mechanisms'] = {}
    for (const [id, stats] of Object.entries(jobStats.mechanisms)) {
      mechanisms[Number(id)] = {
        lastRun: stats.lastRun || null,
        cycles: stats.cycles,
        failures: stats.failures,
        lastDurationMs: stats.lastDurationMs,
      }
    }

    return {
      status: 'ok',
      version: CLIENT_VERSION,
      uptime: Math.floor((at - startTime) / 1000),
      database: { cachedScores: deps.db ? countCachedScores(deps.db) : null },
      mechanisms: deps.registry.list().map((m) => m.getStatus()),
      jobs: {
        mechanisms,
        weightPublisher: {
          lastRun: jobStats.weightPublisher.lastRun || null,
          submissions: jobStats.weightPublisher.submissions,
          failures: jobStats.weightPublisher.failures,
        },
        cacheCleanup: {
          lastRun: jobStats.cacheCleanup.lastRun || null,
          evicted: jobStats.cacheCleanup.evicted,
        },
      },
    }
  }

  const health = new Hono()

  health.get('/', (c) => {
    const at = now()
    if (!cachedPayload || at - cachedAt > CACHE_TTL_MS) {
      cachedPayload = buildHealthPayload(at)
      cachedAt = at
    } else {
      cachedPayload.uptime = Math.floor((at - startTime) / 1000)
    }
    return c.json(cachedPayload)
  })

  return health
}
