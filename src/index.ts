import { serve } from '@hono/node-server'
import { createApp } from './app.js'
import { DryRunChainClient } from './chain/dryRun.js'
import { CollectorClient } from './collector/client.js'
import { JOB_CONFIG, JOB_INTERVALS, JOB_STARTUP_DELAYS } from './config/constants.js'
import { loadConfig } from './config/settings.js'
import { createDatabase } from './db/connection.js'
import { log } from './logger.js'
import { MechanismRegistry, type Mechanism } from './mechanisms/base.js'
import { ServerMechanism } from './mechanisms/serverMechanism.js'
import { WeightPublisher } from './weights/publisher.js'

// ---------- Config ----------

const config = loadConfig()
const db = createDatabase(config.dbPath)

if (!config.collector.apiKey) {
  log.warn('config', 'COLLECTOR_API_KEY not set; report and vote requests will be unauthenticated')
}
if (config.ownerKeys.length === 0) {
  log.warn('config', 'OWNER_KEYS is empty; no entities will be scored')
}

// ---------- Wiring ----------

const collector = new CollectorClient(config.collector)
const chain = new DryRunChainClient(config.ownerKeys, config.minAllowedWeights)
const registry = new MechanismRegistry()
registry.register(new ServerMechanism({ collector, chain, config, db }))
const publisher = new WeightPublisher(chain, config.weights, { db, maxScore: config.scoring.maxScore })

const app = createApp({ registry, db, requestLogging: true })

// ---------- Graceful shutdown ----------

const intervals: ReturnType<typeof setInterval>[] = []
const timeouts: ReturnType<typeof setTimeout>[] = []
let server: ReturnType<typeof serve> | null = null
let shuttingDown = false

function shutdown() {
  if (shuttingDown) return
  shuttingDown = true
  log.info('server', 'Shutting down...')

  for (const id of intervals) clearInterval(id)
  for (const id of timeouts) clearTimeout(id)

  if (server) {
    server.close(() => {
      log.info('server', 'All connections closed')
      db.close()
      process.exit(0)
    })
    setTimeout(() => {
      log.warn('server', 'Forcing exit after timeout')
      db.close()
      process.exit(1)
    }, JOB_CONFIG.SHUTDOWN_TIMEOUT_MS).unref()
  } else {
    db.close()
    process.exit(0)
  }
}
process.on('SIGINT', shutdown)
process.on('SIGTERM', shutdown)

// ---------- Jobs ----------

function scheduleMechanism(mechanism: Mechanism, startupDelayMs: number) {
  let running = false
  const tick = async () => {
    if (running || shuttingDown) return
    running = true
    try {
      await mechanism.runCycle()
    } catch (e) {
      log.error('jobs', `Error in ${mechanism.name} cycle`, e)
    } finally {
      running = false
    }
  }
  timeouts.push(
    setTimeout(() => {
      void tick()
      intervals.push(setInterval(() => void tick(), mechanism.intervalMs))
    }, startupDelayMs),
  )
}

// ---------- Start ----------

server = serve({ fetch: app.fetch, port: config.port }, (info) => {
  log.info('server', `Validator status API running on http://localhost:${info.port}`)
  log.info('server', `collector: ${config.collector.baseUrl}`)

  log.info('jobs', 'Starting background processes...')

  // ── 1. Mechanism cycles (each on its own cadence, staggered) ───────────────
  for (const [index, mechanism] of registry.list().entries()) {
    scheduleMechanism(mechanism, JOB_STARTUP_DELAYS.SERVER_MECHANISM_MS + index * 1_000)
  }

  // ── 2. Weight publisher (checks every 30s; per-mechanism intervals gate submissions) ──
  let publisherRunning = false
  timeouts.push(
    setTimeout(() => {
      intervals.push(
        setInterval(async () => {
          if (publisherRunning || shuttingDown) return
          publisherRunning = true
          try {
            await publisher.publishAll(registry.list())
          } catch (e) {
            log.error('weights', 'Error in weight publisher', e)
          } finally {
            publisherRunning = false
          }
        }, JOB_INTERVALS.WEIGHT_PUBLISHER_MS),
      )
    }, JOB_STARTUP_DELAYS.WEIGHT_PUBLISHER_MS),
  )

  log.info('jobs', 'All background processes registered')
})
