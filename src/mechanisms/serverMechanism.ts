/**
 * Server-reputation mechanism (id 0).
 *
 * One cycle:
 *   roster → owner mappings → scan refresh → report fetch → validation →
 *   player power → score + smooth → commit cache → cleanup → votes.
 *
 * The cycle works on a copy of the score cache and swaps it in at the end, so
 * readers (the weight publisher, /health) never see a half-written cycle.
 * runCycle() never rejects; failures are logged and counted.
 */

import type { Database } from 'better-sqlite3'
import type { ChainClient } from '../chain/client.js'
import type { CollectorApi } from '../collector/client.js'
import { JOB_CONFIG, JOB_INTERVALS } from '../config/constants.js'
import type { ValidatorConfig } from '../config/settings.js'
import { loadScoreCache, saveScoreCache } from '../db/queries.js'
import { jobStats, mechanismStats } from '../jobs/jobStats.js'
import { log } from '../logger.js'
import { ScanController } from '../scanner/controller.js'
import type { LookupFn } from '../scanner/scanner.js'
import { hasRequiredPlugins } from '../scoring/components.js'
import { calculateScore, smoothScore, ZERO_COMPONENTS } from '../scoring/engine.js'
import { PlayerPowerAggregator } from '../scoring/playerPower.js'
import { validateReports, type ValidationDecision } from '../scoring/validator.js'
import type { EntityScoreResult, ScoreCacheEntry } from '../types.js'
import { mapWithConcurrency } from '../utils/concurrency.js'
import { submitVotes, type VoteSummary } from '../votes/voteClient.js'
import type { CycleStats, Mechanism, MechanismStatus } from './base.js'
import { MappingsCache } from './mappings.js'

const TAG = 'server-mechanism'

export interface ServerMechanismDeps {
  collector: CollectorApi
  chain: ChainClient
  config: ValidatorConfig
  db?: Database | null
  lookup?: LookupFn
  now?: () => number
}

interface Assignment {
  ownerKey: string
  entityId: string
}

export class ServerMechanism implements Mechanism {
  readonly id = 0
  readonly name = 'server_reputation'
  readonly intervalMs = JOB_INTERVALS.SERVER_MECHANISM_MS

  private cache: Map<string, ScoreCacheEntry>
  private ownerScores = new Map<string, number>()
  private cycleCount = 0
  private lastCleanupAt = 0
  private lastVotes: VoteSummary | null = null
  private readonly scanner: ScanController
  private readonly mappings: MappingsCache
  private readonly now: () => number
  private readonly db: Database | null

  constructor(private readonly deps: ServerMechanismDeps) {
    this.now = deps.now ?? Date.now
    this.db = deps.db ?? null
    this.cache = this.db ? loadScoreCache(this.db, this.id) : new Map()
    this.scanner = new ScanController(deps.collector, deps.config.scanner, { now: this.now, lookup: deps.lookup })
    this.mappings = new MappingsCache(deps.collector, deps.config.collector.mappingsMinRefreshMs, this.now)
    if (this.cache.size > 0) {
      log.info(TAG, `Restored ${this.cache.size} cached score(s)`)
    }
  }

  getCachedScore(entityId: string): ScoreCacheEntry | undefined {
    return this.cache.get(entityId)
  }

  getOwnerScores(): Map<string, number> {
    return new Map(this.ownerScores)
  }

  getStatus(): MechanismStatus {
    return {
      mechanismId: this.id,
      mechanismName: this.name,
      cycleCount: this.cycleCount,
      cachedScores: this.cache.size,
      latestScores: this.ownerScores.size,
      scanner: this.scanner.getStatus(),
      lastVotes: this.lastVotes,
    }
  }

  async runCycle(): Promise<CycleStats> {
    const startedAt = this.now()
    const cycleId = ++this.cycleCount
    const stats = mechanismStats(this.id)
    const cycle: CycleStats = {
      cycleId,
      mechanismId: this.id,
      mechanismName: this.name,
      startedAt,
      durationMs: 0,
      entitiesProcessed: 0,
      scoresUpdated: 0,
      errors: 0,
      results: {},
    }

    try {
      await this.score(cycle)
    } catch (err) {
      cycle.errors++
      stats.failures++
      log.error(TAG, `Cycle ${cycleId} failed`, err)
    }

    cycle.durationMs = this.now() - startedAt
    stats.lastRun = new Date(startedAt).toISOString()
    stats.cycles++
    stats.entitiesScored += cycle.scoresUpdated
    stats.lastDurationMs = cycle.durationMs
    log.info(TAG, `Cycle ${cycleId} finished`, {
      durationMs: cycle.durationMs,
      processed: cycle.entitiesProcessed,
      updated: cycle.scoresUpdated,
      errors: cycle.errors,
    })
    return cycle
  }

  private async score(cycle: CycleStats): Promise<void> {
    const { config, collector, chain } = this.deps
    const roster = await chain.getRoster()
    const mappings = await this.mappings.get(roster)

    const assignments: Assignment[] = []
    const claimed = new Set<string>()
    for (const ownerKey of roster) {
      for (const entityId of mappings[ownerKey] ?? []) {
        if (claimed.has(entityId)) continue
        claimed.add(entityId)
        assignments.push({ ownerKey, entityId })
      }
    }

    const now = this.now()
    if (assignments.length === 0) {
      log.info(TAG, 'No entities mapped to any owner this cycle')
      this.commit(new Map(this.cache), assignments, now)
      return
    }

    const entityIds = assignments.map((a) => a.entityId)
    const refresh = await this.scanner.refresh(entityIds)
    log.debug(TAG, `Scan ${refresh.status}`, {
      attempted: refresh.attempted.length,
      missing: refresh.missing.length,
      disabled: refresh.disabledProviders,
    })

    const reports = await mapWithConcurrency(entityIds, config.collector.reportFetchConcurrency, async (entityId) => {
      try {
        return await collector.fetchReports(entityId)
      } catch (err) {
        cycle.errors++
        log.warn(TAG, `Report fetch failed for ${entityId}; validating with no reports`, err)
        return []
      }
    })

    const limits = { ...config.validation, historyCapacity: config.scoring.history.capacity }
    const decisions = new Map<string, ValidationDecision>()
    const power = new PlayerPowerAggregator()
    assignments.forEach(({ entityId }, index) => {
      const decision = validateReports(
        {
          scan: this.scanner.getScan(entityId),
          reports: reports[index] ?? [],
          previousScore: this.cache.get(entityId)?.score ?? null,
          now,
        },
        limits,
      )
      decisions.set(entityId, decision)
      if (decision.kind === 'pass') power.ingest(entityId, decision.latest)
    })
    const playerPower = power.compute()

    const working = new Map(this.cache)
    const results: EntityScoreResult[] = []

    for (const [index, { ownerKey, entityId }] of assignments.entries()) {
      const decision = decisions.get(entityId)
      if (!decision || decision.kind === 'skip') continue
      cycle.entitiesProcessed++

      const scan = this.scanner.getScan(entityId)
      const reportsCount = reports[index]?.length ?? 0

      if (decision.kind === 'zero') {
        working.set(entityId, { score: 0, rawScore: 0, components: { ...ZERO_COMPONENTS }, updatedAt: now })
        cycle.scoresUpdated++
        results.push({
          entityId,
          ownerKey,
          score: 0,
          rawScore: 0,
          components: { ...ZERO_COMPONENTS },
          compliant: false,
          reportsCount,
          zeroReason: decision.reason,
          scan,
          reportMaxPlayers: decision.reportMaxPlayers,
          reportPlayerCount: decision.reportPlayerCount,
        })
        log.debug(TAG, `Entity ${entityId} zeroed: ${decision.reason}`)
        continue
      }

      const result = this.scorePassing(ownerKey, entityId, decision, playerPower.normalized[entityId] ?? 0)
      working.set(entityId, {
        score: result.score,
        rawScore: result.rawScore,
        components: result.components,
        updatedAt: now,
      })
      cycle.scoresUpdated++
      results.push({
        ...result,
        reportsCount,
        scan,
        playerPowerTotal: playerPower.totals[entityId] ?? 0,
      })
    }

    this.commit(working, assignments, now)

    for (const result of results) {
      const current = cycle.results[result.ownerKey]
      if (!current || result.score > current.score) cycle.results[result.ownerKey] = result
    }

    if (config.votesEnabled && results.length > 0) {
      this.lastVotes = await submitVotes(
        collector,
        results,
        { baseUrl: config.collector.baseUrl, validation: config.validation, now },
        config.collector.voteConcurrency,
      )
    }
  }

  private scorePassing(
    ownerKey: string,
    entityId: string,
    decision: Extract<ValidationDecision, { kind: 'pass' }>,
    playerPower: number,
  ): Omit<EntityScoreResult, 'reportsCount' | 'scan'> {
    const cfg = this.deps.config.scoring
    const latest = decision.latest
    const calc = calculateScore({ report: latest, history: decision.history, playerPower }, cfg)
    if (calc.failure) {
      log.warn(TAG, `Score for ${entityId} defaulted: ${calc.failure.component} failed`, calc.failure)
    }
    const previous = this.cache.get(entityId)?.score ?? null
    const score = smoothScore(calc.score, previous, cfg)
    log.debug(TAG, `Entity ${entityId} scored ${score}`, { raw: calc.score, previous })

    return {
      entityId,
      ownerKey,
      score,
      rawScore: calc.score,
      components: calc.components,
      compliant: !calc.defaulted && hasRequiredPlugins(latest.payload.plugins, cfg),
      defaulted: calc.defaulted,
      reportMaxPlayers: decision.reportMaxPlayers,
      reportPlayerCount: decision.reportPlayerCount,
      scanDeltaPlayers: decision.scanDeltaPlayers ?? undefined,
    }
  }

  /** Swap in the cycle's cache, evict stale entries at most hourly, persist, and rebuild owner scores. */
  private commit(
    working: Map<string, ScoreCacheEntry>,
    assignments: readonly Assignment[],
    now: number,
  ): void {
    if (this.lastCleanupAt === 0 || now - this.lastCleanupAt >= JOB_CONFIG.CLEANUP_INTERVAL_MS) {
      let evicted = 0
      for (const [entityId, entry] of working) {
        if (now - entry.updatedAt > JOB_CONFIG.SCORE_CACHE_TTL_MS) {
          working.delete(entityId)
          evicted++
        }
      }
      this.lastCleanupAt = now
      jobStats.cacheCleanup.lastRun = new Date(now).toISOString()
      jobStats.cacheCleanup.evicted += evicted
      if (evicted > 0) log.info(TAG, `Evicted ${evicted} stale cached score(s)`)
    }

    this.cache = working
    if (this.db) saveScoreCache(this.db, this.id, working)

    const ownerScores = new Map<string, number>()
    for (const { ownerKey, entityId } of assignments) {
      const entry = working.get(entityId)
      if (!entry) continue
      ownerScores.set(ownerKey, Math.max(ownerScores.get(ownerKey) ?? 0, entry.score))
    }
    this.ownerScores = ownerScores
  }
}
