/**
 * Scan controller — keeps the last cycle's scan per entity and decides when
 * to refresh it.
 *
 * A refresh is skipped (cached results reused) when the minimum interval has
 * not elapsed and every requested entity has been seen before. Otherwise the
 * catalog is fetched, each entity is mapped to `host:port`, entities with no
 * coordinates or a duplicate address are marked missing, and the rest are
 * scanned.
 */

import type { CollectorApi } from '../collector/client.js'
import type { ScannerConfig } from '../config/settings.js'
import { log } from '../logger.js'
import type { CatalogEntry, EntityScan, ProviderName, ScanMetrics } from '../types.js'
import { scanCatalog, type LookupFn } from './scanner.js'

const TAG = 'scanner'

export type RefreshStatus = 'no_entities' | 'cached' | 'performed' | 'no_attempt' | 'error'

export interface RefreshOutcome {
  status: RefreshStatus
  lastRunAt: number | null
  /** Entities that were scanned (had a usable, unique address). */
  attempted: string[]
  /** Entities with no scan this cycle: absent from the catalog, no coordinates, or duplicate address. */
  missing: string[]
  metrics: ScanMetrics | null
  disabledProviders: ProviderName[]
  error?: string
}

export interface ScanControllerOptions {
  now?: () => number
  lookup?: LookupFn
}

export class ScanController {
  private readonly results = new Map<string, EntityScan | null>()
  private lastScanAt = 0
  private lastAttempted: string[] = []
  private lastMissing: string[] = []
  private lastMetrics: ScanMetrics | null = null
  private lastDisabled: ProviderName[] = []
  private lastStatus: RefreshStatus | 'never' = 'never'
  private lastError: string | null = null
  private readonly now: () => number

  constructor(
    private readonly collector: CollectorApi,
    private readonly config: ScannerConfig,
    private readonly opts: ScanControllerOptions = {},
  ) {
    this.now = opts.now ?? Date.now
  }

  /** Latest scan for an entity, or null when it has none. */
  getScan(entityId: string): EntityScan | null {
    return this.results.get(entityId) ?? null
  }

  getStatus() {
    return {
      status: this.lastStatus,
      lastRunAt: this.lastScanAt ? new Date(this.lastScanAt).toISOString() : null,
      intervalMs: this.config.intervalMs,
      tracked: this.results.size,
      attempted: this.lastAttempted.length,
      missing: this.lastMissing.length,
      disabledProviders: this.lastDisabled,
      lastError: this.lastError,
    }
  }

  async refresh(entityIds: readonly string[]): Promise<RefreshOutcome> {
    const relevant = [...new Set(entityIds.filter((id) => id.length > 0))]
    if (relevant.length === 0) {
      return this.outcome('no_entities', [], [], null, [])
    }

    const now = this.now()
    const hasNew = relevant.some((id) => !this.results.has(id))
    const intervalReady = this.lastScanAt === 0 || now - this.lastScanAt >= this.config.intervalMs

    if (!intervalReady && !hasNew) {
      return this.outcome('cached', this.lastAttempted, this.lastMissing, this.lastMetrics, this.lastDisabled)
    }

    let catalog: CatalogEntry[]
    try {
      catalog = await this.collector.fetchCatalog()
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      log.error(TAG, 'Catalog fetch failed; keeping previous scan results', err)
      this.lastStatus = 'error'
      this.lastError = message
      return { ...this.outcome('error', [], relevant, null, []), error: message }
    }

    const byId = new Map(catalog.map((entry) => [entry.id, entry]))
    const missing = new Set<string>()
    const addressToEntity = new Map<string, string>()
    const fresh = new Map<string, EntityScan | null>()

    for (const id of relevant) {
      fresh.set(id, null)
      const entry = byId.get(id)
      if (!entry) {
        missing.add(id)
        continue
      }
      if (entry.host === null || entry.port === null) {
        log.warn(TAG, `Missing network coordinates for entity ${id}`)
        missing.add(id)
        continue
      }
      const address = `${entry.host}:${entry.port}`
      const owner = addressToEntity.get(address)
      if (owner !== undefined) {
        log.warn(TAG, `Duplicate address ${address} for entities ${owner} and ${id}`)
        missing.add(id)
        continue
      }
      addressToEntity.set(address, id)
      fresh.set(id, {
        address,
        online: false,
        players: null,
        maxPlayers: null,
        pingMs: 0,
        provider: null,
        entityId: id,
        scannedAt: now,
        host: entry.host,
        port: entry.port,
        declaredActivePlayers: entry.declaredActivePlayers,
        declaredMaxPlayers: entry.declaredMaxPlayers,
      })
    }

    const addresses = [...addressToEntity.keys()]
    let metrics: ScanMetrics | null = null
    let disabled: ProviderName[] = []

    if (addresses.length > 0) {
      const scan = await scanCatalog(addresses, {
        timeoutMs: this.config.timeoutMs,
        concurrency: this.config.concurrency,
        disabled: new Set(),
        lookup: this.opts.lookup,
      })
      metrics = scan.metrics
      disabled = [...scan.disabled].sort()
      for (const result of scan.results) {
        const id = addressToEntity.get(result.address)
        const base = id === undefined ? undefined : fresh.get(id)
        if (id === undefined || !base) continue
        fresh.set(id, { ...base, ...result })
      }
    } else {
      log.warn(TAG, `No requested entities are scannable (requested=${relevant.length})`)
    }

    for (const id of this.results.keys()) {
      if (!fresh.has(id)) this.results.delete(id)
    }
    for (const [id, scan] of fresh) this.results.set(id, scan)

    const attempted = addresses.map((a) => addressToEntity.get(a)).filter((id): id is string => id !== undefined)
    this.lastScanAt = now
    this.lastAttempted = attempted
    this.lastMissing = [...missing]
    this.lastMetrics = metrics
    this.lastDisabled = disabled
    this.lastError = null

    const status: RefreshStatus = attempted.length > 0 ? 'performed' : 'no_attempt'
    this.lastStatus = status
    return this.outcome(status, attempted, this.lastMissing, metrics, disabled)
  }

  private outcome(
    status: RefreshStatus,
    attempted: string[],
    missing: string[],
    metrics: ScanMetrics | null,
    disabledProviders: ProviderName[],
  ): RefreshOutcome {
    return {
      status,
      lastRunAt: this.lastScanAt || null,
      attempted: [...attempted],
      missing: [...missing],
      metrics,
      disabledProviders: [...disabledProviders],
    }
  }
}
