/**
 * Collector HTTP client — catalog, reports, owner → entity mappings and votes.
 *
 * Every call uses a Bearer API key and an AbortSignal timeout. Reads are
 * wrapped in withRetry; 4xx responses other than 429 are not retried.
 */

import type { CollectorConfig } from '../config/settings.js'
import { CollectorError, ErrorCodes } from '../errors.js'
import { log } from '../logger.js'
import type { CatalogEntry, EntityMappings, TelemetryReport } from '../types.js'
import { withRetry } from '../utils/retry.js'
import {
  CatalogItemSchema,
  ItemsEnvelopeSchema,
  parseReport,
  ValidatorServerSchema,
  type ValidatorServer,
} from './schemas.js'

const TAG = 'collector'

export type VotePayload = Record<string, unknown>

/** Read surface the mechanisms depend on. Tests substitute a fake. */
export interface CollectorApi {
  fetchCatalog(): Promise<CatalogEntry[]>
  fetchReports(entityId: string, limit?: number): Promise<TelemetryReport[]>
  fetchEntityMappings(ownerKeys: readonly string[]): Promise<EntityMappings>
  submitVote(entityId: string, payload: VotePayload): Promise<number>
}

export interface CollectorClientOptions {
  retryAttempts?: number
  retryBaseDelayMs?: number
}

export class CollectorClient implements CollectorApi {
  private readonly retryAttempts: number
  private readonly retryBaseDelayMs: number

  constructor(
    private readonly config: CollectorConfig,
    opts: CollectorClientOptions = {},
  ) {
    this.retryAttempts = opts.retryAttempts ?? 3
    this.retryBaseDelayMs = opts.retryBaseDelayMs ?? 1_000
  }

  private headers(withAuth = true): Record<string, string> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' }
    if (withAuth && this.config.apiKey) headers.Authorization = `Bearer ${this.config.apiKey}`
    return headers
  }

  private async getItems(path: string, withAuth = true): Promise<unknown[]> {
    return withRetry(
      async () => {
        let res: Response
        try {
          res = await fetch(`${this.config.baseUrl}${path}`, {
            headers: this.headers(withAuth),
            signal: AbortSignal.timeout(this.config.timeoutMs),
          })
        } catch (err) {
          throw new CollectorError(`GET ${path} failed: ${err instanceof Error ? err.message : String(err)}`)
        }
        if (!res.ok) {
          throw new CollectorError(`GET ${path} returned ${res.status}`, res.status)
        }
        let body: unknown
        try {
          body = await res.json()
        } catch {
          throw new CollectorError(`GET ${path} returned invalid JSON`, res.status, ErrorCodes.COLLECTOR_BAD_RESPONSE)
        }
        const envelope = ItemsEnvelopeSchema.safeParse(body)
        if (!envelope.success) {
          throw new CollectorError(`GET ${path} returned an unexpected body`, res.status, ErrorCodes.COLLECTOR_BAD_RESPONSE)
        }
        return envelope.data.items
      },
      {
        attempts: this.retryAttempts,
        baseDelayMs: this.retryBaseDelayMs,
        tag: TAG,
        shouldRetry: (err) => !(err instanceof CollectorError) || err.retryable,
      },
    )
  }

  /** GET /servers — the catalog is public, so no Authorization header is sent. */
  async fetchCatalog(): Promise<CatalogEntry[]> {
    const items = await this.getItems('/servers', false)
    const entries: CatalogEntry[] = []
    for (const item of items) {
      const parsed = CatalogItemSchema.safeParse(item)
      if (parsed.success) entries.push(parsed.data)
    }
    if (entries.length < items.length) {
      log.debug(TAG, `Dropped ${items.length - entries.length} malformed catalog item(s)`)
    }
    return entries
  }

  /** GET /validators/servers/{id}/reports — newest first, malformed items dropped. */
  async fetchReports(entityId: string, limit = this.config.reportsLimit): Promise<TelemetryReport[]> {
    const query = new URLSearchParams({ limit: String(limit) })
    const items = await this.getItems(`/validators/servers/${encodeURIComponent(entityId)}/reports?${query}`)
    const reports: TelemetryReport[] = []
    for (const item of items) {
      const report = parseReport(item, entityId)
      if (report) reports.push(report)
    }
    if (reports.length < items.length) {
      log.debug(TAG, `Dropped ${items.length - reports.length} unreadable report(s) for ${entityId}`)
    }
    return reports
  }

  /**
   * GET /validators/servers/ids?hotkeys=… — split into at most
   * `maxMappingChunks` requests. A failed chunk is logged and skipped; the
   * call only throws when every chunk failed.
   */
  async fetchEntityMappings(ownerKeys: readonly string[]): Promise<EntityMappings> {
    const unique = [...new Set(ownerKeys.filter((k) => k.length > 0))]
    if (unique.length === 0) return {}

    const chunks = chunkKeys(unique, this.config.maxMappingChunks)
    const mappings: EntityMappings = {}
    let failures = 0
    let firstError: unknown

    for (const [index, chunk] of chunks.entries()) {
      const query = new URLSearchParams({ hotkeys: chunk.join(',') })
      let items: unknown[]
      try {
        items = await this.getItems(`/validators/servers/ids?${query}`)
      } catch (err) {
        failures++
        firstError ??= err
        log.warn(TAG, `Mapping chunk ${index + 1}/${chunks.length} failed`, err)
        continue
      }
      for (const item of items) {
        const parsed = ValidatorServerSchema.safeParse(item)
        if (parsed.success) addMapping(mappings, parsed.data)
      }
    }

    if (failures === chunks.length) throw firstError
    return mappings
  }

  /** POST /validators/servers/{id}/vote — returns the HTTP status; 599 on network failure. */
  async submitVote(entityId: string, payload: VotePayload): Promise<number> {
    const path = `/validators/servers/${encodeURIComponent(entityId)}/vote`
    try {
      const res = await fetch(`${this.config.baseUrl}${path}`, {
        method: 'POST',
        headers: this.headers(),
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.config.timeoutMs),
      })
      if (!res.ok) {
        log.warn(TAG, `Vote for ${entityId} returned ${res.status}`)
      }
      return res.status
    } catch (err) {
      log.error(TAG, `Vote for ${entityId} failed`, err)
      return 599
    }
  }
}

/** Split keys into at most `maxChunks` nearly equal, order-preserving chunks. */
export function chunkKeys(keys: readonly string[], maxChunks: number): string[][] {
  if (keys.length === 0) return []
  const chunkCount = Math.max(1, Math.min(maxChunks, keys.length))
  const size = Math.ceil(keys.length / chunkCount)
  const chunks: string[][] = []
  for (let i = 0; i < keys.length; i += size) {
    chunks.push(keys.slice(i, i + size))
  }
  return chunks
}

function addMapping(mappings: EntityMappings, server: ValidatorServer): void {
  const ids = mappings[server.hotkey] ?? []
  if (!ids.includes(server.id)) ids.push(server.id)
  mappings[server.hotkey] = ids
}
