/**
 * Owner → entity mappings with a minimum refresh interval. A failed refresh
 * keeps serving the last good mapping.
 */

import type { CollectorApi } from '../collector/client.js'
import { log } from '../logger.js'
import type { EntityMappings } from '../types.js'

export class MappingsCache {
  private mappings: EntityMappings = {}
  private keysFingerprint = ''
  private fetchedAt = 0

  constructor(
    private readonly collector: CollectorApi,
    private readonly minRefreshMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  async get(ownerKeys: readonly string[]): Promise<EntityMappings> {
    const fingerprint = [...new Set(ownerKeys)].sort().join(',')
    const now = this.now()
    const fresh = this.fetchedAt > 0 && now - this.fetchedAt < this.minRefreshMs
    if (fresh && fingerprint === this.keysFingerprint) return this.mappings

    try {
      this.mappings = await this.collector.fetchEntityMappings(ownerKeys)
      this.keysFingerprint = fingerprint
      this.fetchedAt = now
    } catch (err) {
      log.warn('mappings', 'Mapping refresh failed; reusing previous mapping', err)
    }
    return this.mappings
  }
}
