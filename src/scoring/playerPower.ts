/**
 * Player-power aggregation across entities.
 *
 * Each unique player's reported power is averaged over every entity that
 * claims the player, then split evenly between those entities, so a player
 * claimed by several colluding entities is not counted more than once.
 * Totals are normalized against the cycle's maximum.
 */

import { ZERO_UUID } from '../collector/schemas.js'
import type { ActivePlayer, TelemetryReport } from '../types.js'

export interface PlayerPowerResult {
  /** entity → total / max total, in (0, 1]. Entities with no power are absent. */
  normalized: Record<string, number>
  /** entity → raw summed share. */
  totals: Record<string, number>
}

/** Stable player identity: lower-cased uuid, or lower-cased name when the uuid is blank or the zero sentinel. */
export function playerIdentity(player: Pick<ActivePlayer, 'name' | 'uuid'>): string | null {
  const uuid = player.uuid.trim().toLowerCase()
  if (uuid && uuid !== ZERO_UUID) return uuid
  const name = player.name.trim().toLowerCase()
  return name || null
}

export class PlayerPowerAggregator {
  private readonly claims = new Map<string, Array<{ entityId: string; power: number }>>()

  ingest(entityId: string, report: TelemetryReport): void {
    const seen = new Set<string>()
    for (const player of report.payload.activePlayers) {
      const id = playerIdentity(player)
      if (!id || seen.has(id)) continue
      seen.add(id)
      const power = Number.isFinite(player.power) ? player.power : 0
      if (power <= 0) continue
      const entries = this.claims.get(id) ?? []
      entries.push({ entityId, power })
      this.claims.set(id, entries)
    }
  }

  compute(): PlayerPowerResult {
    const totals: Record<string, number> = {}
    for (const entries of this.claims.values()) {
      if (entries.length === 0) continue
      const average = entries.reduce((sum, e) => sum + e.power, 0) / entries.length
      const share = average / entries.length
      if (share <= 0) continue
      for (const { entityId } of entries) {
        totals[entityId] = (totals[entityId] ?? 0) + share
      }
    }

    const max = Math.max(0, ...Object.values(totals))
    if (max <= 0) return { normalized: {}, totals: {} }

    const normalized: Record<string, number> = {}
    for (const [entityId, total] of Object.entries(totals)) {
      normalized[entityId] = total / max
    }
    return { normalized, totals }
  }
}
