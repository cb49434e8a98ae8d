/**
 * Test Factories — reports, scans and catalog entries with sensible defaults.
 *
 * Usage:
 *   const report = makeReport({ tpsMillis: 19_500, players: 50, maxPlayers: 100 })
 *   const scan = makeScan('srv-1', { players: 50, maxPlayers: 100 })
 */
import { ZERO_UUID } from '../src/collector/schemas.js'
import { PARTICIPATION_DEFAULTS } from '../src/config/constants.js'
import type { ActivePlayer, CatalogEntry, EntityScan, TelemetryReport } from '../src/types.js'

// ---------------------------------------------------------------------------
// Shared helpers
// ---------------------------------------------------------------------------

/** Fixed clock for every test: 2026-01-15T12:00:00.000Z */
export const NOW = Date.UTC(2026, 0, 15, 12, 0, 0)

export const MINUTE = 60_000
export const HOUR = 60 * MINUTE

export const REQUIRED_PLUGINS: string[] = [...PARTICIPATION_DEFAULTS.REQUIRED_PLUGINS]

let seq = 0

/** `count` players named `${prefix}-1` … with the zero uuid, so identity falls back to the name. */
export function makePlayers(count: number, opts: { prefix?: string; power?: number } = {}): ActivePlayer[] {
  const { prefix = 'player', power = 0 } = opts
  return Array.from({ length: count }, (_, i) => ({ name: `${prefix}-${i + 1}`, uuid: ZERO_UUID, power }))
}

// ---------------------------------------------------------------------------
// Reports
// ---------------------------------------------------------------------------

export function makeReport(
  overrides: Partial<{
    entityId: string
    tpsMillis: number
    players: number | ActivePlayer[]
    maxPlayers: number
    plugins: string[]
    timestampMs: number
    counter: number
  }> = {},
): TelemetryReport {
  const {
    entityId = 'srv-1',
    tpsMillis = 20_000,
    players = 0,
    maxPlayers = 100,
    plugins = REQUIRED_PLUGINS,
    timestampMs = NOW - MINUTE,
    counter = ++seq,
  } = overrides

  return {
    id: `report-${counter}`,
    entityId,
    counter,
    clientTimestampMs: timestampMs,
    payload: {
      activePlayers: typeof players === 'number' ? makePlayers(players) : players,
      maxPlayers,
      plugins,
      tpsMillis,
      uptimeMs: HOUR,
      memory: { freeBytes: 512, usedBytes: 512, totalBytes: 1024 },
      systemInfo: {
        cpuCores: 4,
        uptimeMs: HOUR,
        memory: { freeBytes: 512, usedBytes: 512, totalBytes: 1024 },
      },
    },
  }
}

/**
 * `count` reports one minute apart, oldest first, ending one minute before NOW.
 * `tps` gives the tick rate for each position.
 */
export function makeSeries(count: number, tps: (index: number) => number, entityId = 'srv-1'): TelemetryReport[] {
  return Array.from({ length: count }, (_, i) =>
    makeReport({
      entityId,
      tpsMillis: Math.round(tps(i) * 1000),
      timestampMs: NOW - (count - i) * MINUTE,
    }),
  )
}

// ---------------------------------------------------------------------------
// Scans & catalog
// ---------------------------------------------------------------------------

export function makeScan(entityId: string, overrides: Partial<EntityScan> = {}): EntityScan {
  return {
    address: `${entityId}.example.test:25565`,
    online: true,
    players: 0,
    maxPlayers: 100,
    pingMs: 20,
    provider: 'mcsrvstat',
    entityId,
    scannedAt: NOW,
    host: `${entityId}.example.test`,
    port: 25565,
    declaredActivePlayers: null,
    declaredMaxPlayers: null,
    ...overrides,
  }
}

export function makeCatalogEntry(id: string, overrides: Partial<CatalogEntry> = {}): CatalogEntry {
  return {
    id,
    host: `${id}.example.test`,
    port: 25565,
    declaredActivePlayers: null,
    declaredMaxPlayers: null,
    ...overrides,
  }
}
