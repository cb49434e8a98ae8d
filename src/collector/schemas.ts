/**
 * Zod schemas for collector payloads.
 *
 * Report fields are coerced the way the collector's own plugin emits them:
 * missing values take the documented defaults, an out-of-range tick value
 * falls back to 50, and malformed player uuids collapse to the zero uuid.
 */

import { z } from 'zod'
import type {
  ActivePlayer,
  CatalogEntry,
  MemoryInfo,
  ReportPayload,
  SystemInfo,
  TelemetryReport,
} from '../types.js'

export const ZERO_UUID = '00000000-0000-0000-0000-000000000000'

const DEFAULT_TPS_MILLIS = 50
const MAX_TPS_MILLIS = 25_000
const DEFAULT_MAX_PLAYERS = 20
const MAX_UPTIME_MS = 100 * 365 * 24 * 60 * 60 * 1000

const nonNegativeInt = (fallback: number) =>
  z
    .unknown()
    .transform((v) => (typeof v === 'number' && Number.isFinite(v) && v >= 0 ? Math.floor(v) : fallback))

function normalizeUuid(value: string): string {
  return value.length === 36 && value.split('-').length === 5 ? value : ZERO_UUID
}

function coercePower(value: unknown): number {
  const n = typeof value === 'string' ? Number(value) : value
  return typeof n === 'number' && Number.isFinite(n) ? Math.max(0, n) : 0
}

const ActivePlayerSchema = z.union([
  z.string().transform((name): ActivePlayer => ({ name, uuid: ZERO_UUID, power: 0 })),
  z
    .object({
      name: z.unknown().optional(),
      uuid: z.unknown().optional(),
      power: z.unknown().optional(),
    })
    .transform(
      (p): ActivePlayer => ({
        name: p.name == null ? 'Unknown' : String(p.name),
        uuid: normalizeUuid(p.uuid == null ? ZERO_UUID : String(p.uuid)),
        power: coercePower(p.power),
      }),
    ),
])

const MemorySchema = z
  .object({
    free_memory_bytes: nonNegativeInt(0),
    used_memory_bytes: nonNegativeInt(0),
    total_memory_bytes: nonNegativeInt(0),
  })
  .partial()
  .nullish()
  .transform((m): MemoryInfo => {
    const freeBytes = m?.free_memory_bytes ?? 0
    const usedBytes = m?.used_memory_bytes ?? 0
    const reported = m?.total_memory_bytes ?? 0
    const expected = usedBytes + freeBytes
    // A total that disagrees with used+free by more than 5% is replaced.
    const totalBytes = expected > 0 && Math.abs(reported - expected) / expected > 0.05 ? expected : reported
    return { freeBytes, usedBytes, totalBytes }
  })

const SystemInfoSchema = z
  .object({
    cpu_cores: z.unknown(),
    uptime_ms: nonNegativeInt(0),
    memory_ram_info: MemorySchema,
  })
  .partial()
  .nullish()
  .transform(
    (s): SystemInfo => ({
      cpuCores:
        typeof s?.cpu_cores === 'number' && Number.isInteger(s.cpu_cores) && s.cpu_cores >= 1 && s.cpu_cores <= 256
          ? s.cpu_cores
          : 1,
      uptimeMs: Math.min(s?.uptime_ms ?? 0, MAX_UPTIME_MS),
      memory: s?.memory_ram_info ?? { freeBytes: 0, usedBytes: 0, totalBytes: 0 },
    }),
  )

const PluginsSchema = z
  .unknown()
  .transform((v): string[] => {
    if (!v) return []
    if (typeof v === 'string') return [v]
    if (!Array.isArray(v)) return []
    return v.filter((p) => Boolean(p)).map((p) => String(p))
  })

export const ReportPayloadSchema = z
  .object({
    active_players: z
      .array(z.unknown())
      .nullish()
      .transform((items) =>
        (items ?? []).flatMap((item) => {
          const parsed = ActivePlayerSchema.safeParse(item)
          return parsed.success ? [parsed.data] : []
        }),
      ),
    max_players: z.number().int().min(1).max(50_000).default(DEFAULT_MAX_PLAYERS),
    plugins: PluginsSchema,
    tps_millis: z
      .unknown()
      .transform((v) =>
        typeof v === 'number' && Number.isFinite(v) && v >= 0 && v <= MAX_TPS_MILLIS ? Math.floor(v) : DEFAULT_TPS_MILLIS,
      ),
    uptime_ms: nonNegativeInt(0),
    memory_ram_info: MemorySchema,
    system_info: SystemInfoSchema,
  })
  .transform(
    (p): ReportPayload => ({
      activePlayers: p.active_players,
      maxPlayers: p.max_players,
      plugins: p.plugins,
      tpsMillis: p.tps_millis,
      uptimeMs: p.uptime_ms,
      memory: p.memory_ram_info,
      systemInfo: p.system_info,
    }),
  )

export const ReportSchema = z.object({
  id: z.coerce.string().default(''),
  server_id: z.coerce.string().default(''),
  counter: z.number().int().min(0).default(0),
  client_timestamp_ms: z.number().int().min(0).default(0),
  payload: ReportPayloadSchema.nullish(),
})

/** Convert a collector report item, or null when it cannot be read. */
export function parseReport(raw: unknown, entityId: string): TelemetryReport | null {
  const parsed = ReportSchema.safeParse(raw)
  if (!parsed.success) return null
  const r = parsed.data
  const payload = r.payload ?? ReportPayloadSchema.parse({})
  return {
    id: r.id,
    entityId: r.server_id || entityId,
    counter: r.counter,
    clientTimestampMs: r.client_timestamp_ms,
    payload,
  }
}

/** Tick rate derived from the reported tick value, capped at 20. */
export function tpsActual(payload: ReportPayload): number {
  return payload.tpsMillis <= 0 ? 0 : Math.min(payload.tpsMillis / 1000, 20)
}

const optionalCount = z
  .unknown()
  .transform((v) => (typeof v === 'number' && Number.isFinite(v) ? Math.floor(v) : null))

export const CatalogItemSchema = z
  .object({
    id: z.union([z.string().min(1), z.number()]).transform(String),
    ip: z.string().nullish(),
    hostname: z.string().nullish(),
    port: z.union([z.number(), z.string()]).nullish(),
    active_players: optionalCount,
    max_players: optionalCount,
  })
  .transform((item): CatalogEntry => {
    const host = (item.ip || item.hostname || '').trim()
    const port = item.port == null || item.port === '' ? Number.NaN : Number(item.port)
    return {
      id: item.id,
      host: host.length > 0 ? host : null,
      port: Number.isInteger(port) && port > 0 && port <= 65_535 ? port : null,
      declaredActivePlayers: item.active_players,
      declaredMaxPlayers: item.max_players,
    }
  })

export const ValidatorServerSchema = z.object({
  id: z.union([z.string().min(1), z.number()]).transform(String),
  hotkey: z.string().min(1),
  registered_at: z.string().nullish(),
})

export type ValidatorServer = z.infer<typeof ValidatorServerSchema>

/** `{ items: [...] }` envelope used by every list endpoint. */
export const ItemsEnvelopeSchema = z.object({ items: z.array(z.unknown()).default([]) })
