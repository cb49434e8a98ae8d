/**
 * Third-party status providers.
 *
 * Each adapter owns its URL and its response parsing and normalizes into a
 * ProviderObservation. Fields that are absent or of the wrong type come back
 * as null (unknown), never false or 0. Adding a provider means adding one
 * entry to ADAPTERS and one name to PROVIDER_ORDER.
 */

import { ProviderError } from '../errors.js'
import type { ProviderName, ProviderObservation } from '../types.js'

export interface LookupTarget {
  address: string
  host: string
  port: number | null
}

export interface ProviderAdapter {
  readonly name: ProviderName
  url(target: LookupTarget): string
  parse(body: Record<string, unknown>): ProviderObservation
}

/** Fixed priority order, also the round-robin order. */
export const PROVIDER_ORDER: readonly ProviderName[] = [
  'mcsrvstat',
  'mcstatus',
  'mcapi',
  'xdefcon',
  'minetools',
  'tickhosting',
]

// ---------- Field helpers ----------

type Json = Record<string, unknown>

function isRecord(v: unknown): v is Json {
  return typeof v === 'object' && v !== null && !Array.isArray(v)
}

function section(body: Json, key: string): Json {
  const v = body[key]
  return isRecord(v) ? v : {}
}

function int(v: unknown): number | null {
  return typeof v === 'number' && Number.isInteger(v) ? v : null
}

/** Any finite number, truncated. */
function truncated(v: unknown): number | null {
  return typeof v === 'number' && Number.isFinite(v) ? Math.trunc(v) : null
}

function num(v: unknown): number | null {
  return typeof v === 'number' && Number.isFinite(v) ? v : null
}

function bool(v: unknown): boolean | null {
  return typeof v === 'boolean' ? v : null
}

function query(params: Record<string, string | number | null>): string {
  const search = new URLSearchParams()
  for (const [k, v] of Object.entries(params)) {
    if (v !== null) search.set(k, String(v))
  }
  return search.toString()
}

/** `host:port` → { host, port }. Anything else keeps the whole string as host and a null port. */
export function splitAddress(address: string): LookupTarget {
  const parts = address.split(':')
  if (parts.length === 2) {
    const [host = '', rawPort = ''] = parts
    const port = /^\d+$/.test(rawPort) ? Number(rawPort) : null
    return { address, host, port }
  }
  return { address, host: address, port: null }
}

// ---------- Adapters ----------

/** `{ online: bool, players: { online, max } }` — shared by two providers. */
function onlineWithPlayers(name: ProviderName, url: (t: LookupTarget) => string): ProviderAdapter {
  return {
    name,
    url,
    parse(body) {
      const players = section(body, 'players')
      return {
        online: bool(body.online),
        players: int(players.online),
        maxPlayers: int(players.max),
        pingMs: null,
      }
    },
  }
}

export const ADAPTERS: Record<ProviderName, ProviderAdapter> = {
  mcsrvstat: onlineWithPlayers('mcsrvstat', (t) => `https://api.mcsrvstat.us/3/${t.address}`),

  mcstatus: onlineWithPlayers('mcstatus', (t) => `https://api.mcstatus.io/v2/status/java/${t.address}`),

  mcapi: {
    name: 'mcapi',
    url: (t) => `https://mcapi.us/server/status?${query({ ip: t.host, port: t.port })}`,
    parse(body) {
      const players = section(body, 'players')
      return {
        online: bool(body.online),
        players: int(players.now),
        maxPlayers: int(players.max),
        pingMs: null,
      }
    },
  },

  xdefcon: {
    name: 'xdefcon',
    url: (t) => `https://mcapi.xdefcon.com/server/${t.address}/full/json`,
    parse(body) {
      const status = body.serverStatus
      return {
        online: status === 'online' ? true : status === 'offline' ? false : null,
        players: truncated(body.players),
        maxPlayers: truncated(body.maxplayers),
        pingMs: num(body.ping),
      }
    },
  },

  minetools: {
    name: 'minetools',
    url: (t) => `https://api.minetools.eu/ping/${t.port === null ? t.host : `${t.host}/${t.port}`}`,
    parse(body) {
      const players = section(body, 'players')
      const online = int(players.online)
      return {
        // No explicit flag; a numeric player count means the ping answered.
        online: online === null ? null : true,
        players: online,
        maxPlayers: int(players.max),
        pingMs: num(body.latency),
      }
    },
  },

  tickhosting: {
    name: 'tickhosting',
    url: (t) => `https://mcstats.tickhosting.com/api/status?${query({ ip: t.host, type: 'java', port: t.port })}`,
    parse(body) {
      const players = section(body, 'players')
      return {
        online: bool(body.online),
        players: int(players.online),
        maxPlayers: int(players.max),
        pingMs: num(body.latency),
      }
    },
  },
}

/**
 * Query one address with one provider. Throws ProviderError on timeout,
 * non-2xx, unreadable or non-object JSON; `rateLimited` is set on HTTP 429.
 */
export async function lookup(
  adapter: ProviderAdapter,
  target: LookupTarget,
  timeoutMs: number,
): Promise<ProviderObservation> {
  let res: Response
  try {
    res = await fetch(adapter.url(target), { signal: AbortSignal.timeout(timeoutMs) })
  } catch (err) {
    throw new ProviderError(adapter.name, `request failed: ${err instanceof Error ? err.message : String(err)}`)
  }

  if (res.status === 429) {
    throw new ProviderError(adapter.name, 'rate limited (HTTP 429)', true)
  }
  if (!res.ok) {
    throw new ProviderError(adapter.name, `HTTP ${res.status}`)
  }

  let body: unknown
  try {
    body = await res.json()
  } catch {
    throw new ProviderError(adapter.name, 'invalid JSON')
  }
  if (!isRecord(body)) {
    throw new ProviderError(adapter.name, `unexpected payload type ${Array.isArray(body) ? 'array' : typeof body}`)
  }
  return adapter.parse(body)
}
