/**
 * Catalog scanner — one full pass over a set of addresses.
 *
 * Pass 1 assigns providers round-robin by position (skipping disabled ones)
 * and runs lookups through a bounded worker pool. Pass 2 runs after pass 1
 * drains: each failed address walks the untried, non-disabled providers in
 * priority order until one answers. A 429 disables that provider for the rest
 * of the cycle. Disablement is passed in and handed back; nothing is kept
 * between calls.
 */

import { ProviderError } from '../errors.js'
import { log } from '../logger.js'
import type { ProviderName, ProviderObservation, ProviderStats, ScanMetrics, ScanResult } from '../types.js'
import { mapWithConcurrency } from '../utils/concurrency.js'
import { ADAPTERS, PROVIDER_ORDER, lookup, splitAddress, type LookupTarget, type ProviderAdapter } from './providers.js'

const TAG = 'scanner'

export type LookupFn = (adapter: ProviderAdapter, target: LookupTarget, timeoutMs: number) => Promise<ProviderObservation>

export interface ScanOptions {
  timeoutMs: number
  concurrency: number
  /** Providers already disabled for this cycle. Not mutated. */
  disabled?: ReadonlySet<ProviderName>
  lookup?: LookupFn
}

export interface ScanOutcome {
  /** One entry per input address, in input order. */
  results: ScanResult[]
  metrics: ScanMetrics
  /** Input disablement plus every provider rate-limited during this scan. */
  disabled: Set<ProviderName>
}

interface Success {
  provider: ProviderName
  observation: ProviderObservation
}

/** Round-robin pick: start at `start` and walk forward past disabled providers. */
export function pickProvider(start: number, disabled: ReadonlySet<ProviderName>): ProviderName | null {
  const n = PROVIDER_ORDER.length
  for (let offset = 0; offset < n; offset++) {
    const candidate = PROVIDER_ORDER[(start + offset) % n]
    if (candidate !== undefined && !disabled.has(candidate)) return candidate
  }
  return null
}

function emptyStats(): Record<ProviderName, ProviderStats> {
  const zero = (): ProviderStats => ({ attempts: 0, elapsedMs: 0, retrySuccesses: 0 })
  return {
    mcsrvstat: zero(),
    mcstatus: zero(),
    mcapi: zero(),
    xdefcon: zero(),
    minetools: zero(),
    tickhosting: zero(),
  }
}

/**
 * Fold a provider observation into the scan shape. An answer without an online
 * flag counts as online; missing counts stay null.
 */
export function toScanResult(address: string, success: Success | undefined): ScanResult {
  if (!success) {
    return { address, online: false, players: null, maxPlayers: null, pingMs: 0, provider: null }
  }
  const o = success.observation
  return {
    address,
    online: o.online ?? true,
    players: o.players,
    maxPlayers: o.maxPlayers,
    pingMs: o.pingMs ?? 0,
    provider: success.provider,
  }
}

export async function scanCatalog(addresses: readonly string[], opts: ScanOptions): Promise<ScanOutcome> {
  const lookupFn = opts.lookup ?? lookup
  const disabled = new Set<ProviderName>(opts.disabled ?? [])
  const newlyDisabled = new Set<ProviderName>()
  const stats = emptyStats()
  const successes = new Map<string, Success>()
  const tried = new Map<string, Set<ProviderName>>()
  const failed: string[] = []

  if (addresses.length === 0) {
    return {
      results: [],
      metrics: { totalElapsedMs: 0, avgPerAddressMs: 0, perProvider: stats, disabledProviders: [] },
      disabled,
    }
  }

  const startAll = performance.now()

  async function attempt(name: ProviderName, target: LookupTarget, stage: string): Promise<boolean> {
    const attempts = tried.get(target.address) ?? new Set<ProviderName>()
    attempts.add(name)
    tried.set(target.address, attempts)

    const start = performance.now()
    try {
      const observation = await lookupFn(ADAPTERS[name], target, opts.timeoutMs)
      const elapsed = performance.now() - start
      stats[name].attempts++
      stats[name].elapsedMs += elapsed
      successes.set(target.address, { provider: name, observation })
      log.debug(TAG, `[${stage}][${name}] ${target.address} -> players=${observation.players ?? 'UNK'}`, {
        elapsedMs: Math.round(elapsed),
      })
      return true
    } catch (err) {
      const elapsed = performance.now() - start
      stats[name].attempts++
      stats[name].elapsedMs += elapsed
      if (err instanceof ProviderError && err.rateLimited && !disabled.has(name)) {
        disabled.add(name)
        newlyDisabled.add(name)
        log.warn(TAG, `Provider ${name} rate limited; disabled for the rest of this cycle`)
      }
      log.debug(TAG, `[${stage}][${name}] ${target.address} -> error: ${err instanceof Error ? err.message : String(err)}`)
      return false
    }
  }

  // Pass 1 — round-robin
  await mapWithConcurrency(addresses, opts.concurrency, async (address, index) => {
    const target = splitAddress(address)
    const name = pickProvider(index % PROVIDER_ORDER.length, disabled)
    if (name === null) {
      log.warn(TAG, `No providers available for ${address}; all disabled this cycle`)
      failed.push(address)
      return
    }
    const ok = await attempt(name, target, `${index + 1}/${addresses.length}`)
    if (!ok) failed.push(address)
  })

  // Pass 2 — fallback through untried providers
  await mapWithConcurrency(failed, opts.concurrency, async (address) => {
    const target = splitAddress(address)
    for (const name of PROVIDER_ORDER) {
      if (tried.get(address)?.has(name)) continue
      if (disabled.has(name)) continue
      if (await attempt(name, target, 'retry')) {
        stats[name].retrySuccesses++
        return
      }
    }
  })

  const totalElapsedMs = performance.now() - startAll
  const results = addresses.map((address) => toScanResult(address, successes.get(address)))
  const resolved = results.filter((r) => r.provider !== null).length
  log.info(TAG, `Scanned ${addresses.length} address(es): ${resolved} resolved, ${addresses.length - resolved} unresolved`, {
    elapsedMs: Math.round(totalElapsedMs),
  })

  return {
    results,
    metrics: {
      totalElapsedMs,
      avgPerAddressMs: totalElapsedMs / addresses.length,
      perProvider: stats,
      disabledProviders: [...newlyDisabled].sort(),
    },
    disabled,
  }
}
