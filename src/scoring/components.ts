/**
 * Score components. Each returns a ComponentResult: a value in [0, 1], or a
 * typed failure the engine turns into the neutral default score.
 *
 *   Infrastructure = tick rate vs ideal, 0.1× below the broken threshold
 *   Participation  = compliance (required + bonus plugins) and player count
 *   Reliability    = player power, tick stability, dip recovery
 */

import { tpsActual } from '../collector/schemas.js'
import type { ScoringConfig } from '../config/settings.js'
import type { ReportPayload, TelemetryReport } from '../types.js'
import type { ReportHistory } from './history.js'

export type ComponentName =
  | 'infrastructure'
  | 'participation'
  | 'reliability'
  | 'stability'
  | 'recovery'
  | 'playerPower'

export interface ComponentFailure {
  ok: false
  component: ComponentName
  error: string
}

export type ComponentResult = { ok: true; value: number } | ComponentFailure

function ok(value: number): ComponentResult {
  return { ok: true, value }
}

function fail(component: ComponentName, error: string): ComponentFailure {
  return { ok: false, component, error }
}

function clamp01(n: number): number {
  return Math.max(0, Math.min(1, n))
}

// ---------- Infrastructure ----------

export function infrastructureScore(payload: ReportPayload, cfg: ScoringConfig): ComponentResult {
  const tps = tpsActual(payload)
  if (!Number.isFinite(tps)) return fail('infrastructure', `non-finite tick rate ${tps}`)

  const clamped = Math.max(0, Math.min(tps, cfg.maxTpsBonus))
  let tpsScore = Math.min(1, clamped / cfg.idealTps)
  if (tps < cfg.minTpsThreshold) tpsScore *= 0.1

  return ok(clamp01(cfg.weights.infrastructure.tps * tpsScore))
}

// ---------- Participation ----------

/** Every required plugin is installed. Names compare case-insensitively. */
export function hasRequiredPlugins(plugins: readonly string[], cfg: Pick<ScoringConfig, 'requiredPlugins'>): boolean {
  const installed = new Set(plugins.map((p) => p.trim().toLowerCase()).filter((p) => p.length > 0))
  return cfg.requiredPlugins.every((p) => installed.has(p.trim().toLowerCase()))
}

export function complianceScore(plugins: readonly string[], cfg: ScoringConfig): number {
  let compliance = hasRequiredPlugins(plugins, cfg) ? 0.6 : 0

  const exact = new Set(plugins.map((p) => p.trim()))
  const bonusPresent = cfg.bonusPlugins.filter((p) => exact.has(p)).length
  const maxBonus = Math.min(cfg.bonusPlugins.length, 10)
  compliance += Math.min(0.4, maxBonus > 0 ? (bonusPresent / maxBonus) * 0.4 : 0)

  return Math.min(1, compliance)
}

export function playersScore(playerCount: number, maxPlayers: number, cfg: ScoringConfig): number {
  if (playerCount < cfg.minPlayersForBonus) return 0
  let raw = Math.min(playerCount / cfg.maxPlayersWeight, 1)
  if (maxPlayers > 0) {
    const ratio = playerCount / maxPlayers
    if (ratio >= cfg.optimalPlayerRatioMin && ratio <= cfg.optimalPlayerRatioMax) {
      raw *= 1.2
    } else if (ratio > cfg.saturationRatio) {
      raw *= 0.8
    }
  }
  return Math.min(1, raw)
}

export function participationScore(payload: ReportPayload, cfg: ScoringConfig): ComponentResult {
  if (!Number.isFinite(payload.maxPlayers)) return fail('participation', 'non-finite max players')
  const compliance = complianceScore(payload.plugins, cfg)
  const players = playersScore(payload.activePlayers.length, payload.maxPlayers, cfg)
  const w = cfg.weights.participation
  return ok(clamp01(w.compliance * compliance + w.players * players))
}

// ---------- Reliability ----------

function sampleStdev(values: readonly number[], mean: number): number {
  if (values.length < 2) return 0
  const sq = values.reduce((sum, v) => sum + (v - mean) ** 2, 0)
  return Math.sqrt(sq / (values.length - 1))
}

/** Coefficient of variation of tick rate over the newest `stabilityWindow` samples. */
export function stabilityScore(history: ReportHistory, cfg: ScoringConfig): ComponentResult {
  const h = cfg.history
  if (history.length < h.stabilityWindow) return ok(h.stabilityInsufficientScore)

  const valid = history
    .last(h.stabilityWindow)
    .map((r) => tpsActual(r.payload))
    .filter((tps) => tps >= cfg.minTpsThreshold && tps <= cfg.maxTpsBonus)
  if (valid.length < h.minValidStabilitySamples) return ok(h.stabilityLowSampleScore)

  const mean = valid.reduce((a, b) => a + b, 0) / valid.length
  if (!Number.isFinite(mean)) return fail('stability', 'non-finite mean tick rate')
  if (mean <= 0) return ok(0)

  const cv = sampleStdev(valid, mean) / mean
  let stability = Math.max(0, 1 - cv / h.maxTpsCoefficientOfVariation)
  if (mean >= cfg.idealTps * 0.9) stability = Math.min(1, stability * 1.1)
  return ok(stability)
}

/**
 * Minutes from a dip to the `recoverySampleCount`-th consecutive good sample
 * after it, or null when that run never happens.
 */
export function measureRecoveryMinutes(afterDip: readonly TelemetryReport[], cfg: ScoringConfig): number | null {
  const h = cfg.history
  const first = afterDip[0]
  if (!first || afterDip.length < h.recoverySampleCount) return null

  let good = 0
  for (const report of afterDip.slice(1)) {
    if (tpsActual(report.payload) >= h.recoveryTpsThreshold) {
      good++
      if (good >= h.recoverySampleCount) {
        return (report.clientTimestampMs - first.clientTimestampMs) / 60_000
      }
    } else {
      good = 0
    }
  }
  return null
}

/** Every dip below the recovery threshold multiplies the score down; nothing multiplies it up. */
export function recoveryScore(history: ReportHistory, cfg: ScoringConfig): ComponentResult {
  const h = cfg.history
  if (history.length < h.minSamplesForRecovery) return ok(1)

  const recent = history.last(h.recoveryWindow)
  let recovery = 1
  for (const [index, report] of recent.entries()) {
    if (tpsActual(report.payload) >= h.recoveryTpsThreshold) continue
    const minutes = measureRecoveryMinutes(recent.slice(index), cfg)
    if (minutes === null) {
      recovery *= 0.5
    } else if (minutes > h.maxRecoveryTimeMinutes) {
      recovery *= 0.7
    } else {
      recovery *= 1 - (minutes / h.maxRecoveryTimeMinutes) * 0.3
    }
  }
  if (!Number.isFinite(recovery)) return fail('recovery', 'non-finite recovery multiplier')
  return ok(clamp01(recovery))
}

export interface ReliabilityBreakdown {
  playerPower: number
  stability: number
  recovery: number
}

export type ReliabilityResult = ({ ok: true; value: number } & ReliabilityBreakdown) | ComponentFailure

export function reliabilityScore(history: ReportHistory, playerPower: number, cfg: ScoringConfig): ReliabilityResult {
  if (!Number.isFinite(playerPower)) return fail('playerPower', 'non-finite player power')
  const stability = stabilityScore(history, cfg)
  if (!stability.ok) return stability
  const recovery = recoveryScore(history, cfg)
  if (!recovery.ok) return recovery

  const power = clamp01(playerPower)
  const w = cfg.weights.reliability
  const value = w.playerPower * power + w.stability * stability.value + w.recovery * recovery.value
  return { ok: true, value: clamp01(value), playerPower: power, stability: stability.value, recovery: recovery.value }
}
