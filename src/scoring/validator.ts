/**
 * Report validation — gates an entity's reports against its independent scan.
 *
 * First match wins:
 *   scan missing → scan offline → no reports → all stale → capacity mismatch
 *   → player-count mismatch → pass.
 *
 * A count the scan could not read is not compared.
 *
 * "No reports" only zeroes an entity that previously held a positive score;
 * otherwise there is nothing to decide and the entity is skipped.
 */

import type { ValidationConfig } from '../config/settings.js'
import type { EntityScan, TelemetryReport, ZeroReason } from '../types.js'
import { ReportHistory } from './history.js'

export type ValidationDecision =
  | { kind: 'zero'; reason: ZeroReason; reportMaxPlayers?: number; reportPlayerCount?: number }
  | { kind: 'skip' }
  | {
      kind: 'pass'
      latest: TelemetryReport
      history: ReportHistory
      reportMaxPlayers: number
      reportPlayerCount: number
      scanDeltaPlayers: number | null
    }

export interface ValidationInput {
  scan: EntityScan | null
  /** Newest first, as returned by the collector. */
  reports: readonly TelemetryReport[]
  previousScore: number | null
  now: number
}

export interface ValidationLimits extends ValidationConfig {
  historyCapacity: number
}

export function isFresh(report: TelemetryReport, now: number, maxAgeMs: number): boolean {
  return now - report.clientTimestampMs <= maxAgeMs
}

export function validateReports(input: ValidationInput, limits: ValidationLimits): ValidationDecision {
  const { scan, reports, previousScore, now } = input

  if (!scan) return { kind: 'zero', reason: 'scan_missing' }
  if (!scan.online) {
    const newest = reports[0]
    return newest
      ? { kind: 'zero', reason: 'scan_offline', reportPlayerCount: newest.payload.activePlayers.length }
      : { kind: 'zero', reason: 'scan_offline' }
  }

  if (reports.length === 0) {
    return previousScore !== null && previousScore > 0
      ? { kind: 'zero', reason: 'collector_no_reports' }
      : { kind: 'skip' }
  }

  const fresh = reports.filter((r) => isFresh(r, now, limits.maxReportAgeMs))
  const latest = fresh[0]
  if (!latest) return { kind: 'zero', reason: 'collector_reports_stale' }

  const reportMaxPlayers = latest.payload.maxPlayers
  const reportPlayerCount = latest.payload.activePlayers.length

  if (scan.maxPlayers !== null && Math.abs(scan.maxPlayers - reportMaxPlayers) > limits.maxPlayersTolerance) {
    return { kind: 'zero', reason: 'max_players_mismatch', reportMaxPlayers, reportPlayerCount }
  }
  if (scan.players !== null && reportPlayerCount > scan.players + limits.playerCountTolerance) {
    return { kind: 'zero', reason: 'player_count_mismatch', reportMaxPlayers, reportPlayerCount }
  }

  return {
    kind: 'pass',
    latest,
    history: ReportHistory.from([...fresh].reverse(), limits.historyCapacity),
    reportMaxPlayers,
    reportPlayerCount,
    scanDeltaPlayers: scan.players === null ? null : reportPlayerCount - scan.players,
  }
}
