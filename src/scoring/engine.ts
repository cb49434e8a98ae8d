/**
 * Scoring engine — combines the three components into an integer score,
 * smooths it against the previous score, and classifies it.
 *
 * A component failure never propagates: the engine returns the neutral
 * default score with `defaulted: true` so callers can tell "computed and low"
 * from "failed and defaulted".
 */

import { CLASSIFICATION_THRESHOLDS } from '../config/constants.js'
import type { ScoringConfig } from '../config/settings.js'
import type { ScoreClassification, ScoreComponents, TelemetryReport } from '../types.js'
import {
  infrastructureScore,
  participationScore,
  reliabilityScore,
  type ComponentFailure,
  type ComponentName,
} from './components.js'
import type { ReportHistory } from './history.js'

export interface ScoreInput {
  report: TelemetryReport
  history: ReportHistory
  /** Normalized player power in [0, 1]; 0 when the aggregator has nothing for the entity. */
  playerPower: number
}

export interface ScoreCalculation {
  score: number
  components: ScoreComponents
  defaulted: boolean
  failure?: { component: ComponentName; error: string }
}

export const ZERO_COMPONENTS: ScoreComponents = Object.freeze({
  infrastructure: 0,
  participation: 0,
  reliability: 0,
  playerPower: 0,
  rawCombined: 0,
})

/** Map a [0, 1] raw value onto the integer score range. */
export function normalizeScore(raw: number, cfg: ScoringConfig): number {
  const clamped = Math.max(0, Math.min(1, raw))
  const normalized = cfg.minScore + Math.round((cfg.maxScore - cfg.minScore) * clamped)
  return Math.max(cfg.minScore, Math.min(cfg.maxScore, normalized))
}

function defaulted(cfg: ScoringConfig, failure: ComponentFailure): ScoreCalculation {
  return {
    score: cfg.defaultScore,
    components: { ...ZERO_COMPONENTS },
    defaulted: true,
    failure: { component: failure.component, error: failure.error },
  }
}

export function calculateScore(input: ScoreInput, cfg: ScoringConfig): ScoreCalculation {
  const payload = input.report.payload
  const infra = infrastructureScore(payload, cfg)
  if (!infra.ok) return defaulted(cfg, infra)
  const part = participationScore(payload, cfg)
  if (!part.ok) return defaulted(cfg, part)
  const rely = reliabilityScore(input.history, input.playerPower, cfg)
  if (!rely.ok) return defaulted(cfg, rely)

  const w = cfg.weights.primary
  const rawCombined = w.infrastructure * infra.value + w.participation * part.value + w.reliability * rely.value

  return {
    score: normalizeScore(rawCombined, cfg),
    components: {
      infrastructure: infra.value,
      participation: part.value,
      reliability: rely.value,
      playerPower: rely.playerPower,
      rawCombined,
    },
    defaulted: false,
  }
}

/**
 * Exponential moving average against the previous score. The step is capped
 * at min(maxScoreChange, max(minScoreChange, |new − prev| / 2)); steps smaller
 * than minScoreChange leave the previous score unchanged.
 */
export function smoothScore(newScore: number, previous: number | null, cfg: ScoringConfig): number {
  if (previous === null) return newScore

  let smoothed = Math.round(cfg.emaAlpha * newScore + (1 - cfg.emaAlpha) * previous)
  const maxChange = Math.min(cfg.maxScoreChange, Math.max(cfg.minScoreChange, Math.abs(newScore - previous) * 0.5))
  if (Math.abs(smoothed - previous) > maxChange) {
    smoothed = Math.round(smoothed > previous ? previous + maxChange : previous - maxChange)
  }
  if (Math.abs(smoothed - previous) < cfg.minScoreChange) return previous
  return Math.max(cfg.minScore, Math.min(cfg.maxScore, smoothed))
}

export function classifyScore(score: number): ScoreClassification {
  if (score >= CLASSIFICATION_THRESHOLDS.excellent) return 'excellent'
  if (score >= CLASSIFICATION_THRESHOLDS.good) return 'good'
  if (score >= CLASSIFICATION_THRESHOLDS.average) return 'average'
  return 'poor'
}
