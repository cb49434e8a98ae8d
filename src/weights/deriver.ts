/**
 * Weight derivation — score map → consensus-ready weight vector.
 *
 * Weights are never renormalized: an entity's weight depends only on its own
 * score, not on how many others qualified. When nothing qualifies the vector
 * falls back to full weight on the fallback index.
 */

import type { WeightVector } from '../types.js'

export interface DeriveInput {
  /** Raw weights in [0, 1], indexed by uid. */
  weights: readonly number[]
  /** Number of known entities (roster size). */
  entityCount: number
  minAllowedWeights: number
  /** Fraction of the lowest non-zero weights to drop, in [0, 1]. */
  excludeQuantile: number
  fallbackUid?: number
}

export interface DeriveResult extends WeightVector {
  fallback: boolean
}

/** Score → raw weight in [0, 1]. */
export function scoreToWeight(score: number, maxScore = 1000): number {
  if (!Number.isFinite(score) || maxScore <= 0) return 0
  return Math.max(0, Math.min(1, score / maxScore))
}

/** Linear-interpolated quantile of an ascending-sorted array. */
export function linearQuantile(sorted: readonly number[], q: number): number {
  if (sorted.length === 0) return Number.NaN
  const pos = Math.max(0, Math.min(1, q)) * (sorted.length - 1)
  const lo = Math.floor(pos)
  const hi = Math.ceil(pos)
  const a = sorted[lo] ?? 0
  const b = sorted[hi] ?? a
  return a + (b - a) * (pos - lo)
}

export function fallbackVector(entityCount: number, fallbackUid = 0): DeriveResult {
  if (entityCount <= 0) return { uids: [], weights: [], fallback: true }
  const uids = Array.from({ length: entityCount }, (_, i) => i)
  const weights = uids.map((uid) => (uid === fallbackUid ? 1 : 0))
  return { uids, weights, fallback: true }
}

export function deriveWeights(input: DeriveInput): DeriveResult {
  const { entityCount, minAllowedWeights, excludeQuantile } = input
  const fallbackUid = input.fallbackUid ?? 0

  const nonZero: Array<{ uid: number; weight: number }> = []
  input.weights.forEach((weight, uid) => {
    if (weight > 0) nonZero.push({ uid, weight })
  })

  if (nonZero.length === 0 || entityCount < minAllowedWeights || nonZero.length < minAllowedWeights) {
    return fallbackVector(entityCount, fallbackUid)
  }

  const maxExclude = Math.max(0, nonZero.length - minAllowedWeights) / nonZero.length
  const q = Math.min(excludeQuantile, maxExclude)
  const threshold = linearQuantile(
    nonZero.map((e) => e.weight).sort((a, b) => a - b),
    q,
  )

  const kept = nonZero.filter((e) => e.weight >= threshold)
  return {
    uids: kept.map((e) => e.uid),
    weights: kept.map((e) => e.weight),
    fallback: false,
  }
}
