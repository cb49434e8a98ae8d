/**
 * Mechanism — one independent scoring track with its own cadence, score
 * cache and weight vector.
 */

import type { EntityScoreResult, ScoreCacheEntry } from '../types.js'

export interface CycleStats {
  cycleId: number
  mechanismId: number
  mechanismName: string
  startedAt: number
  durationMs: number
  entitiesProcessed: number
  scoresUpdated: number
  errors: number
  /** owner key → result for the entity that owner is scored by. */
  results: Record<string, EntityScoreResult>
}

export interface MechanismStatus {
  mechanismId: number
  mechanismName: string
  cycleCount: number
  cachedScores: number
  latestScores: number
  [key: string]: unknown
}

export interface Mechanism {
  readonly id: number
  readonly name: string
  readonly intervalMs: number
  runCycle(): Promise<CycleStats>
  getStatus(): MechanismStatus
  getCachedScore(entityId: string): ScoreCacheEntry | undefined
  /** owner key → smoothed score from the latest cycle. */
  getOwnerScores(): Map<string, number>
}

/** Ordered registry of mechanisms, keyed by id. */
export class MechanismRegistry {
  private readonly mechanisms = new Map<number, Mechanism>()

  register(mechanism: Mechanism): void {
    if (this.mechanisms.has(mechanism.id)) {
      throw new Error(`Mechanism ${mechanism.id} already registered`)
    }
    this.mechanisms.set(mechanism.id, mechanism)
  }

  get(id: number): Mechanism | undefined {
    return this.mechanisms.get(id)
  }

  list(): Mechanism[] {
    return [...this.mechanisms.values()].sort((a, b) => a.id - b.id)
  }
}
