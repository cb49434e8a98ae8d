/**
 * Weight publisher — turns each mechanism's owner scores into a weight vector
 * and submits it through the chain client.
 *
 * Per mechanism: at most one successful submission per update interval; a
 * failed or empty attempt schedules a retry after the retry interval; a vector
 * whose keccak256 fingerprint matches the last successful one is not resent.
 */

import type { Database } from 'better-sqlite3'
import { keccak256, stringToHex } from 'viem'
import type { ChainClient } from '../chain/client.js'
import type { WeightConfig } from '../config/settings.js'
import { getLastSuccessfulSubmission, insertWeightSubmission } from '../db/queries.js'
import { jobStats } from '../jobs/jobStats.js'
import { log } from '../logger.js'
import type { Mechanism } from '../mechanisms/base.js'
import type { WeightVector } from '../types.js'
import { deriveWeights, scoreToWeight } from './deriver.js'

const TAG = 'weights'

export interface WeightState {
  lastUpdate: number
  lastAttempt: number
  nextUpdate: number
  lastUids: number[] | null
  lastWeights: number[] | null
  lastFingerprint: string | null
}

export type PublishStatus = 'no_scores' | 'not_due' | 'empty' | 'unchanged' | 'submitted' | 'failed'

export interface PublishOutcome {
  mechanismId: number
  status: PublishStatus
  fingerprint?: string
  fallback?: boolean
  message?: string
}

export function initialWeightState(): WeightState {
  return { lastUpdate: 0, lastAttempt: 0, nextUpdate: 0, lastUids: null, lastWeights: null, lastFingerprint: null }
}

/** False before `nextUpdate`, or within `updateIntervalMs` of the last success. */
export function shouldUpdate(state: WeightState, now: number, updateIntervalMs: number): boolean {
  if (now < state.nextUpdate) return false
  if (state.lastUpdate && now - state.lastUpdate < updateIntervalMs) return false
  return true
}

/** keccak256 of the canonical JSON of the vector. */
export function vectorFingerprint(vector: WeightVector): `0x${string}` {
  return keccak256(stringToHex(JSON.stringify({ uids: vector.uids, weights: vector.weights })))
}

export interface WeightPublisherOptions {
  db?: Database | null
  maxScore?: number
  now?: () => number
}

export class WeightPublisher {
  private readonly states = new Map<number, WeightState>()
  private readonly now: () => number
  private readonly db: Database | null
  private readonly maxScore: number

  constructor(
    private readonly chain: ChainClient,
    private readonly config: WeightConfig,
    opts: WeightPublisherOptions = {},
  ) {
    this.now = opts.now ?? Date.now
    this.db = opts.db ?? null
    this.maxScore = opts.maxScore ?? 1000
  }

  /** A new state picks up the last recorded fingerprint so a restart does not resubmit the same vector. */
  getState(mechanismId: number): WeightState {
    let state = this.states.get(mechanismId)
    if (!state) {
      state = initialWeightState()
      if (this.db) state.lastFingerprint = getLastSuccessfulSubmission(this.db, mechanismId)?.fingerprint ?? null
      this.states.set(mechanismId, state)
    }
    return state
  }

  async publishAll(mechanisms: readonly Mechanism[]): Promise<PublishOutcome[]> {
    const outcomes: PublishOutcome[] = []
    for (const mechanism of mechanisms) {
      try {
        outcomes.push(await this.publish(mechanism))
      } catch (err) {
        log.error(TAG, `Weight update for mechanism ${mechanism.id} failed`, err)
        this.scheduleRetry(this.getState(mechanism.id), this.now())
        outcomes.push({ mechanismId: mechanism.id, status: 'failed', message: errorMessage(err) })
      }
    }
    jobStats.weightPublisher.lastRun = new Date(this.now()).toISOString()
    return outcomes
  }

  async publish(mechanism: Pick<Mechanism, 'id' | 'name' | 'getOwnerScores'>): Promise<PublishOutcome> {
    const mechanismId = mechanism.id
    const label = `${mechanism.name}#${mechanismId}`
    const scores = mechanism.getOwnerScores()
    if (scores.size === 0) return { mechanismId, status: 'no_scores' }

    const state = this.getState(mechanismId)
    const now = this.now()
    if (!shouldUpdate(state, now, this.config.updateIntervalS * 1000)) {
      return { mechanismId, status: 'not_due' }
    }
    state.lastAttempt = now

    const roster = await this.chain.getRoster()
    const raw = new Array<number>(roster.length).fill(0)
    roster.forEach((ownerKey, uid) => {
      const score = scores.get(ownerKey)
      if (score !== undefined) raw[uid] = scoreToWeight(score, this.maxScore)
    })

    const minAllowedWeights = await this.chain.getMinAllowedWeights(mechanismId)
    const vector = deriveWeights({
      weights: raw,
      entityCount: roster.length,
      minAllowedWeights,
      excludeQuantile: this.config.excludeQuantile,
      fallbackUid: this.config.fallbackUid,
    })

    const total = vector.weights.reduce((a, b) => a + b, 0)
    if (vector.weights.length === 0 || total <= 0) {
      log.warn(TAG, `[${label}] No weights to set`)
      this.scheduleRetry(state, now)
      return { mechanismId, status: 'empty', fallback: vector.fallback }
    }

    const fingerprint = vectorFingerprint(vector)
    if (fingerprint === state.lastFingerprint) {
      log.info(TAG, `[${label}] Vector unchanged since last submission; skipping`)
      this.scheduleRetry(state, now)
      return { mechanismId, status: 'unchanged', fingerprint, fallback: vector.fallback }
    }

    let success = false
    let message: string | undefined
    try {
      const result = await this.chain.setWeights(mechanismId, vector.uids, vector.weights)
      success = result.success
      message = result.message
    } catch (err) {
      message = errorMessage(err)
      log.error(TAG, `[${label}] setWeights threw`, err)
    }

    this.record(mechanismId, vector, fingerprint, success, message)

    if (!success) {
      log.error(TAG, `[${label}] Failed to set weights${message ? `: ${message}` : ''}`)
      this.scheduleRetry(state, now)
      jobStats.weightPublisher.failures++
      return { mechanismId, status: 'failed', fingerprint, fallback: vector.fallback, message }
    }

    const doneAt = this.now()
    state.lastUpdate = doneAt
    state.nextUpdate = doneAt + this.config.updateIntervalS * 1000
    state.lastUids = [...vector.uids]
    state.lastWeights = [...vector.weights]
    state.lastFingerprint = fingerprint
    jobStats.weightPublisher.submissions++

    log.info(TAG, `[${label}] Updated weights for ${vector.weights.filter((w) => w > 0).length} uid(s)`, {
      totalWeight: Number(total.toFixed(3)),
      fallback: vector.fallback,
    })
    return { mechanismId, status: 'submitted', fingerprint, fallback: vector.fallback, message }
  }

  private scheduleRetry(state: WeightState, now: number): void {
    const retryMs = this.config.retryIntervalS * 1000
    state.nextUpdate = Math.max(now + retryMs, state.lastAttempt + retryMs)
  }

  private record(mechanismId: number, vector: WeightVector, fingerprint: string, success: boolean, message?: string) {
    if (!this.db) return
    try {
      insertWeightSubmission(this.db, {
        mechanismId,
        uids: vector.uids,
        weights: vector.weights,
        fingerprint,
        status: success ? 'success' : 'failed',
        message,
      })
    } catch (err) {
      log.error(TAG, 'Failed to record weight submission', err)
    }
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
