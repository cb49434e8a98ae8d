import { beforeEach, describe, expect, it, vi } from 'vitest'

vi.mock('../../src/logger.js', () => ({
  log: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}))

import type { ChainClient } from '../../src/chain/client.js'
import { DryRunChainClient } from '../../src/chain/dryRun.js'
import type { WeightConfig } from '../../src/config/settings.js'
import { insertWeightSubmission } from '../../src/db/queries.js'
import type { Mechanism } from '../../src/mechanisms/base.js'
import {
  initialWeightState,
  shouldUpdate,
  vectorFingerprint,
  WeightPublisher,
} from '../../src/weights/publisher.js'
import { NOW } from '../factories.js'
import { createTestDb, submissionRows } from '../helpers/testDb.js'

const SECOND = 1_000
const config: WeightConfig = { updateIntervalS: 1_200, retryIntervalS: 60, excludeQuantile: 0, fallbackUid: 0 }
const ROSTER = ['owner-a', 'owner-b', 'owner-c']

function fakeMechanism(scores: Map<string, number>): Pick<Mechanism, 'id' | 'name' | 'getOwnerScores'> {
  return { id: 0, name: 'test', getOwnerScores: () => new Map(scores) }
}

describe('shouldUpdate', () => {
  it('is true for a fresh state', () => {
    expect(shouldUpdate(initialWeightState(), NOW, 1_200 * SECOND)).toBe(true)
  })

  it('waits for nextUpdate', () => {
    const state = { ...initialWeightState(), nextUpdate: NOW + 1 }
    expect(shouldUpdate(state, NOW, 1_200 * SECOND)).toBe(false)
  })

  it('waits a full interval after the last success', () => {
    const state = { ...initialWeightState(), lastUpdate: NOW - 600 * SECOND }
    expect(shouldUpdate(state, NOW, 1_200 * SECOND)).toBe(false)
    expect(shouldUpdate(state, NOW + 600 * SECOND, 1_200 * SECOND)).toBe(true)
  })
})

describe('vectorFingerprint', () => {
  it('is a keccak256 hex digest that depends on uids and weights', () => {
    const a = vectorFingerprint({ uids: [0, 1], weights: [0.5, 0.25] })
    expect(a).toMatch(/^0x[0-9a-f]{64}$/)
    expect(vectorFingerprint({ uids: [0, 1], weights: [0.5, 0.25] })).toBe(a)
    expect(vectorFingerprint({ uids: [0, 1], weights: [0.5, 0.26] })).not.toBe(a)
    expect(vectorFingerprint({ uids: [1, 0], weights: [0.5, 0.25] })).not.toBe(a)
  })
})

describe('WeightPublisher', () => {
  let clock: number
  let chain: DryRunChainClient
  let scores: Map<string, number>

  beforeEach(() => {
    clock = NOW
    chain = new DryRunChainClient(ROSTER)
    scores = new Map([['owner-b', 800]])
  })

  function publisher(client: ChainClient = chain, db = createTestDb()) {
    return { pub: new WeightPublisher(client, config, { db, now: () => clock }), db }
  }

  it('submits owner scores as weights indexed by roster position', async () => {
    const { pub } = publisher()

    const outcome = await pub.publish(fakeMechanism(scores))

    expect(outcome.status).toBe('submitted')
    expect(outcome.fallback).toBe(false)
    expect(chain.submissions).toEqual([{ mechanismId: 0, uids: [1], weights: [0.8] }])
    expect(pub.getState(0)).toMatchObject({
      lastUpdate: NOW,
      nextUpdate: NOW + 1_200 * SECOND,
      lastUids: [1],
      lastWeights: [0.8],
      lastFingerprint: outcome.fingerprint,
    })
  })

  it('does not submit again before the update interval', async () => {
    const { pub } = publisher()
    await pub.publish(fakeMechanism(scores))

    clock += 600 * SECOND
    scores.set('owner-c', 500)
    const outcome = await pub.publish(fakeMechanism(scores))

    expect(outcome.status).toBe('not_due')
    expect(chain.submissions).toHaveLength(1)
  })

  it('skips a vector identical to the last successful one', async () => {
    const { pub } = publisher()
    await pub.publish(fakeMechanism(scores))

    clock += 1_200 * SECOND
    const outcome = await pub.publish(fakeMechanism(scores))

    expect(outcome.status).toBe('unchanged')
    expect(chain.submissions).toHaveLength(1)
    expect(pub.getState(0).nextUpdate).toBe(clock + 60 * SECOND)
  })

  it('submits a changed vector once the interval has passed', async () => {
    const { pub } = publisher()
    await pub.publish(fakeMechanism(scores))

    clock += 1_200 * SECOND
    scores.set('owner-a', 300)
    const outcome = await pub.publish(fakeMechanism(scores))

    expect(outcome.status).toBe('submitted')
    expect(chain.submissions[1]).toEqual({ mechanismId: 0, uids: [0, 1], weights: [0.3, 0.8] })
  })

  it('retries a failed submission after the retry interval', async () => {
    const setWeights = vi.fn<ChainClient['setWeights']>().mockResolvedValueOnce({ success: false, message: 'busy' })
    setWeights.mockResolvedValue({ success: true })
    const client: ChainClient = {
      getRoster: async () => ROSTER,
      getMinAllowedWeights: async () => 1,
      setWeights,
    }
    const { pub, db } = publisher(client)

    const failed = await pub.publish(fakeMechanism(scores))
    expect(failed).toMatchObject({ status: 'failed', message: 'busy' })
    expect(pub.getState(0).nextUpdate).toBe(NOW + 60 * SECOND)
    expect(pub.getState(0).lastFingerprint).toBeNull()

    clock += 30 * SECOND
    expect((await pub.publish(fakeMechanism(scores))).status).toBe('not_due')

    clock += 30 * SECOND
    expect((await pub.publish(fakeMechanism(scores))).status).toBe('submitted')
    expect(setWeights).toHaveBeenCalledTimes(2)

    const rows = submissionRows(db, 0)
    expect(rows.map((r) => r.status)).toEqual(['success', 'failed'])
    expect(rows[1]?.message).toBe('busy')
  })

  it('treats a throwing setWeights as a failed attempt', async () => {
    const client: ChainClient = {
      getRoster: async () => ROSTER,
      getMinAllowedWeights: async () => 1,
      setWeights: async () => {
        throw new Error('rpc unavailable')
      },
    }
    const { pub } = publisher(client)

    const outcome = await pub.publish(fakeMechanism(scores))

    expect(outcome).toMatchObject({ status: 'failed', message: 'rpc unavailable' })
  })

  it('falls back to the fallback uid when every owner scored zero', async () => {
    const { pub } = publisher()

    const outcome = await pub.publish(fakeMechanism(new Map([['owner-b', 0]])))

    expect(outcome).toMatchObject({ status: 'submitted', fallback: true })
    expect(chain.submissions[0]).toEqual({ mechanismId: 0, uids: [0, 1, 2], weights: [1, 0, 0] })
  })

  it('reports an empty vector for an empty roster and schedules a retry', async () => {
    const { pub } = publisher(new DryRunChainClient([]))

    const outcome = await pub.publish(fakeMechanism(scores))

    expect(outcome.status).toBe('empty')
    expect(pub.getState(0).nextUpdate).toBe(NOW + 60 * SECOND)
  })

  it('does nothing for a mechanism without scores', async () => {
    const { pub } = publisher()
    expect((await pub.publish(fakeMechanism(new Map()))).status).toBe('no_scores')
    expect(chain.submissions).toHaveLength(0)
  })

  it('ignores scores for owners not on the roster', async () => {
    const { pub } = publisher()
    await pub.publish(fakeMechanism(new Map([['stranger', 900], ['owner-c', 250]])))
    expect(chain.submissions[0]).toEqual({ mechanismId: 0, uids: [2], weights: [0.25] })
  })

  it('records successful submissions with their fingerprint', async () => {
    const { pub, db } = publisher()

    const outcome = await pub.publish(fakeMechanism(scores))

    const rows = submissionRows(db, 0)
    expect(rows).toHaveLength(1)
    expect(rows[0]).toMatchObject({
      mechanism_id: 0,
      uids: '[1]',
      weights: '[0.8]',
      fingerprint: outcome.fingerprint,
      status: 'success',
      message: 'dry-run',
    })
  })

  it('does not resubmit the last recorded vector after a restart', async () => {
    const db = createTestDb()
    const fingerprint = vectorFingerprint({ uids: [1], weights: [0.8] })
    insertWeightSubmission(db, { mechanismId: 0, uids: [1], weights: [0.8], fingerprint, status: 'success' })
    const { pub } = publisher(chain, db)

    const outcome = await pub.publish(fakeMechanism(scores))

    expect(outcome).toMatchObject({ status: 'unchanged', fingerprint })
    expect(chain.submissions).toHaveLength(0)
  })

  it('ignores a recorded vector whose submission failed', async () => {
    const db = createTestDb()
    const fingerprint = vectorFingerprint({ uids: [1], weights: [0.8] })
    insertWeightSubmission(db, { mechanismId: 0, uids: [1], weights: [0.8], fingerprint, status: 'failed', message: 'busy' })
    const { pub } = publisher(chain, db)

    expect((await pub.publish(fakeMechanism(scores))).status).toBe('submitted')
  })

  it('publishAll isolates a mechanism whose roster lookup throws', async () => {
    const client: ChainClient = {
      getRoster: async () => {
        throw new Error('chain offline')
      },
      getMinAllowedWeights: async () => 1,
      setWeights: async () => ({ success: true }),
    }
    const pub = new WeightPublisher(client, config, { now: () => clock })
    const mechanism: Mechanism = {
      id: 0,
      name: 'test',
      intervalMs: 60_000,
      runCycle: vi.fn(),
      getStatus: vi.fn(),
      getCachedScore: () => undefined,
      getOwnerScores: () => new Map(scores),
    }

    const outcomes = await pub.publishAll([mechanism])

    expect(outcomes).toEqual([{ mechanismId: 0, status: 'failed', message: 'chain offline' }])
    expect(pub.getState(0).nextUpdate).toBe(NOW + 60 * SECOND)
  })
})
