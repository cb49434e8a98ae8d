/**
 * Dry-run chain client — roster from configuration, submissions logged only.
 * Wired in when no chain endpoint is configured.
 */

import { log } from '../logger.js'
import type { ChainClient, SetWeightsResult } from './client.js'

const TAG = 'chain'

/** Most recent submissions kept for inspection. */
export const MAX_RECORDED_SUBMISSIONS = 100

export class DryRunChainClient implements ChainClient {
  readonly submissions: Array<{ mechanismId: number; uids: number[]; weights: number[] }> = []

  constructor(
    private readonly roster: readonly string[],
    private readonly minAllowedWeights = 1,
  ) {}

  async getRoster(): Promise<string[]> {
    return [...this.roster]
  }

  async getMinAllowedWeights(): Promise<number> {
    return this.minAllowedWeights
  }

  async setWeights(mechanismId: number, uids: readonly number[], weights: readonly number[]): Promise<SetWeightsResult> {
    this.submissions.push({ mechanismId, uids: [...uids], weights: [...weights] })
    if (this.submissions.length > MAX_RECORDED_SUBMISSIONS) this.submissions.shift()
    const total = weights.reduce((a, b) => a + b, 0)
    log.info(TAG, `[dry-run] mechanism ${mechanismId}: ${uids.length} uid(s), total weight ${total.toFixed(3)}`)
    return { success: true, message: 'dry-run' }
  }
}
