/**
 * Chain client — the consensus layer the weight publisher submits to.
 *
 * The submission wire format is owned by the chain; the validator only needs
 * the roster, the per-mechanism minimum vector size and a setWeights call.
 */

export interface SetWeightsResult {
  success: boolean
  message?: string
}

export interface ChainClient {
  /** Owner keys in uid order. */
  getRoster(): Promise<string[]>
  getMinAllowedWeights(mechanismId: number): Promise<number>
  setWeights(mechanismId: number, uids: readonly number[], weights: readonly number[]): Promise<SetWeightsResult>
}
