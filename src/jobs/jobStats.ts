/**
 * Shared in-memory job statistics.
 * Each background job updates its entry when it runs; /health reads them.
 */

export interface MechanismCycleStats {
  lastRun: string
  cycles: number
  failures: number
  entitiesScored: number
  lastDurationMs: number
}

const mechanisms: Record<number, MechanismCycleStats> = {}

export const jobStats = {
  mechanisms,
  weightPublisher: { lastRun: '', submissions: 0, failures: 0 },
  cacheCleanup: { lastRun: '', evicted: 0 },
}

export function mechanismStats(mechanismId: number): MechanismCycleStats {
  let stats = jobStats.mechanisms[mechanismId]
  if (!stats) {
    stats = { lastRun: '', cycles: 0, failures: 0, entitiesScored: 0, lastDurationMs: 0 }
    jobStats.mechanisms[mechanismId] = stats
  }
  return stats
}
