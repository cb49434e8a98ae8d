/**
 * Queries — typed helpers over the score cache and the weight-submission log.
 */

import type { Database } from 'better-sqlite3'
import { z } from 'zod'
import { log } from '../logger.js'
import type { ScoreCacheEntry, ScoreComponents } from '../types.js'

interface ScoreCacheRow {
  entity_id: string
  score: number
  raw_score: number
  components: string
  updated_at: number
}

export interface WeightSubmissionRow {
  id: number
  mechanism_id: number
  uids: string
  weights: string
  fingerprint: string
  status: 'success' | 'failed'
  message: string | null
  submitted_at: string
}

const ComponentsSchema = z.object({
  infrastructure: z.number().default(0),
  participation: z.number().default(0),
  reliability: z.number().default(0),
  playerPower: z.number().default(0),
  rawCombined: z.number().default(0),
})

function parseComponents(entityId: string, json: string): ScoreComponents {
  let parsed: unknown
  try {
    parsed = JSON.parse(json)
  } catch (err) {
    log.warn('db', `Unreadable components for ${entityId}, resetting breakdown`, err)
    parsed = {}
  }
  const result = ComponentsSchema.safeParse(parsed)
  return result.success ? result.data : ComponentsSchema.parse({})
}

// ---------- Score cache ----------

export function loadScoreCache(db: Database, mechanismId: number): Map<string, ScoreCacheEntry> {
  const rows = db
    .prepare<[number], ScoreCacheRow>(
      'SELECT entity_id, score, raw_score, components, updated_at FROM score_cache WHERE mechanism_id = ?',
    )
    .all(mechanismId)

  const cache = new Map<string, ScoreCacheEntry>()
  for (const row of rows) {
    cache.set(row.entity_id, {
      score: row.score,
      rawScore: row.raw_score,
      components: parseComponents(row.entity_id, row.components),
      updatedAt: row.updated_at,
    })
  }
  return cache
}

/** Replace the stored cache for a mechanism in one transaction. */
export function saveScoreCache(
  db: Database,
  mechanismId: number,
  cache: ReadonlyMap<string, ScoreCacheEntry>,
): void {
  const del = db.prepare('DELETE FROM score_cache WHERE mechanism_id = ?')
  const insert = db.prepare(
    `INSERT INTO score_cache (mechanism_id, entity_id, score, raw_score, components, updated_at)
     VALUES (?, ?, ?, ?, ?, ?)`,
  )
  const tx = db.transaction(() => {
    del.run(mechanismId)
    for (const [entityId, entry] of cache) {
      insert.run(
        mechanismId,
        entityId,
        entry.score,
        entry.rawScore,
        JSON.stringify(entry.components),
        entry.updatedAt,
      )
    }
  })
  tx()
}

export function countCachedScores(db: Database): number {
  const row = db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM score_cache').get()
  return row?.n ?? 0
}

// ---------- Weight submissions ----------

export function insertWeightSubmission(
  db: Database,
  sub: {
    mechanismId: number
    uids: readonly number[]
    weights: readonly number[]
    fingerprint: string
    status: 'success' | 'failed'
    message?: string
  },
): void {
  db.prepare(
    `INSERT INTO weight_submissions (mechanism_id, uids, weights, fingerprint, status, message)
     VALUES (?, ?, ?, ?, ?, ?)`,
  ).run(
    sub.mechanismId,
    JSON.stringify(sub.uids),
    JSON.stringify(sub.weights),
    sub.fingerprint,
    sub.status,
    sub.message ?? null,
  )
}

export function getLastSuccessfulSubmission(
  db: Database,
  mechanismId: number,
): WeightSubmissionRow | undefined {
  return db
    .prepare<[number], WeightSubmissionRow>(
      `SELECT * FROM weight_submissions
       WHERE mechanism_id = ? AND status = 'success'
       ORDER BY id DESC LIMIT 1`,
    )
    .get(mechanismId)
}
