/**
 * Vote client — turns each scored entity into a trusted/suspicious verdict
 * and posts it to the collector.
 *
 * Entities zeroed for a reason are suspicious; entities with a positive,
 * compliant score are trusted; anything else gets no vote.
 */

import type { CollectorApi, VotePayload } from '../collector/client.js'
import { CLIENT_VERSION } from '../config/constants.js'
import type { ValidationConfig } from '../config/settings.js'
import { log } from '../logger.js'
import type { EntityScoreResult } from '../types.js'
import { mapWithConcurrency } from '../utils/concurrency.js'

const TAG = 'votes'

export type Verdict = 'trusted' | 'suspicious'

export interface VoteSummary {
  submitted: number
  skipped: number
  errors: number
}

export interface VoteContext {
  baseUrl: string
  validation: ValidationConfig
  now: number
}

interface VoteDetail {
  verdict: Verdict
  reason: string
  expected?: Record<string, unknown>
  got?: Record<string, unknown>
}

function voteDetail(result: EntityScoreResult, validation: ValidationConfig): VoteDetail | null {
  const scan = result.scan
  switch (result.zeroReason) {
    case 'max_players_mismatch':
      return {
        verdict: 'suspicious',
        reason: `Scanner observed max player capacity ${scan?.maxPlayers ?? 'unknown'} while collector report indicated ${result.reportMaxPlayers ?? 'unknown'}.`,
        expected: { max_players: scan?.maxPlayers ?? null },
        got: { max_players: result.reportMaxPlayers ?? null },
      }
    case 'player_count_mismatch':
      return {
        verdict: 'suspicious',
        reason: `Collector report returned player count ${result.reportPlayerCount ?? 'unknown'}, exceeding scanner observation ${scan?.players ?? 'unknown'} by more than ${validation.playerCountTolerance}.`,
        expected: { players: scan?.players ?? null, tolerance: validation.playerCountTolerance },
        got: { players: result.reportPlayerCount ?? null },
      }
    case 'scan_offline':
      return {
        verdict: 'suspicious',
        reason: 'Scanner reported the server offline while collector telemetry remained available.',
        expected: { online: true },
        got: { scanner_online: false, report_players: result.reportPlayerCount ?? null },
      }
    case 'scan_missing':
      return {
        verdict: 'suspicious',
        reason: 'Scanner did not return data for this server during the validation window.',
      }
    case 'collector_no_reports':
      return {
        verdict: 'suspicious',
        reason: 'Collector returned no fresh reports for this server during the validation window.',
      }
    case 'collector_reports_stale': {
      const hours = validation.maxReportAgeMs / 3_600_000
      return {
        verdict: 'suspicious',
        reason: `Collector reports were older than ${hours} hours, suggesting stale or missing telemetry.`,
        got: { report_age_hours: hours },
      }
    }
    case undefined:
      break
  }

  if (result.score > 0 && result.compliant) {
    const players = scan?.players ?? result.reportPlayerCount ?? null
    const maxPlayers = scan?.maxPlayers ?? result.reportMaxPlayers ?? null
    return {
      verdict: 'trusted',
      reason: `Scanner and collector metrics aligned: player counts matched at ${players ?? 'unknown'}, max player capacity matched at ${maxPlayers ?? 'unknown'}.`,
      expected: { players: scan?.players ?? null, max_players: scan?.maxPlayers ?? null },
      got: { players: result.reportPlayerCount ?? null, max_players: result.reportMaxPlayers ?? null },
    }
  }
  return null
}

/** Drop null values; returns undefined when nothing is left. */
function compact(values: Record<string, unknown> | undefined): Record<string, unknown> | undefined {
  if (!values) return undefined
  const entries = Object.entries(values).filter(([, v]) => v !== null && v !== undefined)
  return entries.length > 0 ? Object.fromEntries(entries) : undefined
}

/** Vote body for one entity, or null when the entity gets no vote. */
export function buildVotePayload(result: EntityScoreResult, ctx: VoteContext): VotePayload | null {
  const detail = voteDetail(result, ctx.validation)
  if (!detail) return null

  const payload: VotePayload = {
    verdict: detail.verdict,
    reason: detail.reason,
    report_evidence: `${ctx.baseUrl}/validators/servers/${encodeURIComponent(result.entityId)}/reports`,
    observed_at: new Date(ctx.now).toISOString(),
    client_version: CLIENT_VERSION,
  }
  const expected = compact(detail.expected)
  const got = compact(detail.got)
  if (expected) payload.value_expected = expected
  if (got) payload.value_got = got
  return payload
}

/** Post one vote per voteable entity. A 2xx counts as submitted; anything else is an error. */
export async function submitVotes(
  collector: CollectorApi,
  results: readonly EntityScoreResult[],
  ctx: VoteContext,
  concurrency: number,
): Promise<VoteSummary> {
  const summary: VoteSummary = { submitted: 0, skipped: 0, errors: 0 }
  const queue: Array<{ entityId: string; payload: VotePayload }> = []

  for (const result of results) {
    const payload = buildVotePayload(result, ctx)
    if (payload) queue.push({ entityId: result.entityId, payload })
    else summary.skipped++
  }

  await mapWithConcurrency(queue, concurrency, async ({ entityId, payload }) => {
    let status: number
    try {
      status = await collector.submitVote(entityId, payload)
    } catch (err) {
      log.error(TAG, `Vote for ${entityId} threw`, err)
      summary.errors++
      return
    }
    if (status >= 200 && status < 300) summary.submitted++
    else summary.errors++
  })

  if (queue.length > 0) {
    log.info(TAG, `Votes: ${summary.submitted} submitted, ${summary.skipped} skipped, ${summary.errors} errors`)
  }
  return summary
}
