import { Hono } from 'hono'
import { errorResponse, ErrorCodes } from '../errors.js'
import type { MechanismRegistry } from '../mechanisms/base.js'
import { classifyScore } from '../scoring/engine.js'

/** GET /scores/:mechanismId/:entityId — the cached score for one entity. */
export function createScoresRoute(registry: MechanismRegistry): Hono {
  const scores = new Hono()

  scores.get('/:mechanismId/:entityId', (c) => {
    const mechanismId = Number(c.req.param('mechanismId'))
    const entityId = c.req.param('entityId')
    const mechanism = Number.isInteger(mechanismId) ? registry.get(mechanismId) : undefined
    if (!mechanism) {
      return c.json(errorResponse(ErrorCodes.NOT_FOUND, `Unknown mechanism: ${c.req.param('mechanismId')}`), 404)
    }

    const entry = mechanism.getCachedScore(entityId)
    if (!entry) {
      return c.json(errorResponse(ErrorCodes.NOT_FOUND, `No cached score for ${entityId}`), 404)
    }

    return c.json({
      mechanismId: mechanism.id,
      entityId,
      score: entry.score,
      rawScore: entry.rawScore,
      classification: classifyScore(entry.score),
      components: entry.components,
      updatedAt: new Date(entry.updatedAt).toISOString(),
    })
  })

  return scores
}
