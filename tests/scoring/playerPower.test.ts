import { describe, expect, it } from 'vitest'
import { PlayerPowerAggregator, playerIdentity } from '../../src/scoring/playerPower.js'
import { makePlayers, makeReport } from '../factories.js'

const UUID_A = '123e4567-e89b-12d3-a456-426614174000'

describe('playerIdentity', () => {
  it('uses the lower-cased uuid when present', () => {
    expect(playerIdentity({ name: 'Alex', uuid: UUID_A.toUpperCase() })).toBe(UUID_A)
  })

  it('falls back to the lower-cased name for the zero or blank uuid', () => {
    expect(playerIdentity({ name: ' Alex ', uuid: '00000000-0000-0000-0000-000000000000' })).toBe('alex')
    expect(playerIdentity({ name: 'Alex', uuid: '' })).toBe('alex')
  })

  it('returns null when neither is usable', () => {
    expect(playerIdentity({ name: '  ', uuid: '' })).toBeNull()
  })
})

describe('PlayerPowerAggregator', () => {
  it('splits a shared player evenly between the entities claiming it', () => {
    const shared = [{ name: 'shared', uuid: UUID_A, power: 100 }]
    const agg = new PlayerPowerAggregator()
    agg.ingest('srv-a', makeReport({ players: shared }))
    agg.ingest('srv-b', makeReport({ players: shared }))

    expect(agg.compute()).toEqual({
      totals: { 'srv-a': 50, 'srv-b': 50 },
      normalized: { 'srv-a': 1, 'srv-b': 1 },
    })
  })

  it('averages different claimed powers before splitting', () => {
    const agg = new PlayerPowerAggregator()
    agg.ingest('srv-a', makeReport({ players: [{ name: 'p', uuid: UUID_A, power: 120 }] }))
    agg.ingest('srv-b', makeReport({ players: [{ name: 'p', uuid: UUID_A, power: 40 }] }))

    // average 80, two claimants → 40 each
    expect(agg.compute().totals).toEqual({ 'srv-a': 40, 'srv-b': 40 })
  })

  it('normalizes against the largest total', () => {
    const agg = new PlayerPowerAggregator()
    agg.ingest(
      'srv-a',
      makeReport({
        players: [
          { name: 'solo', uuid: '00000000-0000-0000-0000-000000000000', power: 30 },
          { name: 'shared', uuid: UUID_A, power: 100 },
        ],
      }),
    )
    agg.ingest('srv-b', makeReport({ players: [{ name: 'shared', uuid: UUID_A, power: 100 }] }))

    const { totals, normalized } = agg.compute()
    expect(totals).toEqual({ 'srv-a': 80, 'srv-b': 50 })
    expect(normalized['srv-a']).toBe(1)
    expect(normalized['srv-b']).toBeCloseTo(0.625, 10)
  })

  it('counts a player listed twice in one report once', () => {
    const agg = new PlayerPowerAggregator()
    agg.ingest(
      'srv-a',
      makeReport({
        players: [
          { name: 'Alex', uuid: '', power: 10 },
          { name: 'alex', uuid: '', power: 10 },
        ],
      }),
    )
    expect(agg.compute().totals).toEqual({ 'srv-a': 10 })
  })

  it('ignores players without positive power', () => {
    const agg = new PlayerPowerAggregator()
    agg.ingest('srv-a', makeReport({ players: makePlayers(5, { power: 0 }) }))
    expect(agg.compute()).toEqual({ normalized: {}, totals: {} })
  })
})
