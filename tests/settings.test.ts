import { describe, expect, it } from 'vitest'
import { defaultConfig, loadConfig, validateConfig } from '../src/config/settings.js'
import { AppError } from '../src/errors.js'

function expectInvalid(fn: () => unknown): AppError {
  try {
    fn()
  } catch (err) {
    expect(err).toBeInstanceOf(AppError)
    if (err instanceof AppError) {
      expect(err.code).toBe('invalid_config')
      return err
    }
  }
  throw new Error('expected invalid_config')
}

describe('loadConfig', () => {
  it('uses the documented defaults with an empty environment', () => {
    const config = loadConfig({})
    expect(config.scoring.weights.primary).toEqual({ infrastructure: 0.2, participation: 0.2, reliability: 0.6 })
    expect(config.scoring.weights.reliability).toEqual({ playerPower: 0.9, stability: 0.05, recovery: 0.05 })
    expect(config.scoring.idealTps).toBe(20)
    expect(config.scoring.defaultScore).toBe(100)
    expect(config.scoring.history.capacity).toBe(60)
    expect(config.validation).toEqual({
      maxReportAgeMs: 6 * 60 * 60 * 1000,
      playerCountTolerance: 5,
      maxPlayersTolerance: 0,
    })
    expect(config.weights.updateIntervalS).toBe(1200)
    expect(config.weights.retryIntervalS).toBe(60)
    expect(config.collector.baseUrl).toBe('http://localhost:8080')
    expect(config.votesEnabled).toBe(true)
    expect(config.ownerKeys).toEqual([])
  })

  it('applies environment overrides', () => {
    const config = loadConfig({
      COLLECTOR_URL: 'https://collector.example.test///',
      COLLECTOR_API_KEY: 'test-secret',
      IDEAL_TPS: '18',
      PLAYER_COUNT_TOLERANCE: '3',
      OWNER_KEYS: ' owner-a, owner-b ,,owner-c ',
      VOTES_ENABLED: 'false',
      PORT: '4010',
    })
    expect(config.collector.baseUrl).toBe('https://collector.example.test')
    expect(config.collector.apiKey).toBe('test-secret')
    expect(config.scoring.idealTps).toBe(18)
    expect(config.validation.playerCountTolerance).toBe(3)
    expect(config.ownerKeys).toEqual(['owner-a', 'owner-b', 'owner-c'])
    expect(config.votesEnabled).toBe(false)
    expect(config.port).toBe(4010)
  })

  it('floors weight intervals at 10 seconds', () => {
    const config = loadConfig({ WEIGHT_UPDATE_INTERVAL_S: '5', WEIGHT_RETRY_INTERVAL_S: '1' })
    expect(config.weights.updateIntervalS).toBe(10)
    expect(config.weights.retryIntervalS).toBe(10)
  })

  it('returns a frozen config', () => {
    const config = loadConfig({})
    expect(Object.isFrozen(config)).toBe(true)
    expect(Object.isFrozen(config.scoring.weights.primary)).toBe(true)
  })

  it('rejects a primary weight group that does not sum to 1', () => {
    const err = expectInvalid(() => loadConfig({ W_INFRA: '0.5' }))
    expect(err.message).toContain('Primary')
  })

  it('rejects a reliability weight group that does not sum to 1', () => {
    const err = expectInvalid(() => loadConfig({ W_RELY_STABILITY: '0.2' }))
    expect(err.message).toContain('Reliability')
  })

  it('accepts a rebalanced group within tolerance', () => {
    const config = loadConfig({ W_INFRA: '0.3', W_PART: '0.1', W_RELY: '0.6' })
    expect(config.scoring.weights.primary.infrastructure).toBe(0.3)
  })

  it('rejects out-of-range tunables', () => {
    expectInvalid(() => loadConfig({ IDEAL_TPS: '40' }))
    expectInvalid(() => loadConfig({ IDEAL_TPS: '0' }))
    expectInvalid(() => loadConfig({ EMA_ALPHA: '1.5' }))
    expectInvalid(() => loadConfig({ MAX_SCORE: '0' }))
    expectInvalid(() => loadConfig({ WEIGHT_EXCLUDE_QUANTILE: '2' }))
    expectInvalid(() => loadConfig({ SCANNER_CONCURRENCY: '0' }))
  })

  it('rejects malformed environment values', () => {
    const err = expectInvalid(() => loadConfig({ COLLECTOR_URL: 'not a url' }))
    expect(err.details).toEqual({ issues: [expect.stringContaining('COLLECTOR_URL')] })
    expectInvalid(() => loadConfig({ IDEAL_TPS: 'fast' }))
    expectInvalid(() => loadConfig({ VOTES_ENABLED: 'yes' }))
  })
})

describe('validateConfig', () => {
  it('accepts the defaults', () => {
    expect(() => validateConfig(defaultConfig())).not.toThrow()
  })

  it('rejects a default score outside the score range', () => {
    const config = defaultConfig()
    config.scoring.defaultScore = 5000
    expectInvalid(() => validateConfig(config))
  })

  it('rejects a non-integer history capacity', () => {
    const config = defaultConfig()
    config.scoring.history.capacity = 2.5
    expectInvalid(() => validateConfig(config))
  })
})
