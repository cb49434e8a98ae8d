/**
 * Validator configuration — built once at startup and passed down explicitly.
 *
 * Defaults come from constants.ts; a handful of values can be overridden via
 * environment variables. Weight groups are checked here so a bad override
 * fails the process at boot instead of skewing scores at first use.
 */

import { z } from 'zod'
import { AppError, ErrorCodes } from '../errors.js'
import {
  API_CONFIG,
  COLLECTOR_DEFAULTS,
  HISTORY_DEFAULTS,
  INFRASTRUCTURE_WEIGHTS,
  PARTICIPATION_DEFAULTS,
  PARTICIPATION_WEIGHTS,
  PERFORMANCE_DEFAULTS,
  PRIMARY_WEIGHTS,
  RELIABILITY_WEIGHTS,
  SCANNER_DEFAULTS,
  SCORE_RANGE,
  SMOOTHING_DEFAULTS,
  VALIDATION_DEFAULTS,
  WEIGHT_DEFAULTS,
  WEIGHT_SUM_TOLERANCE,
} from './constants.js'

export interface ScoringConfig {
  idealTps: number
  minTpsThreshold: number
  maxTpsBonus: number
  maxPlayersWeight: number
  minPlayersForBonus: number
  optimalPlayerRatioMin: number
  optimalPlayerRatioMax: number
  saturationRatio: number
  requiredPlugins: readonly string[]
  bonusPlugins: readonly string[]
  weights: {
    primary: { infrastructure: number; participation: number; reliability: number }
    infrastructure: { tps: number }
    participation: { compliance: number; players: number }
    reliability: { playerPower: number; stability: number; recovery: number }
  }
  minScore: number
  maxScore: number
  defaultScore: number
  emaAlpha: number
  minScoreChange: number
  maxScoreChange: number
  history: {
    capacity: number
    stabilityWindow: number
    minValidStabilitySamples: number
    maxTpsCoefficientOfVariation: number
    stabilityInsufficientScore: number
    stabilityLowSampleScore: number
    minSamplesForRecovery: number
    recoveryWindow: number
    recoveryTpsThreshold: number
    recoverySampleCount: number
    maxRecoveryTimeMinutes: number
  }
}

export interface ValidationConfig {
  maxReportAgeMs: number
  playerCountTolerance: number
  maxPlayersTolerance: number
}

export interface ScannerConfig {
  timeoutMs: number
  concurrency: number
  intervalMs: number
}

export interface CollectorConfig {
  baseUrl: string
  apiKey: string
  timeoutMs: number
  reportsLimit: number
  maxMappingChunks: number
  mappingsMinRefreshMs: number
  reportFetchConcurrency: number
  voteConcurrency: number
}

export interface WeightConfig {
  updateIntervalS: number
  retryIntervalS: number
  excludeQuantile: number
  fallbackUid: number
}

export interface ValidatorConfig {
  scoring: ScoringConfig
  validation: ValidationConfig
  scanner: ScannerConfig
  collector: CollectorConfig
  weights: WeightConfig
  /** Owner keys known to the network, in index order. Used by the dry-run chain client. */
  ownerKeys: readonly string[]
  minAllowedWeights: number
  dbPath: string
  port: number
  votesEnabled: boolean
}

// ---------- Environment schema ----------

const optionalNumber = z.coerce.number().finite().optional()

const EnvSchema = z.object({
  COLLECTOR_URL: z.string().url().optional(),
  COLLECTOR_API_KEY: z.string().min(1).optional(),
  COLLECTOR_TIMEOUT_MS: optionalNumber,
  COLLECTOR_REPORTS_LIMIT: optionalNumber,
  IDEAL_TPS: optionalNumber,
  MAX_PLAYERS_WEIGHT: optionalNumber,
  W_INFRA: optionalNumber,
  W_PART: optionalNumber,
  W_RELY: optionalNumber,
  W_RELY_PLAYER_POWER: optionalNumber,
  W_RELY_STABILITY: optionalNumber,
  W_RELY_RECOVERY: optionalNumber,
  EMA_ALPHA: optionalNumber,
  MAX_SCORE: optionalNumber,
  PLAYER_COUNT_TOLERANCE: optionalNumber,
  MAX_PLAYERS_TOLERANCE: optionalNumber,
  SCANNER_TIMEOUT_MS: optionalNumber,
  SCANNER_CONCURRENCY: optionalNumber,
  SCANNER_INTERVAL_MS: optionalNumber,
  WEIGHT_UPDATE_INTERVAL_S: optionalNumber,
  WEIGHT_RETRY_INTERVAL_S: optionalNumber,
  WEIGHT_EXCLUDE_QUANTILE: optionalNumber,
  MIN_ALLOWED_WEIGHTS: optionalNumber,
  OWNER_KEYS: z.string().optional(),
  DB_PATH: z.string().optional(),
  PORT: optionalNumber,
  VOTES_ENABLED: z.enum(['true', 'false']).optional(),
})

type Env = z.infer<typeof EnvSchema>

function invalid(message: string, details?: Record<string, unknown>): AppError {
  return new AppError(ErrorCodes.INVALID_CONFIG, message, 500, details)
}

function assertSumsToOne(group: string, values: Record<string, number>): void {
  const total = Object.values(values).reduce((a, b) => a + b, 0)
  if (Math.abs(total - 1) > WEIGHT_SUM_TOLERANCE) {
    throw invalid(`${group} weights must sum to 1.0, got ${total}`, { group, total })
  }
}

/** Check every invariant the scoring code relies on. Throws AppError('invalid_config'). */
export function validateConfig(config: ValidatorConfig): void {
  const { scoring, weights, validation } = config
  assertSumsToOne('Primary', scoring.weights.primary)
  assertSumsToOne('Infrastructure', scoring.weights.infrastructure)
  assertSumsToOne('Participation', scoring.weights.participation)
  assertSumsToOne('Reliability', scoring.weights.reliability)

  if (!(scoring.idealTps > 0 && scoring.idealTps <= 30)) {
    throw invalid(`idealTps must be in (0, 30], got ${scoring.idealTps}`)
  }
  if (!(scoring.emaAlpha > 0 && scoring.emaAlpha <= 1)) {
    throw invalid(`emaAlpha must be in (0, 1], got ${scoring.emaAlpha}`)
  }
  if (scoring.maxScore <= scoring.minScore) {
    throw invalid(`maxScore (${scoring.maxScore}) must be > minScore (${scoring.minScore})`)
  }
  if (scoring.defaultScore < scoring.minScore || scoring.defaultScore > scoring.maxScore) {
    throw invalid(`defaultScore (${scoring.defaultScore}) must lie within the score range`)
  }
  if (!Number.isInteger(scoring.history.capacity) || scoring.history.capacity < 1) {
    throw invalid(`history capacity must be a positive integer, got ${scoring.history.capacity}`)
  }
  if (weights.excludeQuantile < 0 || weights.excludeQuantile > 1) {
    throw invalid(`excludeQuantile must be in [0, 1], got ${weights.excludeQuantile}`)
  }
  if (validation.playerCountTolerance < 0 || validation.maxPlayersTolerance < 0) {
    throw invalid('validation tolerances must be non-negative')
  }
  if (config.scanner.concurrency < 1) {
    throw invalid(`scanner concurrency must be >= 1, got ${config.scanner.concurrency}`)
  }
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object') {
    for (const child of Object.values(value)) deepFreeze(child)
    Object.freeze(value)
  }
  return value
}

/** Defaults with no environment applied. Useful in tests. */
export function defaultConfig(): ValidatorConfig {
  return buildConfig({})
}

function buildConfig(env: Env): ValidatorConfig {
  const primary = {
    infrastructure: env.W_INFRA ?? PRIMARY_WEIGHTS.infrastructure,
    participation: env.W_PART ?? PRIMARY_WEIGHTS.participation,
    reliability: env.W_RELY ?? PRIMARY_WEIGHTS.reliability,
  }
  const reliability = {
    playerPower: env.W_RELY_PLAYER_POWER ?? RELIABILITY_WEIGHTS.playerPower,
    stability: env.W_RELY_STABILITY ?? RELIABILITY_WEIGHTS.stability,
    recovery: env.W_RELY_RECOVERY ?? RELIABILITY_WEIGHTS.recovery,
  }

  return {
    scoring: {
      idealTps: env.IDEAL_TPS ?? PERFORMANCE_DEFAULTS.IDEAL_TPS,
      minTpsThreshold: PERFORMANCE_DEFAULTS.MIN_TPS_THRESHOLD,
      maxTpsBonus: PERFORMANCE_DEFAULTS.MAX_TPS_BONUS,
      maxPlayersWeight: env.MAX_PLAYERS_WEIGHT ?? PARTICIPATION_DEFAULTS.MAX_PLAYERS_WEIGHT,
      minPlayersForBonus: PARTICIPATION_DEFAULTS.MIN_PLAYERS_FOR_BONUS,
      optimalPlayerRatioMin: PARTICIPATION_DEFAULTS.OPTIMAL_PLAYER_RATIO_MIN,
      optimalPlayerRatioMax: PARTICIPATION_DEFAULTS.OPTIMAL_PLAYER_RATIO_MAX,
      saturationRatio: PARTICIPATION_DEFAULTS.SATURATION_RATIO,
      requiredPlugins: [...PARTICIPATION_DEFAULTS.REQUIRED_PLUGINS],
      bonusPlugins: [...PARTICIPATION_DEFAULTS.BONUS_PLUGINS],
      weights: {
        primary,
        infrastructure: { tps: INFRASTRUCTURE_WEIGHTS.tps },
        participation: {
          compliance: PARTICIPATION_WEIGHTS.compliance,
          players: PARTICIPATION_WEIGHTS.players,
        },
        reliability,
      },
      minScore: SCORE_RANGE.MIN_SCORE,
      maxScore: env.MAX_SCORE ?? SCORE_RANGE.MAX_SCORE,
      defaultScore: SCORE_RANGE.DEFAULT_SCORE,
      emaAlpha: env.EMA_ALPHA ?? SMOOTHING_DEFAULTS.EMA_ALPHA,
      minScoreChange: SMOOTHING_DEFAULTS.MIN_SCORE_CHANGE,
      maxScoreChange: SMOOTHING_DEFAULTS.MAX_SCORE_CHANGE,
      history: {
        capacity: HISTORY_DEFAULTS.MAX_REPORT_HISTORY,
        stabilityWindow: HISTORY_DEFAULTS.TPS_STABILITY_WINDOW,
        minValidStabilitySamples: HISTORY_DEFAULTS.MIN_VALID_STABILITY_SAMPLES,
        maxTpsCoefficientOfVariation: HISTORY_DEFAULTS.MAX_TPS_COEFFICIENT_OF_VARIATION,
        stabilityInsufficientScore: HISTORY_DEFAULTS.STABILITY_INSUFFICIENT_SCORE,
        stabilityLowSampleScore: HISTORY_DEFAULTS.STABILITY_LOW_SAMPLE_SCORE,
        minSamplesForRecovery: HISTORY_DEFAULTS.MIN_SAMPLES_FOR_RECOVERY,
        recoveryWindow: HISTORY_DEFAULTS.RECOVERY_WINDOW,
        recoveryTpsThreshold: HISTORY_DEFAULTS.RECOVERY_TPS_THRESHOLD,
        recoverySampleCount: HISTORY_DEFAULTS.RECOVERY_SAMPLE_COUNT,
        maxRecoveryTimeMinutes: HISTORY_DEFAULTS.MAX_RECOVERY_TIME_MINUTES,
      },
    },
    validation: {
      maxReportAgeMs: VALIDATION_DEFAULTS.MAX_REPORT_AGE_MS,
      playerCountTolerance: env.PLAYER_COUNT_TOLERANCE ?? VALIDATION_DEFAULTS.PLAYER_COUNT_TOLERANCE,
      maxPlayersTolerance: env.MAX_PLAYERS_TOLERANCE ?? VALIDATION_DEFAULTS.MAX_PLAYERS_TOLERANCE,
    },
    scanner: {
      timeoutMs: env.SCANNER_TIMEOUT_MS ?? SCANNER_DEFAULTS.TIMEOUT_MS,
      concurrency: env.SCANNER_CONCURRENCY ?? SCANNER_DEFAULTS.CONCURRENCY,
      intervalMs: env.SCANNER_INTERVAL_MS ?? SCANNER_DEFAULTS.INTERVAL_MS,
    },
    collector: {
      baseUrl: (env.COLLECTOR_URL ?? 'http://localhost:8080').replace(/\/+$/, ''),
      apiKey: env.COLLECTOR_API_KEY ?? '',
      timeoutMs: env.COLLECTOR_TIMEOUT_MS ?? COLLECTOR_DEFAULTS.TIMEOUT_MS,
      reportsLimit: env.COLLECTOR_REPORTS_LIMIT ?? COLLECTOR_DEFAULTS.REPORTS_LIMIT,
      maxMappingChunks: COLLECTOR_DEFAULTS.MAX_MAPPING_CHUNKS,
      mappingsMinRefreshMs: COLLECTOR_DEFAULTS.MAPPINGS_MIN_REFRESH_MS,
      reportFetchConcurrency: COLLECTOR_DEFAULTS.REPORT_FETCH_CONCURRENCY,
      voteConcurrency: COLLECTOR_DEFAULTS.VOTE_CONCURRENCY,
    },
    weights: {
      updateIntervalS: Math.max(
        env.WEIGHT_UPDATE_INTERVAL_S ?? WEIGHT_DEFAULTS.UPDATE_INTERVAL_S,
        WEIGHT_DEFAULTS.MIN_INTERVAL_S,
      ),
      retryIntervalS: Math.max(
        env.WEIGHT_RETRY_INTERVAL_S ?? WEIGHT_DEFAULTS.RETRY_INTERVAL_S,
        WEIGHT_DEFAULTS.MIN_INTERVAL_S,
      ),
      excludeQuantile: env.WEIGHT_EXCLUDE_QUANTILE ?? WEIGHT_DEFAULTS.EXCLUDE_QUANTILE,
      fallbackUid: WEIGHT_DEFAULTS.FALLBACK_UID,
    },
    ownerKeys: (env.OWNER_KEYS ?? '')
      .split(',')
      .map((k) => k.trim())
      .filter((k) => k.length > 0),
    minAllowedWeights: env.MIN_ALLOWED_WEIGHTS ?? 1,
    dbPath: env.DB_PATH ?? 'data/validator.db',
    port: env.PORT ?? API_CONFIG.DEFAULT_PORT,
    votesEnabled: env.VOTES_ENABLED !== 'false',
  }
}

/**
 * Parse environment overrides, build and validate the config, and freeze it.
 * Throws AppError('invalid_config') on any malformed or inconsistent value.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ValidatorConfig {
  const parsed = EnvSchema.safeParse(env)
  if (!parsed.success) {
    throw invalid('Invalid environment configuration', {
      issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    })
  }
  const config = buildConfig(parsed.data)
  validateConfig(config)
  return deepFreeze(config)
}
