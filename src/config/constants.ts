/**
 * Default tunables.
 *
 * Grouped by subsystem so related values are easy to find and tune together.
 * Nothing reads these directly at run time except `loadConfig()`, which layers
 * environment overrides on top and freezes the result into a ValidatorConfig.
 */

// ── Performance targets ─────────────────────────────────────────────────────

export const PERFORMANCE_DEFAULTS = {
  /** Ticks per second a healthy server sustains. */
  IDEAL_TPS: 20,
  /** Below this the infrastructure score takes a 0.1× penalty. */
  MIN_TPS_THRESHOLD: 5,
  /** Reported TPS is capped here before normalization. */
  MAX_TPS_BONUS: 20,
} as const

// ── Participation ───────────────────────────────────────────────────────────

export const PARTICIPATION_DEFAULTS = {
  /** Player count at which the players sub-score saturates. */
  MAX_PLAYERS_WEIGHT: 200,
  MIN_PLAYERS_FOR_BONUS: 5,
  OPTIMAL_PLAYER_RATIO_MIN: 0.2,
  OPTIMAL_PLAYER_RATIO_MAX: 0.8,
  /** Occupancy above this is penalized (near-full servers are often padded). */
  SATURATION_RATIO: 0.95,
  REQUIRED_PLUGINS: ['Level114', 'LuckPerms', 'CraftingStore', 'PlayerPoints'],
  BONUS_PLUGINS: ['ViaVersion', 'ViaBackwards', 'ViaRewind'],
} as const

// ── Weights (each group sums to 1.0) ────────────────────────────────────────

export const PRIMARY_WEIGHTS = {
  infrastructure: 0.2,
  participation: 0.2,
  reliability: 0.6,
} as const

export const INFRASTRUCTURE_WEIGHTS = {
  tps: 1.0,
} as const

export const PARTICIPATION_WEIGHTS = {
  compliance: 6 / 7,
  players: 1 / 7,
} as const

export const RELIABILITY_WEIGHTS = {
  playerPower: 0.9,
  stability: 0.05,
  recovery: 0.05,
} as const

/** Tolerance used when checking that a weight group sums to 1.0. */
export const WEIGHT_SUM_TOLERANCE = 0.001

// ── Score range & smoothing ─────────────────────────────────────────────────

export const SCORE_RANGE = {
  MIN_SCORE: 0,
  MAX_SCORE: 1000,
  /** Neutral score returned when a calculation fails part-way. */
  DEFAULT_SCORE: 100,
} as const

export const SMOOTHING_DEFAULTS = {
  EMA_ALPHA: 0.2,
  MIN_SCORE_CHANGE: 1,
  MAX_SCORE_CHANGE: 200,
} as const

export const CLASSIFICATION_THRESHOLDS = {
  excellent: 850,
  good: 650,
  average: 300,
} as const

// ── History ─────────────────────────────────────────────────────────────────

export const HISTORY_DEFAULTS = {
  /** Fixed capacity of the per-entity report window. */
  MAX_REPORT_HISTORY: 60,
  TPS_STABILITY_WINDOW: 20,
  MIN_VALID_STABILITY_SAMPLES: 3,
  MAX_TPS_COEFFICIENT_OF_VARIATION: 0.3,
  /** Stability returned when the window is not yet full. */
  STABILITY_INSUFFICIENT_SCORE: 0.5,
  /** Stability returned when too few samples fall in the valid TPS band. */
  STABILITY_LOW_SAMPLE_SCORE: 0.1,
  MIN_SAMPLES_FOR_RECOVERY: 10,
  RECOVERY_WINDOW: 30,
  RECOVERY_TPS_THRESHOLD: 18,
  RECOVERY_SAMPLE_COUNT: 10,
  MAX_RECOVERY_TIME_MINUTES: 30,
} as const

// ── Report validation ───────────────────────────────────────────────────────

export const VALIDATION_DEFAULTS = {
  /** Reports older than this are stale (ms). */
  MAX_REPORT_AGE_MS: 6 * 60 * 60 * 1000,
  /** Allowed excess of reported players over the scanned count. */
  PLAYER_COUNT_TOLERANCE: 5,
  /** Allowed |report − scan| difference in declared capacity. */
  MAX_PLAYERS_TOLERANCE: 0,
} as const

// ── Scanner ─────────────────────────────────────────────────────────────────

export const SCANNER_DEFAULTS = {
  /** Per-lookup HTTP timeout (ms) */
  TIMEOUT_MS: 3_000,
  /** Max concurrent lookups across all providers */
  CONCURRENCY: 8,
  /** Min interval between full catalog scans (ms) */
  INTERVAL_MS: 5 * 60 * 1000,
} as const

// ── Collector ───────────────────────────────────────────────────────────────

export const COLLECTOR_DEFAULTS = {
  TIMEOUT_MS: 10_000,
  REPORTS_LIMIT: 25,
  /** Mapping lookups are split into at most this many requests */
  MAX_MAPPING_CHUNKS: 5,
  /** The ids endpoint allows ~5 req/min */
  MAPPINGS_MIN_REFRESH_MS: 12_500,
  /** Concurrent report fetches per cycle */
  REPORT_FETCH_CONCURRENCY: 8,
  /** Concurrent vote submissions per cycle */
  VOTE_CONCURRENCY: 4,
} as const

// ── Weights ─────────────────────────────────────────────────────────────────

export const WEIGHT_DEFAULTS = {
  /** Min seconds between successful submissions */
  UPDATE_INTERVAL_S: 1_200,
  /** Retry delay after a failed or empty submission */
  RETRY_INTERVAL_S: 60,
  /** Floor for both intervals */
  MIN_INTERVAL_S: 10,
  /** Fraction of the lowest non-zero weights to drop */
  EXCLUDE_QUANTILE: 0,
  /** Index that receives full weight when nothing qualifies */
  FALLBACK_UID: 0,
} as const

// ── Background jobs ─────────────────────────────────────────────────────────

export const JOB_INTERVALS = {
  /** Server-reputation mechanism cycle */
  SERVER_MECHANISM_MS: 60_000,
  /** Weight publisher check */
  WEIGHT_PUBLISHER_MS: 30_000,
} as const

/** Staggered startup delays so the first scan does not race the first submission */
export const JOB_STARTUP_DELAYS = {
  SERVER_MECHANISM_MS: 2_000,
  WEIGHT_PUBLISHER_MS: 15_000,
} as const

export const JOB_CONFIG = {
  /** Score cache entries older than this are evicted (ms) */
  SCORE_CACHE_TTL_MS: 60 * 60 * 1000,
  /** Min gap between cache cleanups (ms) */
  CLEANUP_INTERVAL_MS: 60 * 60 * 1000,
  /** Graceful shutdown timeout (ms) */
  SHUTDOWN_TIMEOUT_MS: 10_000,
} as const

export const API_CONFIG = {
  DEFAULT_PORT: 3000,
} as const

export const CLIENT_VERSION = '0.1.0'
