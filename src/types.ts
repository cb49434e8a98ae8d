// ---------- Telemetry reports ----------

export interface ActivePlayer {
  name: string
  uuid: string
  /** Self-reported engagement value. Absent or non-numeric values count as 0. */
  power: number
}

export interface MemoryInfo {
  freeBytes: number
  usedBytes: number
  totalBytes: number
}

export interface SystemInfo {
  cpuCores: number
  uptimeMs: number
  memory: MemoryInfo
}

export interface ReportPayload {
  activePlayers: ActivePlayer[]
  maxPlayers: number
  plugins: string[]
  /** Milliseconds-per-second tick budget as reported by the server plugin. */
  tpsMillis: number
  uptimeMs: number
  memory: MemoryInfo
  systemInfo: SystemInfo
}

export interface TelemetryReport {
  id: string
  entityId: string
  counter: number
  clientTimestampMs: number
  payload: ReportPayload
}

// ---------- Catalog & mappings ----------

export interface CatalogEntry {
  id: string
  host: string | null
  port: number | null
  declaredActivePlayers: number | null
  declaredMaxPlayers: number | null
}

/** Owner key → entity ids registered under it. */
export type EntityMappings = Record<string, string[]>

// ---------- Scanning ----------

export type ProviderName = 'mcsrvstat' | 'mcstatus' | 'mcapi' | 'xdefcon' | 'minetools' | 'tickhosting'

/** What one provider said about one address. `null` means the provider did not say. */
export interface ProviderObservation {
  online: boolean | null
  players: number | null
  maxPlayers: number | null
  pingMs: number | null
}

export interface ScanResult {
  address: string
  online: boolean
  /** null when no provider reported it. */
  players: number | null
  maxPlayers: number | null
  pingMs: number
  provider: ProviderName | null
}

/** Scan result joined back to the entity it was requested for. */
export interface EntityScan extends ScanResult {
  entityId: string
  scannedAt: number
  host: string
  port: number
  declaredActivePlayers: number | null
  declaredMaxPlayers: number | null
}

export interface ProviderStats {
  attempts: number
  elapsedMs: number
  retrySuccesses: number
}

export interface ScanMetrics {
  totalElapsedMs: number
  avgPerAddressMs: number
  perProvider: Record<ProviderName, ProviderStats>
  disabledProviders: ProviderName[]
}

// ---------- Scoring ----------

export type ZeroReason =
  | 'scan_missing'
  | 'scan_offline'
  | 'collector_no_reports'
  | 'collector_reports_stale'
  | 'max_players_mismatch'
  | 'player_count_mismatch'

export interface ScoreComponents {
  infrastructure: number
  participation: number
  reliability: number
  playerPower: number
  rawCombined: number
}

export interface ScoreCacheEntry {
  score: number
  rawScore: number
  components: ScoreComponents
  updatedAt: number
}

export type ScoreClassification = 'excellent' | 'good' | 'average' | 'poor'

/** Per-entity outcome of one scoring cycle. */
export interface EntityScoreResult {
  entityId: string
  ownerKey: string
  score: number
  rawScore: number
  components: ScoreComponents
  compliant: boolean
  reportsCount: number
  zeroReason?: ZeroReason
  defaulted?: boolean
  scan: EntityScan | null
  reportMaxPlayers?: number
  reportPlayerCount?: number
  scanDeltaPlayers?: number
  playerPowerTotal?: number
}

// ---------- Weights ----------

export interface WeightVector {
  uids: number[]
  weights: number[]
}
