import type { SyncMode } from './position-sync.types.js'

export type LogLevel =
  | 'fatal'
  | 'error'
  | 'warn'
  | 'info'
  | 'debug'
  | 'trace'
  | 'silent'

export type AudibleLocale =
  | 'us'
  | 'uk'
  | 'de'
  | 'fr'
  | 'ca'
  | 'au'
  | 'in'
  | 'it'
  | 'jp'
  | 'es'
  | 'br'

export interface Config {
  // System Config
  port: number
  logLevel: LogLevel
  closeGraceDelay: number
  rateLimitMax: number
  /** Shared secret for the status routes; empty leaves them open */
  statusToken: string
  // Audiobookshelf Config
  absBaseUrl: string
  absToken: string
  /** Restricts ASIN lookups to one library; empty searches all book libraries */
  absLibraryId: string
  // Audible Config
  audibleLocale: AudibleLocale
  audibleAuthPath: string
  audibleRecentlyPlayedLimit: number
  /** Library scan for partly listened titles; 0 disables it */
  audibleDeepScanIntervalSeconds: number
  audibleDeepScanMaxInProgress: number
  /** Scan for new purchases; 0 disables it */
  audiblePurchaseScanIntervalSeconds: number
  // State Config
  statePath: string
  persistEnabled: boolean
  // Sync Config
  syncIntervalSeconds: number
  moveThresholdSeconds: number
  cooldownSeconds: number
  syncMode: SyncMode
  dryRun: boolean
  watchlistRetentionHours: number
  watchlistMaxSize: number
  // Network Config
  requestTimeoutSeconds: number
  maxRetries: number
  retryBaseDelayMs: number
  fetchConcurrency: number
}
