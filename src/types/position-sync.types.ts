import type { DiscoveryKind } from './provider.types.js'

/**
 * The two platforms Earmark keeps in step.
 * `audible` is side A, `abs` (Audiobookshelf) is side B.
 */
export type Side = 'audible' | 'abs'

export const SIDES: readonly Side[] = ['audible', 'abs'] as const

/**
 * Which directions pushes may flow in
 */
export type SyncMode = 'bidirectional' | 'audible-to-abs' | 'abs-to-audible'

/**
 * A position reading taken from one side during a tick
 */
export interface Observation {
  positionSeconds: number
  /** Engine-local detection time (epoch ms) */
  observedAt: number
  /** Platform-reported update time (epoch ms), when the platform furnishes one */
  sourceTimestamp?: number
  durationSeconds?: number
}

export interface KnownPosition {
  positionSeconds: number
  observedAt: number
  sourceTimestamp?: number
}

export interface PushRecord {
  positionSeconds: number
  pushedAt: number
  /** True once the side has reported this value back to us */
  acknowledged: boolean
}

/**
 * Persistent per-book sync state, keyed by ASIN
 */
export interface BookState {
  bookId: string
  durationSeconds: number | null
  lastKnown: Partial<Record<Side, KnownPosition>>
  lastPushed: Partial<Record<Side, PushRecord>>
  cooldownUntil: Partial<Record<Side, number>>
  lastConflictAt?: number
  createdAt: number
  updatedAt: number
}

export interface WatchlistEntry {
  bookId: string
  lastActiveAt: number
  expiresAt: number
}

export interface WatchlistSuppression {
  bookId: string
  until: number
  reason: string
}

export interface SyncSnapshot {
  version: 1
  books: Record<string, BookState>
  watchlist: Record<string, WatchlistEntry>
  suppressed: Record<string, WatchlistSuppression>
  lastSuccessfulSyncAt: number | null
  /** Last successful library scan per kind (epoch ms) */
  discoveredAt?: Partial<Record<DiscoveryKind, number>>
}

export type NoActionReason =
  | 'unchanged'
  | 'in-sync'
  | 'target-unavailable'

export type Decision =
  | { kind: 'none'; reason: NoActionReason }
  | {
      kind: 'push'
      source: Side
      target: Side
      positionSeconds: number
      resolvedBy: 'single-move' | 'recency'
    }
  | {
      kind: 'conflict'
      positions: Record<Side, number>
      timestamps: Record<Side, number>
    }

export interface ReconcileOptions {
  moveThresholdSeconds: number
  now: number
}

export interface ReconcileResult {
  decision: Decision
  nextState: BookState
  /** Sides that moved significantly (echoes excluded) */
  movedSides: Side[]
}

export type SuppressionReason = 'cooldown' | 'direction' | 'dry-run'

export type GateVerdict =
  | { verdict: 'approved'; target: Side; source: Side; positionSeconds: number }
  | {
      verdict: 'suppressed'
      reason: SuppressionReason
      target: Side
      source: Side
      positionSeconds: number
    }

export interface SafetyGateConfig {
  syncMode: SyncMode
  dryRun: boolean
  cooldownMs: number
}

export type TickStatus = 'completed' | 'aborted' | 'failed'

export interface TickCountersSnapshot {
  candidates: number
  pushes: number
  dryRunPushes: number
  suppressed: Record<SuppressionReason, number>
  conflicts: number
  failures: number
  skipped: number
  dropped: number
}

export interface TickReport {
  tickId: number
  startedAt: string
  finishedAt: string
  status: TickStatus
  unavailableSides: Side[]
  counters: TickCountersSnapshot
  error?: string
}

export interface PositionSyncStatus {
  tickInProgress: boolean
  trackedBooks: number
  watchlistSize: number
  suppressedBooks: number
  lastSuccessfulSyncAt: string | null
  pendingPersist: boolean
  lastTick: TickReport | null
  settings: {
    syncMode: SyncMode
    dryRun: boolean
    intervalSeconds: number
  }
}

export interface SyncHealth {
  status: 'healthy' | 'unhealthy' | 'starting'
  lastSuccessfulSyncAt: string | null
  ageSeconds: number | null
  thresholdSeconds: number
}
