import type { Side } from '@root/types/position-sync.types.js'

/**
 * An in-progress item as reported by a platform's activity listing
 */
export interface ActiveItem {
  bookId: string
  positionSeconds: number
  sourceTimestamp?: number
  durationSeconds?: number
}

export interface PositionReading {
  positionSeconds: number
  sourceTimestamp?: number
  durationSeconds?: number
}

/**
 * Capability set every platform implements.
 * Failures are thrown as ProviderError.
 */
export interface PositionProvider {
  readonly side: Side
  /** Most books one getPositions call should be asked for */
  readonly readBatchSize: number
  listActiveItems(): Promise<ActiveItem[]>
  /**
   * Reads current positions. Books the platform does not know are left out
   * of the result.
   */
  getPositions(bookIds: readonly string[]): Promise<Map<string, PositionReading>>
  setPosition(bookId: string, positionSeconds: number): Promise<void>
}

export type DiscoveryKind = 'in-progress' | 'purchases'

/**
 * Slow library scans that find books the activity listing misses
 */
export interface DiscoverySource {
  /** Titles started but not finished, at most `maxItems` */
  listInProgress(maxItems: number): Promise<string[]>
  /** Titles purchased at or after `since` (epoch ms) */
  listRecentPurchases(since: number): Promise<string[]>
}

export type ProviderRegistry = Record<Side, PositionProvider>

export type ProviderErrorKind = 'transient' | 'permanent' | 'auth'

/**
 * Supplies the currently valid Audible access token.
 * Keeping the token fresh is the collaborator's job.
 */
export interface CredentialSource {
  getAccessToken(): Promise<string>
}
