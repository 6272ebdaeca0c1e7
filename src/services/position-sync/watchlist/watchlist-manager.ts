import type {
  SyncSnapshot,
  WatchlistEntry,
  WatchlistSuppression,
} from '@root/types/position-sync.types.js'

export interface WatchlistOptions {
  /** How long a book stays a candidate after its last activity */
  retentionMs: number
  /** Upper bound on candidates; least recently active entries go first */
  maxSize: number
}

/**
 * Owns membership of the candidate set polled on every tick.
 *
 * Membership is derived from recent activity on either platform instead of
 * the full library, which bounds the per-tick work. Leaving the watchlist
 * never touches a book's sync state.
 */
export class WatchlistManager {
  private readonly entries = new Map<string, WatchlistEntry>()
  private readonly suppressed = new Map<string, WatchlistSuppression>()

  constructor(
    private readonly options: WatchlistOptions,
    initial?: Pick<SyncSnapshot, 'watchlist' | 'suppressed'>,
  ) {
    if (initial) {
      for (const entry of Object.values(initial.watchlist)) {
        this.entries.set(entry.bookId, { ...entry })
      }
      for (const suppression of Object.values(initial.suppressed)) {
        this.suppressed.set(suppression.bookId, { ...suppression })
      }
    }
  }

  get size(): number {
    return this.entries.size
  }

  has(bookId: string): boolean {
    return this.entries.has(bookId)
  }

  get(bookId: string): WatchlistEntry | undefined {
    return this.entries.get(bookId)
  }

  /**
   * Admits books reported active on either side, ages out stale entries and
   * returns this tick's candidate set.
   *
   * @param activeOnA - Books in progress on Audible
   * @param activeOnB - Books in progress on Audiobookshelf
   * @param now - Engine-local time (epoch ms)
   */
  admitCandidates(
    activeOnA: ReadonlySet<string>,
    activeOnB: ReadonlySet<string>,
    now: number,
  ): Set<string> {
    for (const [bookId, suppression] of this.suppressed) {
      if (suppression.until <= now) this.suppressed.delete(bookId)
    }

    for (const bookId of new Set([...activeOnA, ...activeOnB])) {
      if (this.suppressed.has(bookId)) continue
      this.upsert(bookId, now)
    }

    for (const [bookId, entry] of this.entries) {
      if (now - entry.lastActiveAt > this.options.retentionMs) {
        this.entries.delete(bookId)
      }
    }

    this.enforceMaxSize()

    return new Set(this.entries.keys())
  }

  /**
   * Refreshes activity for a book that is already a candidate
   */
  touch(bookId: string, at: number): void {
    const entry = this.entries.get(bookId)
    if (!entry || at <= entry.lastActiveAt) return
    this.upsert(bookId, at)
  }

  /**
   * Removes a book after a permanent failure and keeps it out for one
   * retention window so it is not re-resolved on every tick
   */
  drop(bookId: string, now: number, reason: string): void {
    this.entries.delete(bookId)
    this.suppressed.set(bookId, {
      bookId,
      until: now + this.options.retentionMs,
      reason,
    })
  }

  isSuppressed(bookId: string): boolean {
    return this.suppressed.has(bookId)
  }

  snapshot(): Pick<SyncSnapshot, 'watchlist' | 'suppressed'> {
    return {
      watchlist: Object.fromEntries(
        [...this.entries].map(([bookId, entry]) => [bookId, { ...entry }]),
      ),
      suppressed: Object.fromEntries(
        [...this.suppressed].map(([bookId, suppression]) => [
          bookId,
          { ...suppression },
        ]),
      ),
    }
  }

  private upsert(bookId: string, lastActiveAt: number): void {
    this.entries.set(bookId, {
      bookId,
      lastActiveAt,
      expiresAt: lastActiveAt + this.options.retentionMs,
    })
  }

  private enforceMaxSize(): void {
    const overflow = this.entries.size - this.options.maxSize
    if (overflow <= 0) return

    const oldestFirst = [...this.entries.values()].sort(
      (a, b) => a.lastActiveAt - b.lastActiveAt,
    )
    for (const entry of oldestFirst.slice(0, overflow)) {
      this.entries.delete(entry.bookId)
    }
  }
}
