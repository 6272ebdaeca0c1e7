import type {
  Side,
  SuppressionReason,
  TickCountersSnapshot,
} from '@root/types/position-sync.types.js'
import type { ActiveItem } from '@root/types/provider.types.js'

/**
 * Tallies the outcomes of one tick for the status surface
 */
export class TickCounters {
  private _candidates = 0
  private _pushes = 0
  private _dryRunPushes = 0
  private _suppressed: Record<SuppressionReason, number> = {
    cooldown: 0,
    direction: 0,
    'dry-run': 0,
  }
  private _conflicts = 0
  private _failures = 0
  private _skipped = 0
  private _dropped = 0

  get pushes(): number {
    return this._pushes
  }
  get conflicts(): number {
    return this._conflicts
  }
  get failures(): number {
    return this._failures
  }

  setCandidates(count: number): void {
    this._candidates = count
  }

  incrementPushes(): void {
    this._pushes++
  }

  /**
   * Dry-run pushes count both as a dry-run push and as a suppression
   */
  incrementSuppressed(reason: SuppressionReason): void {
    this._suppressed[reason]++
    if (reason === 'dry-run') this._dryRunPushes++
  }

  incrementConflicts(): void {
    this._conflicts++
  }

  incrementFailures(): void {
    this._failures++
  }

  incrementSkipped(count = 1): void {
    this._skipped += count
  }

  incrementDropped(): void {
    this._dropped++
  }

  snapshot(): TickCountersSnapshot {
    return {
      candidates: this._candidates,
      pushes: this._pushes,
      dryRunPushes: this._dryRunPushes,
      suppressed: { ...this._suppressed },
      conflicts: this._conflicts,
      failures: this._failures,
      skipped: this._skipped,
      dropped: this._dropped,
    }
  }
}

/**
 * Everything one tick carries from the watchlist refresh to the final
 * persist. Created fresh per tick and discarded afterwards.
 */
export interface TickContext {
  tickId: number
  startedAt: number
  signal: AbortSignal
  counters: TickCounters
  /** Sides whose provider rejected our credentials this tick */
  unavailableSides: Set<Side>
  /** Activity listings keyed by book, reused as observations */
  listings: Record<Side, Map<string, ActiveItem>>
}

export function createTickContext(
  tickId: number,
  startedAt: number,
  signal: AbortSignal,
): TickContext {
  return {
    tickId,
    startedAt,
    signal,
    counters: new TickCounters(),
    unavailableSides: new Set(),
    listings: { audible: new Map(), abs: new Map() },
  }
}
