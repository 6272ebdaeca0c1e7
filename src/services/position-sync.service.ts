/**
 * Position Sync Service
 *
 * Runs one reconciliation pass ("tick") over the watchlist: refreshes the
 * candidate set from both platforms' activity, reads current positions,
 * decides what to push, filters pushes through the safety gate, writes the
 * approved ones and persists the resulting state.
 *
 * Ticks never overlap. Per-book work is serialized; only the position reads
 * fan out, bounded by `fetchConcurrency`.
 */
import type {
  BookState,
  GateVerdict,
  Observation,
  PositionSyncStatus,
  SafetyGateConfig,
  Side,
  SyncHealth,
  SyncMode,
  SyncSnapshot,
  TickReport,
  TickStatus,
} from '@root/types/position-sync.types.js'
import { SIDES } from '@root/types/position-sync.types.js'
import type {
  DiscoveryKind,
  DiscoverySource,
  ProviderRegistry,
} from '@root/types/provider.types.js'
import {
  createEmptySnapshot,
  type StateStore,
} from '@services/position-sync/persistence/index.js'
import {
  createBookState,
  decide,
  recordDryRunPush,
  recordPush,
} from '@services/position-sync/reconciliation/index.js'
import {
  type RetryPolicy,
  RetryExecutor,
} from '@services/position-sync/retry/index.js'
import { applySafetyGate } from '@services/position-sync/safety/index.js'
import {
  createTickContext,
  type TickContext,
} from '@services/position-sync/tick/index.js'
import { WatchlistManager } from '@services/position-sync/watchlist/index.js'
import { ProviderError } from '@services/providers/provider-error.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger } from 'fastify'
import pLimit from 'p-limit'

export interface PositionSyncOptions {
  syncMode: SyncMode
  dryRun: boolean
  moveThresholdSeconds: number
  cooldownMs: number
  intervalMs: number
  watchlistRetentionMs: number
  watchlistMaxSize: number
  fetchConcurrency: number
  retry: RetryPolicy
  discovery: {
    /** Cap on titles one in-progress scan admits */
    maxInProgress: number
    /** How far back a purchase scan looks */
    purchaseLookbackMs: number
  }
}

export interface PositionSyncDeps {
  providers: ProviderRegistry
  stateStore: StateStore
  /** Library scans feeding the watchlist; without one discovery is a no-op */
  discovery?: DiscoverySource
  clock?: () => number
  sleep?: (ms: number) => Promise<void>
  random?: () => number
}

type SideFetch =
  | { status: 'ok'; observation: Observation }
  | { status: 'error'; error: ProviderError }

type BookFetch = Partial<Record<Side, SideFetch>>

export class PositionSyncService {
  private readonly log: FastifyBaseLogger
  private readonly clock: () => number
  private readonly retry: RetryExecutor
  private readonly gateConfig: SafetyGateConfig
  private readonly shutdown = new AbortController()

  private books = new Map<string, BookState>()
  private watchlist: WatchlistManager
  private lastSuccessfulSyncAt: number | null = null
  private discoveredAt: Partial<Record<DiscoveryKind, number>> = {}
  private lastReport: TickReport | null = null
  private tickCounter = 0
  private currentTick: Promise<TickReport> | null = null
  private pendingPersist = false
  private initializing: Promise<void> | null = null
  private initialized = false

  constructor(
    baseLog: FastifyBaseLogger,
    private readonly options: PositionSyncOptions,
    private readonly deps: PositionSyncDeps,
  ) {
    this.log = createServiceLogger(baseLog, 'POSITION_SYNC')
    this.clock = deps.clock ?? Date.now
    this.retry = new RetryExecutor(options.retry, {
      logger: this.log,
      sleep: deps.sleep,
      random: deps.random,
    })
    this.gateConfig = {
      syncMode: options.syncMode,
      dryRun: options.dryRun,
      cooldownMs: options.cooldownMs,
    }
    this.watchlist = this.createWatchlist()
  }

  /**
   * Loads persisted state once. Concurrent callers share the same load.
   */
  initialize(): Promise<void> {
    this.initializing ??= this.loadState().catch((error: unknown) => {
      this.initializing = null
      throw error
    })
    return this.initializing
  }

  private async loadState(): Promise<void> {
    const snapshot = await this.deps.stateStore.load()
    this.books = new Map(
      Object.values(snapshot.books).map((book) => [book.bookId, book]),
    )
    this.watchlist = this.createWatchlist(snapshot)
    this.lastSuccessfulSyncAt = snapshot.lastSuccessfulSyncAt
    this.discoveredAt = { ...snapshot.discoveredAt }
    this.initialized = true

    this.log.info(
      {
        syncMode: this.options.syncMode,
        dryRun: this.options.dryRun,
        books: this.books.size,
      },
      'Position sync initialized',
    )
  }

  /**
   * Runs a tick, or joins the one already in flight
   */
  runTick(): Promise<TickReport> {
    if (this.currentTick) {
      this.log.debug('Tick already in progress, joining it')
      return this.currentTick
    }

    const tick = this.executeTick().finally(() => {
      this.currentTick = null
    })
    this.currentTick = tick
    return tick
  }

  /**
   * Runs one library scan and admits the titles it finds to the watchlist.
   * The next tick polls them and saves the result.
   *
   * @returns How many titles were new to the watchlist
   * @throws {ProviderError} When the scan fails
   */
  async runDiscovery(kind: DiscoveryKind): Promise<number> {
    const source = this.deps.discovery
    if (!source || this.shutdown.signal.aborted) return 0

    await this.initialize()
    const startedAt = this.clock()
    const { maxInProgress, purchaseLookbackMs } = this.options.discovery

    const outcome = await this.retry.run(
      `Discovering ${kind} titles`,
      'audible',
      () =>
        kind === 'in-progress'
          ? source.listInProgress(maxInProgress)
          : source.listRecentPurchases(startedAt - purchaseLookbackMs),
      this.shutdown.signal,
    )
    if (outcome.state !== 'succeeded') throw outcome.error

    const found = outcome.value
    const fresh = found.filter((bookId) => !this.watchlist.has(bookId))
    this.watchlist.admitCandidates(new Set(found), new Set(), startedAt)
    const admitted = fresh.filter((bookId) => this.watchlist.has(bookId)).length
    this.discoveredAt[kind] = startedAt

    this.log.info(
      `Discovery (${kind}) found ${found.length} titles, ${admitted} new to the watchlist`,
    )
    return admitted
  }

  /**
   * When a discovery scan of this kind last succeeded (epoch ms)
   */
  getLastDiscoveryAt(kind: DiscoveryKind): number | null {
    return this.discoveredAt[kind] ?? null
  }

  /**
   * Signals the running tick to stop between books, waits for it, then
   * writes the final state
   */
  async stop(): Promise<void> {
    this.shutdown.abort()

    if (this.currentTick) {
      this.log.info('Waiting for in-flight tick to finish')
      await this.currentTick
    }

    if (!this.initialized) return

    try {
      await this.deps.stateStore.persist(this.getSnapshot())
      this.pendingPersist = false
    } catch (error) {
      this.log.error({ error }, 'Failed to persist state during shutdown')
    }
  }

  getStatus(): PositionSyncStatus {
    const watchlist = this.watchlist.snapshot()
    return {
      tickInProgress: this.currentTick !== null,
      trackedBooks: this.books.size,
      watchlistSize: this.watchlist.size,
      suppressedBooks: Object.keys(watchlist.suppressed).length,
      lastSuccessfulSyncAt:
        this.lastSuccessfulSyncAt === null
          ? null
          : new Date(this.lastSuccessfulSyncAt).toISOString(),
      pendingPersist: this.pendingPersist,
      lastTick: this.lastReport,
      settings: {
        syncMode: this.options.syncMode,
        dryRun: this.options.dryRun,
        intervalSeconds: Math.round(this.options.intervalMs / 1000),
      },
    }
  }

  /**
   * Liveness of the sync loop. `starting` until the first tick in this
   * process finishes without a prior successful sync; afterwards healthy while
   * the last successful sync is younger than three intervals plus a minute.
   */
  getHealth(): SyncHealth {
    const thresholdMs = this.options.intervalMs * 3 + 60_000
    const thresholdSeconds = thresholdMs / 1000
    const last = this.lastSuccessfulSyncAt

    if (last === null) {
      return {
        status: this.lastReport === null ? 'starting' : 'unhealthy',
        lastSuccessfulSyncAt: null,
        ageSeconds: null,
        thresholdSeconds,
      }
    }

    const ageMs = Math.max(0, this.clock() - last)
    return {
      status: ageMs <= thresholdMs ? 'healthy' : 'unhealthy',
      lastSuccessfulSyncAt: new Date(last).toISOString(),
      ageSeconds: Math.round(ageMs / 1000),
      thresholdSeconds,
    }
  }

  isOnWatchlist(bookId: string): boolean {
    return this.watchlist.has(bookId)
  }

  getBook(bookId: string): BookState | undefined {
    return this.books.get(bookId)
  }

  getSnapshot(): SyncSnapshot {
    return {
      ...createEmptySnapshot(),
      books: Object.fromEntries(this.books),
      ...this.watchlist.snapshot(),
      lastSuccessfulSyncAt: this.lastSuccessfulSyncAt,
      ...(Object.keys(this.discoveredAt).length > 0 && {
        discoveredAt: { ...this.discoveredAt },
      }),
    }
  }

  private createWatchlist(
    initial?: Pick<SyncSnapshot, 'watchlist' | 'suppressed'>,
  ): WatchlistManager {
    return new WatchlistManager(
      {
        retentionMs: this.options.watchlistRetentionMs,
        maxSize: this.options.watchlistMaxSize,
      },
      initial,
    )
  }

  private async executeTick(): Promise<TickReport> {
    const startedAt = this.clock()
    const ctx = createTickContext(
      ++this.tickCounter,
      startedAt,
      this.shutdown.signal,
    )

    if (ctx.signal.aborted) {
      return this.finishTick(ctx, 'aborted')
    }

    try {
      await this.initialize()

      // A snapshot left over from a failed persist must land before anything
      // else is written to either platform
      if (this.pendingPersist) {
        this.log.info('Retrying state save left over from previous tick')
        await this.deps.stateStore.persist(this.getSnapshot())
        this.pendingPersist = false
      }

      await this.refreshListings(ctx)

      const candidates = this.watchlist.admitCandidates(
        new Set(ctx.listings.audible.keys()),
        new Set(ctx.listings.abs.keys()),
        startedAt,
      )
      ctx.counters.setCandidates(candidates.size)

      for (const bookId of candidates) {
        if (!this.books.has(bookId)) {
          this.books.set(bookId, createBookState(bookId, startedAt))
        }
      }

      const bookIds = [...candidates].sort()
      let status: TickStatus = 'completed'

      if (ctx.unavailableSides.size > 0) {
        this.log.warn(
          `Skipping ${bookIds.length} books: ${[...ctx.unavailableSides].join(', ')} unavailable`,
        )
        ctx.counters.incrementSkipped(bookIds.length)
      } else {
        const fetched = await this.fetchObservations(ctx, bookIds)

        for (const bookId of bookIds) {
          if (ctx.signal.aborted) {
            this.log.info('Shutdown requested, abandoning remaining books')
            status = 'aborted'
            break
          }

          try {
            await this.reconcileBook(ctx, bookId, fetched.get(bookId) ?? {})
          } catch (error) {
            ctx.counters.incrementFailures()
            this.log.error({ error }, `Unexpected error syncing ${bookId}`)
          }
        }
      }

      const succeeded = status === 'completed' && ctx.unavailableSides.size === 0
      const snapshot = this.getSnapshot()
      if (succeeded) snapshot.lastSuccessfulSyncAt = this.clock()

      try {
        await this.deps.stateStore.persist(snapshot)
      } catch (error) {
        this.pendingPersist = true
        throw error
      }

      if (succeeded) this.lastSuccessfulSyncAt = snapshot.lastSuccessfulSyncAt
      return this.finishTick(ctx, status)
    } catch (error) {
      this.log.error({ error }, `Tick ${ctx.tickId} failed`)
      return this.finishTick(
        ctx,
        'failed',
        error instanceof Error ? error.message : String(error),
      )
    }
  }

  private finishTick(
    ctx: TickContext,
    status: TickStatus,
    error?: string,
  ): TickReport {
    const report: TickReport = {
      tickId: ctx.tickId,
      startedAt: new Date(ctx.startedAt).toISOString(),
      finishedAt: new Date(this.clock()).toISOString(),
      status,
      unavailableSides: [...ctx.unavailableSides],
      counters: ctx.counters.snapshot(),
      ...(error !== undefined && { error }),
    }
    this.lastReport = report

    const { counters } = report
    const summary = `Tick ${report.tickId} ${status}: ${counters.candidates} candidates, ${counters.pushes} pushed, ${counters.conflicts} conflicts, ${counters.failures} failures`
    if (status === 'completed') {
      if (counters.pushes > 0 || counters.conflicts > 0) {
        this.log.info(summary)
      } else {
        this.log.debug(summary)
      }
    } else {
      this.log.warn(summary)
    }

    return report
  }

  /**
   * Lists recent activity on both sides. An authentication failure marks the
   * side unavailable for this tick; other failures only lose the listing.
   */
  private async refreshListings(ctx: TickContext): Promise<void> {
    await Promise.all(
      SIDES.map(async (side) => {
        const outcome = await this.retry.run(
          `Listing ${side} activity`,
          side,
          () => this.deps.providers[side].listActiveItems(),
          ctx.signal,
        )

        if (outcome.state === 'succeeded') {
          for (const item of outcome.value) {
            ctx.listings[side].set(item.bookId, item)
          }
          return
        }

        if (outcome.error.kind === 'auth') {
          ctx.unavailableSides.add(side)
          this.log.error(
            { error: outcome.error },
            `${side} rejected our credentials, side unavailable this tick`,
          )
          return
        }

        this.log.warn(
          { error: outcome.error },
          `Could not list ${side} activity, continuing with the existing watchlist`,
        )
      }),
    )
  }

  /**
   * Reads both sides' positions for every candidate. Listing entries double
   * as observations so recently active books cost no extra request on that
   * side; the rest are read in batches of the provider's `readBatchSize`.
   * Batches not yet started when shutdown is requested are skipped.
   */
  private async fetchObservations(
    ctx: TickContext,
    bookIds: string[],
  ): Promise<Map<string, BookFetch>> {
    const limit = pLimit(this.options.fetchConcurrency)
    const results = new Map<string, BookFetch>()
    const reads: Promise<void>[] = []

    for (const bookId of bookIds) {
      results.set(bookId, {})
    }

    for (const side of SIDES) {
      const unlisted: string[] = []

      for (const bookId of bookIds) {
        const fetch = results.get(bookId)
        if (!fetch) continue

        const listed = ctx.listings[side].get(bookId)
        if (!listed) {
          unlisted.push(bookId)
          continue
        }
        fetch[side] = {
          status: 'ok',
          observation: {
            positionSeconds: listed.positionSeconds,
            observedAt: ctx.startedAt,
            sourceTimestamp: listed.sourceTimestamp,
            durationSeconds: listed.durationSeconds,
          },
        }
      }

      const batchSize = Math.max(1, this.deps.providers[side].readBatchSize)
      for (let i = 0; i < unlisted.length; i += batchSize) {
        const batch = unlisted.slice(i, i + batchSize)
        reads.push(limit(() => this.readBatch(ctx, side, batch, results)))
      }
    }

    await Promise.all(reads)
    return results
  }

  private async readBatch(
    ctx: TickContext,
    side: Side,
    batch: string[],
    results: Map<string, BookFetch>,
  ): Promise<void> {
    if (ctx.signal.aborted) return

    const outcome = await this.retry.run(
      batch.length === 1
        ? `Reading ${side} position for ${batch[0]}`
        : `Reading ${side} positions for ${batch.length} books`,
      side,
      () => this.deps.providers[side].getPositions(batch),
      ctx.signal,
    )
    const observedAt = this.clock()

    for (const bookId of batch) {
      const fetch = results.get(bookId)
      if (!fetch) continue

      if (outcome.state !== 'succeeded') {
        fetch[side] = { status: 'error', error: outcome.error }
        continue
      }

      const reading = outcome.value.get(bookId)
      fetch[side] = reading
        ? {
            status: 'ok',
            observation: {
              positionSeconds: reading.positionSeconds,
              observedAt,
              sourceTimestamp: reading.sourceTimestamp,
              durationSeconds: reading.durationSeconds,
            },
          }
        : {
            status: 'error',
            error: new ProviderError(`${bookId} not found on ${side}`, {
              kind: 'permanent',
              side,
            }),
          }
    }
  }

  /**
   * Decides, gates and applies one book. State is committed only at the
   * end, and never when a write was attempted and did not land.
   */
  private async reconcileBook(
    ctx: TickContext,
    bookId: string,
    fetch: BookFetch,
  ): Promise<void> {
    const now = this.clock()
    const prior = this.books.get(bookId) ?? createBookState(bookId, now)
    const observations: Partial<Record<Side, Observation>> = {}

    for (const side of SIDES) {
      const result = fetch[side]
      if (!result) continue

      if (result.status === 'ok') {
        observations[side] = result.observation
        continue
      }

      this.handleProviderFailure(ctx, bookId, side, result.error, now)
      return
    }

    const { decision, nextState, movedSides } = decide(prior, observations, {
      moveThresholdSeconds: this.options.moveThresholdSeconds,
      now,
    })

    if (movedSides.length > 0) this.watchlist.touch(bookId, now)

    if (decision.kind === 'none') {
      this.log.debug(`No action for ${bookId}: ${decision.reason}`)
      this.commit(nextState)
      return
    }

    if (decision.kind === 'conflict') {
      ctx.counters.incrementConflicts()
      this.log.warn(
        { positions: decision.positions, timestamps: decision.timestamps },
        `Conflict for ${bookId}: both sides moved with no usable recency signal`,
      )
      this.commit(nextState)
      return
    }

    const verdict = applySafetyGate(
      decision,
      nextState,
      this.gateConfig,
      now,
      this.log,
    )

    if (verdict.verdict === 'suppressed') {
      ctx.counters.incrementSuppressed(verdict.reason)
      this.commit(this.suppressedState(verdict, nextState, now))
      return
    }

    const { target, source, positionSeconds } = verdict
    if (ctx.unavailableSides.has(target)) {
      ctx.counters.incrementSkipped()
      this.log.debug(`Skipping push for ${bookId}: ${target} unavailable`)
      return
    }

    const outcome = await this.retry.run(
      `Pushing ${bookId} to ${target}`,
      target,
      () => this.deps.providers[target].setPosition(bookId, positionSeconds),
      ctx.signal,
    )

    if (outcome.state !== 'succeeded') {
      this.handleProviderFailure(ctx, bookId, target, outcome.error, now)
      return
    }

    ctx.counters.incrementPushes()
    this.log.info(
      `Pushed ${positionSeconds.toFixed(1)}s for ${bookId} from ${source} to ${target} (${decision.resolvedBy})`,
    )
    this.commit(
      recordPush(
        nextState,
        target,
        positionSeconds,
        this.clock(),
        this.options.cooldownMs,
      ),
    )
  }

  /**
   * State to keep for a gated push. The observations are committed either
   * way, so an unchanged next tick does not bring the push back.
   */
  private suppressedState(
    verdict: Extract<GateVerdict, { verdict: 'suppressed' }>,
    nextState: BookState,
    now: number,
  ): BookState {
    switch (verdict.reason) {
      case 'cooldown':
      case 'direction':
        return nextState
      case 'dry-run':
        return recordDryRunPush(
          nextState,
          verdict.target,
          now,
          this.options.cooldownMs,
        )
    }
  }

  private handleProviderFailure(
    ctx: TickContext,
    bookId: string,
    side: Side,
    error: ProviderError,
    now: number,
  ): void {
    switch (error.kind) {
      case 'permanent':
        ctx.counters.incrementDropped()
        this.watchlist.drop(bookId, now, error.message)
        this.log.warn(
          { error },
          `Dropping ${bookId} from the watchlist: ${side} failed permanently`,
        )
        return

      case 'auth':
        ctx.unavailableSides.add(side)
        ctx.counters.incrementSkipped()
        this.log.error(
          { error },
          `${side} rejected our credentials while syncing ${bookId}`,
        )
        return

      case 'transient':
        ctx.counters.incrementFailures()
        this.log.warn(
          { error },
          `Giving up on ${bookId} for this tick after repeated ${side} failures`,
        )
        return
    }
  }

  private commit(state: BookState): void {
    this.books.set(state.bookId, state)
  }
}
