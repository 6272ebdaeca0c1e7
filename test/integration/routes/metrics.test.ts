import type { PositionSyncStatus } from '@root/types/position-sync.types.js'
import { renderMetrics } from '@routes/metrics.js'
import { describe, expect, it } from 'vitest'
import { build } from '../../helpers/app.js'
import { idlePlatformHandlers } from '../../mocks/msw-handlers.js'
import { server } from '../../setup/msw-setup.js'

const baseStatus: PositionSyncStatus = {
  tickInProgress: false,
  trackedBooks: 3,
  watchlistSize: 2,
  suppressedBooks: 0,
  lastSuccessfulSyncAt: '2024-05-01T10:00:00.000Z',
  pendingPersist: false,
  lastTick: null,
  settings: { syncMode: 'bidirectional', dryRun: false, intervalSeconds: 120 },
}

describe('Metrics', () => {
  describe('renderMetrics', () => {
    it('should render gauges before the first tick', () => {
      expect(
        renderMetrics({ ...baseStatus, lastSuccessfulSyncAt: null }),
      ).toBe(
        [
          '# HELP earmark_watchlist_size Books polled on every tick',
          '# TYPE earmark_watchlist_size gauge',
          'earmark_watchlist_size 2',
          '# HELP earmark_books_tracked Books with persisted sync state',
          '# TYPE earmark_books_tracked gauge',
          'earmark_books_tracked 3',
          '# HELP earmark_last_sync_timestamp_seconds Unix time of the last successful tick, 0 if none',
          '# TYPE earmark_last_sync_timestamp_seconds gauge',
          'earmark_last_sync_timestamp_seconds 0',
          '',
        ].join('\n'),
      )
    })

    it('should render the outcome counts of the last tick', () => {
      const output = renderMetrics({
        ...baseStatus,
        lastTick: {
          tickId: 7,
          startedAt: '2024-05-01T10:00:00.000Z',
          finishedAt: '2024-05-01T10:00:01.000Z',
          status: 'completed',
          unavailableSides: [],
          counters: {
            candidates: 2,
            pushes: 1,
            dryRunPushes: 0,
            suppressed: { cooldown: 1, direction: 0, 'dry-run': 0 },
            conflicts: 0,
            failures: 0,
            skipped: 0,
            dropped: 0,
          },
        },
      })

      const lines = output.trimEnd().split('\n')
      expect(lines).toContain('earmark_last_sync_timestamp_seconds 1714557600')
      expect(lines).toContain('earmark_last_tick_books{outcome="candidate"} 2')
      expect(lines).toContain('earmark_last_tick_books{outcome="pushed"} 1')
      expect(lines).toContain(
        'earmark_last_tick_books{outcome="suppressed",reason="cooldown"} 1',
      )
      expect(lines).toContain(
        'earmark_last_tick_books{outcome="suppressed",reason="dry-run"} 0',
      )
      expect(lines.at(-1)).toBe('earmark_last_tick_success 1')
    })

    it('should report an unsuccessful last tick', () => {
      const output = renderMetrics({
        ...baseStatus,
        lastTick: {
          tickId: 1,
          startedAt: '2024-05-01T10:00:00.000Z',
          finishedAt: '2024-05-01T10:00:01.000Z',
          status: 'failed',
          unavailableSides: [],
          counters: {
            candidates: 0,
            pushes: 0,
            dryRunPushes: 0,
            suppressed: { cooldown: 0, direction: 0, 'dry-run': 0 },
            conflicts: 0,
            failures: 0,
            skipped: 0,
            dropped: 0,
          },
          error: 'Failed to save state',
        },
      })

      expect(output.endsWith('earmark_last_tick_success 0\n')).toBe(true)
    })
  })

  describe('GET /metrics', () => {
    it('should serve the Prometheus text format without a token', async (ctx) => {
      server.use(...idlePlatformHandlers)
      const app = await build(ctx, { statusToken: 'test-secret' })
      await app.positionSync.runTick()

      const response = await app.inject({
        method: 'GET',
        url: '/metrics',
      })

      expect(response.statusCode).toBe(200)
      expect(response.headers['content-type']).toBe(
        'text/plain; version=0.0.4; charset=utf-8',
      )
      expect(response.body.split('\n')).toContain('earmark_watchlist_size 0')
      expect(response.body.split('\n')).toContain(
        'earmark_last_tick_books{outcome="candidate"} 0',
      )
    })
  })
})
