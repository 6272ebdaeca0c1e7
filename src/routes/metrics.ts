import type { PositionSyncStatus } from '@root/types/position-sync.types.js'
import type { FastifyPluginAsync } from 'fastify'

/**
 * Renders sync status in the Prometheus text exposition format
 */
export function renderMetrics(status: PositionSyncStatus): string {
  const lines: string[] = []
  const gauge = (name: string, help: string, value: number) => {
    lines.push(`# HELP ${name} ${help}`, `# TYPE ${name} gauge`, `${name} ${value}`)
  }

  gauge('earmark_watchlist_size', 'Books polled on every tick', status.watchlistSize)
  gauge('earmark_books_tracked', 'Books with persisted sync state', status.trackedBooks)
  gauge(
    'earmark_last_sync_timestamp_seconds',
    'Unix time of the last successful tick, 0 if none',
    status.lastSuccessfulSyncAt === null
      ? 0
      : Math.floor(Date.parse(status.lastSuccessfulSyncAt) / 1000),
  )

  const tick = status.lastTick
  if (tick) {
    const { counters } = tick
    lines.push(
      '# HELP earmark_last_tick_books Per-outcome book counts of the last tick',
      '# TYPE earmark_last_tick_books gauge',
      `earmark_last_tick_books{outcome="candidate"} ${counters.candidates}`,
      `earmark_last_tick_books{outcome="pushed"} ${counters.pushes}`,
      `earmark_last_tick_books{outcome="dry_run"} ${counters.dryRunPushes}`,
      `earmark_last_tick_books{outcome="conflict"} ${counters.conflicts}`,
      `earmark_last_tick_books{outcome="failed"} ${counters.failures}`,
      `earmark_last_tick_books{outcome="skipped"} ${counters.skipped}`,
      `earmark_last_tick_books{outcome="dropped"} ${counters.dropped}`,
    )
    for (const [reason, count] of Object.entries(counters.suppressed)) {
      lines.push(
        `earmark_last_tick_books{outcome="suppressed",reason="${reason}"} ${count}`,
      )
    }
    gauge(
      'earmark_last_tick_success',
      '1 if the last tick completed, 0 otherwise',
      tick.status === 'completed' ? 1 : 0,
    )
  }

  return `${lines.join('\n')}\n`
}

const plugin: FastifyPluginAsync = async (fastify) => {
  fastify.get(
    '/metrics',
    {
      schema: {
        summary: 'Prometheus metrics',
        operationId: 'getMetrics',
        description: 'Sync gauges in the Prometheus text format',
        tags: ['System'],
      },
    },
    async (_request, reply) => {
      return reply
        .type('text/plain; version=0.0.4; charset=utf-8')
        .send(renderMetrics(fastify.positionSync.getStatus()))
    },
  )
}

export default plugin
