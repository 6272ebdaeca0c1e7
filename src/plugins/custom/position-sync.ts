/**
 * Position Sync Service Plugin
 *
 * Registers the PositionSyncService and drives it from the scheduler. The
 * first tick runs as soon as the server is ready. Library discovery scans run
 * as their own, slower jobs, immediately when one is overdue.
 */
import type { DiscoveryKind } from '@root/types/provider.types.js'
import { PositionSyncService } from '@services/position-sync.service.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

declare module 'fastify' {
  interface FastifyInstance {
    positionSync: PositionSyncService
  }
}

export const POSITION_SYNC_JOB = 'position-sync'

export const DISCOVERY_JOBS: Record<DiscoveryKind, string> = {
  'in-progress': 'audible-deep-scan',
  purchases: 'audible-purchase-scan',
}

export default fp(
  async (fastify: FastifyInstance) => {
    const { config } = fastify

    const service = new PositionSyncService(
      fastify.log,
      {
        syncMode: config.syncMode,
        dryRun: config.dryRun,
        moveThresholdSeconds: config.moveThresholdSeconds,
        cooldownMs: config.cooldownSeconds * 1000,
        intervalMs: config.syncIntervalSeconds * 1000,
        watchlistRetentionMs: config.watchlistRetentionHours * 3_600_000,
        watchlistMaxSize: config.watchlistMaxSize,
        fetchConcurrency: config.fetchConcurrency,
        retry: {
          maxRetries: config.maxRetries,
          baseDelayMs: config.retryBaseDelayMs,
        },
        discovery: {
          maxInProgress: config.audibleDeepScanMaxInProgress,
          // Twice the scan interval, so a missed scan loses nothing
          purchaseLookbackMs: config.audiblePurchaseScanIntervalSeconds * 2000,
        },
      },
      {
        providers: fastify.providers,
        stateStore: fastify.stateStore,
        discovery: fastify.discovery,
      },
    )
    const discoveryScans: Array<{ kind: DiscoveryKind; seconds: number }> = [
      { kind: 'in-progress', seconds: config.audibleDeepScanIntervalSeconds },
      { kind: 'purchases', seconds: config.audiblePurchaseScanIntervalSeconds },
    ]
    await service.initialize()
    fastify.decorate('positionSync', service)

    fastify.addHook('onReady', async () => {
      fastify.scheduler.scheduleJob(
        POSITION_SYNC_JOB,
        { seconds: config.syncIntervalSeconds, runImmediately: true },
        async () => {
          const report = await service.runTick()
          if (report.status === 'failed') {
            throw new Error(report.error ?? `Tick ${report.tickId} failed`)
          }
        },
      )

      for (const { kind, seconds } of discoveryScans) {
        if (seconds <= 0) continue

        const last = service.getLastDiscoveryAt(kind)
        const overdue = last === null || Date.now() - last >= seconds * 1000
        fastify.scheduler.scheduleJob(
          DISCOVERY_JOBS[kind],
          { seconds, runImmediately: overdue },
          async () => {
            await service.runDiscovery(kind)
          },
        )
      }
    })

    fastify.addHook('onClose', async () => {
      fastify.scheduler.unscheduleJob(POSITION_SYNC_JOB)
      for (const job of Object.values(DISCOVERY_JOBS)) {
        fastify.scheduler.unscheduleJob(job)
      }
      await service.stop()
    })
  },
  {
    name: 'position-sync',
    dependencies: ['config', 'scheduler', 'state-store', 'providers'],
  },
)
