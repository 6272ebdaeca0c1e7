import { SchedulerService, intervalToMs } from '@services/scheduler.service.js'
import type { FastifyBaseLogger } from 'fastify'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { createMockLogger } from '../../mocks/logger.js'

const NOW = 1_000_000

describe('SchedulerService', () => {
  let logger: FastifyBaseLogger
  let scheduler: SchedulerService

  beforeEach(() => {
    logger = createMockLogger()
    scheduler = new SchedulerService(logger, () => NOW)
  })

  afterEach(() => {
    scheduler.stop()
  })

  describe('intervalToMs', () => {
    it('should add up every unit', () => {
      expect(intervalToMs({ hours: 1, minutes: 2, seconds: 3 })).toBe(3_723_000)
      expect(intervalToMs({ days: 1 })).toBe(86_400_000)
      expect(intervalToMs({})).toBe(0)
    })
  })

  describe('scheduleJob', () => {
    it('should register a job with its next run', () => {
      expect(scheduler.scheduleJob('sync', { seconds: 60 }, vi.fn())).toBe(true)

      expect(scheduler.getActiveJobs()).toEqual(['sync'])
      expect(scheduler.getJobStatus('sync')).toEqual({
        name: 'sync',
        intervalSeconds: 60,
        running: false,
        lastRun: null,
        nextRun: {
          time: new Date(NOW + 60_000).toISOString(),
          status: 'pending',
          estimated: true,
        },
      })
    })

    it('should refuse a job without a positive interval', () => {
      expect(scheduler.scheduleJob('sync', { seconds: 0 }, vi.fn())).toBe(false)
      expect(scheduler.getJobStatus('sync')).toBeNull()
    })

    it('should run the handler right away when asked to', async () => {
      const handler = vi.fn().mockResolvedValue(undefined)

      scheduler.scheduleJob('sync', { seconds: 60, runImmediately: true }, handler)

      await vi.waitFor(() => {
        expect(handler).toHaveBeenCalledWith('sync')
      })
    })

    it('should replace a job registered under the same name', async () => {
      const first = vi.fn().mockResolvedValue(undefined)
      const second = vi.fn().mockResolvedValue(undefined)
      scheduler.scheduleJob('sync', { seconds: 60 }, first)
      scheduler.scheduleJob('sync', { minutes: 5 }, second)

      await scheduler.runJobNow('sync')

      expect(first).not.toHaveBeenCalled()
      expect(second).toHaveBeenCalledTimes(1)
      expect(scheduler.getJobStatus('sync')?.intervalSeconds).toBe(300)
    })
  })

  describe('runJobNow', () => {
    it('should record a completed run', async () => {
      scheduler.scheduleJob('sync', { seconds: 60 }, vi.fn().mockResolvedValue(undefined))

      expect(await scheduler.runJobNow('sync')).toBe(true)
      expect(scheduler.getJobStatus('sync')?.lastRun).toEqual({
        time: new Date(NOW).toISOString(),
        status: 'completed',
      })
    })

    it('should record a failed run', async () => {
      scheduler.scheduleJob(
        'sync',
        { seconds: 60 },
        vi.fn().mockRejectedValue(new Error('boom')),
      )

      expect(await scheduler.runJobNow('sync')).toBe(false)
      expect(scheduler.getJobStatus('sync')?.lastRun).toEqual({
        time: new Date(NOW).toISOString(),
        status: 'failed',
        error: 'boom',
      })
    })

    it('should not overlap a run that is still going', async () => {
      let finish: () => void = () => {}
      const handler = vi.fn(
        () =>
          new Promise<void>((resolve) => {
            finish = resolve
          }),
      )
      scheduler.scheduleJob('sync', { seconds: 60 }, handler)

      const running = scheduler.runJobNow('sync')
      expect(scheduler.getJobStatus('sync')?.running).toBe(true)
      expect(await scheduler.runJobNow('sync')).toBe(false)

      finish()
      expect(await running).toBe(true)
      expect(handler).toHaveBeenCalledTimes(1)
    })

    it('should return false for an unknown job', async () => {
      expect(await scheduler.runJobNow('missing')).toBe(false)
    })
  })

  describe('unscheduleJob', () => {
    it('should remove a job', () => {
      scheduler.scheduleJob('sync', { seconds: 60 }, vi.fn())

      expect(scheduler.unscheduleJob('sync')).toBe(true)
      expect(scheduler.unscheduleJob('sync')).toBe(false)
      expect(scheduler.getActiveJobs()).toEqual([])
    })
  })
})
