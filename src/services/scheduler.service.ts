/**
 * Scheduler Service
 *
 * In-memory interval scheduling on top of toad-scheduler.
 *
 * Responsible for:
 * - Registering interval jobs and their handlers
 * - Preventing overlapping runs of the same job
 * - Recording the outcome of the last run
 * - Manual runs outside the schedule
 *
 * @example
 * const scheduler = new SchedulerService(log)
 * scheduler.scheduleJob('position-sync', { seconds: 120 }, async () => {
 *   await positionSync.runTick()
 * })
 */
import type {
  IntervalConfig,
  JobRunInfo,
  JobStatus,
} from '@root/types/scheduler.types.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger } from 'fastify'
import { AsyncTask, SimpleIntervalJob, ToadScheduler } from 'toad-scheduler'

/** Handler function type for scheduled jobs */
export type JobHandler = (jobName: string) => Promise<void>

interface JobEntry {
  job: SimpleIntervalJob
  handler: JobHandler
  intervalMs: number
  running: boolean
  lastRun: JobRunInfo | null
  nextRunAt: number | null
}

/**
 * Converts an interval configuration to milliseconds
 */
export function intervalToMs(config: IntervalConfig): number {
  return (
    ((config.days ?? 0) * 86_400 +
      (config.hours ?? 0) * 3_600 +
      (config.minutes ?? 0) * 60 +
      (config.seconds ?? 0)) *
    1000
  )
}

export class SchedulerService {
  private readonly log: FastifyBaseLogger
  private readonly scheduler = new ToadScheduler()
  private readonly jobs = new Map<string, JobEntry>()

  constructor(
    baseLog: FastifyBaseLogger,
    private readonly clock: () => number = Date.now,
  ) {
    this.log = createServiceLogger(baseLog, 'SCHEDULER')
    this.log.info('Scheduler service initialized')
  }

  /**
   * Registers a handler on an interval, replacing any job of the same name
   *
   * @returns false when the interval is not a positive duration
   */
  scheduleJob(
    name: string,
    config: IntervalConfig,
    handler: JobHandler,
  ): boolean {
    const intervalMs = intervalToMs(config)
    if (intervalMs <= 0) {
      this.log.error(`Refusing to schedule ${name}: interval must be positive`)
      return false
    }

    if (this.jobs.has(name)) {
      this.scheduler.removeById(name)
      this.log.info(`Replacing existing job: ${name}`)
    }

    const task = new AsyncTask(
      `${name}-task`,
      () => this.execute(name),
      (error) => {
        this.log.error({ error }, `Job task error for ${name}`)
      },
    )

    const job = new SimpleIntervalJob(
      {
        ...config,
        runImmediately: config.runImmediately ?? false,
      },
      task,
      {
        id: name,
        preventOverrun: true,
      },
    )

    this.jobs.set(name, {
      job,
      handler,
      intervalMs,
      running: false,
      lastRun: null,
      nextRunAt: config.runImmediately ? this.clock() : this.clock() + intervalMs,
    })
    this.scheduler.addSimpleIntervalJob(job)

    this.log.info(
      `Job ${name} scheduled every ${Math.round(intervalMs / 1000)}s`,
    )
    return true
  }

  /**
   * Remove a job from the scheduler
   */
  unscheduleJob(name: string): boolean {
    if (!this.jobs.has(name)) return false

    this.scheduler.removeById(name)
    this.jobs.delete(name)
    this.log.info(`Job ${name} unscheduled`)
    return true
  }

  /**
   * Runs a job immediately, outside of its schedule
   *
   * @returns false when the job is unknown, already running or fails
   */
  async runJobNow(name: string): Promise<boolean> {
    const entry = this.jobs.get(name)
    if (!entry) {
      this.log.warn(`Cannot run unknown job: ${name}`)
      return false
    }

    if (entry.running) {
      this.log.info(`Job ${name} is already running, skipping manual run`)
      return false
    }

    this.log.info(`Manually running job: ${name}`)
    await this.execute(name)
    return entry.lastRun?.status === 'completed'
  }

  getJobStatus(name: string): JobStatus | null {
    const entry = this.jobs.get(name)
    if (!entry) return null

    return {
      name,
      intervalSeconds: Math.round(entry.intervalMs / 1000),
      running: entry.running,
      lastRun: entry.lastRun,
      nextRun:
        entry.nextRunAt === null
          ? null
          : {
              time: new Date(entry.nextRunAt).toISOString(),
              status: 'pending',
              estimated: true,
            },
    }
  }

  /**
   * Get a list of all registered job names
   */
  getActiveJobs(): string[] {
    return Array.from(this.jobs.keys())
  }

  /**
   * Stop the scheduler and all running jobs
   *
   * Should be called during application shutdown.
   */
  stop(): void {
    this.log.info('Stopping all scheduled jobs')
    this.scheduler.stop()
  }

  /**
   * Runs a handler and records the outcome; never rejects
   */
  private async execute(name: string): Promise<void> {
    const entry = this.jobs.get(name)
    if (!entry) return

    if (entry.running) {
      this.log.debug(`Job ${name} still running, skipping this run`)
      return
    }

    const startedAt = this.clock()
    entry.running = true
    entry.nextRunAt = startedAt + entry.intervalMs

    try {
      this.log.debug(`Running job: ${name}`)
      await entry.handler(name)
      entry.lastRun = {
        time: new Date(startedAt).toISOString(),
        status: 'completed',
      }
      this.log.debug(`Job ${name} completed successfully`)
    } catch (error) {
      this.log.error({ error }, `Error in job ${name}`)
      entry.lastRun = {
        time: new Date(startedAt).toISOString(),
        status: 'failed',
        error: error instanceof Error ? error.message : String(error),
      }
    } finally {
      entry.running = false
    }
  }
}
