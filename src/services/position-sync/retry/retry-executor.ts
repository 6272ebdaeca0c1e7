import type { Side } from '@root/types/position-sync.types.js'
import {
  type ProviderError,
  toProviderError,
} from '@services/providers/provider-error.js'
import { computeBackoffDelay } from '@utils/url.js'
import type { FastifyBaseLogger } from 'fastify'

/**
 * Lifecycle of one provider call:
 * pending -> (retrying -> ...) -> succeeded | failed | exhausted | aborted
 */
export type RetryState =
  | 'pending'
  | 'retrying'
  | 'succeeded'
  | 'failed'
  | 'exhausted'
  | 'aborted'

export type RetryOutcome<T> =
  | { state: 'succeeded'; value: T; attempts: number }
  | {
      state: 'failed' | 'exhausted' | 'aborted'
      error: ProviderError
      attempts: number
    }

export interface RetryPolicy {
  /** Retries after the first attempt */
  maxRetries: number
  baseDelayMs: number
  maxDelayMs?: number
}

export interface RetryDeps {
  logger: FastifyBaseLogger
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>
  random?: () => number
}

/**
 * Waits for the delay, or until the signal fires
 */
const defaultSleep = (ms: number, signal?: AbortSignal) =>
  new Promise<void>((resolve) => {
    const done = () => {
      clearTimeout(timer)
      signal?.removeEventListener('abort', done)
      resolve()
    }
    const timer = setTimeout(done, ms)
    signal?.addEventListener('abort', done, { once: true })
  })

/**
 * Runs provider calls with bounded exponential backoff.
 *
 * Only transient failures are retried. Permanent and authentication failures
 * end the call immediately in the `failed` state; transient failures that
 * outlast the retry budget end in `exhausted`. Once `signal` fires, no
 * further attempt is made and the call ends in `aborted`. Never throws.
 */
export class RetryExecutor {
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>
  private readonly random: () => number

  constructor(
    private readonly policy: RetryPolicy,
    private readonly deps: RetryDeps,
  ) {
    this.sleep = deps.sleep ?? defaultSleep
    this.random = deps.random ?? Math.random
  }

  async run<T>(
    label: string,
    side: Side,
    operation: () => Promise<T>,
    signal?: AbortSignal,
  ): Promise<RetryOutcome<T>> {
    let state: RetryState = 'pending'
    let attempts = 0

    for (;;) {
      attempts++
      try {
        const value = await operation()
        return { state: 'succeeded', value, attempts }
      } catch (error) {
        const providerError = toProviderError(error, side)

        if (providerError.kind !== 'transient') {
          return { state: 'failed', error: providerError, attempts }
        }

        if (attempts > this.policy.maxRetries) {
          this.deps.logger.warn(
            { error: providerError, state },
            `${label} gave up after ${attempts} attempts`,
          )
          return { state: 'exhausted', error: providerError, attempts }
        }

        if (signal?.aborted) {
          return { state: 'aborted', error: providerError, attempts }
        }

        const delay = computeBackoffDelay(
          attempts - 1,
          this.policy.baseDelayMs,
          this.policy.maxDelayMs,
          this.random,
        )
        this.deps.logger.warn(
          `${label} failed (${providerError.message}), retrying after ${delay}ms (attempt ${attempts}/${this.policy.maxRetries})`,
        )
        state = 'retrying'
        await this.sleep(delay, signal)

        if (signal?.aborted) {
          this.deps.logger.info(`${label} abandoned: shutting down`)
          return { state: 'aborted', error: providerError, attempts }
        }
      }
    }
  }
}
