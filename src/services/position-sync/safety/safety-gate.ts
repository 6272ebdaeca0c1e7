import type {
  BookState,
  Decision,
  GateVerdict,
  SafetyGateConfig,
  Side,
  SyncMode,
} from '@root/types/position-sync.types.js'
import type { FastifyBaseLogger } from 'fastify'
import { clampPosition } from '../reconciliation/book-state.js'

type PushDecision = Extract<Decision, { kind: 'push' }>

/**
 * Whether a push towards `target` is permitted under the configured mode
 */
export function isDirectionAllowed(mode: SyncMode, target: Side): boolean {
  switch (mode) {
    case 'bidirectional':
      return true
    case 'audible-to-abs':
      return target === 'abs'
    case 'abs-to-audible':
      return target === 'audible'
  }
}

/**
 * Filters a push decision through the write policies.
 *
 * Checks run in order: directional mode, target cooldown, dry-run. The
 * position is clamped again against the book's duration regardless of what
 * the reconciler produced.
 *
 * @param decision - Push decision from the reconciler
 * @param state - Book state the decision was computed into
 * @param config - Gate settings
 * @param now - Engine-local time (epoch ms)
 * @param logger - Logger instance
 */
export function applySafetyGate(
  decision: PushDecision,
  state: BookState,
  config: SafetyGateConfig,
  now: number,
  logger: FastifyBaseLogger,
): GateVerdict {
  const { source, target } = decision
  const positionSeconds = clampPosition(
    decision.positionSeconds,
    state.durationSeconds,
  )

  if (positionSeconds !== decision.positionSeconds) {
    logger.warn(
      `Clamped push for ${state.bookId} from ${decision.positionSeconds}s to ${positionSeconds}s`,
    )
  }

  if (!isDirectionAllowed(config.syncMode, target)) {
    logger.debug(
      `Suppressed push to ${target} for ${state.bookId}: mode is ${config.syncMode}`,
    )
    return {
      verdict: 'suppressed',
      reason: 'direction',
      source,
      target,
      positionSeconds,
    }
  }

  const cooldownUntil = state.cooldownUntil[target]
  if (cooldownUntil !== undefined && now < cooldownUntil) {
    logger.info(
      `Throttled push to ${target} for ${state.bookId}: cooldown active for another ${Math.ceil((cooldownUntil - now) / 1000)}s`,
    )
    return {
      verdict: 'suppressed',
      reason: 'cooldown',
      source,
      target,
      positionSeconds,
    }
  }

  if (config.dryRun) {
    logger.info(
      `[DRY RUN] Would push ${positionSeconds.toFixed(1)}s from ${source} to ${target} for ${state.bookId}`,
    )
    return {
      verdict: 'suppressed',
      reason: 'dry-run',
      source,
      target,
      positionSeconds,
    }
  }

  return { verdict: 'approved', source, target, positionSeconds }
}
