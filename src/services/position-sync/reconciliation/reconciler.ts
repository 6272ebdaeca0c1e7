import type {
  BookState,
  Decision,
  KnownPosition,
  Observation,
  PushRecord,
  ReconcileOptions,
  ReconcileResult,
  Side,
} from '@root/types/position-sync.types.js'
import { SIDES } from '@root/types/position-sync.types.js'
import { clampPosition, mergeDuration, otherSide } from './book-state.js'

/**
 * Most authoritative time signal for a side: the platform's own update time
 * when it reports one, otherwise when we saw the change.
 */
function timeSignal(observation: Observation): number {
  return observation.sourceTimestamp ?? observation.observedAt
}

/**
 * Decides what to do for one book given this tick's observations and the
 * prior state.
 *
 * A side has moved when its position differs from the last known position by
 * more than the threshold (no prior observation counts as position 0). A move
 * that lands on the value we last pushed to that side is our own write coming
 * back and is not counted. One moved side is copied to the other; two moved
 * sides are settled by the later time signal, and an exact tie is reported as
 * a conflict without writing anything.
 */
export function decide(
  prior: BookState,
  observations: Partial<Record<Side, Observation>>,
  options: ReconcileOptions,
): ReconcileResult {
  const { moveThresholdSeconds: threshold, now } = options
  const durationSeconds = mergeDuration(prior.durationSeconds, observations)

  const lastKnown: Partial<Record<Side, KnownPosition>> = {
    ...prior.lastKnown,
  }
  const lastPushed: Partial<Record<Side, PushRecord>> = {
    ...prior.lastPushed,
  }
  const positions: Partial<Record<Side, number>> = {}
  const movedSides: Side[] = []

  for (const side of SIDES) {
    const observation = observations[side]
    if (!observation) continue

    const position = clampPosition(observation.positionSeconds, durationSeconds)
    positions[side] = position

    const previous = prior.lastKnown[side]?.positionSeconds ?? 0
    const significant = Math.abs(position - previous) > threshold

    const pushed = prior.lastPushed[side]
    const isEcho =
      pushed !== undefined &&
      !pushed.acknowledged &&
      Math.abs(position - pushed.positionSeconds) <= threshold
    if (isEcho && pushed) {
      lastPushed[side] = { ...pushed, acknowledged: true }
    }

    if (significant && !isEcho) movedSides.push(side)

    lastKnown[side] = {
      positionSeconds: position,
      observedAt: observation.observedAt,
      sourceTimestamp: observation.sourceTimestamp,
    }
  }

  const decision = resolve(movedSides, positions, observations, threshold)

  const nextState: BookState = {
    ...prior,
    durationSeconds,
    lastKnown,
    lastPushed,
    lastConflictAt:
      decision.kind === 'conflict' ? now : prior.lastConflictAt,
    updatedAt: now,
  }

  return { decision, nextState, movedSides }
}

function resolve(
  movedSides: Side[],
  positions: Partial<Record<Side, number>>,
  observations: Partial<Record<Side, Observation>>,
  threshold: number,
): Decision {
  const audible = positions.audible
  const abs = positions.abs

  if (movedSides.length === 0) {
    return { kind: 'none', reason: 'unchanged' }
  }

  if (movedSides.length === 1) {
    const source = movedSides[0]
    const target = otherSide(source)
    const sourcePosition = positions[source]
    const targetPosition = positions[target]

    if (sourcePosition === undefined || targetPosition === undefined) {
      return { kind: 'none', reason: 'target-unavailable' }
    }
    if (Math.abs(sourcePosition - targetPosition) <= threshold) {
      return { kind: 'none', reason: 'in-sync' }
    }
    return {
      kind: 'push',
      source,
      target,
      positionSeconds: sourcePosition,
      resolvedBy: 'single-move',
    }
  }

  // Both sides moved: a concurrent session on each platform
  const audibleObservation = observations.audible
  const absObservation = observations.abs
  if (
    audible === undefined ||
    abs === undefined ||
    !audibleObservation ||
    !absObservation
  ) {
    return { kind: 'none', reason: 'target-unavailable' }
  }
  if (Math.abs(audible - abs) <= threshold) {
    return { kind: 'none', reason: 'in-sync' }
  }

  const audibleTime = timeSignal(audibleObservation)
  const absTime = timeSignal(absObservation)

  if (audibleTime > absTime) {
    return {
      kind: 'push',
      source: 'audible',
      target: 'abs',
      positionSeconds: audible,
      resolvedBy: 'recency',
    }
  }
  if (absTime > audibleTime) {
    return {
      kind: 'push',
      source: 'abs',
      target: 'audible',
      positionSeconds: abs,
      resolvedBy: 'recency',
    }
  }

  return {
    kind: 'conflict',
    positions: { audible, abs },
    timestamps: { audible: audibleTime, abs: absTime },
  }
}
