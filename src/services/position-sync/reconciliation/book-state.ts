import type {
  BookState,
  Observation,
  Side,
} from '@root/types/position-sync.types.js'

/**
 * Returns the opposite side
 */
export function otherSide(side: Side): Side {
  return side === 'audible' ? 'abs' : 'audible'
}

/**
 * Clamps a position into [0, duration]. An unknown duration only enforces the
 * lower bound; non-finite input collapses to 0.
 */
export function clampPosition(
  positionSeconds: number,
  durationSeconds: number | null,
): number {
  if (!Number.isFinite(positionSeconds)) return 0
  const lowerBounded = Math.max(0, positionSeconds)
  if (durationSeconds === null || durationSeconds <= 0) return lowerBounded
  return Math.min(lowerBounded, durationSeconds)
}

export function createBookState(bookId: string, now: number): BookState {
  return {
    bookId,
    durationSeconds: null,
    lastKnown: {},
    lastPushed: {},
    cooldownUntil: {},
    createdAt: now,
    updatedAt: now,
  }
}

/**
 * Raises the known duration from this tick's observations. Durations only
 * ever grow.
 */
export function mergeDuration(
  current: number | null,
  observations: Partial<Record<Side, Observation>>,
): number | null {
  let duration = current
  for (const observation of Object.values(observations)) {
    const reported = observation?.durationSeconds
    if (reported === undefined || !Number.isFinite(reported) || reported <= 0)
      continue
    if (duration === null || reported > duration) duration = reported
  }
  return duration
}

/**
 * Records a confirmed write: the pushed value (awaiting its echo) and the
 * cooldown on the target side
 */
export function recordPush(
  state: BookState,
  target: Side,
  positionSeconds: number,
  now: number,
  cooldownMs: number,
): BookState {
  return {
    ...state,
    lastPushed: {
      ...state.lastPushed,
      [target]: { positionSeconds, pushedAt: now, acknowledged: false },
    },
    cooldownUntil: { ...state.cooldownUntil, [target]: now + cooldownMs },
    updatedAt: now,
  }
}

/**
 * Dry-run counterpart of recordPush: nothing was written, so only the
 * cooldown moves
 */
export function recordDryRunPush(
  state: BookState,
  target: Side,
  now: number,
  cooldownMs: number,
): BookState {
  return {
    ...state,
    cooldownUntil: { ...state.cooldownUntil, [target]: now + cooldownMs },
    updatedAt: now,
  }
}
