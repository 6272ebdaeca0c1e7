import type { Side } from '@root/types/position-sync.types.js'
import type { ProviderErrorKind } from '@root/types/provider.types.js'

export class ProviderError extends Error {
  readonly kind: ProviderErrorKind
  readonly side: Side
  readonly status?: number

  constructor(
    message: string,
    details: {
      kind: ProviderErrorKind
      side: Side
      status?: number
      cause?: unknown
    },
  ) {
    super(message, { cause: details.cause })
    this.name = 'ProviderError'
    this.kind = details.kind
    this.side = details.side
    this.status = details.status
  }
}

export function isProviderError(error: unknown): error is ProviderError {
  return error instanceof ProviderError
}

/**
 * Maps an HTTP status to a failure kind.
 *
 * 401/403 are auth failures, 404/410 mean the item is gone, 408/429/5xx are
 * worth retrying and every other 4xx is permanent.
 */
export function classifyHttpStatus(status: number): ProviderErrorKind {
  if (status === 401 || status === 403) return 'auth'
  if (status === 404 || status === 410) return 'permanent'
  if (status === 408 || status === 429 || status >= 500) return 'transient'
  return 'permanent'
}

/**
 * Normalizes anything thrown by a provider call into a ProviderError.
 * Unknown failures (network errors, timeouts) are treated as transient.
 */
export function toProviderError(error: unknown, side: Side): ProviderError {
  if (isProviderError(error)) return error

  if (error instanceof Error && error.name === 'TimeoutError') {
    return new ProviderError(`${side} request timed out`, {
      kind: 'transient',
      side,
      cause: error,
    })
  }

  const message = error instanceof Error ? error.message : String(error)
  return new ProviderError(`${side} request failed: ${message}`, {
    kind: 'transient',
    side,
    cause: error,
  })
}
