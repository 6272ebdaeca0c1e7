/**
 * Provider HTTP helpers
 *
 * Thin fetch wrappers that apply the per-call timeout, translate HTTP
 * statuses into ProviderError kinds and validate JSON bodies with zod.
 */

import type { Side } from '@root/types/position-sync.types.js'
import { USER_AGENT } from '@utils/version.js'
import type { z } from 'zod'
import {
  ProviderError,
  classifyHttpStatus,
  toProviderError,
} from './provider-error.js'

export interface ProviderRequest {
  side: Side
  url: string
  method?: 'GET' | 'PUT' | 'PATCH' | 'POST'
  headers?: Record<string, string>
  body?: unknown
  timeoutMs: number
}

async function send(request: ProviderRequest): Promise<Response> {
  const headers: Record<string, string> = {
    Accept: 'application/json',
    'User-Agent': USER_AGENT,
    ...request.headers,
  }
  if (request.body !== undefined) {
    headers['Content-Type'] = 'application/json'
  }

  let response: Response
  try {
    response = await fetch(request.url, {
      method: request.method ?? 'GET',
      headers,
      body: request.body !== undefined ? JSON.stringify(request.body) : undefined,
      signal: AbortSignal.timeout(request.timeoutMs),
    })
  } catch (error) {
    throw toProviderError(error, request.side)
  }

  if (!response.ok) {
    const kind = classifyHttpStatus(response.status)
    throw new ProviderError(
      `${request.side} responded ${response.status} ${response.statusText} for ${request.method ?? 'GET'} ${new URL(request.url).pathname}`,
      { kind, side: request.side, status: response.status },
    )
  }

  return response
}

/**
 * Sends a request and parses the JSON response with the given schema
 */
export async function requestJson<T>(
  request: ProviderRequest,
  schema: z.ZodType<T>,
): Promise<T> {
  const response = await send(request)

  let payload: unknown
  try {
    payload = await response.json()
  } catch (error) {
    throw toProviderError(error, request.side)
  }

  const parsed = schema.safeParse(payload)
  if (!parsed.success) {
    throw new ProviderError(
      `${request.side} returned an unexpected payload for ${new URL(request.url).pathname}`,
      { kind: 'transient', side: request.side, cause: parsed.error },
    )
  }
  return parsed.data
}

/**
 * Sends a request whose response body is irrelevant
 */
export async function requestVoid(request: ProviderRequest): Promise<void> {
  const response = await send(request)
  // Drain the body so the connection can be reused
  await response.arrayBuffer()
}
