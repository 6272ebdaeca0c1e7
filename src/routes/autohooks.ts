import { timingSafeEqual } from 'node:crypto'
import type { ErrorResponse } from '@root/schemas/common/error.schema.js'
import type { FastifyInstance } from 'fastify'

/**
 * Constant-time comparison of a presented token against the configured one
 */
export function tokenMatches(presented: string, expected: string): boolean {
  const a = Buffer.from(presented)
  const b = Buffer.from(expected)
  return a.length === b.length && timingSafeEqual(a, b)
}

export default async function (fastify: FastifyInstance) {
  const { statusToken } = fastify.config

  if (!statusToken) {
    fastify.log.warn('statusToken not set: /v1 routes are unauthenticated')
    return
  }

  fastify.addHook('onRequest', async (request, reply) => {
    const urlWithoutQuery = request.url.split('?')[0]

    // /health and /metrics stay open for health checks and scrapers
    if (!urlWithoutQuery.startsWith('/v1/')) {
      return
    }

    const presented = request.headers['x-token']
    if (typeof presented === 'string' && tokenMatches(presented, statusToken)) {
      return
    }

    const response: ErrorResponse = {
      statusCode: 401,
      code: 'UNAUTHORIZED',
      error: 'Unauthorized',
      message: 'Missing or invalid X-Token header',
    }
    return reply.code(401).send(response)
  })
}
