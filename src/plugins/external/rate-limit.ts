import fastifyRateLimit from '@fastify/rate-limit'
import type { FastifyInstance, FastifyRequest } from 'fastify'
import fp from 'fastify-plugin'

// Polled by orchestrators and scrapers on their own schedule
const UNLIMITED_PATHS = new Set(['/health', '/metrics'])

const createRateLimitConfig = (fastify: FastifyInstance) => ({
  max: fastify.config.rateLimitMax,
  timeWindow: '1 minute',
  allowList: (req: FastifyRequest) =>
    UNLIMITED_PATHS.has(req.url.split('?')[0]),
})

/**
 * Per-client rate limit on every route
 *
 * @see {@link https://github.com/fastify/fastify-rate-limit}
 */
export default fp(
  async (fastify: FastifyInstance) => {
    await fastify.register(fastifyRateLimit, createRateLimitConfig(fastify))
  },
  {
    dependencies: ['config'],
  },
)
