import { HealthCheckResponseSchema } from '@schemas/health/health.schema.js'
import type { FastifyPluginAsyncZod } from 'fastify-type-provider-zod'

const plugin: FastifyPluginAsyncZod = async (fastify) => {
  fastify.get(
    '/health',
    {
      schema: {
        summary: 'Health check endpoint',
        operationId: 'getHealth',
        description:
          'Reports whether the sync loop is keeping up. Used by Docker HEALTHCHECK and orchestrators. Does not require authentication.',
        response: {
          200: HealthCheckResponseSchema,
          503: HealthCheckResponseSchema,
        },
        tags: ['System'],
      },
    },
    async (_request, reply) => {
      const { status, ...sync } = fastify.positionSync.getHealth()

      if (status === 'unhealthy') {
        fastify.log.warn(
          `Health check failed: last successful sync ${sync.lastSuccessfulSyncAt ?? 'never'}`,
        )
      }

      return reply.status(status === 'unhealthy' ? 503 : 200).send({
        status,
        timestamp: new Date().toISOString(),
        checks: { sync },
      })
    },
  )
}

export default plugin
