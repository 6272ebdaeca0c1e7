import { ErrorSchema } from '@schemas/common/error.schema.js'
import { TickReportSchema } from '@schemas/status/status.schema.js'
import type { FastifyPluginAsyncZod } from 'fastify-type-provider-zod'

const plugin: FastifyPluginAsyncZod = async (fastify) => {
  fastify.post(
    '/run',
    {
      schema: {
        summary: 'Run a sync tick now',
        operationId: 'runSyncTick',
        description:
          'Runs one reconciliation pass outside the schedule, or waits for the one already running, and returns its report',
        response: {
          200: TickReportSchema,
          401: ErrorSchema,
        },
        tags: ['Sync'],
      },
    },
    async () => {
      fastify.log.info('Manual sync tick requested')
      return fastify.positionSync.runTick()
    },
  )
}

export default plugin
