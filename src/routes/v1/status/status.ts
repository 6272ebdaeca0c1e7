import { ErrorSchema } from '@schemas/common/error.schema.js'
import {
  BookParamsSchema,
  BookStateResponseSchema,
  SyncStatusResponseSchema,
} from '@schemas/status/status.schema.js'
import type { FastifyPluginAsyncZod } from 'fastify-type-provider-zod'

const plugin: FastifyPluginAsyncZod = async (fastify) => {
  fastify.get(
    '/',
    {
      schema: {
        summary: 'Get sync status',
        operationId: 'getSyncStatus',
        description:
          'Watchlist and tracked book counts, the last tick report and the effective sync settings',
        response: {
          200: SyncStatusResponseSchema,
          401: ErrorSchema,
        },
        tags: ['Status'],
      },
    },
    async () => {
      return fastify.positionSync.getStatus()
    },
  )

  fastify.get(
    '/books/:bookId',
    {
      schema: {
        summary: 'Get book sync state',
        operationId: 'getBookState',
        description: 'Persisted sync state for one book, keyed by ASIN',
        params: BookParamsSchema,
        response: {
          200: BookStateResponseSchema,
          401: ErrorSchema,
          404: ErrorSchema,
        },
        tags: ['Status'],
      },
    },
    async (request, reply) => {
      const { bookId } = request.params
      const book = fastify.positionSync.getBook(bookId)

      if (!book) {
        return reply.code(404).send({
          statusCode: 404,
          code: 'BOOK_NOT_FOUND',
          error: 'Not Found',
          message: `No sync state for ${bookId}`,
        })
      }

      return {
        ...book,
        onWatchlist: fastify.positionSync.isOnWatchlist(bookId),
      }
    },
  )
}

export default plugin
