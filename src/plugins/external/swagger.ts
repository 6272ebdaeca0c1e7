import fastifySwagger from '@fastify/swagger'
import { APP_VERSION } from '@utils/version.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'
import {
  jsonSchemaTransform,
  serializerCompiler,
  validatorCompiler,
} from 'fastify-type-provider-zod'

const createOpenapiConfig = (fastify: FastifyInstance) => ({
  openapi: {
    info: {
      title: 'Earmark API',
      description:
        'Status and control surface for the Audible and Audiobookshelf listening position sync',
      version: APP_VERSION,
    },
    servers: [
      {
        url: `http://localhost:${fastify.config.port}`,
        description: 'Localhost Access (with port)',
      },
    ],
    tags: [
      { name: 'System', description: 'Health and metrics endpoints' },
      { name: 'Status', description: 'Sync state inspection endpoints' },
      { name: 'Sync', description: 'Sync control endpoints' },
    ],
    components: {
      securitySchemes: {
        statusToken: {
          type: 'apiKey' as const,
          in: 'header' as const,
          name: 'X-Token',
          description: 'Shared secret from the statusToken setting',
        },
      },
    },
  },
  hideUntagged: true,
  transform: jsonSchemaTransform,
})

export default fp(
  async (fastify: FastifyInstance) => {
    // Zod validators and serializers for every route
    fastify.setValidatorCompiler(validatorCompiler)
    fastify.setSerializerCompiler(serializerCompiler)

    /**
     * @see {@link https://github.com/fastify/fastify-swagger}
     */
    await fastify.register(fastifySwagger, createOpenapiConfig(fastify))

    fastify.get('/openapi.json', { schema: { hide: true } }, async () =>
      fastify.swagger(),
    )
  },
  {
    name: 'swagger',
    dependencies: ['config'],
  },
)
