import helmet, { type FastifyHelmetOptions } from '@fastify/helmet'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

// JSON and plain-text API only: no documents to frame or script
const helmetConfig: FastifyHelmetOptions = {
  global: true,
  contentSecurityPolicy: {
    directives: {
      defaultSrc: ["'none'"],
      frameAncestors: ["'none'"],
    },
  },
  hsts: false,
  hidePoweredBy: true,
  noSniff: true,
  frameguard: {
    action: 'deny',
  },
}

export default fp(
  async (fastify: FastifyInstance) => {
    await fastify.register(helmet, helmetConfig)
  },
  {
    name: 'helmet-plugin',
    dependencies: ['config'],
  },
)
