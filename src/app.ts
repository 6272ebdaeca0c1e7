import path from 'node:path'
import { fileURLToPath } from 'node:url'
import fastifyAutoload from '@fastify/autoload'
import type { FastifyInstance, FastifyPluginOptions } from 'fastify'

const __dirname = path.dirname(fileURLToPath(import.meta.url))

/**
 * Loads external plugins (config, security, rate limiting), then the custom
 * plugins that wire the sync engine, then the routes.
 */
export default async function serviceApp(
  fastify: FastifyInstance,
  opts: FastifyPluginOptions,
) {
  await fastify.register(fastifyAutoload, {
    dir: path.join(__dirname, 'plugins/external'),
    options: {
      ...opts,
      timeout: 30000,
    },
  })

  fastify.register(fastifyAutoload, {
    dir: path.join(__dirname, 'plugins/custom'),
    options: {
      ...opts,
      timeout: 30000,
    },
  })

  fastify.register(fastifyAutoload, {
    dir: path.join(__dirname, 'routes'),
    autoHooks: true,
    cascadeHooks: true,
    options: {
      ...opts,
      timeout: 30000,
    },
  })
}
