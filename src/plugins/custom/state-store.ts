import { StateStore } from '@services/position-sync/persistence/index.js'
import { resolveDataPath } from '@utils/data-dir.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

declare module 'fastify' {
  interface FastifyInstance {
    stateStore: StateStore
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    const store = new StateStore(createServiceLogger(fastify.log, 'STATE'), {
      path: resolveDataPath(fastify.config.statePath),
      enabled: fastify.config.persistEnabled,
    })
    fastify.log.info(`Sync state file: ${store.path}`)
    fastify.decorate('stateStore', store)
  },
  {
    name: 'state-store',
    dependencies: ['config'],
  },
)
