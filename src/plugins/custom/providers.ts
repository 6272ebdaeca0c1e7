/**
 * Providers Plugin
 *
 * Builds the Audible and Audiobookshelf position providers from config and
 * exposes them as a registry keyed by side. Audible also serves the library
 * scans behind watchlist discovery.
 */
import type {
  DiscoverySource,
  ProviderRegistry,
} from '@root/types/provider.types.js'
import {
  AudibleProvider,
  AudiobookshelfProvider,
  FileCredentialSource,
} from '@services/providers/index.js'
import { resolveDataPath } from '@utils/data-dir.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

declare module 'fastify' {
  interface FastifyInstance {
    providers: ProviderRegistry
    discovery: DiscoverySource
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    const { config } = fastify
    const timeoutMs = config.requestTimeoutSeconds * 1000

    const audible = new AudibleProvider(
      createServiceLogger(fastify.log, 'AUDIBLE'),
      new FileCredentialSource(resolveDataPath(config.audibleAuthPath)),
      {
        locale: config.audibleLocale,
        recentlyPlayedLimit: config.audibleRecentlyPlayedLimit,
        timeoutMs,
      },
    )

    const providers: ProviderRegistry = {
      audible,
      abs: new AudiobookshelfProvider(createServiceLogger(fastify.log, 'ABS'), {
        baseUrl: config.absBaseUrl,
        token: config.absToken,
        libraryId: config.absLibraryId || undefined,
        timeoutMs,
      }),
    }

    fastify.decorate('providers', providers)
    fastify.decorate('discovery', audible)
  },
  {
    name: 'providers',
    dependencies: ['config'],
  },
)
