import env from '@fastify/env'
import type { Config } from '@root/types/config.types.js'
import { resolveEnvPath } from '@utils/data-dir.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

const schema = {
  type: 'object',
  required: ['port'],
  properties: {
    port: {
      type: 'number',
      default: 8080,
    },
    logLevel: {
      type: 'string',
      enum: ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'],
      default: 'info',
    },
    closeGraceDelay: {
      type: 'number',
      default: 45000,
    },
    rateLimitMax: {
      type: 'number',
      default: 120,
    },
    statusToken: {
      type: 'string',
      default: '',
    },
    absBaseUrl: {
      type: 'string',
      default: '',
    },
    absToken: {
      type: 'string',
      default: '',
    },
    absLibraryId: {
      type: 'string',
      default: '',
    },
    audibleLocale: {
      type: 'string',
      enum: ['us', 'uk', 'de', 'fr', 'ca', 'au', 'in', 'it', 'jp', 'es', 'br'],
      default: 'us',
    },
    audibleAuthPath: {
      type: 'string',
      default: './data/audible_session.json',
    },
    audibleRecentlyPlayedLimit: {
      type: 'number',
      minimum: 1,
      default: 10,
    },
    audibleDeepScanIntervalSeconds: {
      type: 'number',
      minimum: 0,
      default: 86400,
    },
    audibleDeepScanMaxInProgress: {
      type: 'number',
      minimum: 1,
      default: 200,
    },
    audiblePurchaseScanIntervalSeconds: {
      type: 'number',
      minimum: 0,
      default: 21600,
    },
    statePath: {
      type: 'string',
      default: './data/state.json',
    },
    persistEnabled: {
      type: 'boolean',
      default: true,
    },
    syncIntervalSeconds: {
      type: 'number',
      minimum: 1,
      default: 120,
    },
    moveThresholdSeconds: {
      type: 'number',
      minimum: 0,
      default: 5,
    },
    cooldownSeconds: {
      type: 'number',
      minimum: 0,
      default: 60,
    },
    syncMode: {
      type: 'string',
      enum: ['bidirectional', 'audible-to-abs', 'abs-to-audible'],
      default: 'bidirectional',
    },
    dryRun: {
      type: 'boolean',
      default: false,
    },
    watchlistRetentionHours: {
      type: 'number',
      minimum: 0,
      default: 72,
    },
    watchlistMaxSize: {
      type: 'number',
      minimum: 1,
      default: 500,
    },
    requestTimeoutSeconds: {
      type: 'number',
      minimum: 1,
      default: 30,
    },
    maxRetries: {
      type: 'number',
      minimum: 0,
      default: 3,
    },
    retryBaseDelayMs: {
      type: 'number',
      minimum: 0,
      default: 1000,
    },
    fetchConcurrency: {
      type: 'number',
      minimum: 1,
      default: 4,
    },
  },
}

declare module 'fastify' {
  interface FastifyInstance {
    config: Config
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    await fastify.register(env, {
      confKey: 'config',
      schema,
      dotenv: {
        path: resolveEnvPath(),
        debug: process.env.NODE_ENV === 'development',
      },
      data: process.env,
    })

    const { config } = fastify

    if (!config.absBaseUrl || !config.absToken) {
      throw new Error(
        'absBaseUrl and absToken are required to reach Audiobookshelf.',
      )
    }

    if (!URL.canParse(config.absBaseUrl)) {
      throw new Error(`absBaseUrl is not a valid URL: ${config.absBaseUrl}`)
    }

    // stop() waits for the request in flight before the final save
    const shutdownNeedsMs = config.requestTimeoutSeconds * 1000 + 5000
    if (config.closeGraceDelay < shutdownNeedsMs) {
      fastify.log.warn(
        `closeGraceDelay (${config.closeGraceDelay}ms) is shorter than one request timeout plus 5s (${shutdownNeedsMs}ms); shutdown may exit before the final state save`,
      )
    }

    if (config.dryRun) {
      fastify.log.warn(
        'Dry run enabled: positions will be compared but never written',
      )
    }

    if (!config.persistEnabled) {
      fastify.log.warn(
        'State persistence disabled: sync state will not survive a restart',
      )
    }
  },
  {
    name: 'config',
  },
)
