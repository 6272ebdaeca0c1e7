import fs from 'node:fs'
import { config } from 'dotenv'
import type { FastifyBaseLogger, FastifyRequest } from 'fastify'
import type { Level, LevelWithSilent, LoggerOptions } from 'pino'
import pino from 'pino'
import * as rfs from 'rotating-file-stream'
import { resolveEnvPath, resolveLogPath } from './data-dir.js'

export const validLogLevels: LevelWithSilent[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
]

interface FileLoggerOptions extends LoggerOptions {
  stream: rfs.RotatingFileStream | NodeJS.WriteStream
}

interface MultiStreamLoggerOptions extends LoggerOptions {
  stream: pino.MultiStreamRes
}

type EarmarkLoggerOptions =
  | LoggerOptions
  | FileLoggerOptions
  | MultiStreamLoggerOptions

// Load .env file early for logger configuration
config({ path: resolveEnvPath() })

function isLogLevel(value: string | undefined): value is LevelWithSilent {
  return validLogLevels.some((level) => level === value)
}

/**
 * Log level from the `logLevel` environment variable, falling back to info
 */
function resolveLogLevel(): LevelWithSilent {
  const level = process.env.logLevel
  return isLogLevel(level) ? level : 'info'
}

/**
 * Serializes errors, including ProviderError's `kind`/`side` fields and the
 * `cause` chain. Stack traces are left out for 4xx statuses.
 */
export function serializeError(err: unknown): unknown {
  if (err === null || err === undefined) {
    return err
  }

  if (typeof err !== 'object') {
    const primitiveType =
      typeof err === 'string'
        ? 'StringError'
        : typeof err === 'number'
          ? 'NumberError'
          : 'BooleanError'
    return { message: String(err), type: primitiveType }
  }

  const serialized: Record<string, unknown> = {}

  if ('message' in err && err.message) serialized.message = err.message
  if ('name' in err && err.name) serialized.name = err.name
  if ('status' in err && err.status !== undefined)
    serialized.status = err.status
  if ('statusCode' in err && err.statusCode !== undefined)
    serialized.statusCode = err.statusCode

  if (err instanceof TypeError) {
    serialized.type = 'TypeError'
  } else if (err instanceof RangeError) {
    serialized.type = 'RangeError'
  } else if (err instanceof Error) {
    serialized.type = 'Error'
  } else if ('name' in err && typeof err.name === 'string' && err.name) {
    serialized.type = err.name
  } else {
    serialized.type = 'UnknownError'
  }

  const statusCode =
    'statusCode' in err && typeof err.statusCode === 'number'
      ? err.statusCode
      : 'status' in err && typeof err.status === 'number'
        ? err.status
        : undefined
  const shouldIncludeStack = !statusCode || statusCode >= 500
  if ('stack' in err && err.stack && shouldIncludeStack) {
    serialized.stack = err.stack
  }

  // cause is non-enumerable on Error
  if ('cause' in err && err.cause) {
    serialized.cause = serializeError(err.cause)
  }

  for (const [key, value] of Object.entries(err)) {
    if (
      !['message', 'stack', 'name', 'status', 'statusCode', 'type'].includes(
        key,
      )
    ) {
      serialized[key] = value
    }
  }

  return serialized
}

/**
 * Masks credential-bearing query parameters in a URL or path
 */
export function redactUrl(url: string): string {
  return url
    .replace(/([?&])apiKey=([^&]+)/gi, '$1apiKey=[REDACTED]')
    .replace(/([?&])token=([^&]+)/gi, '$1token=[REDACTED]')
    .replace(/([?&])access_token=([^&]+)/gi, '$1access_token=[REDACTED]')
}

function createRequestSerializer() {
  return (req: FastifyRequest) => ({
    method: req.method,
    url: redactUrl(req.url),
    host: req.headers.host,
    remoteAddress: req.ip,
    remotePort: req.socket.remotePort,
  })
}

const serializers = {
  req: createRequestSerializer(),
  error: serializeError,
  err: serializeError,
}

/**
 * Derives a logger whose messages carry a `[NAME]` prefix
 *
 * @example
 * const log = createServiceLogger(fastify.log, 'POSITION_SYNC')
 * log.info('Tick started') // "[POSITION_SYNC] Tick started"
 */
export function createServiceLogger(
  base: FastifyBaseLogger,
  name: string,
): FastifyBaseLogger {
  return base.child({}, { msgPrefix: `[${name}] ` })
}

/**
 * Rotated log file names: `earmark-current.log` for the live file,
 * `earmark-YYYY-MM-DD[-index].log` once rotated.
 */
function filename(time: number | Date, index?: number): string {
  if (!time) return 'earmark-current.log'
  const date = typeof time === 'number' ? new Date(time) : time
  const year = date.getFullYear()
  const month = String(date.getMonth() + 1).padStart(2, '0')
  const day = String(date.getDate()).padStart(2, '0')
  const indexStr = index ? `-${index}` : ''
  return `earmark-${year}-${month}-${day}${indexStr}.log`
}

/**
 * Creates the rotating log file stream, or falls back to stdout when the log
 * directory cannot be created
 */
function getFileStream(): rfs.RotatingFileStream | NodeJS.WriteStream {
  const logDirectory = resolveLogPath()
  try {
    if (!fs.existsSync(logDirectory)) {
      fs.mkdirSync(logDirectory, { recursive: true })
    }
    return rfs.createStream(filename, {
      size: '10M',
      path: logDirectory,
      compress: 'gzip',
      maxFiles: 7,
    })
  } catch (err) {
    console.error('Failed to setup log directory:', err)
    return process.stdout
  }
}

const prettyOptions = {
  translateTime: 'HH:MM:ss Z',
  ignore: 'pid,hostname',
  colorize: true,
}

function getTerminalOptions(level: LevelWithSilent): LoggerOptions {
  return {
    level,
    transport: {
      target: 'pino-pretty',
      options: prettyOptions,
    },
    serializers,
  }
}

/**
 * Generates logger configuration options based on environment variables.
 *
 * Environment variables:
 * - logLevel: pino level (default: info)
 * - enableConsoleOutput: Show logs in terminal (default: true)
 * - enableFileLogging: Write rotating log files (default: true)
 */
export function createLoggerConfig(): EarmarkLoggerOptions {
  const level = resolveLogLevel()
  const enableConsoleOutput = process.env.enableConsoleOutput !== 'false'
  const enableFileLogging = process.env.enableFileLogging !== 'false'

  if (!enableFileLogging) {
    return getTerminalOptions(level)
  }

  const fileStream = getFileStream()

  if (!enableConsoleOutput) {
    return { level, stream: fileStream, serializers }
  }

  // Avoid double-logging if the file stream fell back to stdout
  if (fileStream === process.stdout) {
    return getTerminalOptions(level)
  }

  const prettyStream = pino.transport({
    target: 'pino-pretty',
    options: prettyOptions,
  })

  // multistream entries default to info and take no 'silent'
  const streamLevel: Level = level === 'silent' ? 'fatal' : level
  const multistream = pino.multistream([
    { stream: prettyStream, level: streamLevel },
    { stream: fileStream, level: streamLevel },
  ])

  return { level, stream: multistream, serializers }
}
