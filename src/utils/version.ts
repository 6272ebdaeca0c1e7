import { readFileSync } from 'node:fs'
import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'

const __dirname = dirname(fileURLToPath(import.meta.url))
const packageJson: { version: string } = JSON.parse(
  readFileSync(resolve(__dirname, '../../package.json'), 'utf8'),
)

/** Application version from package.json */
export const APP_VERSION: string = packageJson.version

/**
 * Standard User-Agent header for platform API requests
 * Format: "Earmark/0.3.0"
 */
export const USER_AGENT = `Earmark/${APP_VERSION}`
