import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'

const __filename = fileURLToPath(import.meta.url)
const __dirname = dirname(__filename)

export const projectRoot = resolve(__dirname, '..', '..')

/**
 * Resolves the Earmark data directory.
 *
 * Priority:
 * 1. process.env.dataDir (explicit override)
 * 2. Windows: %PROGRAMDATA%\Earmark
 * 3. macOS: ~/.config/Earmark
 * 4. Linux/Docker: null (use project-relative paths)
 */
export function resolveDataDir(): string | null {
  if (process.env.dataDir) {
    return process.env.dataDir
  }

  if (process.platform === 'win32') {
    const programData = process.env.PROGRAMDATA || process.env.ALLUSERSPROFILE
    if (programData) {
      return resolve(programData, 'Earmark')
    }
  }

  if (process.platform === 'darwin') {
    const home = process.env.HOME
    if (home) {
      return resolve(home, '.config', 'Earmark')
    }
  }

  return null
}

/**
 * Log directory: {dataDir}/logs, or {projectRoot}/data/logs without one
 */
export function resolveLogPath(): string {
  const dataDir = resolveDataDir()
  return dataDir
    ? resolve(dataDir, 'logs')
    : resolve(projectRoot, 'data', 'logs')
}

/**
 * .env file: {dataDir}/.env, or {projectRoot}/.env without a data dir
 */
export function resolveEnvPath(): string {
  const dataDir = resolveDataDir()
  return dataDir ? resolve(dataDir, '.env') : resolve(projectRoot, '.env')
}

/**
 * Resolves a configured file path. Relative paths are taken against the data
 * directory when there is one, otherwise against the project root.
 */
export function resolveDataPath(path: string): string {
  return resolve(resolveDataDir() ?? projectRoot, path)
}
