import { join } from 'node:path'
import {
  projectRoot,
  resolveDataDir,
  resolveDataPath,
  resolveEnvPath,
  resolveLogPath,
} from '@utils/data-dir.js'
import { afterEach, describe, expect, it, vi } from 'vitest'

describe('data-dir', () => {
  afterEach(() => {
    vi.unstubAllEnvs()
  })

  describe('with an explicit data directory', () => {
    it('should place every file under it', () => {
      vi.stubEnv('dataDir', '/srv/earmark')

      expect(resolveDataDir()).toBe('/srv/earmark')
      expect(resolveEnvPath()).toBe('/srv/earmark/.env')
      expect(resolveLogPath()).toBe('/srv/earmark/logs')
      expect(resolveDataPath('./data/state.json')).toBe(
        '/srv/earmark/data/state.json',
      )
    })

    it('should leave absolute paths alone', () => {
      vi.stubEnv('dataDir', '/srv/earmark')

      expect(resolveDataPath('/var/lib/earmark/state.json')).toBe(
        '/var/lib/earmark/state.json',
      )
    })
  })

  describe.runIf(process.platform === 'linux')('without a data directory', () => {
    it('should resolve against the project root', () => {
      vi.stubEnv('dataDir', '')

      expect(resolveDataDir()).toBeNull()
      expect(resolveEnvPath()).toBe(join(projectRoot, '.env'))
      expect(resolveLogPath()).toBe(join(projectRoot, 'data', 'logs'))
      expect(resolveDataPath('./data/state.json')).toBe(
        join(projectRoot, 'data', 'state.json'),
      )
    })
  })
})
