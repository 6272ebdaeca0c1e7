/**
 * State Store
 *
 * JSON file persistence for the sync snapshot. Writes go to a sibling
 * temporary file that is flushed and then renamed over the canonical file, so
 * the canonical file is always either the previous or the next complete
 * snapshot.
 */

import { mkdir, open, readFile, rename } from 'node:fs/promises'
import { dirname } from 'node:path'
import { SyncSnapshotSchema } from '@root/schemas/state/sync-snapshot.schema.js'
import type { SyncSnapshot } from '@root/types/position-sync.types.js'
import type { FastifyBaseLogger } from 'fastify'

export class StatePersistError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'StatePersistError'
  }
}

export function createEmptySnapshot(): SyncSnapshot {
  return {
    version: 1,
    books: {},
    watchlist: {},
    suppressed: {},
    lastSuccessfulSyncAt: null,
  }
}

export interface StateStoreOptions {
  path: string
  /** When false, persist() is a no-op and load() still reads */
  enabled: boolean
}

export class StateStore {
  constructor(
    private readonly log: FastifyBaseLogger,
    private readonly options: StateStoreOptions,
  ) {}

  get path(): string {
    return this.options.path
  }

  private get tmpPath(): string {
    return `${this.options.path}.tmp`
  }

  /**
   * Loads the last persisted snapshot. A missing, unreadable or invalid file
   * yields an empty snapshot.
   */
  async load(): Promise<SyncSnapshot> {
    let raw: string
    try {
      raw = await readFile(this.options.path, 'utf8')
    } catch (error) {
      if (
        error instanceof Error &&
        'code' in error &&
        error.code === 'ENOENT'
      ) {
        this.log.info(
          `No state file found at ${this.options.path}, starting fresh`,
        )
      } else {
        this.log.error(
          { error },
          `Failed to read state file ${this.options.path}, starting fresh`,
        )
      }
      return createEmptySnapshot()
    }

    let json: unknown
    try {
      json = JSON.parse(raw)
    } catch (error) {
      this.log.error(
        { error },
        `State file ${this.options.path} is not valid JSON, starting fresh`,
      )
      return createEmptySnapshot()
    }

    const parsed = SyncSnapshotSchema.safeParse(json)
    if (!parsed.success) {
      this.log.error(
        { issues: parsed.error.issues },
        `State file ${this.options.path} failed validation, starting fresh`,
      )
      return createEmptySnapshot()
    }

    const snapshot: SyncSnapshot = parsed.data
    this.log.info(
      `Loaded state for ${Object.keys(snapshot.books).length} books (${Object.keys(snapshot.watchlist).length} on the watchlist)`,
    )
    return snapshot
  }

  /**
   * Atomically replaces the persisted snapshot
   *
   * @throws {StatePersistError} When any step of the write fails; the
   * previously persisted file is left untouched
   */
  async persist(snapshot: SyncSnapshot): Promise<void> {
    if (!this.options.enabled) {
      this.log.debug('Persistence disabled, skipping state save')
      return
    }

    try {
      await mkdir(dirname(this.options.path), { recursive: true })

      const handle = await open(this.tmpPath, 'w')
      try {
        await handle.writeFile(JSON.stringify(snapshot, null, 2), 'utf8')
        await handle.sync()
      } finally {
        await handle.close()
      }

      await rename(this.tmpPath, this.options.path)
    } catch (error) {
      throw new StatePersistError(
        `Failed to save state to ${this.options.path}`,
        { cause: error },
      )
    }

    this.log.debug(
      `Persisted state for ${Object.keys(snapshot.books).length} books`,
    )
  }
}
