/**
 * Audiobookshelf Provider
 *
 * Reads and writes listening progress for the configured Audiobookshelf user.
 * Audiobookshelf addresses books by library item id, so ASINs are resolved
 * through item metadata or a library search and cached for the process
 * lifetime.
 */

import {
  AbsLibrariesResponseSchema,
  AbsLibraryItemResponseSchema,
  AbsMeResponseSchema,
  type AbsMediaProgress,
  MediaProgressSchema,
  AbsSearchResponseSchema,
} from '@root/schemas/providers/audiobookshelf.schema.js'
import type {
  ActiveItem,
  PositionProvider,
  PositionReading,
} from '@root/types/provider.types.js'
import { joinUrl } from '@utils/url.js'
import type { FastifyBaseLogger } from 'fastify'
import { type ProviderRequest, requestJson, requestVoid } from './http.js'
import { ProviderError, isProviderError } from './provider-error.js'

export interface AudiobookshelfProviderOptions {
  baseUrl: string
  token: string
  /** Restrict ASIN lookups to one library */
  libraryId?: string
  timeoutMs: number
}

export class AudiobookshelfProvider implements PositionProvider {
  readonly side = 'abs' as const
  /** Progress is read one library item at a time */
  readonly readBatchSize = 1

  /** ASIN -> library item id */
  private readonly itemIdsByAsin = new Map<string, string>()

  /** library item id -> ASIN (null when the item carries none) */
  private readonly asinsByItemId = new Map<string, string | null>()

  private libraries: string[] | null = null

  constructor(
    private readonly log: FastifyBaseLogger,
    private readonly options: AudiobookshelfProviderOptions,
  ) {}

  async listActiveItems(): Promise<ActiveItem[]> {
    const me = await requestJson(this.request('/api/me'), AbsMeResponseSchema)

    const active: ActiveItem[] = []
    for (const progress of me.mediaProgress) {
      if (progress.isFinished || progress.episodeId) continue

      const asin = await this.resolveAsin(progress.libraryItemId)
      if (!asin) continue

      active.push({
        bookId: asin,
        ...this.toReading(progress),
      })
    }

    this.log.debug(
      `Audiobookshelf reports ${active.length} in-progress books with an ASIN`,
    )
    return active
  }

  /**
   * Reads each book in turn. ASINs that resolve to no library item are left
   * out; any other failure fails the whole call.
   */
  async getPositions(
    bookIds: readonly string[],
  ): Promise<Map<string, PositionReading>> {
    const readings = new Map<string, PositionReading>()
    for (const bookId of bookIds) {
      try {
        readings.set(bookId, await this.getPosition(bookId))
      } catch (error) {
        if (isProviderError(error) && error.kind === 'permanent') {
          this.log.debug({ error }, `No Audiobookshelf position for ${bookId}`)
          continue
        }
        throw error
      }
    }
    return readings
  }

  async getPosition(bookId: string): Promise<PositionReading> {
    const itemId = await this.resolveItemId(bookId)

    try {
      const progress = await requestJson(
        this.request(`/api/me/progress/${encodeURIComponent(itemId)}`),
        MediaProgressSchema,
      )
      return this.toReading(progress)
    } catch (error) {
      // No progress recorded yet for an item that exists
      if (isProviderError(error) && error.status === 404) {
        return { positionSeconds: 0 }
      }
      throw error
    }
  }

  async setPosition(bookId: string, positionSeconds: number): Promise<void> {
    const itemId = await this.resolveItemId(bookId)

    await requestVoid({
      ...this.request(`/api/me/progress/${encodeURIComponent(itemId)}`),
      method: 'PATCH',
      body: {
        currentTime: positionSeconds,
        isFinished: false,
      },
    })

    this.log.info(
      `Updated Audiobookshelf item ${itemId} (${bookId}) to ${positionSeconds.toFixed(1)}s`,
    )
  }

  private toReading(progress: AbsMediaProgress): PositionReading {
    return {
      positionSeconds: progress.currentTime,
      sourceTimestamp: progress.lastUpdate ?? undefined,
      durationSeconds:
        progress.duration && progress.duration > 0
          ? progress.duration
          : undefined,
    }
  }

  /**
   * Resolves the ASIN of a library item, caching both directions.
   * Items that have been removed from the library resolve to null.
   */
  private async resolveAsin(itemId: string): Promise<string | null> {
    const cached = this.asinsByItemId.get(itemId)
    if (cached !== undefined) return cached

    try {
      const item = await requestJson(
        this.request(`/api/items/${encodeURIComponent(itemId)}`),
        AbsLibraryItemResponseSchema,
      )
      const asin = item.media?.metadata?.asin?.trim() || null
      this.asinsByItemId.set(itemId, asin)
      if (asin) this.itemIdsByAsin.set(asin, itemId)
      return asin
    } catch (error) {
      if (isProviderError(error) && error.kind === 'permanent') {
        this.log.debug(
          { error },
          `Audiobookshelf item ${itemId} could not be resolved, ignoring`,
        )
        return null
      }
      throw error
    }
  }

  /**
   * Finds the library item id for an ASIN by searching each book library
   */
  private async resolveItemId(asin: string): Promise<string> {
    const cached = this.itemIdsByAsin.get(asin)
    if (cached) return cached

    for (const libraryId of await this.getLibraries()) {
      const results = await requestJson(
        this.request(
          `/api/libraries/${encodeURIComponent(libraryId)}/search?q=${encodeURIComponent(asin)}`,
        ),
        AbsSearchResponseSchema,
      )

      const match = results.book.find(
        (result) => result.libraryItem.media?.metadata?.asin === asin,
      )
      if (match) {
        const itemId = match.libraryItem.id
        this.itemIdsByAsin.set(asin, itemId)
        this.asinsByItemId.set(itemId, asin)
        this.log.debug(`Resolved ASIN ${asin} to Audiobookshelf item ${itemId}`)
        return itemId
      }
    }

    throw new ProviderError(`ASIN ${asin} not found in Audiobookshelf`, {
      kind: 'permanent',
      side: this.side,
    })
  }

  private async getLibraries(): Promise<string[]> {
    if (this.libraries) return this.libraries

    const response = await requestJson(
      this.request('/api/libraries'),
      AbsLibrariesResponseSchema,
    )
    const bookLibraries = response.libraries
      .filter((library) => !library.mediaType || library.mediaType === 'book')
      .map((library) => library.id)

    const scoped = this.options.libraryId
    if (scoped) {
      if (bookLibraries.includes(scoped)) {
        this.libraries = [scoped]
        this.log.info(`Scoped to Audiobookshelf library ${scoped}`)
      } else {
        this.log.warn(
          `Configured Audiobookshelf library ${scoped} not found among: ${bookLibraries.join(', ')}`,
        )
        this.libraries = []
      }
    } else {
      this.libraries = bookLibraries
    }

    return this.libraries
  }

  private request(path: string): ProviderRequest {
    return {
      side: this.side,
      url: joinUrl(this.options.baseUrl, path),
      headers: { Authorization: `Bearer ${this.options.token}` },
      timeoutMs: this.options.timeoutMs,
    }
  }
}
