/**
 * Audible Provider
 *
 * Talks to the regional Audible API with the bearer token of a registered
 * device session. Positions travel in milliseconds on the wire and in seconds
 * everywhere else.
 */

import {
  AudibleLastPositionsResponseSchema,
  AudibleLibraryResponseSchema,
} from '@root/schemas/providers/audible.schema.js'
import type {
  ActiveItem,
  CredentialSource,
  DiscoverySource,
  PositionProvider,
  PositionReading,
} from '@root/types/provider.types.js'
import { joinUrl } from '@utils/url.js'
import type { FastifyBaseLogger } from 'fastify'
import { type ProviderRequest, requestJson, requestVoid } from './http.js'

/** ASINs per lastpositions request */
export const AUDIBLE_READ_BATCH_SIZE = 20

const LIBRARY_PAGE_SIZE = 50
const DEEP_SCAN_MAX_PAGES = 20

const AUDIBLE_DOMAINS: Record<string, string> = {
  us: 'com',
  uk: 'co.uk',
  de: 'de',
  fr: 'fr',
  ca: 'ca',
  au: 'com.au',
  in: 'in',
  it: 'it',
  jp: 'co.jp',
  es: 'es',
  br: 'com.br',
}

/**
 * Resolves the API base URL for a marketplace locale
 *
 * @throws {Error} When the locale is not a known Audible marketplace
 */
export function audibleApiBaseUrl(locale: string): string {
  const domain = AUDIBLE_DOMAINS[locale.toLowerCase()]
  if (!domain) {
    throw new Error(
      `Unknown Audible locale "${locale}". Expected one of: ${Object.keys(AUDIBLE_DOMAINS).join(', ')}`,
    )
  }
  return `https://api.audible.${domain}`
}

/**
 * Parses Audible's "YYYY-MM-DD HH:mm:ss.SSS" UTC timestamps into epoch ms
 */
export function parseAudibleTimestamp(
  value: string | null | undefined,
): number | undefined {
  if (!value) return undefined
  const isoLike = value.includes('T') ? value : value.replace(' ', 'T')
  const hasZone = /([zZ]|[+-]\d{2}:?\d{2})$/.test(isoLike)
  const parsed = Date.parse(hasZone ? isoLike : `${isoLike}Z`)
  return Number.isNaN(parsed) ? undefined : parsed
}

export interface AudibleProviderOptions {
  locale: string
  recentlyPlayedLimit: number
  timeoutMs: number
}

export class AudibleProvider implements PositionProvider, DiscoverySource {
  readonly side = 'audible' as const
  readonly readBatchSize = AUDIBLE_READ_BATCH_SIZE

  private readonly baseUrl: string

  constructor(
    private readonly log: FastifyBaseLogger,
    private readonly credentials: CredentialSource,
    private readonly options: AudibleProviderOptions,
  ) {
    this.baseUrl = audibleApiBaseUrl(options.locale)
  }

  /**
   * Lists the most recently accessed library titles together with their
   * last heard positions
   */
  async listActiveItems(): Promise<ActiveItem[]> {
    const params = new URLSearchParams({
      num_results: String(this.options.recentlyPlayedLimit),
      response_groups: 'product_attrs',
      sort_by: '-DateAccessed',
    })
    const library = await requestJson(
      await this.request(`/1.0/library?${params.toString()}`),
      AudibleLibraryResponseSchema,
    )
    if (library.items.length === 0) return []

    const runtimes = new Map(
      library.items.map((item) => [item.asin, item.runtime_length_min]),
    )
    const positions = await this.fetchLastPositions([...runtimes.keys()])

    const active: ActiveItem[] = []
    for (const [asin, reading] of positions) {
      if (!reading) continue
      const runtimeMinutes = runtimes.get(asin)
      active.push({
        bookId: asin,
        ...reading,
        durationSeconds: runtimeMinutes ? runtimeMinutes * 60 : undefined,
      })
    }

    this.log.debug(`Audible reports ${active.length} recently played books`)
    return active
  }

  /**
   * Reads last heard positions in one request. A title that was never played
   * reads as zero; ASINs outside the library are left out.
   */
  async getPositions(
    bookIds: readonly string[],
  ): Promise<Map<string, PositionReading>> {
    const readings = new Map<string, PositionReading>()
    if (bookIds.length === 0) return readings

    for (const [asin, reading] of await this.fetchLastPositions(bookIds)) {
      readings.set(asin, reading ?? { positionSeconds: 0 })
    }
    return readings
  }

  async setPosition(bookId: string, positionSeconds: number): Promise<void> {
    const positionMs = Math.round(positionSeconds * 1000)

    await requestVoid({
      ...(await this.request(
        `/1.0/lastpositions/${encodeURIComponent(bookId)}`,
      )),
      method: 'PUT',
      body: {
        asin: bookId,
        acr: bookId,
        position_ms: positionMs,
      },
    })

    this.log.info(`Updated Audible ${bookId} to ${positionMs}ms`)
  }

  /**
   * Pages through the library for titles that are partly listened to
   */
  async listInProgress(maxItems: number): Promise<string[]> {
    const found: string[] = []

    for (let page = 1; page <= DEEP_SCAN_MAX_PAGES; page++) {
      const params = new URLSearchParams({
        num_results: String(LIBRARY_PAGE_SIZE),
        page: String(page),
        response_groups: 'product_attrs,percent_complete',
      })
      const library = await requestJson(
        await this.request(`/1.0/library?${params.toString()}`),
        AudibleLibraryResponseSchema,
      )

      for (const item of library.items) {
        const percent = item.percent_complete
        if (percent != null && percent > 0 && percent < 100) {
          found.push(item.asin)
          if (found.length >= maxItems) return found
        }
      }

      if (library.items.length < LIBRARY_PAGE_SIZE) break
    }

    return found
  }

  /**
   * Latest purchases, newest first. Titles without a purchase date are kept.
   */
  async listRecentPurchases(since: number): Promise<string[]> {
    const params = new URLSearchParams({
      num_results: String(LIBRARY_PAGE_SIZE),
      response_groups: 'product_attrs',
      sort_by: '-PurchaseDate',
    })
    const library = await requestJson(
      await this.request(`/1.0/library?${params.toString()}`),
      AudibleLibraryResponseSchema,
    )

    return library.items
      .filter((item) => {
        const purchasedAt = parseAudibleTimestamp(item.purchase_date)
        return purchasedAt === undefined || purchasedAt >= since
      })
      .map((item) => item.asin)
  }

  /**
   * Fetches last heard positions for a batch of ASINs.
   * A known ASIN without any recorded position maps to null.
   */
  private async fetchLastPositions(
    asins: readonly string[],
  ): Promise<Map<string, PositionReading | null>> {
    const params = new URLSearchParams({ asins: asins.join(',') })
    const response = await requestJson(
      await this.request(`/1.0/annotations/lastpositions?${params.toString()}`),
      AudibleLastPositionsResponseSchema,
    )

    const positions = new Map<string, PositionReading | null>()
    for (const annotation of response.asin_last_position_heard_annots) {
      const heard = annotation.last_position_heard
      if (
        !heard ||
        heard.position_ms == null ||
        heard.status === 'DoesNotExist'
      ) {
        positions.set(annotation.asin, null)
        continue
      }
      positions.set(annotation.asin, {
        positionSeconds: heard.position_ms / 1000,
        sourceTimestamp: parseAudibleTimestamp(heard.last_updated),
      })
    }
    return positions
  }

  private async request(path: string): Promise<ProviderRequest> {
    const token = await this.credentials.getAccessToken()
    return {
      side: this.side,
      url: joinUrl(this.baseUrl, path),
      headers: {
        Authorization: `Bearer ${token}`,
        'client-id': '0',
      },
      timeoutMs: this.options.timeoutMs,
    }
  }
}
