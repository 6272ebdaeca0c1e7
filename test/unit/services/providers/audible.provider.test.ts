import {
  AudibleProvider,
  StaticCredentialSource,
  audibleApiBaseUrl,
  parseAudibleTimestamp,
} from '@services/providers/index.js'
import type { FastifyBaseLogger } from 'fastify'
import { HttpResponse, http } from 'msw'
import { beforeEach, describe, expect, it } from 'vitest'
import { createMockLogger } from '../../../mocks/logger.js'
import { server } from '../../../setup/msw-setup.js'

const AUDIBLE = 'https://api.audible.com'

describe('AudibleProvider', () => {
  let logger: FastifyBaseLogger
  let provider: AudibleProvider

  beforeEach(() => {
    logger = createMockLogger()
    provider = new AudibleProvider(
      logger,
      new StaticCredentialSource('test-secret'),
      { locale: 'us', recentlyPlayedLimit: 10, timeoutMs: 1000 },
    )
  })

  describe('audibleApiBaseUrl', () => {
    it('should map marketplaces to their API host', () => {
      expect(audibleApiBaseUrl('us')).toBe('https://api.audible.com')
      expect(audibleApiBaseUrl('UK')).toBe('https://api.audible.co.uk')
      expect(audibleApiBaseUrl('jp')).toBe('https://api.audible.co.jp')
    })

    it('should reject an unknown marketplace', () => {
      expect(() => audibleApiBaseUrl('xx')).toThrow('Unknown Audible locale "xx"')
    })
  })

  describe('parseAudibleTimestamp', () => {
    it('should read space separated timestamps as UTC', () => {
      expect(parseAudibleTimestamp('2024-05-01 10:00:00.000')).toBe(
        Date.UTC(2024, 4, 1, 10),
      )
    })

    it('should honour an explicit offset', () => {
      expect(parseAudibleTimestamp('2024-05-01T10:00:00+02:00')).toBe(
        Date.UTC(2024, 4, 1, 8),
      )
    })

    it('should return undefined for missing or unparseable values', () => {
      expect(parseAudibleTimestamp(null)).toBeUndefined()
      expect(parseAudibleTimestamp('')).toBeUndefined()
      expect(parseAudibleTimestamp('yesterday')).toBeUndefined()
    })
  })

  describe('listActiveItems', () => {
    it('should combine recent library titles with their last positions', async () => {
      let libraryUrl = ''
      let requestedAsins: string | null = null
      let authorization: string | null = null

      server.use(
        http.get(`${AUDIBLE}/1.0/library`, ({ request }) => {
          libraryUrl = request.url
          authorization = request.headers.get('authorization')
          return HttpResponse.json({
            items: [
              { asin: 'B0001', runtime_length_min: 600 },
              { asin: 'B0002', runtime_length_min: null },
              { asin: 'B0003' },
            ],
          })
        }),
        http.get(`${AUDIBLE}/1.0/annotations/lastpositions`, ({ request }) => {
          requestedAsins = new URL(request.url).searchParams.get('asins')
          return HttpResponse.json({
            asin_last_position_heard_annots: [
              {
                asin: 'B0001',
                last_position_heard: {
                  position_ms: 125_500,
                  last_updated: '2024-05-01 10:00:00.000',
                  status: 'Exists',
                },
              },
              {
                asin: 'B0002',
                last_position_heard: { position_ms: 6_000 },
              },
              {
                asin: 'B0003',
                last_position_heard: { status: 'DoesNotExist' },
              },
            ],
          })
        }),
      )

      const items = await provider.listActiveItems()

      expect(items).toEqual([
        {
          bookId: 'B0001',
          positionSeconds: 125.5,
          sourceTimestamp: Date.UTC(2024, 4, 1, 10),
          durationSeconds: 36_000,
        },
        { bookId: 'B0002', positionSeconds: 6 },
      ])
      const libraryParams = new URL(libraryUrl).searchParams
      expect(libraryParams.get('num_results')).toBe('10')
      expect(libraryParams.get('sort_by')).toBe('-DateAccessed')
      expect(requestedAsins).toBe('B0001,B0002,B0003')
      expect(authorization).toBe('Bearer test-secret')
    })

    it('should skip the position lookup for an empty library', async () => {
      server.use(
        http.get(`${AUDIBLE}/1.0/library`, () => HttpResponse.json({ items: [] })),
      )

      expect(await provider.listActiveItems()).toEqual([])
    })

    it('should classify a rejected token as an auth failure', async () => {
      server.use(
        http.get(
          `${AUDIBLE}/1.0/library`,
          () => new HttpResponse(null, { status: 403 }),
        ),
      )

      await expect(provider.listActiveItems()).rejects.toMatchObject({
        kind: 'auth',
        side: 'audible',
        status: 403,
      })
    })

    it('should classify throttling as transient', async () => {
      server.use(
        http.get(
          `${AUDIBLE}/1.0/library`,
          () => new HttpResponse(null, { status: 429 }),
        ),
      )

      await expect(provider.listActiveItems()).rejects.toMatchObject({
        kind: 'transient',
        status: 429,
      })
    })
  })

  describe('getPositions', () => {
    it('should read a batch in one request and leave unknown titles out', async () => {
      const requested: Array<string | null> = []
      server.use(
        http.get(`${AUDIBLE}/1.0/annotations/lastpositions`, ({ request }) => {
          requested.push(new URL(request.url).searchParams.get('asins'))
          return HttpResponse.json({
            asin_last_position_heard_annots: [
              {
                asin: 'B0001',
                last_position_heard: {
                  position_ms: 90_000,
                  last_updated: '2024-05-01 10:00:00.000',
                },
              },
              { asin: 'B0002', last_position_heard: null },
            ],
          })
        }),
      )

      const readings = await provider.getPositions(['B0001', 'B0002', 'B0009'])

      expect(requested).toEqual(['B0001,B0002,B0009'])
      expect(readings).toEqual(
        new Map([
          [
            'B0001',
            { positionSeconds: 90, sourceTimestamp: Date.UTC(2024, 4, 1, 10) },
          ],
          ['B0002', { positionSeconds: 0 }],
        ]),
      )
    })

    it('should skip the request for an empty batch', async () => {
      expect(await provider.getPositions([])).toEqual(new Map())
    })

    it('should read twenty titles per request', () => {
      expect(provider.readBatchSize).toBe(20)
    })
  })

  describe('listInProgress', () => {
    const page = (start: number, percents: Array<number | null>) =>
      percents.map((percent, i) => ({
        asin: `B${String(start + i).padStart(4, '0')}`,
        percent_complete: percent,
      }))

    it('should page through the library for partly listened titles', async () => {
      const pages: Array<string | null> = []
      server.use(
        http.get(`${AUDIBLE}/1.0/library`, ({ request }) => {
          const params = new URL(request.url).searchParams
          pages.push(params.get('page'))
          const items =
            params.get('page') === '1'
              ? [
                  ...page(1, [0, 12.5, 100, null]),
                  ...page(5, Array<number>(46).fill(0)),
                ]
              : page(51, [99.9])
          return HttpResponse.json({ items })
        }),
      )

      expect(await provider.listInProgress(200)).toEqual(['B0002', 'B0051'])
      expect(pages).toEqual(['1', '2'])
    })

    it('should stop at the cap', async () => {
      server.use(
        http.get(`${AUDIBLE}/1.0/library`, () =>
          HttpResponse.json({ items: page(1, Array<number>(50).fill(40)) }),
        ),
      )

      expect(await provider.listInProgress(3)).toEqual([
        'B0001',
        'B0002',
        'B0003',
      ])
    })
  })

  describe('listRecentPurchases', () => {
    it('should keep purchases made since the given time', async () => {
      let sortBy: string | null = null
      server.use(
        http.get(`${AUDIBLE}/1.0/library`, ({ request }) => {
          sortBy = new URL(request.url).searchParams.get('sort_by')
          return HttpResponse.json({
            items: [
              { asin: 'B0001', purchase_date: '2024-05-02T08:00:00Z' },
              { asin: 'B0002' },
              { asin: 'B0003', purchase_date: '2024-04-01T08:00:00Z' },
            ],
          })
        }),
      )

      const found = await provider.listRecentPurchases(Date.UTC(2024, 4, 1))

      expect(found).toEqual(['B0001', 'B0002'])
      expect(sortBy).toBe('-PurchaseDate')
    })
  })

  describe('setPosition', () => {
    it('should put the position in milliseconds', async () => {
      let body: unknown
      server.use(
        http.put(`${AUDIBLE}/1.0/lastpositions/B0001`, async ({ request }) => {
          body = await request.json()
          return HttpResponse.json({})
        }),
      )

      await provider.setPosition('B0001', 250.5)

      expect(body).toEqual({ asin: 'B0001', acr: 'B0001', position_ms: 250_500 })
      expect(logger.info).toHaveBeenCalledWith(
        'Updated Audible B0001 to 250500ms',
      )
    })
  })
})
