import type { TickReportResponse } from '@schemas/status/status.schema.js'
import { HttpResponse, http } from 'msw'
import { describe, expect, it } from 'vitest'
import { TEST_ABS_URL, TEST_AUDIBLE_URL, build } from '../../helpers/app.js'
import { idlePlatformHandlers } from '../../mocks/msw-handlers.js'
import { server } from '../../setup/msw-setup.js'

/**
 * B0001 at 300s on Audible and never opened on Audiobookshelf. The
 * Audiobookshelf progress endpoint remembers what it was sent.
 */
function useBookBehindOnAbs() {
  const patches: unknown[] = []
  let absPosition: number | null = null

  server.use(
    http.get(`${TEST_AUDIBLE_URL}/1.0/library`, () =>
      HttpResponse.json({ items: [{ asin: 'B0001', runtime_length_min: 600 }] }),
    ),
    http.get(`${TEST_AUDIBLE_URL}/1.0/annotations/lastpositions`, () =>
      HttpResponse.json({
        asin_last_position_heard_annots: [
          { asin: 'B0001', last_position_heard: { position_ms: 300_000 } },
        ],
      }),
    ),
    http.get(`${TEST_ABS_URL}/api/me`, () =>
      HttpResponse.json({ id: 'user-1', mediaProgress: [] }),
    ),
    http.get(`${TEST_ABS_URL}/api/libraries`, () =>
      HttpResponse.json({ libraries: [{ id: 'lib-books', mediaType: 'book' }] }),
    ),
    http.get(`${TEST_ABS_URL}/api/libraries/lib-books/search`, () =>
      HttpResponse.json({
        book: [
          {
            libraryItem: {
              id: 'li-1',
              media: { metadata: { asin: 'B0001' } },
            },
          },
        ],
      }),
    ),
    http.get(`${TEST_ABS_URL}/api/me/progress/li-1`, () =>
      absPosition === null
        ? new HttpResponse(null, { status: 404 })
        : HttpResponse.json({ libraryItemId: 'li-1', currentTime: absPosition }),
    ),
    http.patch(`${TEST_ABS_URL}/api/me/progress/li-1`, async ({ request }) => {
      const body = await request.json()
      patches.push(body)
      if (
        typeof body === 'object' &&
        body !== null &&
        'currentTime' in body &&
        typeof body.currentTime === 'number'
      ) {
        absPosition = body.currentTime
      }
      return HttpResponse.json({})
    }),
  )

  return patches
}

describe('Sync Routes', () => {
  describe('POST /v1/sync/run', () => {
    it('should run a tick and return its report', async (ctx) => {
      server.use(...idlePlatformHandlers)
      const app = await build(ctx)
      await app.positionSync.runTick()

      const response = await app.inject({
        method: 'POST',
        url: '/v1/sync/run',
      })

      expect(response.statusCode).toBe(200)

      const report = response.json<TickReportResponse>()
      expect(report.tickId).toBe(2)
      expect(report.status).toBe('completed')
      expect(report.unavailableSides).toEqual([])
      expect(report.counters.candidates).toBe(0)
    })

    it('should push a position and leave the echo alone on the next run', async (ctx) => {
      const patches = useBookBehindOnAbs()
      const app = await build(ctx)

      const first = await app.positionSync.runTick()
      expect(first.counters.pushes).toBe(1)
      expect(patches).toEqual([{ currentTime: 300, isFinished: false }])

      const response = await app.inject({
        method: 'POST',
        url: '/v1/sync/run',
      })

      const report = response.json<TickReportResponse>()
      expect(report.counters.pushes).toBe(0)
      expect(patches).toHaveLength(1)
      expect(app.positionSync.getBook('B0001')?.lastPushed.abs).toMatchObject({
        positionSeconds: 300,
        acknowledged: true,
      })
    })

    it('should require the token when one is configured', async (ctx) => {
      server.use(...idlePlatformHandlers)
      const app = await build(ctx, { statusToken: 'test-secret' })
      await app.positionSync.runTick()

      const response = await app.inject({
        method: 'POST',
        url: '/v1/sync/run',
      })

      expect(response.statusCode).toBe(401)
    })
  })
})
