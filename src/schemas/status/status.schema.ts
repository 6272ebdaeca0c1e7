import { BookStateSchema } from '@schemas/state/sync-snapshot.schema.js'
import { z } from 'zod'

const SideSchema = z.enum(['audible', 'abs'])

export const TickCountersSchema = z.object({
  candidates: z.number(),
  pushes: z.number(),
  dryRunPushes: z.number(),
  suppressed: z.object({
    cooldown: z.number(),
    direction: z.number(),
    'dry-run': z.number(),
  }),
  conflicts: z.number(),
  failures: z.number(),
  skipped: z.number(),
  dropped: z.number(),
})

export const TickReportSchema = z.object({
  tickId: z.number(),
  startedAt: z.string(),
  finishedAt: z.string(),
  status: z.enum(['completed', 'aborted', 'failed']),
  unavailableSides: z.array(SideSchema),
  counters: TickCountersSchema,
  error: z.string().optional(),
})

export const SyncStatusResponseSchema = z.object({
  tickInProgress: z.boolean(),
  trackedBooks: z.number(),
  watchlistSize: z.number(),
  suppressedBooks: z.number(),
  lastSuccessfulSyncAt: z.string().nullable(),
  pendingPersist: z.boolean(),
  lastTick: TickReportSchema.nullable(),
  settings: z.object({
    syncMode: z.enum(['bidirectional', 'audible-to-abs', 'abs-to-audible']),
    dryRun: z.boolean(),
    intervalSeconds: z.number(),
  }),
})

export const BookParamsSchema = z.object({
  bookId: z
    .string()
    .min(1)
    .max(32)
    .regex(/^[A-Za-z0-9]+$/, 'bookId must be an ASIN'),
})

export const BookStateResponseSchema = BookStateSchema.extend({
  onWatchlist: z.boolean(),
})

export type SyncStatusResponse = z.infer<typeof SyncStatusResponseSchema>
export type TickReportResponse = z.infer<typeof TickReportSchema>
export type BookStateResponse = z.infer<typeof BookStateResponseSchema>
