import { z } from 'zod'

const KnownPositionSchema = z.object({
  positionSeconds: z.number().min(0),
  observedAt: z.number(),
  sourceTimestamp: z.number().optional(),
})

const PushRecordSchema = z.object({
  positionSeconds: z.number().min(0),
  pushedAt: z.number(),
  acknowledged: z.boolean(),
})

const perSide = <T extends z.ZodType>(schema: T) =>
  z.object({
    audible: schema.optional(),
    abs: schema.optional(),
  })

export const BookStateSchema = z.object({
  bookId: z.string().min(1),
  durationSeconds: z.number().positive().nullable(),
  lastKnown: perSide(KnownPositionSchema),
  lastPushed: perSide(PushRecordSchema),
  cooldownUntil: perSide(z.number()),
  lastConflictAt: z.number().optional(),
  createdAt: z.number(),
  updatedAt: z.number(),
})

export const WatchlistEntrySchema = z.object({
  bookId: z.string().min(1),
  lastActiveAt: z.number(),
  expiresAt: z.number(),
})

export const WatchlistSuppressionSchema = z.object({
  bookId: z.string().min(1),
  until: z.number(),
  reason: z.string(),
})

export const SyncSnapshotSchema = z.object({
  version: z.literal(1),
  books: z.record(z.string(), BookStateSchema),
  watchlist: z.record(z.string(), WatchlistEntrySchema),
  suppressed: z.record(z.string(), WatchlistSuppressionSchema).default({}),
  lastSuccessfulSyncAt: z.number().nullable(),
  discoveredAt: z
    .object({
      'in-progress': z.number().optional(),
      purchases: z.number().optional(),
    })
    .optional(),
})

export type SyncSnapshotFile = z.infer<typeof SyncSnapshotSchema>
