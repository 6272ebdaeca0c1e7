import { z } from 'zod'

const MetadataSchema = z.object({
  asin: z.string().nullish(),
})

const LibraryItemSchema = z.object({
  id: z.string(),
  media: z
    .object({
      metadata: MetadataSchema.optional(),
      duration: z.number().nullish(),
    })
    .optional(),
})

export const MediaProgressSchema = z.object({
  libraryItemId: z.string(),
  episodeId: z.string().nullish(),
  currentTime: z.number(),
  duration: z.number().nullish(),
  isFinished: z.boolean().default(false),
  lastUpdate: z.number().nullish(),
})

export const AbsMeResponseSchema = z.object({
  id: z.string(),
  mediaProgress: z.array(MediaProgressSchema).default([]),
})

export const AbsLibraryItemResponseSchema = LibraryItemSchema

export const AbsLibrariesResponseSchema = z.object({
  libraries: z.array(
    z.object({
      id: z.string(),
      mediaType: z.string().optional(),
    }),
  ),
})

export const AbsSearchResponseSchema = z.object({
  book: z
    .array(
      z.object({
        libraryItem: LibraryItemSchema,
      }),
    )
    .default([]),
})

export type AbsMediaProgress = z.infer<typeof MediaProgressSchema>
export type AbsMeResponse = z.infer<typeof AbsMeResponseSchema>
export type AbsLibraryItem = z.infer<typeof AbsLibraryItemResponseSchema>
