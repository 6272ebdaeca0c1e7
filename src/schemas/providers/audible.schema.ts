import { z } from 'zod'

export const AudibleLibraryResponseSchema = z.object({
  items: z
    .array(
      z.object({
        asin: z.string(),
        runtime_length_min: z.number().nullish(),
        percent_complete: z.number().nullish(),
        purchase_date: z.string().nullish(),
      }),
    )
    .default([]),
})

const LastPositionHeardSchema = z.object({
  position_ms: z.number().nullish(),
  last_updated: z.string().nullish(),
  status: z.string().nullish(),
})

export const AudibleLastPositionsResponseSchema = z.object({
  asin_last_position_heard_annots: z
    .array(
      z.object({
        asin: z.string(),
        last_position_heard: LastPositionHeardSchema.nullish(),
      }),
    )
    .default([]),
})

/**
 * Subset of the session file written by the Audible device registration
 */
export const AudibleSessionFileSchema = z.object({
  access_token: z.string().min(1),
  /** Expiry as epoch seconds */
  expires: z.number().optional(),
  locale_code: z.string().optional(),
})

export type AudibleLibraryResponse = z.infer<typeof AudibleLibraryResponseSchema>
export type AudibleLastPositionsResponse = z.infer<
  typeof AudibleLastPositionsResponseSchema
>
export type AudibleSessionFile = z.infer<typeof AudibleSessionFileSchema>
