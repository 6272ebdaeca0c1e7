import { z } from 'zod'

export const HealthCheckResponseSchema = z.object({
  status: z.enum(['healthy', 'unhealthy', 'starting']),
  timestamp: z.string().datetime(),
  checks: z.object({
    sync: z.object({
      lastSuccessfulSyncAt: z.string().datetime().nullable(),
      ageSeconds: z.number().nullable(),
      thresholdSeconds: z.number(),
    }),
  }),
})

export type HealthCheckResponse = z.infer<typeof HealthCheckResponseSchema>
