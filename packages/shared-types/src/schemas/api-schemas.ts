/**
 * Zod schemas for the radio API requests and responses
 */

import {z} from 'zod'

// ===== Error Response =====

export const ErrorCodeSchema = z.enum([
  'auth_required',
  'internal_error',
  'invalid_request',
  'no_active_playback',
  'recommendation_failed',
  'transport_error',
  'upstream_timeout',
])

export const ApiErrorSchema = z.object({
  code: ErrorCodeSchema,
  error: z.string(),
  strategy: z.string().optional(),
})

// ===== Track =====

export const TrackMetadataSchema = z.object({
  album: z.string().optional(),
  artistIds: z.array(z.string()).optional(),
  durationMs: z.number().optional(),
  externalUrl: z.string().optional(),
  isrc: z.string().optional(),
  popularity: z.number().optional(),
})

export const TrackSchema = z.object({
  artists: z.array(z.string()),
  id: z.string().min(1),
  metadata: TrackMetadataSchema,
  title: z.string(),
  uri: z.string().min(1),
})

export const TrackSummarySchema = TrackSchema.pick({artists: true, id: true, title: true, uri: true})

// ===== Radio =====

export const RadioStrategySchema = z.enum(['native', 'llm', 'similarity'])

export const DispatchModeSchema = z.enum(['queue', 'play'])

export const TriggerRequestSchema = z.object({
  limit: z.number().int().min(1).max(50).optional(),
  mode: DispatchModeSchema.optional(),
})

export const EnqueueSummarySchema = z.object({
  attempted: z.number().int().min(0),
  failed: z.number().int().min(0),
  failed_tracks: z.array(z.string()),
  succeeded: z.number().int().min(0),
})

export const TriggerResponseSchema = z.object({
  message: z.string(),
  mode: DispatchModeSchema,
  seed_track: TrackSummarySchema,
  strategy: RadioStrategySchema,
  summary: EnqueueSummarySchema,
  tracks: z.array(TrackSummarySchema),
})

// ===== Type Exports =====

export type ErrorCode = z.infer<typeof ErrorCodeSchema>
export type ApiError = z.infer<typeof ApiErrorSchema>
export type TrackMetadata = z.infer<typeof TrackMetadataSchema>
export type Track = z.infer<typeof TrackSchema>
export type TrackSummary = z.infer<typeof TrackSummarySchema>
export type RadioStrategy = z.infer<typeof RadioStrategySchema>
export type DispatchMode = z.infer<typeof DispatchModeSchema>
export type TriggerRequest = z.infer<typeof TriggerRequestSchema>
export type EnqueueSummary = z.infer<typeof EnqueueSummarySchema>
export type TriggerResponse = z.infer<typeof TriggerResponseSchema>
