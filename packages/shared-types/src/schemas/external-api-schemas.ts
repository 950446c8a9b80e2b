/**
 * Zod schemas for external API responses
 * Covers the ReccoBeats recommendation API
 */

import {z} from 'zod'

// ===== ReccoBeats API =====

/**
 * Helper for optional strings that might be empty
 * ReccoBeats leaves identifiers blank rather than omitting them
 */
const optionalNonEmpty = z.preprocess(val => {
  if (typeof val === 'string' && val.trim() === '') {
    return undefined
  }
  return val
}, z.string().optional())

export const ReccoBeatsArtistSchema = z.object({
  href: optionalNonEmpty,
  id: z.string(),
  name: z.string(),
})

export const ReccoBeatsTrackSchema = z.object({
  artists: z.array(ReccoBeatsArtistSchema).default([]),
  durationMs: z.number().optional(),
  // Spotify URL of the track, e.g. https://open.spotify.com/track/<id>
  href: optionalNonEmpty,
  id: z.string(),
  isrc: optionalNonEmpty,
  popularity: z.number().optional(),
  trackTitle: z.string(),
})

export const ReccoBeatsRecommendationResponseSchema = z.object({
  content: z.array(z.unknown()),
})

// ===== Type Exports =====

export type ReccoBeatsArtist = z.infer<typeof ReccoBeatsArtistSchema>
export type ReccoBeatsTrack = z.infer<typeof ReccoBeatsTrackSchema>
export type ReccoBeatsRecommendationResponse = z.infer<typeof ReccoBeatsRecommendationResponseSchema>
