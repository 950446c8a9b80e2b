/**
 * Zod schemas for Spotify Web API responses
 * Only the fields the radio reads are declared; unknown keys are stripped.
 */

import {z} from 'zod'

// ===== Base Types =====

export const SpotifyImageSchema = z.object({
  height: z.number().nullable().optional(),
  url: z.string().url(),
  width: z.number().nullable().optional(),
})

export const SpotifyExternalUrlsSchema = z.object({
  spotify: z.string().url().optional(),
})

export const SpotifyExternalIdsSchema = z.object({
  ean: z.string().optional(),
  isrc: z.string().optional(),
  upc: z.string().optional(),
})

// ===== Artist =====

export const SpotifyArtistSimpleSchema = z.object({
  external_urls: SpotifyExternalUrlsSchema.optional(),
  id: z.string(),
  name: z.string(),
  uri: z.string(),
})

export const SpotifyArtistFullSchema = SpotifyArtistSimpleSchema.extend({
  genres: z.array(z.string()).default([]),
  popularity: z.number().min(0).max(100).optional(),
})

// ===== Album =====

export const SpotifyAlbumSimpleSchema = z.object({
  id: z.string(),
  images: z.array(SpotifyImageSchema).default([]),
  name: z.string(),
  release_date: z.string().optional(),
  uri: z.string().optional(),
})

// ===== Track =====

export const SpotifyTrackFullSchema = z.object({
  album: SpotifyAlbumSimpleSchema.optional(),
  artists: z.array(SpotifyArtistSimpleSchema),
  duration_ms: z.number(),
  explicit: z.boolean().optional(),
  external_ids: SpotifyExternalIdsSchema.optional(),
  external_urls: SpotifyExternalUrlsSchema.optional(),
  id: z.string(),
  is_local: z.boolean().optional(),
  name: z.string(),
  popularity: z.number().min(0).max(100).optional(),
  type: z.literal('track'),
  uri: z.string(),
})

// Local files in the player carry null ids, and no Spotify uri for artist and album
export const SpotifyPlayerTrackSchema = SpotifyTrackFullSchema.extend({
  album: SpotifyAlbumSimpleSchema.extend({
    id: z.string().nullable(),
    release_date: z.string().nullable().optional(),
    uri: z.string().nullable().optional(),
  }).optional(),
  artists: z.array(
    SpotifyArtistSimpleSchema.extend({
      id: z.string().nullable(),
      uri: z.string().nullable(),
    }),
  ),
  id: z.string().nullable(),
})

// Podcast episodes can also be "now playing"; the radio ignores them
export const SpotifyEpisodeSchema = z.object({
  id: z.string(),
  name: z.string(),
  type: z.literal('episode'),
  uri: z.string(),
})

// ===== Player =====

export const SpotifyDeviceSchema = z.object({
  id: z.string().nullable(),
  is_active: z.boolean(),
  is_restricted: z.boolean().optional(),
  name: z.string(),
  type: z.string(),
  volume_percent: z.number().nullable().optional(),
})

export const SpotifyPlaybackContextSchema = z.object({
  external_urls: SpotifyExternalUrlsSchema.optional(),
  type: z.string(),
  uri: z.string(),
})

export const SpotifyPlaybackStateSchema = z.object({
  context: SpotifyPlaybackContextSchema.nullable().optional(),
  currently_playing_type: z.string().optional(),
  device: SpotifyDeviceSchema.optional(),
  is_playing: z.boolean(),
  item: z.discriminatedUnion('type', [SpotifyPlayerTrackSchema, SpotifyEpisodeSchema]).nullable(),
  progress_ms: z.number().nullable().optional(),
})

// ===== Paging Objects =====

export const SpotifyPagingSchema = <T extends z.ZodTypeAny>(itemSchema: T) =>
  z.object({
    href: z.string().optional(),
    items: z.array(itemSchema),
    limit: z.number(),
    next: z.string().nullable().optional(),
    offset: z.number(),
    previous: z.string().nullable().optional(),
    total: z.number(),
  })

// ===== Search =====

export const SpotifySearchResponseSchema = z.object({
  tracks: SpotifyPagingSchema(SpotifyTrackFullSchema).optional(),
})

// ===== Token Response =====

export const SpotifyTokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().positive(),
  refresh_token: z.string().optional(),
  scope: z.string().optional(),
  token_type: z.string(),
})

// ===== Error Responses =====

export const SpotifyErrorSchema = z.object({
  error: z.object({
    message: z.string(),
    reason: z.string().optional(),
    status: z.number(),
  }),
})

// Token endpoint errors use the OAuth shape instead of the Web API one
export const SpotifyOAuthErrorSchema = z.object({
  error: z.string(),
  error_description: z.string().optional(),
})

// ===== Type Exports =====

export type SpotifyArtistFull = z.infer<typeof SpotifyArtistFullSchema>
export type SpotifyTrackFull = z.infer<typeof SpotifyTrackFullSchema>
export type SpotifyPlaybackState = z.infer<typeof SpotifyPlaybackStateSchema>
export type SpotifyTokenResponse = z.infer<typeof SpotifyTokenResponseSchema>
