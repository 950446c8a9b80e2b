/**
 * Zod schemas for LLM output validation
 *
 * Models answer in slightly different shapes; these schemas accept the common
 * spellings and normalize them to a single suggestion type.
 */

import {z} from 'zod'

// ===== Track Suggestion =====

const nonEmpty = z.string().trim().min(1)

/**
 * One suggested track. Accepts `track_name`, `title` or `name` for the title,
 * and `artist` or an `artists` list for the artist.
 */
export const TrackSuggestionSchema = z
  .object({
    artist: nonEmpty.optional(),
    artists: z.array(nonEmpty).min(1).optional(),
    name: nonEmpty.optional(),
    title: nonEmpty.optional(),
    track_name: nonEmpty.optional(),
  })
  .transform((raw, ctx) => {
    const title = raw.track_name ?? raw.title ?? raw.name
    const artist = raw.artist ?? raw.artists?.join(', ')
    if (!title || !artist) {
      ctx.addIssue({code: z.ZodIssueCode.custom, message: 'Suggestion needs a title and an artist'})
      return z.NEVER
    }
    return {artist, title}
  })

/**
 * Wrapper some models put around the list: {"tracks": [...]} or {"recommendations": [...]}
 */
export const TrackSuggestionEnvelopeSchema = z.union([
  z.object({tracks: z.array(z.unknown())}).transform(value => value.tracks),
  z.object({recommendations: z.array(z.unknown())}).transform(value => value.recommendations),
  z.array(z.unknown()),
])

// ===== Type Exports =====

export type TrackSuggestion = z.infer<typeof TrackSuggestionSchema>
