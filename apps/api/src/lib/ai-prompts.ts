/**
 * AI Prompts - prompt templates for LLM radio
 *
 * The prompt asks for a JSON array; the parser also copes with numbered
 * "Title - Artist" lines for models that ignore the format.
 */

import type {Track} from '@radio/shared-types'

export const RADIO_SYSTEM_PROMPT =
  'You are a music curator building radio stations. Reply with JSON only, no commentary.'

/**
 * Prompt for a radio seeded by one track
 */
export function buildRadioPrompt(args: {count: number; seed: Pick<Track, 'artists' | 'metadata' | 'title'>}): string {
  const {count, seed} = args
  return `<task>
Suggest ${count} songs for a radio station that starts from the seed track below.
</task>

<seed_track>
Title: ${seed.title}
Artist: ${seed.artists.join(', ')}
${seed.metadata.album ? `Album: ${seed.metadata.album}` : ''}
</seed_track>

<guidelines>
- Match the genre and mood of the seed, but avoid the most mainstream choices
- Mix artists; at most two songs by the seed's artist
- Only suggest songs that exist on Spotify
- Do not include the seed track itself
</guidelines>

<output_format>
A JSON array of exactly ${count} objects with "track_name" and "artist" keys:
[{"track_name": "Song title", "artist": "Artist name"}]
</output_format>`
}
