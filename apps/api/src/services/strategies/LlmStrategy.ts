/**
 * LlmStrategy - radio proposed by a language model
 *
 * The model names tracks; each suggestion is resolved to a Spotify track
 * through search, in the order proposed. Suggestions that cannot be found
 * are skipped.
 */

import type {Track, TrackSuggestion} from '@radio/shared-types'

import {RADIO} from '../../constants'
import {AuthError, getErrorMessage, RecommendationError} from '../../errors'
import {buildRadioPrompt, RADIO_SYSTEM_PROMPT} from '../../lib/ai-prompts'
import {parseTrackSuggestions, type TextGenerationClient} from '../../lib/ai-service'
import {fromSpotifyTrack} from '../../lib/tracks'
import {getLogger} from '../../utils/LoggerContext'
import type {SpotifyApi} from '../SpotifyClient'
import {type RecommendationStrategy, toStrategyError} from './types'

// Room for roughly 40 tokens per suggested track
const TOKENS_PER_SUGGESTION = 40

export class LlmStrategy implements RecommendationStrategy {
  readonly name = 'llm'

  constructor(
    private readonly client: null | TextGenerationClient,
    private readonly spotify: SpotifyApi,
  ) {}

  async recommend(seed: Track, limit: number): Promise<Track[]> {
    if (!this.client) {
      throw new RecommendationError('llm', 'No language model API key is configured')
    }

    let suggestions: TrackSuggestion[]
    try {
      const reply = await this.client.complete(buildRadioPrompt({count: limit, seed}), {
        maxTokens: Math.max(600, limit * TOKENS_PER_SUGGESTION),
        system: RADIO_SYSTEM_PROMPT,
        temperature: RADIO.SUGGESTION_TEMPERATURE,
      })
      suggestions = parseTrackSuggestions(reply)
    } catch (error) {
      throw toStrategyError('llm', error)
    }

    getLogger()?.info('Model suggestions parsed', {count: suggestions.length, provider: this.client.provider})
    if (suggestions.length === 0) {
      throw new RecommendationError('llm', 'The model reply contained no usable track suggestions')
    }

    const tracks: Track[] = []
    const seen = new Set<string>([seed.id])
    for (const suggestion of suggestions) {
      if (tracks.length >= limit) break

      const track = await this.resolve(suggestion)
      if (!track || seen.has(track.id)) continue
      seen.add(track.id)
      tracks.push(track)
    }

    if (tracks.length === 0) {
      throw new RecommendationError('llm', 'None of the suggested tracks could be found on Spotify')
    }
    return tracks
  }

  /**
   * Field-filtered search first, then a plain query
   */
  private async resolve(suggestion: TrackSuggestion): Promise<null | Track> {
    const queries = [
      `track:"${suggestion.title}" artist:"${suggestion.artist}"`,
      `${suggestion.title} ${suggestion.artist}`,
    ]
    try {
      for (const query of queries) {
        const page = await this.spotify.searchTracks(query, {limit: 1})
        const match = page.items[0]
        if (match) {
          return fromSpotifyTrack(match)
        }
      }
      getLogger()?.debug('Suggestion not found on Spotify', {...suggestion})
      return null
    } catch (error) {
      if (error instanceof AuthError) {
        throw error
      }
      getLogger()?.warn('Suggestion lookup failed', {...suggestion, error: getErrorMessage(error)})
      return null
    }
  }
}
