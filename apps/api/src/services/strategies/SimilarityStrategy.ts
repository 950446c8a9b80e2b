/**
 * SimilarityStrategy - radio from ReccoBeats audio similarity
 */

import type {Track} from '@radio/shared-types'

import {RecommendationError} from '../../errors'
import {finalizeTracks} from '../../lib/tracks'
import type {ReccoBeatsService} from '../ReccoBeatsService'
import {type RecommendationStrategy, toStrategyError} from './types'

export class SimilarityStrategy implements RecommendationStrategy {
  readonly name = 'similarity'

  constructor(private readonly reccoBeats: Pick<ReccoBeatsService, 'getRecommendations'>) {}

  async recommend(seed: Track, limit: number): Promise<Track[]> {
    try {
      // One extra in case the seed comes back
      const candidates = await this.reccoBeats.getRecommendations([seed.id], limit + 1)
      const tracks = finalizeTracks(seed, candidates, limit)
      if (tracks.length === 0) {
        throw new RecommendationError('similarity', 'ReccoBeats returned no tracks with a Spotify id')
      }
      return tracks
    } catch (error) {
      throw toStrategyError('similarity', error)
    }
  }
}
