/**
 * NativeStrategy - shuffled radio from Spotify search
 *
 * Picks one of the seed artist's genres (or the artist name when Spotify
 * lists none), jumps to a random page of track search results for it, and
 * shuffles that page.
 */

import type {Track} from '@radio/shared-types'

import {RADIO, SPOTIFY} from '../../constants'
import {finalizeTracks, fromSpotifyTrack, shuffle} from '../../lib/tracks'
import {getLogger} from '../../utils/LoggerContext'
import type {SpotifyApi} from '../SpotifyClient'
import {type RecommendationStrategy, toStrategyError} from './types'

export interface NativeStrategyOptions {
  poolSize?: number
  random?: () => number
}

export class NativeStrategy implements RecommendationStrategy {
  readonly name = 'native'
  private readonly poolSize: number
  private readonly random: () => number

  constructor(
    private readonly spotify: SpotifyApi,
    options: NativeStrategyOptions = {},
  ) {
    this.poolSize = options.poolSize ?? RADIO.NATIVE_POOL_SIZE
    this.random = options.random ?? Math.random
  }

  async recommend(seed: Track, limit: number): Promise<Track[]> {
    try {
      const query = await this.pickQuery(seed)
      const pool = Math.min(Math.max(this.poolSize, limit), SPOTIFY.MAX_SEARCH_LIMIT)

      // One-item probe for the total, then a random window inside it
      const probe = await this.spotify.searchTracks(query, {limit: 1})
      const maxOffset = Math.max(0, Math.min(probe.total, SPOTIFY.MAX_SEARCH_WINDOW) - pool)
      const offset = Math.floor(this.random() * (maxOffset + 1))

      getLogger()?.info('Native radio search', {offset, pool, query, total: probe.total})

      const page = await this.spotify.searchTracks(query, {limit: pool, offset})
      const tracks = finalizeTracks(seed, shuffle(page.items.map(fromSpotifyTrack), this.random), limit)
      if (tracks.length === 0) {
        getLogger()?.warn('Native radio search found nothing', {query})
      }
      return tracks
    } catch (error) {
      throw toStrategyError('native', error)
    }
  }

  private async pickQuery(seed: Track): Promise<string> {
    const artistName = seed.artists[0] ?? seed.title
    const artistId = seed.metadata.artistIds?.[0]
    if (!artistId) {
      return artistName
    }

    const artist = await this.spotify.getArtist(artistId)
    if (artist.genres.length === 0) {
      return artist.name
    }
    return artist.genres[Math.floor(this.random() * artist.genres.length)] ?? artist.name
  }
}
