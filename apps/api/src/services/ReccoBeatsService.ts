/**
 * ReccoBeatsService - similarity recommendations from ReccoBeats
 *
 * ReccoBeats ids are its own; the Spotify id is read from each item's
 * open.spotify.com href. Items without one are dropped.
 */

import type {ReccoBeatsTrack, Track} from '@radio/shared-types'
import {ReccoBeatsRecommendationResponseSchema, ReccoBeatsTrackSchema, safeParse} from '@radio/shared-types'

import {RADIO, RECCOBEATS} from '../constants'
import {TransportError} from '../errors'
import {fetchWithTimeout, readErrorBody, readJson} from '../lib/http'
import {getLogger} from '../utils/LoggerContext'

const SERVICE = 'reccobeats'
const SPOTIFY_TRACK_URL = /open\.spotify\.com\/(?:intl-[a-z]+\/)?track\/([A-Za-z0-9]+)/

export function spotifyIdFromHref(href: string | undefined): null | string {
  if (!href) return null
  return SPOTIFY_TRACK_URL.exec(href)?.[1] ?? null
}

function toTrack(item: ReccoBeatsTrack): null | Track {
  const id = spotifyIdFromHref(item.href)
  if (!id) return null
  return {
    artists: item.artists.map(artist => artist.name),
    id,
    metadata: {
      durationMs: item.durationMs,
      externalUrl: item.href,
      isrc: item.isrc,
      popularity: item.popularity,
    },
    title: item.trackTitle,
    uri: `spotify:track:${id}`,
  }
}

export class ReccoBeatsService {
  constructor(
    private readonly timeoutMs: number,
    private readonly apiKey?: string,
  ) {}

  /**
   * Recommendations for Spotify seed ids, in ReccoBeats' ranking order
   */
  async getRecommendations(seedIds: string[], size: number): Promise<Track[]> {
    const params = new URLSearchParams({
      seeds: seedIds.join(','),
      size: String(Math.min(Math.max(size, 1), RADIO.RECCOBEATS_MAX_SIZE)),
    })
    const headers: Record<string, string> = {Accept: 'application/json'}
    if (this.apiKey) {
      headers['x-api-key'] = this.apiKey
    }

    const response = await fetchWithTimeout(`${RECCOBEATS.API_URL}/track/recommendation?${params.toString()}`, {
      headers,
      service: SERVICE,
      timeoutMs: this.timeoutMs,
    })

    if (!response.ok) {
      const body = await readErrorBody(response)
      getLogger()?.warn('ReccoBeats request failed', {body, status: response.status})
      throw new TransportError(`ReccoBeats returned ${response.status}`, {service: SERVICE, status: response.status})
    }

    const parsed = safeParse(ReccoBeatsRecommendationResponseSchema, await readJson(response, SERVICE))
    if (!parsed.success) {
      throw new TransportError('ReccoBeats returned an unexpected payload', {cause: parsed.error, service: SERVICE})
    }

    const tracks = parsed.data.content.flatMap(raw => {
      const item = safeParse(ReccoBeatsTrackSchema, raw)
      const track = item.success ? toTrack(item.data) : null
      return track ? [track] : []
    })
    getLogger()?.info('ReccoBeats recommendations', {
      dropped: parsed.data.content.length - tracks.length,
      received: parsed.data.content.length,
    })
    return tracks
  }
}
