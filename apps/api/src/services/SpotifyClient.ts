/**
 * SpotifyClient - the slice of the Spotify Web API the radio uses
 *
 * Asks its token provider for an access token before every call, so a
 * token that expires during a long radio build is refreshed in between.
 */

import type {SpotifyArtistFull, SpotifyPlaybackState, SpotifyTrackFull} from '@radio/shared-types'
import {
  safeParse,
  SpotifyArtistFullSchema,
  SpotifyErrorSchema,
  SpotifyPlaybackStateSchema,
  SpotifySearchResponseSchema,
} from '@radio/shared-types'
import type {z} from 'zod'

import {SPOTIFY} from '../constants'
import {AuthError, TransportError} from '../errors'
import {fetchWithTimeout, parseJsonSafely, readErrorBody, readJson} from '../lib/http'
import {getLogger} from '../utils/LoggerContext'

export interface TrackSearchPage {
  items: SpotifyTrackFull[]
  total: number
}

export interface SpotifyApi {
  addToQueue(uri: string, deviceId?: string): Promise<void>
  getArtist(id: string): Promise<SpotifyArtistFull>
  /** null when nothing is playing (HTTP 204) */
  getPlaybackState(): Promise<null | SpotifyPlaybackState>
  searchTracks(query: string, options?: {limit?: number; offset?: number}): Promise<TrackSearchPage>
  startPlayback(uris: string[], deviceId?: string): Promise<void>
}

export type AccessTokenProvider = () => Promise<string>

const SERVICE = 'spotify'

export class SpotifyClient implements SpotifyApi {
  constructor(
    private readonly getAccessToken: AccessTokenProvider,
    private readonly timeoutMs: number,
  ) {}

  async addToQueue(uri: string, deviceId?: string): Promise<void> {
    const params = new URLSearchParams({uri})
    if (deviceId) params.set('device_id', deviceId)
    await this.request(`/me/player/queue?${params.toString()}`, {method: 'POST'})
  }

  async getArtist(id: string): Promise<SpotifyArtistFull> {
    const response = await this.request(`/artists/${encodeURIComponent(id)}`)
    return this.parseBody(response, SpotifyArtistFullSchema, 'artist')
  }

  async getPlaybackState(): Promise<null | SpotifyPlaybackState> {
    const response = await this.request('/me/player')
    if (response.status === 204) {
      return null
    }
    return this.parseBody(response, SpotifyPlaybackStateSchema, 'playback state')
  }

  async searchTracks(query: string, options: {limit?: number; offset?: number} = {}): Promise<TrackSearchPage> {
    const params = new URLSearchParams({
      limit: String(options.limit ?? 20),
      offset: String(options.offset ?? 0),
      q: query,
      type: 'track',
    })
    const response = await this.request(`/search?${params.toString()}`)
    const body = await this.parseBody(response, SpotifySearchResponseSchema, 'search results')
    return {items: body.tracks?.items ?? [], total: body.tracks?.total ?? 0}
  }

  async startPlayback(uris: string[], deviceId?: string): Promise<void> {
    const path = deviceId ? `/me/player/play?device_id=${encodeURIComponent(deviceId)}` : '/me/player/play'
    await this.request(path, {
      body: JSON.stringify({uris}),
      headers: {'Content-Type': 'application/json'},
      method: 'PUT',
    })
  }

  private async parseBody<T extends z.ZodTypeAny>(response: Response, schema: T, what: string): Promise<z.output<T>> {
    const result = safeParse(schema, await readJson(response, SERVICE))
    if (!result.success) {
      throw new TransportError(`Spotify returned an unexpected ${what} payload`, {
        cause: result.error,
        service: SERVICE,
        status: response.status,
      })
    }
    return result.data
  }

  private async request(path: string, init: RequestInit = {}): Promise<Response> {
    const headers = new Headers(init.headers)
    headers.set('Authorization', `Bearer ${await this.getAccessToken()}`)
    const response = await fetchWithTimeout(`${SPOTIFY.API_URL}${path}`, {
      ...init,
      headers,
      service: SERVICE,
      timeoutMs: this.timeoutMs,
    })

    if (response.ok) {
      return response
    }

    const body = await readErrorBody(response)
    const parsed = safeParse(SpotifyErrorSchema, parseJsonSafely(body))
    const message = parsed.success ? parsed.data.error.message : body || `HTTP ${response.status}`

    if (response.status === 401) {
      throw new AuthError(`Spotify rejected the access token: ${message}`, 'token_rejected')
    }

    getLogger()?.warn('Spotify API request failed', {message, path: path.split('?')[0], status: response.status})
    throw new TransportError(`Spotify API returned ${response.status}: ${message}`, {
      service: SERVICE,
      status: response.status,
    })
  }
}
