/**
 * SpotifyClient Tests
 * Request shape, token use, and error mapping against a mocked fetch
 */

import {beforeEach, describe, expect, it, type Mock, vi} from 'vitest'

import {AuthError, TransportError} from '../../errors'
import {type AccessTokenProvider, SpotifyClient} from '../../services/SpotifyClient'
import {buildPlaybackState, buildSpotifyTrack, jsonResponse} from '../fixtures/test-builders'

function lastRequest(): {headers: Headers; init: RequestInit | undefined; url: URL} {
  const calls = vi.mocked(fetch).mock.calls
  const [input, init] = calls[calls.length - 1] ?? []
  return {headers: new Headers(init?.headers), init, url: new URL(String(input))}
}

describe('SpotifyClient', () => {
  let getAccessToken: Mock<AccessTokenProvider>
  let client: SpotifyClient

  beforeEach(() => {
    getAccessToken = vi.fn<AccessTokenProvider>().mockResolvedValue('access-1')
    client = new SpotifyClient(getAccessToken, 1000)
  })

  describe('getPlaybackState', () => {
    it('returns null for 204 No Content', async () => {
      vi.mocked(fetch).mockResolvedValueOnce(new Response(null, {status: 204}))

      await expect(client.getPlaybackState()).resolves.toBeNull()

      const {headers, url} = lastRequest()
      expect(url.toString()).toBe('https://api.spotify.com/v1/me/player')
      expect(headers.get('Authorization')).toBe('Bearer access-1')
    })

    it('parses the current track', async () => {
      vi.mocked(fetch).mockResolvedValueOnce(jsonResponse(buildPlaybackState()))

      const state = await client.getPlaybackState()

      expect(state?.item?.id).toBe('seed')
      expect(state?.device?.id).toBe('device-1')
    })

    it('rejects an unexpected payload', async () => {
      vi.mocked(fetch).mockResolvedValueOnce(jsonResponse({is_playing: 'yes'}))

      await expect(client.getPlaybackState()).rejects.toMatchObject({
        message: 'Spotify returned an unexpected playback state payload',
      })
    })
  })

  describe('searchTracks', () => {
    it('sends the query, type, limit and offset', async () => {
      vi.mocked(fetch).mockResolvedValueOnce(
        jsonResponse({tracks: {items: [buildSpotifyTrack()], limit: 20, offset: 40, total: 300}}),
      )

      const page = await client.searchTracks('dream pop', {limit: 20, offset: 40})

      expect(page.total).toBe(300)
      expect(page.items.map(track => track.id)).toEqual(['track-1'])
      const {url} = lastRequest()
      expect(url.pathname).toBe('/v1/search')
      expect(url.searchParams.get('q')).toBe('dream pop')
      expect(url.searchParams.get('type')).toBe('track')
      expect(url.searchParams.get('limit')).toBe('20')
      expect(url.searchParams.get('offset')).toBe('40')
    })

    it('treats a missing tracks section as empty', async () => {
      vi.mocked(fetch).mockResolvedValueOnce(jsonResponse({}))

      await expect(client.searchTracks('nothing')).resolves.toEqual({items: [], total: 0})
    })
  })

  describe('player commands', () => {
    it('queues a track on a device', async () => {
      vi.mocked(fetch).mockResolvedValueOnce(new Response(null, {status: 204}))

      await client.addToQueue('spotify:track:abc', 'device-1')

      const {init, url} = lastRequest()
      expect(init?.method).toBe('POST')
      expect(url.pathname).toBe('/v1/me/player/queue')
      expect(url.searchParams.get('uri')).toBe('spotify:track:abc')
      expect(url.searchParams.get('device_id')).toBe('device-1')
    })

    it('starts playback with a list of uris', async () => {
      vi.mocked(fetch).mockResolvedValueOnce(new Response(null, {status: 204}))

      await client.startPlayback(['spotify:track:a', 'spotify:track:b'])

      const {headers, init, url} = lastRequest()
      expect(init?.method).toBe('PUT')
      expect(url.toString()).toBe('https://api.spotify.com/v1/me/player/play')
      expect(headers.get('Content-Type')).toBe('application/json')
      expect(init?.body).toBe('{"uris":["spotify:track:a","spotify:track:b"]}')
    })
  })

  describe('errors', () => {
    it('maps 401 to an AuthError', async () => {
      vi.mocked(fetch).mockResolvedValueOnce(
        jsonResponse({error: {message: 'The access token expired', status: 401}}, 401),
      )

      await expect(client.getPlaybackState()).rejects.toMatchObject({
        message: 'Spotify rejected the access token: The access token expired',
        reason: 'token_rejected',
      })
    })

    it('maps other failures to a TransportError with the Spotify message', async () => {
      vi.mocked(fetch).mockResolvedValueOnce(
        jsonResponse({error: {message: 'Player command failed: No active device found', status: 404}}, 404),
      )

      const error = await client.addToQueue('spotify:track:abc').catch((e: unknown) => e)

      expect(error).toBeInstanceOf(TransportError)
      expect(error).toMatchObject({
        message: 'Spotify API returned 404: Player command failed: No active device found',
        status: 502,
        upstreamStatus: 404,
      })
    })

    it('asks for a token before every request', async () => {
      vi.mocked(fetch).mockImplementation(async () => new Response(null, {status: 204}))

      await client.addToQueue('spotify:track:a')
      await client.addToQueue('spotify:track:b')

      expect(getAccessToken).toHaveBeenCalledTimes(2)
    })

    it('does not call Spotify when no token is available', async () => {
      getAccessToken.mockRejectedValue(new AuthError('Not logged in to Spotify. Visit /login first.', 'login_required'))

      await expect(client.getPlaybackState()).rejects.toBeInstanceOf(AuthError)
      expect(fetch).not.toHaveBeenCalled()
    })
  })
})
