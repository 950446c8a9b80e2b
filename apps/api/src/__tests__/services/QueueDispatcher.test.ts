/**
 * QueueDispatcher Tests
 * Sequential enqueue with per-track failure accounting
 */

import {beforeEach, describe, expect, it} from 'vitest'

import {AuthError, TransportError} from '../../errors'
import {QueueDispatcher} from '../../services/QueueDispatcher'
import {createMockSpotifyApi, type MockSpotifyApi, trackWithId} from '../fixtures/test-builders'

const tracks = [trackWithId('t1'), trackWithId('t2'), trackWithId('t3'), trackWithId('t4')]

describe('QueueDispatcher', () => {
  let spotify: MockSpotifyApi
  let dispatcher: QueueDispatcher

  beforeEach(() => {
    spotify = createMockSpotifyApi()
    dispatcher = new QueueDispatcher(spotify)
  })

  it('queues every track in order', async () => {
    const summary = await dispatcher.dispatch(tracks, 'queue', 'device-1')

    expect(summary).toEqual({attempted: 4, failed: 0, failed_tracks: [], succeeded: 4})
    expect(spotify.addToQueue.mock.calls).toEqual([
      ['spotify:track:t1', 'device-1'],
      ['spotify:track:t2', 'device-1'],
      ['spotify:track:t3', 'device-1'],
      ['spotify:track:t4', 'device-1'],
    ])
  })

  it('continues past a failed track and reports it', async () => {
    spotify.addToQueue
      .mockResolvedValueOnce(undefined)
      .mockRejectedValueOnce(new TransportError('Spotify API returned 502: Bad gateway', {service: 'spotify'}))

    const summary = await dispatcher.enqueue(tracks)

    expect(summary).toEqual({attempted: 4, failed: 1, failed_tracks: ['spotify:track:t2'], succeeded: 3})
    expect(spotify.addToQueue.mock.calls.map(([uri]) => uri)).toEqual([
      'spotify:track:t1',
      'spotify:track:t2',
      'spotify:track:t3',
      'spotify:track:t4',
    ])
  })

  it('stops on an auth failure', async () => {
    const authError = new AuthError('Spotify rejected the access token: revoked', 'token_rejected')
    spotify.addToQueue.mockResolvedValueOnce(undefined).mockRejectedValueOnce(authError)

    await expect(dispatcher.enqueue(tracks)).rejects.toBe(authError)
    expect(spotify.addToQueue).toHaveBeenCalledTimes(2)
  })

  it('handles an empty radio', async () => {
    await expect(dispatcher.enqueue([])).resolves.toEqual({attempted: 0, failed: 0, failed_tracks: [], succeeded: 0})
  })

  describe('play mode', () => {
    it('replaces playback in one call', async () => {
      const summary = await dispatcher.dispatch(tracks, 'play', 'device-1')

      expect(spotify.startPlayback).toHaveBeenCalledTimes(1)
      expect(spotify.startPlayback).toHaveBeenCalledWith(
        ['spotify:track:t1', 'spotify:track:t2', 'spotify:track:t3', 'spotify:track:t4'],
        'device-1',
      )
      expect(spotify.addToQueue).not.toHaveBeenCalled()
      expect(summary).toEqual({attempted: 4, failed: 0, failed_tracks: [], succeeded: 4})
    })

    it('reports every track as failed when playback cannot start', async () => {
      spotify.startPlayback.mockRejectedValue(new TransportError('Spotify API returned 404: No active device', {service: 'spotify'}))

      const summary = await dispatcher.play(tracks.slice(0, 2))

      expect(summary).toEqual({
        attempted: 2,
        failed: 2,
        failed_tracks: ['spotify:track:t1', 'spotify:track:t2'],
        succeeded: 0,
      })
    })

    it('does not touch the player for an empty radio', async () => {
      const summary = await dispatcher.play([])

      expect(spotify.startPlayback).not.toHaveBeenCalled()
      expect(summary).toEqual({attempted: 0, failed: 0, failed_tracks: [], succeeded: 0})
    })
  })
})
