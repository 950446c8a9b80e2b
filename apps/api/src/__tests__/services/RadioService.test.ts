/**
 * RadioService Tests
 * Seed lookup, strategy selection and dispatch for one radio run
 */

import {beforeEach, describe, expect, it, vi} from 'vitest'

import {NoActivePlaybackError} from '../../errors'
import {RadioService} from '../../services/RadioService'
import {SpotifySession} from '../../services/SpotifySession'
import {
  buildPlaybackState,
  createMockSpotifyApi,
  createMockStrategy,
  type MockSpotifyApi,
  trackWithId,
} from '../fixtures/test-builders'

describe('RadioService', () => {
  let spotify: MockSpotifyApi
  let session: SpotifySession
  let strategies: {
    llm: ReturnType<typeof createMockStrategy>
    native: ReturnType<typeof createMockStrategy>
    similarity: ReturnType<typeof createMockStrategy>
  }
  let service: RadioService

  beforeEach(() => {
    spotify = createMockSpotifyApi()
    spotify.getPlaybackState.mockResolvedValue(buildPlaybackState())
    session = new SpotifySession('session-1', {refresh: vi.fn()})
    strategies = {
      llm: createMockStrategy('llm', [trackWithId('l1')]),
      native: createMockStrategy('native', [trackWithId('n1'), trackWithId('n2')]),
      similarity: createMockStrategy('similarity', [trackWithId('s1')]),
    }
    service = new RadioService(() => spotify, {
      llm: () => strategies.llm,
      native: () => strategies.native,
      similarity: () => strategies.similarity,
    })
  })

  it('builds a radio from the current track and queues it on the active device', async () => {
    const result = await service.startRadio(session, 'native', {limit: 2, mode: 'queue'})

    expect(strategies.native.recommend).toHaveBeenCalledWith(expect.objectContaining({id: 'seed'}), 2)
    expect(spotify.addToQueue.mock.calls).toEqual([
      ['spotify:track:n1', 'device-1'],
      ['spotify:track:n2', 'device-1'],
    ])
    expect(result).toEqual({
      message: 'Queued 2 of 2 tracks based on Seed Song by Seed Artist',
      mode: 'queue',
      seed_track: {artists: ['Seed Artist'], id: 'seed', title: 'Seed Song', uri: 'spotify:track:seed'},
      strategy: 'native',
      summary: {attempted: 2, failed: 0, failed_tracks: [], succeeded: 2},
      tracks: [
        {artists: ['Test Artist'], id: 'n1', title: 'Song n1', uri: 'spotify:track:n1'},
        {artists: ['Test Artist'], id: 'n2', title: 'Song n2', uri: 'spotify:track:n2'},
      ],
    })
  })

  it('uses the requested strategy only', async () => {
    await service.startRadio(session, 'similarity', {limit: 5, mode: 'queue'})

    expect(strategies.similarity.recommend).toHaveBeenCalledTimes(1)
    expect(strategies.native.recommend).not.toHaveBeenCalled()
    expect(strategies.llm.recommend).not.toHaveBeenCalled()
  })

  it('starts playback in play mode', async () => {
    const result = await service.startRadio(session, 'llm', {limit: 5, mode: 'play'})

    expect(spotify.startPlayback).toHaveBeenCalledWith(['spotify:track:l1'], 'device-1')
    expect(result.message).toBe('Started 1 of 1 tracks based on Seed Song by Seed Artist')
  })

  it('binds the Spotify client to the session', async () => {
    const createSpotifyApi = vi.fn(() => spotify)
    service = new RadioService(createSpotifyApi, {
      llm: () => strategies.llm,
      native: () => strategies.native,
      similarity: () => strategies.similarity,
    })

    await service.startRadio(session, 'native', {limit: 2, mode: 'queue'})

    expect(createSpotifyApi).toHaveBeenCalledWith(session)
  })

  it('does not ask a strategy when nothing is playing', async () => {
    spotify.getPlaybackState.mockResolvedValue(null)

    await expect(service.startRadio(session, 'native', {limit: 2, mode: 'queue'})).rejects.toBeInstanceOf(
      NoActivePlaybackError,
    )
    expect(strategies.native.recommend).not.toHaveBeenCalled()
    expect(spotify.addToQueue).not.toHaveBeenCalled()
  })

  it('answers an empty radio without touching the player', async () => {
    strategies.native.recommend.mockResolvedValue([])

    const result = await service.startRadio(session, 'native', {limit: 5, mode: 'play'})

    expect(result).toMatchObject({
      message: 'No tracks found based on Seed Song by Seed Artist',
      summary: {attempted: 0, failed: 0, failed_tracks: [], succeeded: 0},
      tracks: [],
    })
    expect(spotify.addToQueue).not.toHaveBeenCalled()
    expect(spotify.startPlayback).not.toHaveBeenCalled()
  })

  it('queues without a device id when Spotify reports none', async () => {
    spotify.getPlaybackState.mockResolvedValue(buildPlaybackState({device: undefined}))

    await service.startRadio(session, 'llm', {limit: 1, mode: 'queue'})

    expect(spotify.addToQueue).toHaveBeenCalledWith('spotify:track:l1', undefined)
  })
})
