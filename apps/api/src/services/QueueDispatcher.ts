/**
 * QueueDispatcher - sends radio tracks to the user's player
 *
 * Queue mode adds tracks one at a time, in order, and keeps going past
 * individual failures. An auth failure stops the run since every later
 * call would fail the same way.
 */

import type {DispatchMode, EnqueueSummary, Track} from '@radio/shared-types'

import {AuthError, getErrorMessage} from '../errors'
import {getLogger} from '../utils/LoggerContext'
import type {SpotifyApi} from './SpotifyClient'

export class QueueDispatcher {
  constructor(private readonly spotify: SpotifyApi) {}

  async dispatch(tracks: Track[], mode: DispatchMode, deviceId?: string): Promise<EnqueueSummary> {
    return mode === 'play' ? await this.play(tracks, deviceId) : await this.enqueue(tracks, deviceId)
  }

  async enqueue(tracks: Track[], deviceId?: string): Promise<EnqueueSummary> {
    const failedTracks: string[] = []

    for (const track of tracks) {
      try {
        await this.spotify.addToQueue(track.uri, deviceId)
      } catch (error) {
        if (error instanceof AuthError) {
          throw error
        }
        getLogger()?.warn('Failed to queue track', {error: getErrorMessage(error), uri: track.uri})
        failedTracks.push(track.uri)
      }
    }

    const summary = {
      attempted: tracks.length,
      failed: failedTracks.length,
      failed_tracks: failedTracks,
      succeeded: tracks.length - failedTracks.length,
    }
    getLogger()?.info('Queue dispatch finished', {...summary})
    return summary
  }

  /**
   * Replace playback with the radio in a single call
   */
  async play(tracks: Track[], deviceId?: string): Promise<EnqueueSummary> {
    const uris = tracks.map(track => track.uri)
    if (uris.length === 0) {
      return {attempted: 0, failed: 0, failed_tracks: [], succeeded: 0}
    }
    try {
      await this.spotify.startPlayback(uris, deviceId)
      return {attempted: uris.length, failed: 0, failed_tracks: [], succeeded: uris.length}
    } catch (error) {
      if (error instanceof AuthError) {
        throw error
      }
      getLogger()?.error('Failed to start playback', error, {tracks: uris.length})
      return {attempted: uris.length, failed: uris.length, failed_tracks: uris, succeeded: 0}
    }
  }
}
