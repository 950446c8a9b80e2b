/**
 * PlaybackInspector - resolves the seed track from the player state
 */

import type {Track} from '@radio/shared-types'
import {safeParse, SpotifyTrackFullSchema} from '@radio/shared-types'

import {NoActivePlaybackError, TransportError} from '../errors'
import {fromSpotifyTrack} from '../lib/tracks'
import {getLogger} from '../utils/LoggerContext'
import type {SpotifyApi} from './SpotifyClient'

export interface NowPlaying {
  contextUri: null | string
  deviceId: null | string
  isPlaying: boolean
  track: Track
}

export class PlaybackInspector {
  constructor(private readonly spotify: SpotifyApi) {}

  /**
   * @throws NoActivePlaybackError when no Spotify track is loaded (204, null item, an episode or a local file)
   */
  async getCurrentTrack(): Promise<NowPlaying> {
    const state = await this.spotify.getPlaybackState()

    if (!state?.item) {
      throw new NoActivePlaybackError()
    }
    if (state.item.type !== 'track') {
      throw new NoActivePlaybackError(`The current item is not a track (${state.item.type})`)
    }

    if (state.item.is_local || state.item.id === null) {
      throw new NoActivePlaybackError('Local files cannot seed a radio')
    }

    const item = safeParse(SpotifyTrackFullSchema, state.item)
    if (!item.success) {
      throw new TransportError('Spotify returned an unexpected playback state payload', {
        cause: item.error,
        service: 'spotify',
      })
    }

    const track = fromSpotifyTrack(item.data)
    getLogger()?.info('Seed track resolved', {isPlaying: state.is_playing, track: track.title})

    return {
      contextUri: state.context?.uri ?? null,
      deviceId: state.device?.id ?? null,
      isPlaying: state.is_playing,
      track,
    }
  }
}
