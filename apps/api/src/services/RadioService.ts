/**
 * RadioService - one radio run from seed to player
 *
 * For a session: read the seed from the player, ask the chosen strategy
 * for tracks, and dispatch them. Spotify access goes through a client
 * bound to the session so every call sees a fresh token.
 */

import type {DispatchMode, RadioStrategy, TriggerResponse} from '@radio/shared-types'

import {formatTrack, toTrackSummary} from '../lib/tracks'
import {getLogger} from '../utils/LoggerContext'
import {PlaybackInspector} from './PlaybackInspector'
import {QueueDispatcher} from './QueueDispatcher'
import type {SpotifyApi} from './SpotifyClient'
import type {SpotifySession} from './SpotifySession'
import type {RecommendationStrategy} from './strategies/types'

export type SpotifyApiFactory = (session: SpotifySession) => SpotifyApi
export type StrategyFactory = (spotify: SpotifyApi) => RecommendationStrategy

export interface RadioRequest {
  limit: number
  mode: DispatchMode
}

export class RadioService {
  constructor(
    private readonly createSpotifyApi: SpotifyApiFactory,
    private readonly strategies: Record<RadioStrategy, StrategyFactory>,
  ) {}

  async startRadio(session: SpotifySession, strategyName: RadioStrategy, request: RadioRequest): Promise<TriggerResponse> {
    const spotify = this.createSpotifyApi(session)
    const strategy = this.strategies[strategyName](spotify)

    const nowPlaying = await new PlaybackInspector(spotify).getCurrentTrack()
    const seed = nowPlaying.track

    const logger = getLogger()?.child(strategyName)
    const tracks = await strategy.recommend(seed, request.limit)
    logger?.info('Radio built', {seed: formatTrack(seed), tracks: tracks.length})

    if (tracks.length === 0) {
      return {
        message: `No tracks found based on ${formatTrack(seed)}`,
        mode: request.mode,
        seed_track: toTrackSummary(seed),
        strategy: strategyName,
        summary: {attempted: 0, failed: 0, failed_tracks: [], succeeded: 0},
        tracks: [],
      }
    }

    const summary = await new QueueDispatcher(spotify).dispatch(tracks, request.mode, nowPlaying.deviceId ?? undefined)
    const verb = request.mode === 'play' ? 'Started' : 'Queued'

    return {
      message: `${verb} ${summary.succeeded} of ${summary.attempted} tracks based on ${formatTrack(seed)}`,
      mode: request.mode,
      seed_track: toTrackSummary(seed),
      strategy: strategyName,
      summary,
      tracks: tracks.map(toTrackSummary),
    }
  }
}
