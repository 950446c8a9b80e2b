/**
 * Service wiring for one server process
 */

import type {AppConfig} from './config'
import {createTextClient, type TextGenerationClient} from './lib/ai-service'
import {OAuthStateStore} from './services/OAuthStateStore'
import {RadioService} from './services/RadioService'
import {ReccoBeatsService} from './services/ReccoBeatsService'
import {SessionStore} from './services/SessionStore'
import {SpotifyAuthService} from './services/SpotifyAuthService'
import {SpotifyClient} from './services/SpotifyClient'
import {LlmStrategy} from './services/strategies/LlmStrategy'
import {NativeStrategy} from './services/strategies/NativeStrategy'
import {SimilarityStrategy} from './services/strategies/SimilarityStrategy'

export interface AppDependencies {
  auth: SpotifyAuthService
  config: AppConfig
  radio: RadioService
  sessions: SessionStore
}

export function createDependencies(
  config: AppConfig,
  textClient: null | TextGenerationClient = createTextClient(config),
): AppDependencies {
  const states = new OAuthStateStore()
  const auth = new SpotifyAuthService({...config.spotify, timeoutMs: config.httpTimeoutMs}, states)
  const sessions = new SessionStore(auth)
  const reccoBeats = new ReccoBeatsService(config.httpTimeoutMs, config.reccoBeatsApiKey)

  const radio = new RadioService(
    session => new SpotifyClient(async () => (await session.getValidToken()).accessToken, config.httpTimeoutMs),
    {
      llm: spotify => new LlmStrategy(textClient, spotify),
      native: spotify => new NativeStrategy(spotify),
      similarity: () => new SimilarityStrategy(reccoBeats),
    },
  )

  return {auth, config, radio, sessions}
}
