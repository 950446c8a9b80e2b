/**
 * SpotifyAuthService - authorization-code flow with PKCE
 *
 * Builds the authorize URL, exchanges callback codes for token pairs and
 * refreshes access tokens. Token endpoint failures are split into
 * rejections (AuthError) and upstream trouble (TransportError).
 */

import type {OAuthCallbackQuery, SpotifyTokenResponse} from '@radio/shared-types'
import {safeParse, SpotifyOAuthErrorSchema, SpotifyTokenResponseSchema} from '@radio/shared-types'

import type {AppConfig} from '../config'
import {SPOTIFY} from '../constants'
import {type AuthFailureReason, AuthError, TransportError} from '../errors'
import {fetchWithTimeout, parseJsonSafely, readErrorBody, readJson} from '../lib/http'
import {generateCodeChallenge, generateCodeVerifier} from '../lib/pkce'
import {getLogger} from '../utils/LoggerContext'
import type {OAuthStateStore} from './OAuthStateStore'
import type {TokenGrant, TokenRefresher} from './SpotifySession'

const TOKEN_URL = `${SPOTIFY.ACCOUNTS_URL}/api/token`
const AUTHORIZE_URL = `${SPOTIFY.ACCOUNTS_URL}/authorize`

export type SpotifyAuthConfig = AppConfig['spotify'] & {timeoutMs: number}

export class SpotifyAuthService implements TokenRefresher {
  constructor(
    private readonly config: SpotifyAuthConfig,
    private readonly states: OAuthStateStore,
    private readonly now: () => number = Date.now,
  ) {}

  /**
   * Create a state record and return the Spotify authorize URL for it
   */
  async beginLogin(): Promise<string> {
    const codeVerifier = generateCodeVerifier()
    const codeChallenge = await generateCodeChallenge(codeVerifier)
    const state = crypto.randomUUID()

    this.states.save({codeVerifier, createdAt: this.now(), state})

    const params = new URLSearchParams({
      client_id: this.config.clientId,
      code_challenge: codeChallenge,
      code_challenge_method: 'S256',
      redirect_uri: this.config.redirectUri,
      response_type: 'code',
      scope: this.config.scope,
      state,
    })
    if (this.config.showDialog) {
      params.set('show_dialog', 'true')
    }

    return `${AUTHORIZE_URL}?${params.toString()}`
  }

  /**
   * Validate the callback and exchange its code for a token pair.
   * The state record is consumed whether or not the exchange succeeds.
   */
  async exchangeCode(query: OAuthCallbackQuery): Promise<TokenGrant & {refreshToken: string}> {
    const record = query.state ? this.states.consume(query.state) : null
    if (!record) {
      throw new AuthError('Unknown or expired OAuth state. Start again at /login.', 'invalid_state')
    }
    if (query.error) {
      throw new AuthError(`Spotify authorization failed: ${query.error}`, 'access_denied')
    }
    if (!query.code) {
      throw new AuthError('Callback is missing the authorization code', 'missing_code')
    }

    const token = await this.requestToken(
      {
        code: query.code,
        code_verifier: record.codeVerifier,
        grant_type: 'authorization_code',
        redirect_uri: this.config.redirectUri,
      },
      'code_rejected',
    )

    if (!token.refresh_token) {
      throw new TransportError('Spotify token response did not include a refresh token', {service: 'spotify-accounts'})
    }

    getLogger()?.info('Authorization code exchanged', {scope: token.scope})
    return {
      accessToken: token.access_token,
      expiresIn: token.expires_in,
      refreshToken: token.refresh_token,
      scope: token.scope,
    }
  }

  async refresh(refreshToken: string): Promise<TokenGrant> {
    const token = await this.requestToken({grant_type: 'refresh_token', refresh_token: refreshToken}, 'refresh_rejected')
    return {
      accessToken: token.access_token,
      expiresIn: token.expires_in,
      refreshToken: token.refresh_token,
      scope: token.scope,
    }
  }

  private async requestToken(
    params: Record<string, string>,
    rejection: AuthFailureReason,
  ): Promise<SpotifyTokenResponse> {
    const response = await fetchWithTimeout(TOKEN_URL, {
      body: new URLSearchParams({
        client_id: this.config.clientId,
        client_secret: this.config.clientSecret,
        ...params,
      }),
      headers: {
        'Content-Type': 'application/x-www-form-urlencoded',
      },
      method: 'POST',
      service: 'spotify-accounts',
      timeoutMs: this.config.timeoutMs,
    })

    if (response.status === 400 || response.status === 401) {
      const body = await readErrorBody(response)
      const oauthError = safeParse(SpotifyOAuthErrorSchema, parseJsonSafely(body))
      const detail = oauthError.success
        ? (oauthError.data.error_description ?? oauthError.data.error)
        : `HTTP ${response.status}`
      getLogger()?.warn('Spotify token endpoint rejected the grant', {detail, status: response.status})
      throw new AuthError(`Spotify rejected the grant: ${detail}`, rejection)
    }

    if (!response.ok) {
      const body = await readErrorBody(response)
      getLogger()?.error('Spotify token endpoint failed', undefined, {body, status: response.status})
      throw new TransportError(`Spotify token endpoint returned ${response.status}`, {
        service: 'spotify-accounts',
        status: response.status,
      })
    }

    const result = safeParse(SpotifyTokenResponseSchema, await readJson(response, 'spotify-accounts'))
    if (!result.success) {
      throw new TransportError('Spotify returned an unexpected token response', {
        cause: result.error,
        service: 'spotify-accounts',
      })
    }
    return result.data
  }
}
