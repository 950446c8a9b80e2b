/**
 * SpotifySession - one user's Spotify token pair
 *
 * Hands out access tokens that are guaranteed not to be expired. A token
 * inside the refresh margin is renewed first, and concurrent callers share
 * a single in-flight refresh.
 */

import type {SessionToken} from '@radio/shared-types'

import {SESSION} from '../constants'
import {AuthError} from '../errors'
import {getLogger} from '../utils/LoggerContext'

export interface TokenGrant {
  accessToken: string
  /** Lifetime in seconds */
  expiresIn: number
  refreshToken?: string
  scope?: string
}

export interface TokenRefresher {
  refresh(refreshToken: string): Promise<TokenGrant>
}

export interface SessionOptions {
  now?: () => number
  /** Called after a rejected refresh has cleared the token */
  onRefreshRejected?: (session: SpotifySession) => void
  refreshMarginMs?: number
}

export function toSessionToken(grant: TokenGrant & {refreshToken: string}, now: number): SessionToken {
  return {
    accessToken: grant.accessToken,
    expiresAt: now + grant.expiresIn * 1000,
    refreshToken: grant.refreshToken,
    scope: grant.scope,
  }
}

export class SpotifySession {
  private token: SessionToken | null = null
  private refreshInflight: Promise<SessionToken> | null = null
  // Bumped whenever the token is replaced or cleared, so a refresh that
  // started against an older token does not overwrite a newer one
  private generation = 0
  private readonly now: () => number
  private readonly onRefreshRejected?: (session: SpotifySession) => void
  private readonly refreshMarginMs: number

  constructor(
    readonly id: string,
    private readonly refresher: TokenRefresher,
    options: SessionOptions = {},
  ) {
    this.now = options.now ?? Date.now
    this.onRefreshRejected = options.onRefreshRejected
    this.refreshMarginMs = options.refreshMarginMs ?? SESSION.REFRESH_MARGIN_MS
  }

  get expiresAt(): number | null {
    return this.token?.expiresAt ?? null
  }

  get isAuthenticated(): boolean {
    return this.token !== null
  }

  clear(): void {
    this.token = null
    this.generation++
  }

  /**
   * Return an access token that is valid for at least the refresh margin,
   * refreshing it first when needed
   * @throws AuthError when there is no token or the refresh token was rejected
   */
  async getValidToken(): Promise<SessionToken> {
    const token = this.token
    if (!token) {
      throw new AuthError('Not logged in to Spotify. Visit /login first.', 'login_required')
    }

    if (token.expiresAt - this.refreshMarginMs > this.now()) {
      return token
    }

    this.refreshInflight ??= this.refresh(token).finally(() => {
      this.refreshInflight = null
    })
    return await this.refreshInflight
  }

  storeToken(token: SessionToken): void {
    this.token = token
    this.generation++
  }

  private async refresh(current: SessionToken): Promise<SessionToken> {
    const generation = this.generation
    getLogger()?.info('Refreshing Spotify access token', {session: this.id})

    let grant: TokenGrant
    try {
      grant = await this.refresher.refresh(current.refreshToken)
    } catch (error) {
      if (error instanceof AuthError && this.generation === generation) {
        getLogger()?.warn('Refresh token rejected, clearing session', {session: this.id})
        this.clear()
        this.onRefreshRejected?.(this)
      }
      throw error
    }

    if (this.generation !== generation) {
      // A new login landed while this refresh was in flight
      if (this.token) {
        return this.token
      }
      throw new AuthError('Session was cleared during token refresh', 'login_required')
    }

    const next: SessionToken = {
      accessToken: grant.accessToken,
      expiresAt: this.now() + grant.expiresIn * 1000,
      refreshToken: grant.refreshToken ?? current.refreshToken,
      scope: grant.scope ?? current.scope,
    }
    this.storeToken(next)
    return next
  }
}
