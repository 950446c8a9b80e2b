/**
 * Session lookup for a request: cookie first, then header, then the default session
 */

import type {Context} from 'hono'
import {deleteCookie, getCookie, setCookie} from 'hono/cookie'

import {SESSION} from '../constants'
import {AuthError} from '../errors'
import type {SessionStore} from '../services/SessionStore'
import type {SpotifySession} from '../services/SpotifySession'

export function getSessionId(c: Context): string | undefined {
  return getCookie(c, SESSION.COOKIE_NAME) ?? c.req.header(SESSION.HEADER_NAME) ?? undefined
}

/**
 * @throws AuthError when no session can be resolved
 */
export function requireSession(c: Context, sessions: SessionStore): SpotifySession {
  const session = sessions.resolve(getSessionId(c))
  if (!session) {
    throw new AuthError('Not logged in to Spotify. Visit /login first.', 'login_required')
  }
  return session
}

export function setSessionCookie(c: Context, sessionId: string, secure: boolean): void {
  setCookie(c, SESSION.COOKIE_NAME, sessionId, {
    httpOnly: true,
    maxAge: SESSION.COOKIE_MAX_AGE_SECONDS,
    path: '/',
    sameSite: 'Lax',
    secure,
  })
}

export function clearSessionCookie(c: Context): void {
  deleteCookie(c, SESSION.COOKIE_NAME, {path: '/'})
}
