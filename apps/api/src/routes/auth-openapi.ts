/**
 * Spotify login routes
 */

import {beginLogin, getSessionStatus, handleCallback, logout} from '@radio/api-contracts'
import type {OpenAPIHono} from '@hono/zod-openapi'

import type {AppDependencies} from '../container'
import {AuthError} from '../errors'
import {clearSessionCookie, getSessionId, requireSession, setSessionCookie} from '../lib/session-cookie'
import {getLogger} from '../utils/LoggerContext'

function toIso(epochMs: number): string {
  return new Date(epochMs).toISOString()
}

/**
 * Register auth routes on the provided OpenAPI app
 */
export function registerAuthRoutes(app: OpenAPIHono, deps: AppDependencies) {
  const secureCookie = deps.config.spotify.redirectUri.startsWith('https://')

  // GET /login - Redirect to Spotify with a fresh state record
  app.openapi(beginLogin, async c => {
    const url = await deps.auth.beginLogin()
    return c.redirect(url, 302)
  })

  // GET /callback - Exchange the code, then store the token pair
  app.openapi(handleCallback, async c => {
    const query = c.req.valid('query')

    // Nothing is stored unless the exchange succeeds
    const grant = await deps.auth.exchangeCode(query)
    const session = deps.sessions.establish(grant, getSessionId(c))
    setSessionCookie(c, session.id, secureCookie)

    getLogger()?.info('Spotify login complete', {session: session.id})
    return c.json(
      {
        expires_at: toIso(session.expiresAt ?? Date.now()),
        message: 'Logged in to Spotify. Start a radio with POST /trigger.',
        session_id: session.id,
      },
      200,
    )
  })

  // POST /logout - Forget the session's tokens
  app.openapi(logout, async c => {
    const session = requireSession(c, deps.sessions)
    if (!deps.sessions.destroy(session.id)) {
      throw new AuthError('Session already ended', 'login_required')
    }
    clearSessionCookie(c)
    return c.json({message: 'Logged out'}, 200)
  })

  // GET /session - Whether the resolved session holds a token
  app.openapi(getSessionStatus, async c => {
    const session = deps.sessions.resolve(getSessionId(c))
    const expiresAt = session?.expiresAt ?? null
    return c.json(
      {
        authenticated: session?.isAuthenticated ?? false,
        expires_at: expiresAt === null ? null : toIso(expiresAt),
      },
      200,
    )
  })
}
