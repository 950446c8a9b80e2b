/**
 * Authentication API contracts
 * Spotify OAuth authorization-code flow with PKCE and a server-side state record
 */

import {ApiErrorSchema, LoginSuccessSchema, SessionStatusSchema} from '@radio/shared-types'
import {createRoute, z} from '@hono/zod-openapi'

/**
 * GET /login
 * Redirects to the Spotify authorize URL
 */
export const beginLogin = createRoute({
  description: 'Redirect to the Spotify authorization page',
  method: 'get',
  path: '/login',
  responses: {
    302: {
      description: 'Redirect to Spotify. A short-lived state record is kept server-side.',
    },
  },
  tags: ['Auth'],
})

/**
 * GET /callback
 * Exchanges the authorization code for a token pair and establishes a session
 */
export const handleCallback = createRoute({
  description: 'Handle the OAuth callback and exchange the code for tokens (server-side)',
  method: 'get',
  path: '/callback',
  request: {
    query: z.object({
      code: z.string().optional(),
      error: z.string().optional(),
      state: z.string().optional(),
    }),
  },
  responses: {
    200: {
      content: {
        'application/json': {
          schema: LoginSuccessSchema,
        },
      },
      description: 'Session established. The radio_session cookie identifies it.',
    },
    400: {
      content: {
        'application/json': {
          schema: ApiErrorSchema,
        },
      },
      description: 'Missing code, or unknown or expired state',
    },
    401: {
      content: {
        'application/json': {
          schema: ApiErrorSchema,
        },
      },
      description: 'Spotify rejected the authorization code',
    },
    502: {
      content: {
        'application/json': {
          schema: ApiErrorSchema,
        },
      },
      description: 'Spotify token endpoint unreachable',
    },
  },
  tags: ['Auth'],
})

/**
 * POST /logout
 * Forgets the session's tokens
 */
export const logout = createRoute({
  description: 'Clear the current session',
  method: 'post',
  path: '/logout',
  responses: {
    200: {
      content: {
        'application/json': {
          schema: z.object({
            message: z.string(),
          }),
        },
      },
      description: 'Session cleared',
    },
    401: {
      content: {
        'application/json': {
          schema: ApiErrorSchema,
        },
      },
      description: 'No session to clear',
    },
  },
  tags: ['Auth'],
})

/**
 * GET /session
 * Reports whether the resolved session holds a token
 */
export const getSessionStatus = createRoute({
  description: 'Report whether the current session is authenticated',
  method: 'get',
  path: '/session',
  responses: {
    200: {
      content: {
        'application/json': {
          schema: SessionStatusSchema,
        },
      },
      description: 'Session status',
    },
  },
  tags: ['Auth'],
})
