/**
 * Radio API contracts
 * One trigger route per recommendation strategy
 */

import {ApiErrorSchema, TriggerRequestSchema, TriggerResponseSchema} from '@radio/shared-types'
import {createRoute} from '@hono/zod-openapi'

const errorContent = {
  'application/json': {
    schema: ApiErrorSchema,
  },
}

function triggerRoute(path: string, description: string) {
  return createRoute({
    description,
    method: 'post',
    path,
    request: {
      body: {
        content: {
          'application/json': {
            schema: TriggerRequestSchema,
          },
        },
        required: false,
      },
    },
    responses: {
      200: {
        content: {
          'application/json': {
            schema: TriggerResponseSchema,
          },
        },
        description: 'Radio built and dispatched. Per-track failures are reported in summary.',
      },
      400: {
        content: errorContent,
        description: 'Invalid request body',
      },
      401: {
        content: errorContent,
        description: 'Login required, or the refresh token was rejected',
      },
      409: {
        content: errorContent,
        description: 'Nothing is currently playing',
      },
      502: {
        content: errorContent,
        description: 'Spotify or the recommendation source failed',
      },
      504: {
        content: errorContent,
        description: 'An upstream call timed out',
      },
    },
    tags: ['Radio'],
  })
}

/**
 * POST /trigger
 * Shuffled radio from Spotify search around the seed artist's genres
 */
export const triggerNativeRadio = triggerRoute('/trigger', 'Start a shuffled radio built from Spotify search')

/**
 * POST /trigger-openai
 * Radio proposed by a language model and resolved through Spotify search
 */
export const triggerLlmRadio = triggerRoute('/trigger-openai', 'Start a radio proposed by a language model')

/**
 * POST /trigger-reccobeats
 * Radio from ReccoBeats audio-similarity recommendations
 */
export const triggerSimilarityRadio = triggerRoute(
  '/trigger-reccobeats',
  'Start a radio from ReccoBeats similarity recommendations',
)
