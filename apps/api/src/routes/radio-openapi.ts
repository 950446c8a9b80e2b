/**
 * Radio trigger routes, one per recommendation strategy
 */

import {triggerLlmRadio, triggerNativeRadio, triggerSimilarityRadio} from '@radio/api-contracts'
import type {OpenAPIHono} from '@hono/zod-openapi'
import type {RadioStrategy, TriggerRequest, TriggerResponse} from '@radio/shared-types'
import type {Context} from 'hono'

import type {AppDependencies} from '../container'
import {requireSession} from '../lib/session-cookie'

/**
 * Register radio routes on the provided OpenAPI app
 */
export function registerRadioRoutes(app: OpenAPIHono, deps: AppDependencies) {
  async function startRadio(c: Context, strategy: RadioStrategy, body: TriggerRequest): Promise<TriggerResponse> {
    const session = requireSession(c, deps.sessions)
    return await deps.radio.startRadio(session, strategy, {
      limit: body.limit ?? deps.config.radioSize,
      mode: body.mode ?? 'queue',
    })
  }

  // POST /trigger - Shuffled radio from Spotify search
  app.openapi(triggerNativeRadio, async c => {
    return c.json(await startRadio(c, 'native', c.req.valid('json') ?? {}), 200)
  })

  // POST /trigger-openai - Radio proposed by a language model
  app.openapi(triggerLlmRadio, async c => {
    return c.json(await startRadio(c, 'llm', c.req.valid('json') ?? {}), 200)
  })

  // POST /trigger-reccobeats - Radio from ReccoBeats similarity
  app.openapi(triggerSimilarityRadio, async c => {
    return c.json(await startRadio(c, 'similarity', c.req.valid('json') ?? {}), 200)
  })
}
