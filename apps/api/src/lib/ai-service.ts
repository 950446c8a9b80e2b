/**
 * AI Service - text generation behind one interface for OpenAI and Anthropic
 *
 * Clients run with SDK retries disabled and the configured HTTP timeout;
 * SDK failures are rethrown as TransportError so the radio maps them to
 * 502/504 like any other upstream.
 */

import Anthropic from '@anthropic-ai/sdk'
import type {TrackSuggestion} from '@radio/shared-types'
import {safeParse, TrackSuggestionEnvelopeSchema, TrackSuggestionSchema} from '@radio/shared-types'
import OpenAI from 'openai'

import type {AppConfig} from '../config'
import {getErrorMessage, TransportError} from '../errors'
import {getLogger} from '../utils/LoggerContext'

// =============================================================================
// TYPES
// =============================================================================

export interface AIRequestOptions {
  maxTokens?: number
  system?: string
  temperature?: number
}

export interface TextGenerationClient {
  readonly provider: string
  complete(prompt: string, options?: AIRequestOptions): Promise<string>
}

export interface TextClientConfig {
  apiKey: string
  model: string
  timeoutMs: number
}

const DEFAULT_MAX_TOKENS = 1000
const DEFAULT_TEMPERATURE = 0.7

// =============================================================================
// CLIENTS
// =============================================================================

export class OpenAITextClient implements TextGenerationClient {
  readonly provider = 'openai'
  private client: OpenAI

  constructor(private readonly config: TextClientConfig) {
    this.client = new OpenAI({apiKey: config.apiKey, maxRetries: 0, timeout: config.timeoutMs})
  }

  async complete(prompt: string, options: AIRequestOptions = {}): Promise<string> {
    try {
      const completion = await this.client.chat.completions.create({
        max_tokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
        messages: [
          ...(options.system ? [{content: options.system, role: 'system' as const}] : []),
          {content: prompt, role: 'user' as const},
        ],
        model: this.config.model,
        temperature: options.temperature ?? DEFAULT_TEMPERATURE,
      })
      return completion.choices[0]?.message.content ?? ''
    } catch (error) {
      throw toTransportError(error, this.provider, this.config.timeoutMs)
    }
  }
}

export class AnthropicTextClient implements TextGenerationClient {
  readonly provider = 'anthropic'
  private client: Anthropic

  constructor(private readonly config: TextClientConfig) {
    this.client = new Anthropic({apiKey: config.apiKey, maxRetries: 0, timeout: config.timeoutMs})
  }

  async complete(prompt: string, options: AIRequestOptions = {}): Promise<string> {
    try {
      const response = await this.client.messages.create({
        max_tokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
        messages: [{content: prompt, role: 'user'}],
        model: this.config.model,
        system: options.system ?? 'You are an AI assistant.',
        temperature: options.temperature ?? DEFAULT_TEMPERATURE,
      })

      return response.content
        .filter((block): block is Anthropic.TextBlock => block.type === 'text')
        .map(block => block.text)
        .join('')
    } catch (error) {
      throw toTransportError(error, this.provider, this.config.timeoutMs)
    }
  }
}

function toTransportError(error: unknown, provider: string, timeoutMs: number): TransportError {
  if (error instanceof OpenAI.APIConnectionTimeoutError || error instanceof Anthropic.APIConnectionTimeoutError) {
    return new TransportError(`${provider} did not respond within ${timeoutMs}ms`, {
      cause: error,
      service: provider,
      timeout: true,
    })
  }
  const status = error instanceof OpenAI.APIError || error instanceof Anthropic.APIError ? error.status : undefined
  getLogger()?.error(`${provider} completion failed`, error, {status})
  return new TransportError(`${provider} request failed: ${getErrorMessage(error)}`, {
    cause: error,
    service: provider,
    status,
  })
}

/**
 * Build the client for the configured provider
 * Returns null when the provider's API key is not set
 */
export function createTextClient(config: Pick<AppConfig, 'httpTimeoutMs' | 'llm'>): null | TextGenerationClient {
  const {llm} = config
  if (llm.provider === 'anthropic') {
    return llm.anthropicApiKey
      ? new AnthropicTextClient({apiKey: llm.anthropicApiKey, model: llm.anthropicModel, timeoutMs: config.httpTimeoutMs})
      : null
  }
  return llm.openaiApiKey
    ? new OpenAITextClient({apiKey: llm.openaiApiKey, model: llm.openaiModel, timeoutMs: config.httpTimeoutMs})
    : null
}

// =============================================================================
// RESPONSE PARSING
// =============================================================================

/**
 * Extract JSON from a text response (handles markdown code blocks, etc.)
 */
export function extractJSON(text: string): unknown {
  const jsonMatch = /\{[\s\S]*\}|\[[\s\S]*\]/.exec(text)
  if (!jsonMatch) {
    return null
  }
  try {
    return JSON.parse(jsonMatch[0])
  } catch (error) {
    getLogger()?.debug('Response contains no parseable JSON', {error: getErrorMessage(error)})
    return null
  }
}

const LIST_MARKER = /^\s*(?:\d+[.)]|[-*•])\s*/
const QUOTED_BY = /^["“'](.+?)["”']\s+by\s+(.+)$/i
const DASHED = /^(.+?)\s+[-–—]\s+(.+)$/
const SURROUNDING_QUOTES = /^["“']+|["”']+$/g

function parseSuggestionLine(line: string): null | TrackSuggestion {
  const text = line.replace(LIST_MARKER, '').trim()
  const match = QUOTED_BY.exec(text) ?? DASHED.exec(text)
  const title = match?.[1]?.replace(SURROUNDING_QUOTES, '').trim()
  const artist = match?.[2]?.replace(SURROUNDING_QUOTES, '').trim()
  return title && artist ? {artist, title} : null
}

/**
 * Turn a model reply into suggestions, in the order given.
 * A JSON list wins; otherwise each "Title - Artist" or
 * '"Title" by Artist' line is read. Malformed entries are skipped.
 */
export function parseTrackSuggestions(text: string): TrackSuggestion[] {
  const envelope = safeParse(TrackSuggestionEnvelopeSchema, extractJSON(text))
  if (envelope.success) {
    return envelope.data.flatMap(item => {
      const suggestion = safeParse(TrackSuggestionSchema, item)
      return suggestion.success ? [suggestion.data] : []
    })
  }

  return text.split('\n').flatMap(line => {
    const suggestion = parseSuggestionLine(line)
    return suggestion ? [suggestion] : []
  })
}
