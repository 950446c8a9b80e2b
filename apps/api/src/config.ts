/**
 * Environment configuration
 *
 * The process environment is validated once at startup. Anything the
 * server cannot run without fails here, before a port is bound.
 */

import {formatZodError} from '@radio/shared-types'
import {z} from 'zod'

import {RADIO, SPOTIFY} from './constants'

// Blank values from a .env file count as unset
const optionalString = z.preprocess(value => (value === '' ? undefined : value), z.string().min(1).optional())

const EnvSchema = z.object({
  ANTHROPIC_API_KEY: optionalString,
  ANTHROPIC_MODEL: z.string().min(1).default('claude-sonnet-4-5-20250929'),
  FRONTEND_URL: z.preprocess(value => (value === '' ? undefined : value), z.string().url().optional()),
  HOST: z.string().min(1).default('0.0.0.0'),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  LLM_PROVIDER: z.enum(['openai', 'anthropic']).default('openai'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL: z.string().min(1).default('gpt-4o-mini'),
  PORT: z.coerce.number().int().min(1).max(65535).default(5002),
  RADIO_SIZE: z.coerce.number().int().min(1).max(50).default(RADIO.DEFAULT_SIZE),
  RECCOBEATS_API_KEY: optionalString,
  SPOTIFY_CLIENT_ID: z.string().min(1, 'SPOTIFY_CLIENT_ID is required'),
  SPOTIFY_CLIENT_SECRET: z.string().min(1, 'SPOTIFY_CLIENT_SECRET is required'),
  SPOTIFY_REDIRECT_URI: z.string().url('SPOTIFY_REDIRECT_URI must be an absolute URL'),
  SPOTIFY_SCOPE: z.string().min(1).default(SPOTIFY.DEFAULT_SCOPE),
  SPOTIFY_SHOW_DIALOG: z
    .enum(['true', 'false'])
    .default('false')
    .transform(value => value === 'true'),
})

export type LogLevel = z.infer<typeof EnvSchema>['LOG_LEVEL']
export type LlmProvider = z.infer<typeof EnvSchema>['LLM_PROVIDER']

export interface AppConfig {
  frontendUrl?: string
  host: string
  httpTimeoutMs: number
  llm: {
    anthropicApiKey?: string
    anthropicModel: string
    openaiApiKey?: string
    openaiModel: string
    provider: LlmProvider
  }
  logLevel: LogLevel
  port: number
  radioSize: number
  reccoBeatsApiKey?: string
  spotify: {
    clientId: string
    clientSecret: string
    redirectUri: string
    scope: string
    showDialog: boolean
  }
}

export class ConfigError extends Error {
  override readonly name = 'ConfigError'
}

/**
 * Validate the environment and map it onto AppConfig
 * @throws ConfigError listing every invalid or missing variable
 */
export function loadConfig(env: Record<string, string | undefined>): AppConfig {
  const result = EnvSchema.safeParse(env)
  if (!result.success) {
    throw new ConfigError(`Invalid environment: ${formatZodError(result.error)}`)
  }

  const vars = result.data
  return {
    frontendUrl: vars.FRONTEND_URL,
    host: vars.HOST,
    httpTimeoutMs: vars.HTTP_TIMEOUT_MS,
    llm: {
      anthropicApiKey: vars.ANTHROPIC_API_KEY,
      anthropicModel: vars.ANTHROPIC_MODEL,
      openaiApiKey: vars.OPENAI_API_KEY,
      openaiModel: vars.OPENAI_MODEL,
      provider: vars.LLM_PROVIDER,
    },
    logLevel: vars.LOG_LEVEL,
    port: vars.PORT,
    radioSize: vars.RADIO_SIZE,
    reccoBeatsApiKey: vars.RECCOBEATS_API_KEY,
    spotify: {
      clientId: vars.SPOTIFY_CLIENT_ID,
      clientSecret: vars.SPOTIFY_CLIENT_SECRET,
      redirectUri: vars.SPOTIFY_REDIRECT_URI,
      scope: vars.SPOTIFY_SCOPE,
      showDialog: vars.SPOTIFY_SHOW_DIALOG,
    },
  }
}
