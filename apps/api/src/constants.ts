/**
 * Application constants
 */

// ===== Spotify =====

export const SPOTIFY = {
  ACCOUNTS_URL: 'https://accounts.spotify.com',
  API_URL: 'https://api.spotify.com/v1',
  DEFAULT_SCOPE: 'user-read-playback-state user-modify-playback-state user-read-currently-playing',
  /** Largest page the search endpoint returns */
  MAX_SEARCH_LIMIT: 50,
  /** offset + limit may not exceed this on search */
  MAX_SEARCH_WINDOW: 1000,
} as const

// ===== Sessions and OAuth =====

export const SESSION = {
  COOKIE_NAME: 'radio_session',
  COOKIE_MAX_AGE_SECONDS: 60 * 60 * 24 * 30,
  HEADER_NAME: 'x-radio-session',
  ID_LENGTH: 32,
  /** Oldest logins are evicted beyond this many sessions */
  MAX_SESSIONS: 100,
  /** Tokens this close to expiry are refreshed before use */
  REFRESH_MARGIN_MS: 60_000,
} as const

export const OAUTH = {
  STATE_TTL_MS: 15 * 60 * 1000,
  /** Random bytes behind a code verifier; 48 bytes encode to 64 characters */
  VERIFIER_BYTES: 48,
} as const

// ===== Radio =====

export const RADIO = {
  DEFAULT_SIZE: 20,
  /** Tracks fetched from search for the native strategy before shuffling */
  NATIVE_POOL_SIZE: 20,
  RECCOBEATS_MAX_SIZE: 100,
  SUGGESTION_TEMPERATURE: 0.8,
} as const

export const RECCOBEATS = {
  API_URL: 'https://api.reccobeats.com/v1',
} as const
