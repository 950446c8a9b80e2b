/**
 * Error taxonomy for the radio API
 *
 * Every failure that crosses a route boundary is one of these, and
 * toErrorResponse() maps it to a status code and an ApiError body.
 */

import type {ApiError, ErrorCode, RadioStrategy} from '@radio/shared-types'
import type {ContentfulStatusCode} from 'hono/utils/http-status'

export type AuthFailureReason =
  | 'access_denied'
  | 'code_rejected'
  | 'invalid_state'
  | 'login_required'
  | 'missing_code'
  | 'refresh_rejected'
  | 'token_rejected'

export abstract class RadioError extends Error {
  abstract readonly code: ErrorCode
  abstract readonly status: ContentfulStatusCode
}

/**
 * Missing, rejected or revoked credentials. A malformed callback
 * (bad state, no code) is reported as a 400 rather than a 401.
 */
export class AuthError extends RadioError {
  override readonly name = 'AuthError'
  readonly code: ErrorCode
  readonly status: ContentfulStatusCode

  constructor(
    message: string,
    readonly reason: AuthFailureReason,
    options?: ErrorOptions,
  ) {
    super(message, options)
    const malformed = reason === 'invalid_state' || reason === 'missing_code'
    this.code = malformed ? 'invalid_request' : 'auth_required'
    this.status = malformed ? 400 : 401
  }
}

export class NoActivePlaybackError extends RadioError {
  override readonly name = 'NoActivePlaybackError'
  readonly code = 'no_active_playback'
  readonly status = 409

  constructor(message = 'No song is currently playing') {
    super(message)
  }
}

export interface TransportErrorOptions extends ErrorOptions {
  service: string
  status?: number
  timeout?: boolean
}

/**
 * An upstream service could not be reached, timed out, or answered
 * with something other than a usable 2xx response.
 */
export class TransportError extends RadioError {
  override readonly name = 'TransportError'
  readonly code: ErrorCode
  readonly service: string
  readonly status: ContentfulStatusCode
  readonly upstreamStatus?: number
  readonly timeout: boolean

  constructor(message: string, options: TransportErrorOptions) {
    super(message, {cause: options.cause})
    this.service = options.service
    this.timeout = options.timeout ?? false
    this.upstreamStatus = options.status
    this.code = this.timeout ? 'upstream_timeout' : 'transport_error'
    this.status = this.timeout ? 504 : 502
  }
}

/**
 * A strategy produced no usable tracks, or its source failed
 */
export class RecommendationError extends RadioError {
  override readonly name = 'RecommendationError'
  readonly code = 'recommendation_failed'
  readonly status: ContentfulStatusCode

  constructor(
    readonly strategy: RadioStrategy,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options)
    this.status = options?.cause instanceof TransportError && options.cause.timeout ? 504 : 502
  }
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

export function toErrorResponse(error: unknown): {body: ApiError; status: ContentfulStatusCode} {
  if (error instanceof RecommendationError) {
    return {body: {code: error.code, error: error.message, strategy: error.strategy}, status: error.status}
  }
  if (error instanceof RadioError) {
    return {body: {code: error.code, error: error.message}, status: error.status}
  }
  return {body: {code: 'internal_error', error: 'Internal server error'}, status: 500}
}
