import type {RadioStrategy, Track} from '@radio/shared-types'

import {AuthError, getErrorMessage, RadioError, RecommendationError} from '../../errors'

/**
 * A source of radio tracks for a seed. Implementations return at most
 * limit tracks, never the seed, in the order they should be played.
 */
export interface RecommendationStrategy {
  readonly name: RadioStrategy
  recommend(seed: Track, limit: number): Promise<Track[]>
}

/**
 * Wrap a failure inside a strategy. Auth failures and errors that already
 * carry a strategy pass through so the route can report them as-is.
 */
export function toStrategyError(strategy: RadioStrategy, error: unknown): RadioError {
  if (error instanceof AuthError || error instanceof RecommendationError) {
    return error
  }
  return new RecommendationError(strategy, `${strategy} recommendations failed: ${getErrorMessage(error)}`, {
    cause: error,
  })
}
