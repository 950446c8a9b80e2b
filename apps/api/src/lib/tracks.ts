/**
 * Track mapping and list helpers shared by the strategies
 */

import type {SpotifyTrackFull, Track, TrackSummary} from '@radio/shared-types'

export function fromSpotifyTrack(track: SpotifyTrackFull): Track {
  return {
    artists: track.artists.map(artist => artist.name),
    id: track.id,
    metadata: {
      album: track.album?.name,
      artistIds: track.artists.map(artist => artist.id),
      durationMs: track.duration_ms,
      externalUrl: track.external_urls?.spotify,
      isrc: track.external_ids?.isrc,
      popularity: track.popularity,
    },
    title: track.name,
    uri: track.uri,
  }
}

export function toTrackSummary(track: Track): TrackSummary {
  return {artists: track.artists, id: track.id, title: track.title, uri: track.uri}
}

export function formatTrack(track: Pick<Track, 'artists' | 'title'>): string {
  return `${track.title} by ${track.artists.join(', ')}`
}

/**
 * Drop the seed and duplicate ids, keep order, and cap at limit
 */
export function finalizeTracks(seed: Track, tracks: Track[], limit: number): Track[] {
  const seen = new Set<string>([seed.id])
  const result: Track[] = []
  for (const track of tracks) {
    if (result.length >= limit) break
    if (seen.has(track.id) || track.uri === seed.uri) continue
    seen.add(track.id)
    result.push(track)
  }
  return result
}

/**
 * Fisher-Yates shuffle into a new array
 */
export function shuffle<T>(items: readonly T[], random: () => number = Math.random): T[] {
  const result = [...items]
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1))
    const current = result[i]
    const swap = result[j]
    if (current === undefined || swap === undefined) continue
    result[i] = swap
    result[j] = current
  }
  return result
}
