import type {OAuthStateRecord} from '@radio/shared-types'
import {beforeEach, describe, expect, it} from 'vitest'

import {OAuthStateStore} from '../../services/OAuthStateStore'

const NOW = 1_700_000_000_000

function buildRecord(state: string, createdAt = NOW): OAuthStateRecord {
  return {codeVerifier: 'v'.repeat(43), createdAt, state}
}

describe('OAuthStateStore', () => {
  let now: number
  let store: OAuthStateStore

  beforeEach(() => {
    now = NOW
    store = new OAuthStateStore(1000, () => now)
  })

  it('consumes a record exactly once', () => {
    store.save(buildRecord('state-aaaaaaaaaaaa'))

    expect(store.consume('state-aaaaaaaaaaaa')).toEqual(buildRecord('state-aaaaaaaaaaaa'))
    expect(store.consume('state-aaaaaaaaaaaa')).toBeNull()
  })

  it('returns null for unknown states', () => {
    expect(store.consume('state-unknown-000')).toBeNull()
  })

  it('rejects records older than the TTL', () => {
    store.save(buildRecord('state-aaaaaaaaaaaa'))
    now = NOW + 1001

    expect(store.consume('state-aaaaaaaaaaaa')).toBeNull()
  })

  it('prunes expired records when saving', () => {
    store.save(buildRecord('state-aaaaaaaaaaaa'))
    now = NOW + 5000
    store.save(buildRecord('state-bbbbbbbbbbbb', now))

    expect(store.size).toBe(1)
  })
})
