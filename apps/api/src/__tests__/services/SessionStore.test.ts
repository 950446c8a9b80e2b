import {beforeEach, describe, expect, it, vi} from 'vitest'

import {AuthError, TransportError} from '../../errors'
import {SessionStore} from '../../services/SessionStore'

const NOW = 1_700_000_000_000
const grant = {accessToken: 'access-1', expiresIn: 3600, refreshToken: 'refresh-1'}

describe('SessionStore', () => {
  let store: SessionStore

  beforeEach(() => {
    store = new SessionStore({refresh: vi.fn()}, {now: () => NOW})
  })

  it('resolves nothing before the first login', () => {
    expect(store.resolve()).toBeUndefined()
    expect(store.size).toBe(0)
  })

  it('establishes an authenticated default session', async () => {
    const session = store.establish(grant)

    expect(session.id).toMatch(/^[0-9A-Za-z]{32}$/)
    expect(store.resolve()).toBe(session)
    expect(store.resolve(session.id)).toBe(session)
    await expect(session.getValidToken()).resolves.toEqual({
      accessToken: 'access-1',
      expiresAt: NOW + 3_600_000,
      refreshToken: 'refresh-1',
    })
  })

  it('reuses the caller session on a repeat login', () => {
    const first = store.establish(grant)
    const second = store.establish({...grant, accessToken: 'access-2'}, first.id)

    expect(second).toBe(first)
    expect(store.size).toBe(1)
  })

  it('creates a new session for an unknown id', () => {
    const session = store.establish(grant, 'missing-session')

    expect(session.id).not.toBe('missing-session')
    expect(store.size).toBe(1)
  })

  it('makes the latest login the default', () => {
    store.establish(grant)
    const latest = store.establish(grant)

    expect(store.size).toBe(2)
    expect(store.resolve()).toBe(latest)
  })

  it('does not fall back to the default for an unknown explicit id', () => {
    store.establish(grant)

    expect(store.resolve('missing-session')).toBeUndefined()
  })

  it('destroys sessions and forgets the default', () => {
    const session = store.establish(grant)

    expect(store.destroy(session.id)).toBe(true)
    expect(session.isAuthenticated).toBe(false)
    expect(store.resolve()).toBeUndefined()
    expect(store.destroy(session.id)).toBe(false)
  })

  describe('capacity', () => {
    it('stays bounded when logins arrive without a session id', () => {
      for (let i = 0; i < 1000; i++) {
        store.establish(grant)
      }

      expect(store.size).toBe(100)
    })

    it('evicts the least recently established session', () => {
      const small = new SessionStore({refresh: vi.fn()}, {maxSessions: 2, now: () => NOW})
      const first = small.establish(grant)
      const second = small.establish(grant)
      small.establish(grant, first.id)
      const third = small.establish(grant)

      expect(small.size).toBe(2)
      expect(small.resolve(second.id)).toBeUndefined()
      expect(second.isAuthenticated).toBe(false)
      expect(small.resolve(first.id)).toBe(first)
      expect(small.resolve()).toBe(third)
    })
  })

  describe('rejected refresh', () => {
    const nearExpiry = {...grant, expiresIn: 30}

    it('removes the session', async () => {
      const refresh = vi.fn().mockRejectedValue(new AuthError('Spotify rejected the grant: revoked', 'refresh_rejected'))
      const rejecting = new SessionStore({refresh}, {now: () => NOW})
      const session = rejecting.establish(nearExpiry)

      await expect(session.getValidToken()).rejects.toBeInstanceOf(AuthError)

      expect(rejecting.size).toBe(0)
      expect(rejecting.resolve()).toBeUndefined()
      expect(rejecting.resolve(session.id)).toBeUndefined()
    })

    it('keeps the session after a transport failure', async () => {
      const refresh = vi.fn().mockRejectedValue(new TransportError('spotify-accounts request failed', {service: 'spotify-accounts'}))
      const flaky = new SessionStore({refresh}, {now: () => NOW})
      const session = flaky.establish(nearExpiry)

      await expect(session.getValidToken()).rejects.toBeInstanceOf(TransportError)

      expect(flaky.resolve()).toBe(session)
      expect(session.isAuthenticated).toBe(true)
    })
  })
})
