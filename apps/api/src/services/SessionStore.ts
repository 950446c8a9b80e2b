/**
 * SessionStore - in-memory registry of Spotify sessions
 *
 * Sessions are keyed by an opaque random id carried in the session cookie
 * or the x-radio-session header. The most recent login becomes the default
 * session, used by callers that send neither.
 *
 * The store holds at most maxSessions sessions; a new login beyond that
 * evicts the least recently established one. A session whose refresh token
 * is rejected is removed at once.
 */

import {customAlphabet} from 'nanoid'

import {SESSION} from '../constants'
import {getLogger} from '../utils/LoggerContext'
import {type SessionOptions, SpotifySession, type TokenRefresher, toSessionToken, type TokenGrant} from './SpotifySession'

const generateSessionId = customAlphabet(
  '0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz',
  SESSION.ID_LENGTH,
)

export interface SessionStoreOptions extends Omit<SessionOptions, 'onRefreshRejected'> {
  maxSessions?: number
}

export class SessionStore {
  // Insertion order doubles as establish order, oldest first
  private sessions = new Map<string, SpotifySession>()
  private defaultSessionId: string | null = null
  private readonly maxSessions: number
  private readonly sessionOptions: Omit<SessionOptions, 'onRefreshRejected'>

  constructor(
    private readonly refresher: TokenRefresher,
    options: SessionStoreOptions = {},
  ) {
    const {maxSessions, ...sessionOptions} = options
    this.maxSessions = Math.max(1, maxSessions ?? SESSION.MAX_SESSIONS)
    this.sessionOptions = sessionOptions
  }

  get size(): number {
    return this.sessions.size
  }

  destroy(id: string): boolean {
    const session = this.sessions.get(id)
    if (!session) {
      return false
    }
    session.clear()
    this.forget(id)
    getLogger()?.info('Session destroyed', {session: id})
    return true
  }

  /**
   * Store a freshly exchanged token pair. An existing session id (from the
   * caller's cookie) is reused so one browser keeps one session; otherwise
   * a new session is created. Either way it becomes the default.
   */
  establish(grant: TokenGrant & {refreshToken: string}, existingId?: string): SpotifySession {
    const now = (this.sessionOptions.now ?? Date.now)()
    const session = (existingId && this.sessions.get(existingId)) || this.create()
    session.storeToken(toSessionToken(grant, now))

    this.sessions.delete(session.id)
    this.sessions.set(session.id, session)
    this.defaultSessionId = session.id
    this.evictOverflow()

    getLogger()?.info('Session established', {session: session.id})
    return session
  }

  /**
   * Resolve the session for a request. An explicit id must exist; without
   * one the default session is used.
   */
  resolve(id?: string): SpotifySession | undefined {
    if (id) {
      return this.sessions.get(id)
    }
    return this.defaultSessionId ? this.sessions.get(this.defaultSessionId) : undefined
  }

  private create(): SpotifySession {
    const session = new SpotifySession(generateSessionId(), this.refresher, {
      ...this.sessionOptions,
      onRefreshRejected: rejected => {
        if (this.sessions.get(rejected.id) === rejected) {
          this.forget(rejected.id)
          getLogger()?.info('Session removed after rejected refresh', {session: rejected.id})
        }
      },
    })
    this.sessions.set(session.id, session)
    return session
  }

  private evictOverflow(): void {
    for (const [id, session] of this.sessions) {
      if (this.sessions.size <= this.maxSessions) {
        return
      }
      session.clear()
      this.forget(id)
      getLogger()?.info('Session evicted', {session: id})
    }
  }

  private forget(id: string): void {
    this.sessions.delete(id)
    if (this.defaultSessionId === id) {
      this.defaultSessionId = null
    }
  }
}
