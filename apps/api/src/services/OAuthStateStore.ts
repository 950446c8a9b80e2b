/**
 * OAuthStateStore - short-lived records tying a callback to its login
 *
 * Each record holds the PKCE verifier for one authorization attempt. A
 * record can be consumed exactly once and expires after the TTL.
 */

import type {OAuthStateRecord} from '@radio/shared-types'

import {OAUTH} from '../constants'

export class OAuthStateStore {
  private records = new Map<string, OAuthStateRecord>()

  constructor(
    private readonly ttlMs: number = OAUTH.STATE_TTL_MS,
    private readonly now: () => number = Date.now,
  ) {}

  get size(): number {
    return this.records.size
  }

  /**
   * Remove and return the record for a state value
   * Returns null for unknown, already used, or expired states
   */
  consume(state: string): null | OAuthStateRecord {
    const record = this.records.get(state)
    if (!record) {
      return null
    }
    this.records.delete(state)
    return this.isExpired(record) ? null : record
  }

  prune(): void {
    for (const [state, record] of this.records) {
      if (this.isExpired(record)) {
        this.records.delete(state)
      }
    }
  }

  save(record: OAuthStateRecord): void {
    this.prune()
    this.records.set(record.state, record)
  }

  private isExpired(record: OAuthStateRecord): boolean {
    return this.now() - record.createdAt > this.ttlMs
  }
}
