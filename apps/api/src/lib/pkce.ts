/**
 * PKCE helpers (RFC 7636) on the Web Crypto API
 */

import {OAUTH} from '../constants'

export function base64urlEncode(bytes: Uint8Array): string {
  return btoa(String.fromCharCode(...bytes))
    .replace(/\+/g, '-')
    .replace(/\//g, '_')
    .replace(/=/g, '')
}

/**
 * S256 challenge for a verifier
 */
export async function generateCodeChallenge(verifier: string): Promise<string> {
  const data = new TextEncoder().encode(verifier)
  const digest = await crypto.subtle.digest('SHA-256', data)
  return base64urlEncode(new Uint8Array(digest))
}

export function generateCodeVerifier(): string {
  const array = new Uint8Array(OAUTH.VERIFIER_BYTES)
  crypto.getRandomValues(array)
  return base64urlEncode(array)
}
