import {describe, expect, it, vi} from 'vitest'

import {TransportError} from '../../errors'
import {fetchWithTimeout, parseJsonSafely, readJson} from '../../lib/http'

describe('fetchWithTimeout', () => {
  it('passes the request through with an abort signal', async () => {
    const response = new Response('ok')
    vi.mocked(fetch).mockResolvedValueOnce(response)

    await expect(fetchWithTimeout('https://api.test/items', {method: 'POST', service: 'test', timeoutMs: 100})).resolves.toBe(
      response,
    )

    const init = vi.mocked(fetch).mock.calls[0]?.[1]
    expect(init?.method).toBe('POST')
    expect(init?.signal).toBeInstanceOf(AbortSignal)
    expect(init).not.toHaveProperty('timeoutMs')
  })

  it('turns a timeout into a 504 TransportError', async () => {
    vi.mocked(fetch).mockRejectedValueOnce(new DOMException('The operation timed out.', 'TimeoutError'))

    const error = await fetchWithTimeout('https://api.test', {service: 'spotify', timeoutMs: 100}).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(TransportError)
    expect(error).toMatchObject({
      code: 'upstream_timeout',
      message: 'spotify did not respond within 100ms',
      status: 504,
    })
  })

  it('turns a network failure into a 502 TransportError', async () => {
    vi.mocked(fetch).mockRejectedValueOnce(new TypeError('fetch failed'))

    await expect(fetchWithTimeout('https://api.test', {service: 'spotify', timeoutMs: 100})).rejects.toMatchObject({
      code: 'transport_error',
      message: 'spotify request failed: fetch failed',
      status: 502,
    })
  })
})

describe('readJson', () => {
  it('rejects a body that is not JSON', async () => {
    await expect(readJson(new Response('<html>', {status: 200}), 'spotify')).rejects.toMatchObject({
      message: 'spotify returned a body that is not JSON',
    })
  })
})

describe('parseJsonSafely', () => {
  it('parses JSON text', () => {
    expect(parseJsonSafely('{"error":{"message":"Not found","status":404}}')).toEqual({
      error: {message: 'Not found', status: 404},
    })
  })

  it('returns null for text that is not JSON', () => {
    expect(parseJsonSafely('<html>Bad gateway</html>')).toBeNull()
    expect(parseJsonSafely('')).toBeNull()
  })
})
