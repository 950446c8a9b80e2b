/**
 * Outbound HTTP with a hard deadline
 *
 * Every provider call goes through fetchWithTimeout so that a stalled
 * upstream surfaces as a TransportError instead of hanging the request.
 */

import {getErrorMessage, TransportError} from '../errors'

export interface TimedRequestInit extends RequestInit {
  /** Name of the upstream, used in error messages and logs */
  service: string
  timeoutMs: number
}

function isTimeout(error: unknown): boolean {
  return error instanceof DOMException && (error.name === 'TimeoutError' || error.name === 'AbortError')
}

export async function fetchWithTimeout(url: string | URL, init: TimedRequestInit): Promise<Response> {
  const {service, timeoutMs, ...requestInit} = init
  try {
    return await fetch(url, {...requestInit, signal: AbortSignal.timeout(timeoutMs)})
  } catch (error) {
    if (isTimeout(error)) {
      throw new TransportError(`${service} did not respond within ${timeoutMs}ms`, {
        cause: error,
        service,
        timeout: true,
      })
    }
    throw new TransportError(`${service} request failed: ${getErrorMessage(error)}`, {cause: error, service})
  }
}

/**
 * Read a response body for diagnostics without failing on an unreadable stream
 */
export async function readErrorBody(response: Response): Promise<string> {
  try {
    return (await response.text()).slice(0, 500)
  } catch (error) {
    return `<unreadable body: ${getErrorMessage(error)}>`
  }
}

/**
 * Parse text as JSON, yielding null when it is not JSON
 */
export function parseJsonSafely(text: string): unknown {
  try {
    return JSON.parse(text)
  } catch {
    return null
  }
}

/**
 * Parse a JSON body, reporting malformed payloads as a TransportError
 */
export async function readJson(response: Response, service: string): Promise<unknown> {
  try {
    return await response.json()
  } catch (error) {
    throw new TransportError(`${service} returned a body that is not JSON`, {
      cause: error,
      service,
      status: response.status,
    })
  }
}
