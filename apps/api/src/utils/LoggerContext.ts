/**
 * LoggerContext - AsyncLocalStorage-based context for ServiceLogger
 *
 * Provides per-request logger context without explicit parameter passing.
 */

import {AsyncLocalStorage} from 'node:async_hooks'
import {z} from 'zod'

import {ServiceLogger} from './ServiceLogger'

interface LoggerContext {
  logger: ServiceLogger
}

const LoggerContextSchema = z.object({
  logger: z.instanceof(ServiceLogger),
})

const loggerStorage = new AsyncLocalStorage<LoggerContext>()

/**
 * Get the current request's logger
 * Returns undefined if called outside of a logger context
 */
export function getLogger(): undefined | ServiceLogger {
  const validation = LoggerContextSchema.safeParse(loggerStorage.getStore())
  if (!validation.success) {
    return undefined
  }
  return validation.data.logger
}

/**
 * Initialize logger context for a request scope
 * Must be called with async/await (not thenables) to ensure context preservation
 */
export async function runWithLogger<T>(logger: ServiceLogger, fn: () => Promise<T>): Promise<T> {
  return await loggerStorage.run({logger}, fn)
}
