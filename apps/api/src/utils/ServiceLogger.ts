/**
 * ServiceLogger - Centralized logging for services
 *
 * Prefixes every line with the service name, keeps structured data as a
 * second console argument, and drops messages below the configured level.
 */

import type {LogLevel} from '../config'

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
}

let minimumLevel: LogLevel = 'info'

export class ServiceLogger {
  private serviceName: string

  constructor(serviceName: string) {
    this.serviceName = serviceName
  }

  /**
   * Set the process-wide minimum level
   */
  static setLevel(level: LogLevel): void {
    minimumLevel = level
  }

  /**
   * Create a child logger with a sub-context
   */
  child(subContext: string): ServiceLogger {
    return new ServiceLogger(`${this.serviceName}:${subContext}`)
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', message, data)
  }

  /**
   * Log an error message, unpacking Error instances and their cause
   */
  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    const errorData =
      error instanceof Error
        ? {error: error.message, stack: error.stack, ...(error.cause !== undefined && {cause: String(error.cause)}), ...data}
        : {error: String(error), ...data}
    this.log('error', message, errorData)
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data)
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data)
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minimumLevel]) {
      return
    }

    const formattedMessage = `[${this.serviceName}] ${message}`

    const consoleMethod = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log
    if (data && Object.keys(data).length > 0) {
      consoleMethod(formattedMessage, data)
    } else {
      consoleMethod(formattedMessage)
    }
  }
}
