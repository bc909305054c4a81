/**
 * LoggerContext - AsyncLocalStorage-based context for ServiceLogger
 *
 * Provides per-request (HTTP) or per-command (CLI) logger context without
 * explicit parameter passing.
 */

import {AsyncLocalStorage} from 'node:async_hooks'

import {ServiceLogger} from './ServiceLogger'

interface LoggerContext {
  logger: ServiceLogger
}

const loggerStorage = new AsyncLocalStorage<LoggerContext>()

/**
 * Get the current request's logger
 * Returns undefined if called outside of a logger context
 */
export function getLogger(): undefined | ServiceLogger {
  const context = loggerStorage.getStore()
  if (!context || !(context.logger instanceof ServiceLogger)) {
    return undefined
  }
  return context.logger
}

/**
 * Initialize logger context for a request scope
 * Must be called with async/await (not thenables) to ensure context preservation
 */
export async function runWithLogger<T>(logger: ServiceLogger, fn: () => Promise<T>): Promise<T> {
  return await loggerStorage.run({logger}, fn)
}
