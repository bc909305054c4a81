/**
 * ServiceLogger - Centralized logging for services with SSE streaming
 *
 * Replaces console.log throughout services to:
 * - Send formatted logs to the client via SSE while a generation stream is open
 * - Log to server console for debugging
 * - Provide consistent formatting
 */

import type {GenerationStreamEvent, StreamLogData} from '@moodlist/shared-types'

export type LogLevel = 'debug' | 'error' | 'info' | 'warn'

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  error: 40,
  info: 20,
  warn: 30,
}

// Simple interface for SSEWriter (to avoid circular dependency)
interface LogEventWriter {
  writeAsync(event: GenerationStreamEvent): void
}

export interface ServiceLoggerOptions {
  minLevel?: LogLevel
  sseWriter?: LogEventWriter
}

export class ServiceLogger {
  private readonly minLevel: LogLevel
  private readonly serviceName: string
  private readonly sseWriter?: LogEventWriter

  constructor(serviceName: string, options: ServiceLoggerOptions = {}) {
    this.serviceName = serviceName
    this.minLevel = options.minLevel ?? 'info'
    this.sseWriter = options.sseWriter
  }

  /**
   * Create a child logger with a sub-context
   */
  child(subContext: string): ServiceLogger {
    return new ServiceLogger(`${this.serviceName}:${subContext}`, {
      minLevel: this.minLevel,
      sseWriter: this.sseWriter,
    })
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', message, data)
  }

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    const errorData =
      error instanceof Error
        ? {error: error.message, stack: error.stack, ...data}
        : error === undefined
          ? data
          : {error: String(error), ...data}
    this.log('error', message, errorData)
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data)
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data)
  }

  /**
   * Core logging method
   */
  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) return

    const formattedMessage = `[${this.serviceName}] ${message}`

    const consoleMethod =
      level === 'error' ? console.error : level === 'warn' ? console.warn : console.log
    if (data && Object.keys(data).length > 0) {
      consoleMethod(formattedMessage, data)
    } else {
      consoleMethod(formattedMessage)
    }

    // Debug output stays on the server
    if (this.sseWriter && level !== 'debug') {
      const logData: StreamLogData = {
        level,
        message: formattedMessage,
      }

      // Fire and forget - the writer queues and never throws
      this.sseWriter.writeAsync({
        data: logData,
        type: 'log',
      })
    }
  }
}
