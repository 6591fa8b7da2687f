import pino from 'pino'
import type { Logger } from 'pino'
import { loadPicaEnvironment, type PicaLogLevel } from '../config/environment'

/**
 * Logging - structured JSON logging via Pino
 *
 * Level comes from PICA_LOG_LEVEL, pretty output from PICA_LOG_PRETTY.
 */

export interface LoggerOptions {
  level?: PicaLogLevel
  pretty?: boolean
}

export const MASKED_VALUE = '********'

export function createLogger(options: LoggerOptions = {}): Logger {
  const env = loadPicaEnvironment()

  return pino({
    name: 'pica-langchain',
    level: options.level ?? env.logLevel,
    ...((options.pretty ?? env.logPretty) && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname',
        },
      },
    }),
  })
}

/**
 * Shared SDK logger
 */
export const logger = createLogger()

export function setLogLevel(level: PicaLogLevel): void {
  logger.level = level
}

/**
 * Hide values of headers that carry secrets or keys
 */
export function maskHeaders<T>(headers: Record<string, T>): Record<string, T | string> {
  const masked: Record<string, T | string> = {}
  for (const [name, value] of Object.entries(headers)) {
    const lower = name.toLowerCase()
    masked[name] = lower.includes('secret') || lower.includes('key') ? MASKED_VALUE : value
  }
  return masked
}

export interface RequestLogDetails {
  requestData?: unknown
  responseStatus?: number
  responseData?: unknown
  error?: unknown
}

/**
 * Log one API request/response pair
 */
export function logRequestResponse(
  method: string,
  url: string,
  details: RequestLogDetails = {},
  log: Logger = logger
): void {
  const entry: Record<string, unknown> = {
    request: { method: method.toUpperCase(), url, data: details.requestData },
  }

  if (details.responseStatus !== undefined || details.responseData !== undefined) {
    entry.response = { status: details.responseStatus, data: details.responseData }
  }

  if (details.error !== undefined) {
    entry.err = details.error
    log.error(entry, `${method.toUpperCase()} ${url} failed`)
    return
  }

  log.debug(entry, `${method.toUpperCase()} ${url}`)
}
