/**
 * Environment Configuration
 *
 * Centralizes environment variable loading for the SDK.
 * Use this instead of reading process.env throughout the codebase.
 */

import { PicaConfigurationError } from './errors'

export type PicaLogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent'

export const DEFAULT_LOG_LEVEL: PicaLogLevel = 'warn'

export interface PicaEnvironmentConfig {
  secret?: string
  serverUrl?: string
  openaiApiKey?: string
  logLevel: PicaLogLevel
  logPretty: boolean
}

type Env = Record<string, string | undefined>

const LOG_LEVEL_ALIASES: Record<string, PicaLogLevel> = {
  trace: 'trace',
  debug: 'debug',
  info: 'info',
  warn: 'warn',
  warning: 'warn',
  error: 'error',
  critical: 'fatal',
  fatal: 'fatal',
  silent: 'silent',
}

/**
 * Map a PICA_LOG_LEVEL value to a pino level.
 * Unknown or empty values fall back to the default.
 */
export function parseLogLevel(value: string | undefined): PicaLogLevel {
  if (!value) return DEFAULT_LOG_LEVEL
  return LOG_LEVEL_ALIASES[value.trim().toLowerCase()] ?? DEFAULT_LOG_LEVEL
}

function readFlag(value: string | undefined): boolean {
  return value !== undefined && ['1', 'true', 'yes'].includes(value.trim().toLowerCase())
}

function readString(value: string | undefined): string | undefined {
  const trimmed = value?.trim()
  return trimmed ? trimmed : undefined
}

export function loadPicaEnvironment(env: Env = process.env): PicaEnvironmentConfig {
  return {
    secret: readString(env.PICA_SECRET),
    serverUrl: readString(env.PICA_SERVER_URL),
    openaiApiKey: readString(env.OPENAI_API_KEY),
    logLevel: parseLogLevel(env.PICA_LOG_LEVEL),
    logPretty: readFlag(env.PICA_LOG_PRETTY),
  }
}

/**
 * Read a required environment variable
 * @throws PicaConfigurationError if it is unset or blank
 */
export function requireEnv(name: string, env: Env = process.env): string {
  const value = readString(env[name])
  if (!value) {
    throw new PicaConfigurationError(`${name} environment variable must be set`, { key: name })
  }
  return value
}
