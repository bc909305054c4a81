/**
 * Environment configuration
 *
 * `.env` is loaded by dotenv, then process.env is validated once with zod.
 * Resolution tunables live here so deployments can trade API spend for playlist completeness.
 */

import 'dotenv/config'

import {formatZodError} from '@moodlist/shared-types'
import {z} from 'zod'

import {CONTENT_LIMITS, LLM, LOOKUP_LIMITS, RESOLUTION} from './constants'
import {ConfigError} from './errors'
import type {LogLevel} from './utils/ServiceLogger'

const EnvSchema = z.object({
  ANTHROPIC_API_KEY: z.string().min(1).optional(),
  ANTHROPIC_MODEL: z.string().min(1).default(LLM.MODEL),
  FRONTEND_URL: z.string().url().optional(),
  LOG_LEVEL: z.enum(['debug', 'error', 'info', 'warn']).default('info'),
  LOOKUP_CONCURRENCY: z.coerce.number().int().min(1).max(20).default(LOOKUP_LIMITS.CONCURRENCY),
  LOOKUP_RATE_PER_SECOND: z.coerce.number().positive().max(100).default(LOOKUP_LIMITS.RATE_PER_SECOND),
  LOOKUP_TIMEOUT_MS: z.coerce.number().int().min(100).default(LOOKUP_LIMITS.TIMEOUT_MS),
  MAX_ROUNDS: z.coerce.number().int().min(1).max(RESOLUTION.MAX_ROUNDS_LIMIT).default(RESOLUTION.MAX_ROUNDS),
  OVERFETCH_MULTIPLIER: z.coerce.number().min(1).max(4).default(RESOLUTION.OVERFETCH_MULTIPLIER),
  PORT: z.coerce.number().int().min(1).max(65535).default(8787),
  ROUND_DELAY_MS: z.coerce.number().int().min(0).default(RESOLUTION.ROUND_DELAY_MS),
  SEED_TRACK_LIMIT: z.coerce.number().int().min(1).max(50).default(CONTENT_LIMITS.DEFAULT_SEED_TRACKS),
  SPOTIFY_ACCESS_TOKEN: z.string().min(1).optional(),
})

export interface AppConfig {
  anthropic: {
    apiKey?: string
    model: string
  }
  frontendUrl?: string
  logLevel: LogLevel
  port: number
  resolution: {
    lookupConcurrency: number
    lookupRatePerSecond: number
    lookupTimeoutMs: number
    maxRounds: number
    overfetchMultiplier: number
    roundDelayMs: number
    seedTrackLimit: number
  }
  spotifyAccessToken?: string
}

/**
 * The Anthropic key, for entry points that generate suggestions
 */
export function requireAnthropicKey(config: AppConfig): string {
  const apiKey = config.anthropic.apiKey
  if (!apiKey) {
    throw new ConfigError('ANTHROPIC_API_KEY is not set')
  }
  return apiKey
}

/**
 * Validate an environment map into the typed config.
 * Empty strings count as unset so a blank line in .env falls back to the default.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const cleaned = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''))
  const result = EnvSchema.safeParse(cleaned)

  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${formatZodError(result.error)}`)
  }

  const vars = result.data
  return {
    anthropic: {
      apiKey: vars.ANTHROPIC_API_KEY,
      model: vars.ANTHROPIC_MODEL,
    },
    frontendUrl: vars.FRONTEND_URL,
    logLevel: vars.LOG_LEVEL,
    port: vars.PORT,
    resolution: {
      lookupConcurrency: vars.LOOKUP_CONCURRENCY,
      lookupRatePerSecond: vars.LOOKUP_RATE_PER_SECOND,
      lookupTimeoutMs: vars.LOOKUP_TIMEOUT_MS,
      maxRounds: vars.MAX_ROUNDS,
      overfetchMultiplier: vars.OVERFETCH_MULTIPLIER,
      roundDelayMs: vars.ROUND_DELAY_MS,
      seedTrackLimit: vars.SEED_TRACK_LIMIT,
    },
    spotifyAccessToken: vars.SPOTIFY_ACCESS_TOKEN,
  }
}
