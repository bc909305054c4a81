/**
 * Backend Constants
 * Centralized magic numbers and configuration defaults for the API and CLI
 */

// =============================================================================
// RESOLUTION DEFAULTS
// =============================================================================

/** Suggestion → catalog resolution loop defaults (all overridable via config) */
export const RESOLUTION = {
  /** Generation rounds per playlist request */
  MAX_ROUNDS: 5,
  /** Upper bound accepted for MAX_ROUNDS */
  MAX_ROUNDS_LIMIT: 10,
  /** Suggestions requested per missing track, to absorb lookup misses */
  OVERFETCH_MULTIPLIER: 1.5,
  /** Pause between rounds in milliseconds */
  ROUND_DELAY_MS: 500,
} as const

// =============================================================================
// RATE LIMITS
// =============================================================================

/** Catalog lookup fan-out per round */
export const LOOKUP_LIMITS = {
  /** Parallel Spotify searches */
  CONCURRENCY: 5,
  /** Spotify searches per second */
  RATE_PER_SECOND: 10,
  /** Overall timeout for one search, after which it counts as a miss */
  TIMEOUT_MS: 8000,
} as const

// =============================================================================
// SPOTIFY
// =============================================================================

export const SPOTIFY = {
  API_BASE: 'https://api.spotify.com/v1',
  /** Maximum URIs per "add items to playlist" request */
  ADD_TRACKS_BATCH: 100,
  /** Maximum top tracks per request */
  MAX_TOP_TRACKS: 50,
} as const

// =============================================================================
// LLM CONFIGURATION
// =============================================================================

/** LLM (Claude) configuration */
export const LLM = {
  /** Default model for song suggestions */
  MODEL: 'claude-sonnet-4-5-20250929',
  /** Higher temperature for varied suggestions */
  TEMPERATURE: 0.8,
  /** Default response budget for JSON prompts */
  MAX_TOKENS: 4000,
  /** Fixed part of a suggestion list's response budget */
  SUGGESTION_BASE_TOKENS: 256,
  /** Response budget per requested song ({"title","artist"} plus separators) */
  TOKENS_PER_SONG: 30,
} as const

// =============================================================================
// CONTENT LIMITS
// =============================================================================

/** Content size limits */
export const CONTENT_LIMITS = {
  /** Maximum playlist description length (Spotify limit) */
  MAX_DESCRIPTION_LENGTH: 300,
  /** Excluded songs listed in a prompt */
  MAX_EXCLUDED_IN_PROMPT: 100,
  /** Seed tracks listed in a prompt */
  MAX_SEEDS_IN_PROMPT: 50,
  /** Default number of top tracks used as seed context */
  DEFAULT_SEED_TRACKS: 50,
} as const

// =============================================================================
// STREAMING CONFIGURATION
// =============================================================================

/** SSE streaming configuration */
export const STREAMING = {
  /** SSE heartbeat interval in milliseconds */
  HEARTBEAT_INTERVAL_MS: 15000,
  /** Transform stream high water mark */
  HIGH_WATER_MARK: 10,
} as const
