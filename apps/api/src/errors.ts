/**
 * Error taxonomy
 *
 * GenerationError  - the suggestion provider failed for a whole round (hard stop, partial result)
 * LookupError      - one catalog search failed at the transport level (counts as a miss)
 * SpotifyApiError  - any other Spotify call failed (user profile, top tracks, publishing)
 * ConfigError      - the environment does not validate
 *
 * Running out of songs is not an error: it is reported through the payload status.
 */

export class GenerationError extends Error {
  constructor(message: string, options?: {cause?: unknown}) {
    super(message, options)
    this.name = 'GenerationError'
  }
}

export class LookupError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
    options?: {cause?: unknown},
  ) {
    super(message, options)
    this.name = 'LookupError'
  }
}

export class SpotifyApiError extends Error {
  constructor(
    message: string,
    public readonly status: number,
  ) {
    super(message)
    this.name = 'SpotifyApiError'
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}
