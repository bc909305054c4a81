import {SpotifyApiError} from '../errors'

// Bearer token from an Authorization header, or null when absent/blank
export function extractBearerToken(header: string | undefined): null | string {
  if (!header?.startsWith('Bearer ')) return null
  const token = header.slice('Bearer '.length).trim()
  return token.length > 0 ? token : null
}

// Status for a failed publish: Spotify's own 400/401 pass through, everything else is upstream trouble
export function publishErrorStatus(error: unknown): 400 | 401 | 500 | 502 {
  if (!(error instanceof SpotifyApiError)) return 500
  if (error.status === 400) return 400
  if (error.status === 401 || error.status === 403) return 401
  return 502
}
