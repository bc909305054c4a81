/**
 * SpotifyCatalogClient
 * Spotify Web API access for track lookup, listening history and playlist publishing.
 * The bearer token is supplied by the caller; no auth flow happens here.
 */

import {
  type PlaylistPayload,
  type PublishedPlaylist,
  type SeedTrack,
  SpotifyAddTracksResponseSchema,
  SpotifyCreatePlaylistResponseSchema,
  SpotifyErrorSchema,
  SpotifySearchResponseSchema,
  type SpotifyTimeRange,
  SpotifyTopTracksResponseSchema,
  SpotifyUserSchema,
  formatZodError,
  safeParse,
} from '@moodlist/shared-types'
import type {z} from 'zod'

import type {CatalogLookupClient, ListeningHistorySource, PlaylistPublisher, PublishOptions} from './types'

import {SPOTIFY} from '../constants'
import {LookupError, SpotifyApiError} from '../errors'
import {getLogger} from '../utils/LoggerContext'

export interface SpotifyUserProfile {
  displayName: null | string
  id: string
}

export interface SpotifyCatalogClientOptions {
  apiBase?: string
}

export class SpotifyCatalogClient implements CatalogLookupClient, ListeningHistorySource, PlaylistPublisher {
  private readonly apiBase: string

  constructor(
    private readonly accessToken: string,
    options: SpotifyCatalogClientOptions = {},
  ) {
    this.apiBase = options.apiBase ?? SPOTIFY.API_BASE
  }

  /**
   * Search for a single track; the first hit's URI is the catalog id
   */
  async find(title: string, artist: string, signal?: AbortSignal): Promise<null | string> {
    const params = new URLSearchParams({
      limit: '1',
      q: `track:${title} artist:${artist}`,
      type: 'track',
    })

    let response: Response
    try {
      response = await fetch(`${this.apiBase}/search?${params.toString()}`, {
        headers: this.headers(),
        signal,
      })
    } catch (error) {
      throw new LookupError(`Spotify search request failed for "${title}"`, undefined, {cause: error})
    }

    if (!response.ok) {
      throw new LookupError(`Spotify search failed: ${response.status}`, response.status)
    }

    const parsed = safeParse(SpotifySearchResponseSchema, await this.readJson(response))
    if (!parsed.success) {
      throw new LookupError(`Invalid Spotify search response: ${formatZodError(parsed.error)}`, response.status)
    }

    const track = parsed.data.tracks?.items[0]
    if (!track) {
      getLogger()?.debug(`[SpotifyCatalogClient] No match for "${title}" by ${artist}`)
      return null
    }
    return track.uri
  }

  async getCurrentUser(): Promise<SpotifyUserProfile> {
    const user = await this.request('/me', SpotifyUserSchema)
    return {displayName: user.display_name ?? null, id: user.id}
  }

  async getTopTracks(limit: number, timeRange: SpotifyTimeRange = 'medium_term'): Promise<SeedTrack[]> {
    const clamped = Math.min(Math.max(Math.trunc(limit), 1), SPOTIFY.MAX_TOP_TRACKS)
    const params = new URLSearchParams({limit: String(clamped), time_range: timeRange})
    const page = await this.request(`/me/top/tracks?${params.toString()}`, SpotifyTopTracksResponseSchema)

    return page.items.map(track => ({
      artist: track.artists.map(a => a.name).join(', '),
      title: track.name,
    }))
  }

  /**
   * Create a playlist for the current user and add every resolved track
   */
  async publish(payload: PlaylistPayload, options: PublishOptions): Promise<PublishedPlaylist> {
    if (payload.catalogIds.length === 0) {
      throw new SpotifyApiError('Cannot publish a playlist without tracks', 400)
    }

    const user = await this.getCurrentUser()
    const playlist = await this.request(
      `/users/${encodeURIComponent(user.id)}/playlists`,
      SpotifyCreatePlaylistResponseSchema,
      {
        body: JSON.stringify({
          description: payload.description,
          name: payload.title,
          public: options.public,
        }),
        method: 'POST',
      },
    )
    getLogger()?.info(`[SpotifyCatalogClient] Created playlist "${playlist.name}" (${playlist.id})`)

    let addedCount = 0
    for (let i = 0; i < payload.catalogIds.length; i += SPOTIFY.ADD_TRACKS_BATCH) {
      const uris = payload.catalogIds.slice(i, i + SPOTIFY.ADD_TRACKS_BATCH)
      await this.request(`/playlists/${playlist.id}/tracks`, SpotifyAddTracksResponseSchema, {
        body: JSON.stringify({uris}),
        method: 'POST',
      })
      addedCount += uris.length
    }

    return {
      addedCount,
      playlistId: playlist.id,
      playlistUrl: playlist.external_urls.spotify,
    }
  }

  private headers(): Record<string, string> {
    return {
      Authorization: `Bearer ${this.accessToken}`,
      'Content-Type': 'application/json',
    }
  }

  private async readJson(response: Response): Promise<unknown> {
    try {
      return await response.json()
    } catch {
      return null
    }
  }

  private async request<S extends z.ZodTypeAny>(path: string, schema: S, init: RequestInit = {}): Promise<z.infer<S>> {
    let response: Response
    try {
      response = await fetch(`${this.apiBase}${path}`, {...init, headers: this.headers()})
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      throw new SpotifyApiError(`Spotify request failed: ${message}`, 502)
    }

    const body = await this.readJson(response)

    if (!response.ok) {
      const spotifyError = SpotifyErrorSchema.safeParse(body)
      const detail = spotifyError.success ? spotifyError.data.error.message : response.statusText
      getLogger()?.error(`[SpotifyCatalogClient] ${init.method ?? 'GET'} ${path} failed: ${response.status}`)
      throw new SpotifyApiError(`Spotify API error: ${detail}`, response.status)
    }

    const parsed = safeParse(schema, body)
    if (!parsed.success) {
      throw new SpotifyApiError(`Invalid Spotify response: ${formatZodError(parsed.error)}`, 502)
    }
    return parsed.data
  }
}
