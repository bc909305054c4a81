/**
 * Zod schemas for Spotify API responses
 * Only the fields the catalog lookups, listening history and playlist
 * publishing read are declared; zod strips the rest.
 */

import {z} from 'zod'

// ===== Base Types =====

export const SpotifyExternalUrlsSchema = z.object({
  spotify: z.string().url(),
})

export const SpotifyArtistRefSchema = z.object({
  id: z.string().optional(),
  name: z.string(),
})

// ===== Track =====

export const SpotifyTrackSchema = z.object({
  artists: z.array(SpotifyArtistRefSchema),
  external_urls: SpotifyExternalUrlsSchema.optional(),
  id: z.string(),
  name: z.string(),
  uri: z.string(),
})

// ===== Paging =====

export const SpotifyPagingSchema = <T extends z.ZodTypeAny>(itemSchema: T) =>
  z.object({
    items: z.array(itemSchema),
    limit: z.number().optional(),
    next: z.string().nullable().optional(),
    offset: z.number().optional(),
    total: z.number().optional(),
  })

export const SpotifyTopTracksResponseSchema = SpotifyPagingSchema(SpotifyTrackSchema)

// ===== Search =====

export const SpotifySearchResponseSchema = z.object({
  tracks: SpotifyPagingSchema(SpotifyTrackSchema).optional(),
})

// ===== User =====

export const SpotifyUserSchema = z.object({
  display_name: z.string().nullable().optional(),
  id: z.string(),
})

// ===== Playlist Creation =====

export const SpotifyCreatePlaylistResponseSchema = z.object({
  external_urls: SpotifyExternalUrlsSchema,
  id: z.string(),
  name: z.string(),
})

export const SpotifyAddTracksResponseSchema = z.object({
  snapshot_id: z.string(),
})

// ===== Errors =====

export const SpotifyErrorSchema = z.object({
  error: z.object({
    message: z.string(),
    status: z.number(),
  }),
})

// ===== Type Exports =====

export type SpotifyTrack = z.infer<typeof SpotifyTrackSchema>
export type SpotifyTopTracksResponse = z.infer<typeof SpotifyTopTracksResponseSchema>
export type SpotifySearchResponse = z.infer<typeof SpotifySearchResponseSchema>
export type SpotifyUser = z.infer<typeof SpotifyUserSchema>
export type SpotifyCreatePlaylistResponse = z.infer<typeof SpotifyCreatePlaylistResponseSchema>
export type SpotifyAddTracksResponse = z.infer<typeof SpotifyAddTracksResponseSchema>
export type SpotifyError = z.infer<typeof SpotifyErrorSchema>

export type SpotifyTimeRange = 'long_term' | 'medium_term' | 'short_term'
