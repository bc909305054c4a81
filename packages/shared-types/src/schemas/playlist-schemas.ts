/**
 * Zod schemas for playlist generation
 * Covers the suggestion → catalog resolution pipeline and its final payload
 */

import {z} from 'zod'

// ===== Songs =====

export const SongRefSchema = z.object({
  artist: z.string().trim().min(1),
  title: z.string().trim().min(1),
})

export const SuggestionSchema = SongRefSchema.extend({
  /** Position in the generator's output for one round (0 = most confident) */
  rank: z.number().int().min(0),
})

export const ResolvedTrackSchema = SuggestionSchema.extend({
  catalogId: z.string().min(1),
  round: z.number().int().min(1),
})

export const SeedTrackSchema = SongRefSchema

// ===== Request =====

export const PlaylistSpecSchema = z.object({
  prompt: z.string().trim().min(1).max(500),
  requestedCount: z.number().int().min(1).max(100),
  seedContext: z.array(SeedTrackSchema).optional(),
  title: z.string().trim().min(1).max(100),
})

export const GeneratePlaylistRequestSchema = PlaylistSpecSchema.extend({
  maxRounds: z.number().int().min(1).max(10).optional(),
  seedTrackLimit: z.number().int().min(1).max(50).optional(),
  useListeningHistory: z.boolean().default(true),
})

// ===== Resolution =====

export const ResolutionStatusSchema = z.enum([
  'complete',
  'partial-exhausted',
  'partial-cancelled',
  'partial-generator-error',
])

export const RoundProgressSchema = z.object({
  requestedCount: z.number().int().min(1),
  resolvedCount: z.number().int().min(0),
  roundNumber: z.number().int().min(1),
})

export const RoundSummarySchema = z.object({
  attempted: z.number().int().min(0),
  duplicates: z.number().int().min(0),
  missed: z.array(SuggestionSchema),
  requested: z.number().int().min(1),
  resolved: z.number().int().min(0),
  roundNumber: z.number().int().min(1),
  skipped: z.number().int().min(0),
  suggested: z.number().int().min(0),
})

// ===== Result =====

export const PlaylistPayloadSchema = z.object({
  achievedCount: z.number().int().min(0),
  catalogIds: z.array(z.string().min(1)),
  description: z.string().max(300),
  error: z.string().optional(),
  partial: z.boolean(),
  prompt: z.string(),
  requestedCount: z.number().int().min(1),
  roundsUsed: z.number().int().min(0),
  status: ResolutionStatusSchema,
  title: z.string().min(1),
  totalSuggestions: z.number().int().min(0),
  tracks: z.array(ResolvedTrackSchema),
})

export const SavePlaylistRequestSchema = z.object({
  payload: PlaylistPayloadSchema,
  public: z.boolean().default(false),
})

export const PublishedPlaylistSchema = z.object({
  addedCount: z.number().int().min(0),
  playlistId: z.string(),
  playlistUrl: z.string().url(),
})

// ===== Type Exports =====

export type SongRef = z.infer<typeof SongRefSchema>
export type Suggestion = z.infer<typeof SuggestionSchema>
export type ResolvedTrack = z.infer<typeof ResolvedTrackSchema>
export type SeedTrack = z.infer<typeof SeedTrackSchema>
export type PlaylistSpec = z.infer<typeof PlaylistSpecSchema>
export type GeneratePlaylistRequest = z.infer<typeof GeneratePlaylistRequestSchema>
export type ResolutionStatus = z.infer<typeof ResolutionStatusSchema>
export type RoundProgress = z.infer<typeof RoundProgressSchema>
export type RoundSummary = z.infer<typeof RoundSummarySchema>
export type PlaylistPayload = z.infer<typeof PlaylistPayloadSchema>
export type SavePlaylistRequest = z.infer<typeof SavePlaylistRequestSchema>
export type PublishedPlaylist = z.infer<typeof PublishedPlaylistSchema>
