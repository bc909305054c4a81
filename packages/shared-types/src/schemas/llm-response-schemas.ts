/**
 * Zod schemas for Claude/LLM output validation
 *
 * These schemas validate structured JSON responses from Claude so that
 * malformed model output is rejected before it reaches the catalog lookups.
 */

import {z} from 'zod'

// ===== Song Suggestions (playlist generation output) =====

export const SuggestedSongSchema = z.object({
  artist: z.string().trim().min(1),
  title: z.string().trim().min(1),
})

export const SuggestedSongsResponseSchema = z.object({
  songs: z.array(SuggestedSongSchema),
})

// ===== Type Exports =====

export type SuggestedSong = z.infer<typeof SuggestedSongSchema>
export type SuggestedSongsResponse = z.infer<typeof SuggestedSongsResponseSchema>
