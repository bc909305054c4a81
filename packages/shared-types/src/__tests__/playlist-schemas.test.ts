import {describe, expect, it} from 'vitest'

import {
  GeneratePlaylistRequestSchema,
  PlaylistPayloadSchema,
  PlaylistSpecSchema,
  PublishedPlaylistSchema,
  ResolvedTrackSchema,
  SavePlaylistRequestSchema,
} from '../schemas/playlist-schemas'

const PAYLOAD = {
  achievedCount: 1,
  catalogIds: ['spotify:track:1'],
  description: 'rainy sunday morning - Generated by Moodlist AI',
  partial: true,
  prompt: 'rainy sunday morning',
  requestedCount: 2,
  roundsUsed: 3,
  status: 'partial-exhausted',
  title: 'Rainy Sunday',
  totalSuggestions: 6,
  tracks: [{artist: 'Bon Iver', catalogId: 'spotify:track:1', rank: 0, round: 1, title: 'Holocene'}],
}

describe('Playlist Schemas', () => {
  describe('PlaylistSpecSchema', () => {
    it('validates a playlist request with seed context', () => {
      const spec = {
        prompt: 'late night drive',
        requestedCount: 20,
        seedContext: [{artist: 'Kavinsky', title: 'Nightcall'}],
        title: 'Night Drive',
      }
      expect(PlaylistSpecSchema.parse(spec)).toEqual(spec)
    })

    it('bounds the requested count', () => {
      const base = {prompt: 'focus', title: 'Focus'}
      expect(PlaylistSpecSchema.safeParse({...base, requestedCount: 0}).success).toBe(false)
      expect(PlaylistSpecSchema.safeParse({...base, requestedCount: 101}).success).toBe(false)
      expect(PlaylistSpecSchema.safeParse({...base, requestedCount: 2.5}).success).toBe(false)
      expect(PlaylistSpecSchema.safeParse({...base, requestedCount: 100}).success).toBe(true)
    })

    it('rejects a blank prompt', () => {
      expect(PlaylistSpecSchema.safeParse({prompt: '   ', requestedCount: 5, title: 'Focus'}).success).toBe(false)
    })
  })

  describe('GeneratePlaylistRequestSchema', () => {
    it('defaults useListeningHistory to true', () => {
      const parsed = GeneratePlaylistRequestSchema.parse({prompt: 'focus', requestedCount: 5, title: 'Focus'})
      expect(parsed.useListeningHistory).toBe(true)
      expect(parsed.maxRounds).toBeUndefined()
    })

    it('caps maxRounds', () => {
      const base = {prompt: 'focus', requestedCount: 5, title: 'Focus'}
      expect(GeneratePlaylistRequestSchema.safeParse({...base, maxRounds: 10}).success).toBe(true)
      expect(GeneratePlaylistRequestSchema.safeParse({...base, maxRounds: 11}).success).toBe(false)
    })
  })

  describe('ResolvedTrackSchema', () => {
    it('requires a catalog id and a round from 1', () => {
      const track = {artist: 'Low', catalogId: 'spotify:track:2', rank: 0, round: 1, title: 'Words'}
      expect(ResolvedTrackSchema.safeParse(track).success).toBe(true)
      expect(ResolvedTrackSchema.safeParse({...track, catalogId: ''}).success).toBe(false)
      expect(ResolvedTrackSchema.safeParse({...track, round: 0}).success).toBe(false)
    })
  })

  describe('PlaylistPayloadSchema', () => {
    it('validates a partial payload', () => {
      expect(PlaylistPayloadSchema.safeParse(PAYLOAD).success).toBe(true)
    })

    it('accepts a generator error message', () => {
      const failed = {...PAYLOAD, error: 'quota exceeded', status: 'partial-generator-error'}
      expect(PlaylistPayloadSchema.safeParse(failed).success).toBe(true)
    })

    it('rejects an unknown status', () => {
      expect(PlaylistPayloadSchema.safeParse({...PAYLOAD, status: 'done'}).success).toBe(false)
    })

    it('rejects a description over 300 characters', () => {
      expect(PlaylistPayloadSchema.safeParse({...PAYLOAD, description: 'x'.repeat(301)}).success).toBe(false)
    })
  })

  describe('SavePlaylistRequestSchema', () => {
    it('defaults to a private playlist', () => {
      expect(SavePlaylistRequestSchema.parse({payload: PAYLOAD}).public).toBe(false)
    })
  })

  describe('PublishedPlaylistSchema', () => {
    it('requires a URL', () => {
      expect(
        PublishedPlaylistSchema.safeParse({addedCount: 1, playlistId: 'pl1', playlistUrl: 'not a url'}).success,
      ).toBe(false)
    })
  })
})
