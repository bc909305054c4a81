import {describe, expect, it} from 'vitest'
import {z} from 'zod'

import {formatZodError, safeParse, safeParseJson} from '../validation'

const SongSchema = z.object({
  artist: z.string().min(1),
  title: z.string().min(1),
})

describe('validation helpers', () => {
  describe('safeParse', () => {
    it('returns data on success', () => {
      expect(safeParse(SongSchema, {artist: 'Low', title: 'Words'})).toEqual({
        data: {artist: 'Low', title: 'Words'},
        error: null,
        success: true,
      })
    })

    it('returns the ZodError on failure', () => {
      const result = safeParse(SongSchema, {artist: 'Low'})
      expect(result.success).toBe(false)
      expect(result.data).toBeNull()
      expect(result.error).toBeInstanceOf(z.ZodError)
    })
  })

  describe('safeParseJson', () => {
    it('parses and validates JSON text', () => {
      const result = safeParseJson('{"artist":"Low","title":"Words"}', SongSchema)
      expect(result.data).toEqual({artist: 'Low', title: 'Words'})
    })

    it('reports a syntax error as a ZodError', () => {
      const result = safeParseJson('{"artist":', SongSchema)
      expect(result.success).toBe(false)
      expect(result.error?.errors[0]?.code).toBe('custom')
    })
  })

  describe('formatZodError', () => {
    it('joins issues with their paths', () => {
      const result = SongSchema.safeParse({artist: '', title: 5})
      if (result.success) throw new Error('expected failure')

      expect(formatZodError(result.error)).toBe(
        'artist: String must contain at least 1 character(s), title: Expected string, received number',
      )
    })

    it('omits the path for root issues', () => {
      const result = z.string().safeParse(1)
      if (result.success) throw new Error('expected failure')

      expect(formatZodError(result.error)).toBe('Expected string, received number')
    })
  })
})
