import {describe, expect, it} from 'vitest'

import {defaultTitle, formatPlaylist, formatProgress, formatTrackList} from '../../cli/format'
import {buildPayload} from '../fixtures/test-builders'

describe('CLI formatting', () => {
  it('formats round progress', () => {
    expect(formatProgress(2, 7, 10)).toBe('Round 2: 7/10 tracks')
  })

  it('numbers a track list', () => {
    expect(
      formatTrackList([
        {artist: 'Nick Drake', title: 'Pink Moon'},
        {artist: 'Low', title: 'Words'},
      ]),
    ).toBe('1. Pink Moon by Nick Drake\n2. Words by Low')
  })

  it('formats a complete playlist', () => {
    expect(formatPlaylist(buildPayload())).toBe(
      [
        'Rainy Sunday',
        'rainy sunday morning - Generated by Moodlist AI',
        '',
        '1. Song 0 by Artist',
        '2. Song 1 by Artist',
        '',
        '2/2 tracks in 1 round(s) (complete)',
      ].join('\n'),
    )
  })

  it('explains a partial playlist and its error', () => {
    const output = formatPlaylist(
      buildPayload({
        achievedCount: 0,
        catalogIds: [],
        error: 'Suggestion generation failed: quota exceeded',
        partial: true,
        requestedCount: 5,
        status: 'partial-generator-error',
        tracks: [],
      }),
    )

    expect(output.split('\n').slice(-2)).toEqual([
      '0/5 tracks in 1 round(s) (suggestion provider failed)',
      'Error: Suggestion generation failed: quota exceeded',
    ])
  })

  it('derives a title from the prompt', () => {
    expect(defaultTitle('  rainy sunday  ')).toBe('Moodlist: rainy sunday')
    expect(defaultTitle('x'.repeat(200))).toHaveLength(100)
  })
})
