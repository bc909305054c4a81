import {describe, expect, it} from 'vitest'

import {formatSong, songKey} from '../../lib/song-key'

describe('songKey', () => {
  it('ignores case and surrounding whitespace', () => {
    expect(songKey({artist: ' Bon Iver ', title: 'HOLOCENE'})).toBe(songKey({artist: 'bon iver', title: 'Holocene'}))
  })

  it('treats "&" and "and" alike', () => {
    expect(songKey({artist: 'Simon & Garfunkel', title: 'America'})).toBe(
      songKey({artist: 'Simon and Garfunkel', title: 'America'}),
    )
  })

  it('collapses punctuation runs', () => {
    expect(songKey({artist: 'Artist', title: "Don't Stop - Live"})).toBe('don t stop live||artist')
  })

  it('keeps different artists apart', () => {
    expect(songKey({artist: 'Artist One', title: 'Song'})).not.toBe(songKey({artist: 'Artist Two', title: 'Song'}))
  })

  it('keeps punctuation-only names apart', () => {
    expect(songKey({artist: ' !!! ', title: 'Party'})).toBe('party||!!!')
    expect(songKey({artist: '!!!', title: 'Party'})).not.toBe(songKey({artist: '???', title: 'Party'}))
  })

  it('keeps non-latin titles', () => {
    expect(songKey({artist: '坂本龍一', title: '戦場のメリークリスマス'})).toBe('戦場のメリークリスマス||坂本龍一')
  })
})

describe('formatSong', () => {
  it('formats as "title by artist"', () => {
    expect(formatSong({artist: 'Bon Iver', title: 'Holocene'})).toBe('Holocene by Bon Iver')
  })
})
