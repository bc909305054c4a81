import type {SongRef} from '@moodlist/shared-types'

/**
 * Normalize a title or artist for identity comparison.
 * Case, runs of punctuation/whitespace and "&" vs "and" do not affect the key.
 * A name made only of punctuation ("!!!") keys on its lowercased raw form.
 */
function normalizePart(value: string): string {
  const lowered = value.normalize('NFKC').toLowerCase()
  const normalized = lowered
    .replace(/&/g, ' and ')
    .replace(/[^\p{L}\p{N}]+/gu, ' ')
    .trim()
  return normalized.length > 0 ? normalized : lowered.trim()
}

/**
 * Identity of a (title, artist) pair across generation rounds
 */
export function songKey(song: SongRef): string {
  return `${normalizePart(song.title)}||${normalizePart(song.artist)}`
}

export function formatSong(song: SongRef): string {
  return `${song.title} by ${song.artist}`
}
