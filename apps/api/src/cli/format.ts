import type {PlaylistPayload, ResolutionStatus, SeedTrack} from '@moodlist/shared-types'

import {formatSong} from '../lib/song-key'

const STATUS_LABELS: Record<ResolutionStatus, string> = {
  complete: 'complete',
  'partial-cancelled': 'cancelled',
  'partial-exhausted': 'ran out of suggestions',
  'partial-generator-error': 'suggestion provider failed',
}

export function formatProgress(roundNumber: number, resolvedCount: number, requestedCount: number): string {
  return `Round ${roundNumber}: ${resolvedCount}/${requestedCount} tracks`
}

export function formatTrackList(tracks: readonly SeedTrack[]): string {
  return tracks.map((track, i) => `${i + 1}. ${formatSong(track)}`).join('\n')
}

export function formatPlaylist(payload: PlaylistPayload): string {
  const lines = [
    `${payload.title}`,
    `${payload.description}`,
    '',
    formatTrackList(payload.tracks),
    '',
    `${payload.achievedCount}/${payload.requestedCount} tracks in ${payload.roundsUsed} round(s) (${STATUS_LABELS[payload.status]})`,
  ]
  if (payload.error) {
    lines.push(`Error: ${payload.error}`)
  }
  return lines.join('\n')
}

export function defaultTitle(prompt: string): string {
  return `Moodlist: ${prompt.trim()}`.slice(0, 100).trim()
}
