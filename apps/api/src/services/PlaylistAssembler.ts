import type {PlaylistPayload, PlaylistSpec, ResolutionStatus} from '@moodlist/shared-types'

import type {ResolutionState} from './ResolutionEngine'

import {CONTENT_LIMITS} from '../constants'

export const DESCRIPTION_SUFFIX = ' - Generated by Moodlist AI'

/** Prompt plus suffix, capped at the description limit in code points */
export function buildDescription(prompt: string): string {
  return Array.from(`${prompt}${DESCRIPTION_SUFFIX}`).slice(0, CONTENT_LIMITS.MAX_DESCRIPTION_LENGTH).join('')
}

/**
 * Shape a finished resolution into the payload handed to callers and the publisher.
 * Never pads: a short playlist stays short and says so through `partial` and `status`.
 */
export function assemble(state: ResolutionState, spec: PlaylistSpec): PlaylistPayload {
  const tracks = state.resolved.slice(0, spec.requestedCount)
  const achievedCount = tracks.length
  const full = achievedCount >= spec.requestedCount

  let status: ResolutionStatus = state.status
  if (full) {
    status = 'complete'
  } else if (status === 'complete') {
    status = 'partial-exhausted'
  }

  return {
    achievedCount,
    catalogIds: tracks.map(track => track.catalogId),
    description: buildDescription(spec.prompt),
    ...(state.error === undefined ? {} : {error: state.error}),
    partial: !full,
    prompt: spec.prompt,
    requestedCount: spec.requestedCount,
    roundsUsed: state.roundNumber,
    status,
    title: spec.title,
    totalSuggestions: state.rounds.reduce((sum, round) => sum + round.suggested, 0),
    tracks,
  }
}
