import type {ResolvedTrack, RoundSummary} from '@moodlist/shared-types'
import {describe, expect, it} from 'vitest'

import type {ResolutionState} from './ResolutionEngine'

import {buildSpec} from '../__tests__/fixtures/test-builders'
import {assemble, buildDescription} from './PlaylistAssembler'

function track(id: string, round = 1): ResolvedTrack {
  return {artist: 'Artist', catalogId: `spotify:track:${id}`, rank: 0, round, title: id.toUpperCase()}
}

function round(roundNumber: number, suggested: number): RoundSummary {
  return {
    attempted: suggested,
    duplicates: 0,
    missed: [],
    requested: suggested,
    resolved: 0,
    roundNumber,
    skipped: 0,
    suggested,
  }
}

function buildState(overrides?: Partial<ResolutionState>): ResolutionState {
  return {
    resolved: [],
    roundNumber: 1,
    rounds: [],
    roundsRemaining: 4,
    seenTitles: new Map(),
    status: 'complete',
    ...overrides,
  }
}

describe('assemble', () => {
  it('builds a complete payload when every requested track resolved', () => {
    const state = buildState({
      resolved: [track('a'), track('b'), track('c', 2)],
      roundNumber: 2,
      rounds: [round(1, 3), round(2, 2)],
    })

    const payload = assemble(state, buildSpec({requestedCount: 3}))

    expect(payload).toEqual({
      achievedCount: 3,
      catalogIds: ['spotify:track:a', 'spotify:track:b', 'spotify:track:c'],
      description: 'rainy sunday morning - Generated by Moodlist AI',
      partial: false,
      prompt: 'rainy sunday morning',
      requestedCount: 3,
      roundsUsed: 2,
      status: 'complete',
      title: 'Rainy Sunday',
      totalSuggestions: 5,
      tracks: [track('a'), track('b'), track('c', 2)],
    })
  })

  it('truncates to the requested count', () => {
    const state = buildState({resolved: [track('a'), track('b'), track('c')]})

    const payload = assemble(state, buildSpec({requestedCount: 2}))

    expect(payload.catalogIds).toEqual(['spotify:track:a', 'spotify:track:b'])
    expect(payload.achievedCount).toBe(2)
    expect(payload.partial).toBe(false)
  })

  it('never pads a short playlist', () => {
    const state = buildState({resolved: [track('a')], status: 'partial-exhausted'})

    const payload = assemble(state, buildSpec({requestedCount: 3}))

    expect(payload.tracks).toHaveLength(1)
    expect(payload.achievedCount).toBe(1)
    expect(payload.partial).toBe(true)
    expect(payload.status).toBe('partial-exhausted')
  })

  it('keeps the stop reason of a short playlist', () => {
    const payload = assemble(
      buildState({resolved: [track('a')], status: 'partial-cancelled'}),
      buildSpec({requestedCount: 2}),
    )

    expect(payload.status).toBe('partial-cancelled')
  })

  it('marks a short playlist reported complete as exhausted', () => {
    const payload = assemble(buildState({resolved: [track('a')], status: 'complete'}), buildSpec({requestedCount: 2}))

    expect(payload.status).toBe('partial-exhausted')
    expect(payload.partial).toBe(true)
  })

  it('reports a full playlist as complete whatever stopped the loop', () => {
    const payload = assemble(
      buildState({resolved: [track('a'), track('b')], status: 'partial-cancelled'}),
      buildSpec({requestedCount: 2}),
    )

    expect(payload.status).toBe('complete')
  })

  it('carries the generator error', () => {
    const payload = assemble(
      buildState({error: 'quota exceeded', status: 'partial-generator-error'}),
      buildSpec({requestedCount: 2}),
    )

    expect(payload.error).toBe('quota exceeded')
    expect(payload.achievedCount).toBe(0)
    expect(payload.catalogIds).toEqual([])
  })

  it('omits the error field when there was none', () => {
    const payload = assemble(buildState({resolved: [track('a')]}), buildSpec({requestedCount: 1}))

    expect('error' in payload).toBe(false)
  })
})

describe('buildDescription', () => {
  it('caps the description at 300 characters', () => {
    const description = buildDescription('x'.repeat(400))

    expect(description).toHaveLength(300)
    expect(description).toBe('x'.repeat(300))
  })

  it('does not split an emoji at the limit', () => {
    const description = buildDescription(`${'x'.repeat(299)}😀 more`)

    expect(description).toBe(`${'x'.repeat(299)}😀`)
    expect(Array.from(description)).toHaveLength(300)
  })

  it('keeps the suffix when the prompt is short', () => {
    expect(buildDescription('focus')).toBe('focus - Generated by Moodlist AI')
  })
})
