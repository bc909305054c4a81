/**
 * ResolutionEngine
 * Turns AI song suggestions into concrete catalog tracks.
 *
 * Each round asks the generator for what is still missing (plus an overfetch
 * buffer), looks the new pairs up in the catalog through a bounded pool, and
 * feeds every attempted pair back as an exclusion for the next round. The loop
 * stops when the playlist is full, the round budget is spent, the caller
 * cancels, or the generator fails.
 */

import type {
  PlaylistSpec,
  ResolutionStatus,
  ResolvedTrack,
  RoundSummary,
  SongRef,
  Suggestion,
} from '@moodlist/shared-types'

import type {CatalogLookupClient, ProgressSink, SuggestionGenerator} from './types'

import {LOOKUP_LIMITS, RESOLUTION} from '../constants'
import {GenerationError} from '../errors'
import {formatSong, songKey} from '../lib/song-key'
import {type CancellationToken, NEVER_CANCELLED} from '../utils/Cancellation'
import {getLogger} from '../utils/LoggerContext'
import {RateLimitedQueue} from '../utils/RateLimitedQueue'
import {sleep, withTimeout} from '../utils/timeout'

export interface ResolutionEngineOptions {
  lookupConcurrency?: number
  lookupRatePerSecond?: number
  lookupTimeoutMs?: number
  maxRounds?: number
  overfetchMultiplier?: number
  roundDelayMs?: number
}

export interface ResolveOptions {
  cancel?: CancellationToken
  /** Overrides the engine-wide round budget for this request */
  maxRounds?: number
  progress?: ProgressSink
}

export interface ResolutionState {
  error?: string
  /** First-resolved order; unique by catalogId; never longer than requestedCount */
  resolved: ResolvedTrack[]
  roundNumber: number
  rounds: RoundSummary[]
  roundsRemaining: number
  /** Every pair looked up so far, keyed by songKey */
  seenTitles: Map<string, SongRef>
  status: ResolutionStatus
}

export class ResolutionEngine {
  private readonly lookupConcurrency: number
  private readonly lookupRatePerSecond: number
  private readonly lookupTimeoutMs: number
  private readonly maxRounds: number
  private readonly overfetchMultiplier: number
  private readonly roundDelayMs: number

  constructor(
    private readonly generator: SuggestionGenerator,
    private readonly catalog: CatalogLookupClient,
    options: ResolutionEngineOptions = {},
  ) {
    this.lookupConcurrency = Math.max(1, options.lookupConcurrency ?? LOOKUP_LIMITS.CONCURRENCY)
    this.lookupRatePerSecond = options.lookupRatePerSecond ?? LOOKUP_LIMITS.RATE_PER_SECOND
    this.lookupTimeoutMs = options.lookupTimeoutMs ?? LOOKUP_LIMITS.TIMEOUT_MS
    this.maxRounds = options.maxRounds ?? RESOLUTION.MAX_ROUNDS
    this.overfetchMultiplier = Math.max(1, options.overfetchMultiplier ?? RESOLUTION.OVERFETCH_MULTIPLIER)
    this.roundDelayMs = Math.max(0, options.roundDelayMs ?? 0)
  }

  async resolve(spec: PlaylistSpec, options: ResolveOptions = {}): Promise<ResolutionState> {
    const {requestedCount} = spec
    const maxRounds = options.maxRounds ?? this.maxRounds
    if (!Number.isInteger(requestedCount) || requestedCount < 1) {
      throw new RangeError(`requestedCount must be a positive integer, got ${requestedCount}`)
    }
    if (!Number.isInteger(maxRounds) || maxRounds < 1) {
      throw new RangeError(`maxRounds must be a positive integer, got ${maxRounds}`)
    }

    const cancel = options.cancel ?? NEVER_CANCELLED
    const state: ResolutionState = {
      resolved: [],
      roundNumber: 0,
      rounds: [],
      roundsRemaining: maxRounds,
      seenTitles: new Map(),
      status: 'partial-exhausted',
    }
    const resolvedIds = new Set<string>()

    let status = this.checkBoundary(state, requestedCount, cancel)
    while (status === null) {
      const stillNeeded = requestedCount - state.resolved.length
      const count = Math.ceil(stillNeeded * this.overfetchMultiplier)
      state.roundNumber++
      state.roundsRemaining--

      getLogger()?.info(
        `[ResolutionEngine] Round ${state.roundNumber}/${maxRounds}: need ${stillNeeded}, asking for ${count}`,
      )

      let suggestions: Suggestion[]
      try {
        suggestions = await this.generator.generate(
          spec.prompt,
          count,
          [...state.seenTitles.values()],
          spec.seedContext,
        )
      } catch (error) {
        if (!(error instanceof GenerationError)) throw error
        getLogger()?.error('[ResolutionEngine] Suggestion generator failed, returning partial result', error)
        state.error = error.message
        status = 'partial-generator-error'
        break
      }

      // Suggestions from an interrupted round are dropped before they touch seenTitles
      if (cancel.isCancelled()) {
        status = 'partial-cancelled'
        break
      }

      if (suggestions.length === 0) {
        getLogger()?.warn('[ResolutionEngine] Generator returned no suggestions, stopping')
        status = 'partial-exhausted'
        break
      }

      const summary = await this.runRound(state, suggestions, count, requestedCount, resolvedIds)
      state.rounds.push(summary)
      this.reportProgress(options.progress, state.roundNumber, state.resolved.length, requestedCount)

      status = this.checkBoundary(state, requestedCount, cancel)
      if (status === null && this.roundDelayMs > 0) {
        await sleep(this.roundDelayMs)
        status = this.checkBoundary(state, requestedCount, cancel)
      }
    }

    state.status = status
    getLogger()?.info(
      `[ResolutionEngine] Finished with ${state.resolved.length}/${requestedCount} tracks after ${state.roundNumber} round(s): ${status}`,
    )
    return state
  }

  /**
   * Exit condition evaluated at every round boundary
   */
  private checkBoundary(
    state: ResolutionState,
    requestedCount: number,
    cancel: CancellationToken,
  ): null | ResolutionStatus {
    if (state.resolved.length >= requestedCount) return 'complete'
    if (cancel.isCancelled()) return 'partial-cancelled'
    if (state.roundsRemaining <= 0) return 'partial-exhausted'
    return null
  }

  private async lookupAll(suggestions: Suggestion[]): Promise<(null | string)[]> {
    const queue = new RateLimitedQueue<null | string>({
      burst: this.lookupConcurrency,
      concurrency: this.lookupConcurrency,
      rate: this.lookupRatePerSecond,
    })
    for (const suggestion of suggestions) {
      queue.enqueue(() => this.lookupOne(suggestion))
    }
    return queue.processAll()
  }

  /**
   * Any failure (LookupError, timeout, unexpected throw) is a miss for this pair only
   */
  private async lookupOne(suggestion: Suggestion): Promise<null | string> {
    try {
      return await withTimeout(
        signal => this.catalog.find(suggestion.title, suggestion.artist, signal),
        this.lookupTimeoutMs,
      )
    } catch (error) {
      getLogger()?.warn(`[ResolutionEngine] Lookup failed for "${formatSong(suggestion)}", treating as not found`, {
        error: error instanceof Error ? error.message : String(error),
      })
      return null
    }
  }

  /**
   * Fire-and-forget: a returned promise is never awaited and sink errors stay in the log
   */
  private reportProgress(
    sink: ProgressSink | undefined,
    roundNumber: number,
    resolvedCount: number,
    requestedCount: number,
  ): void {
    if (!sink) return
    try {
      const pending = sink.onRound(roundNumber, resolvedCount, requestedCount)
      if (pending instanceof Promise) {
        pending.catch((error: unknown) => {
          getLogger()?.warn('[ResolutionEngine] Progress sink rejected', {error: String(error)})
        })
      }
    } catch (error) {
      getLogger()?.warn('[ResolutionEngine] Progress sink threw', {error: String(error)})
    }
  }

  private async runRound(
    state: ResolutionState,
    suggestions: Suggestion[],
    requested: number,
    requestedCount: number,
    resolvedIds: Set<string>,
  ): Promise<RoundSummary> {
    const roundNumber = state.roundNumber
    const fresh: Suggestion[] = []
    let skipped = 0

    for (const suggestion of [...suggestions].sort((a, b) => a.rank - b.rank)) {
      const key = songKey(suggestion)
      if (state.seenTitles.has(key)) {
        skipped++
        continue
      }
      state.seenTitles.set(key, {artist: suggestion.artist, title: suggestion.title})
      fresh.push(suggestion)
    }

    const catalogIds = fresh.length > 0 ? await this.lookupAll(fresh) : []

    const missed: Suggestion[] = []
    let resolved = 0
    let duplicates = 0

    // Merge in generator-rank order, whatever order the lookups finished in
    fresh.forEach((suggestion, index) => {
      const catalogId = catalogIds[index] ?? null
      if (catalogId === null) {
        missed.push(suggestion)
        return
      }
      if (resolvedIds.has(catalogId)) {
        duplicates++
        return
      }
      if (state.resolved.length >= requestedCount) return

      resolvedIds.add(catalogId)
      state.resolved.push({
        artist: suggestion.artist,
        catalogId,
        rank: suggestion.rank,
        round: roundNumber,
        title: suggestion.title,
      })
      resolved++
    })

    getLogger()?.info(
      `[ResolutionEngine] Round ${roundNumber}: ${fresh.length} looked up, ${resolved} resolved, ${missed.length} missed, ${skipped} repeated, ${duplicates} duplicate (${state.resolved.length}/${requestedCount})`,
    )

    return {
      attempted: fresh.length,
      duplicates,
      missed,
      requested,
      resolved,
      roundNumber,
      skipped,
      suggested: suggestions.length,
    }
  }
}
