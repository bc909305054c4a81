/**
 * PlaylistGenerationService
 * Orchestrates one request: seed context → resolution rounds → payload → optional publish.
 */

import type {PlaylistPayload, PlaylistSpec, PublishedPlaylist, SeedTrack} from '@moodlist/shared-types'

import type {CatalogLookupClient, ListeningHistorySource, PlaylistPublisher, PublishOptions, SuggestionGenerator} from './types'

import type {AppConfig} from '../config'
import {CONTENT_LIMITS} from '../constants'
import {SpotifyApiError} from '../errors'
import {getLogger} from '../utils/LoggerContext'
import {assemble} from './PlaylistAssembler'
import {ResolutionEngine, type ResolveOptions} from './ResolutionEngine'

export interface GenerateOptions extends ResolveOptions {
  seedTrackLimit?: number
  useListeningHistory?: boolean
}

export interface PlaylistGenerationServiceOptions {
  history?: ListeningHistorySource
  publisher?: PlaylistPublisher
  seedTrackLimit?: number
}

export class PlaylistGenerationService {
  private readonly history?: ListeningHistorySource
  private readonly publisher?: PlaylistPublisher
  private readonly seedTrackLimit: number

  constructor(
    private readonly engine: ResolutionEngine,
    options: PlaylistGenerationServiceOptions = {},
  ) {
    this.history = options.history
    this.publisher = options.publisher
    this.seedTrackLimit = options.seedTrackLimit ?? CONTENT_LIMITS.DEFAULT_SEED_TRACKS
  }

  async generate(spec: PlaylistSpec, options: GenerateOptions = {}): Promise<PlaylistPayload> {
    const seedContext = await this.resolveSeedContext(spec, options)
    const state = await this.engine.resolve(
      {...spec, seedContext},
      {cancel: options.cancel, maxRounds: options.maxRounds, progress: options.progress},
    )
    const payload = assemble(state, spec)

    getLogger()?.info(
      `[PlaylistGenerationService] "${spec.title}": ${payload.achievedCount}/${payload.requestedCount} tracks (${payload.status})`,
    )
    return payload
  }

  async publish(payload: PlaylistPayload, options: PublishOptions): Promise<PublishedPlaylist> {
    if (!this.publisher) {
      throw new SpotifyApiError('No playlist publisher configured', 500)
    }
    return this.publisher.publish(payload, options)
  }

  /**
   * Explicit seeds win; otherwise the user's top tracks when allowed.
   * A history failure only costs the seeds, never the playlist.
   */
  private async resolveSeedContext(
    spec: PlaylistSpec,
    options: GenerateOptions,
  ): Promise<SeedTrack[] | undefined> {
    if (spec.seedContext) return spec.seedContext
    if (options.useListeningHistory === false || !this.history) return undefined

    try {
      const seeds = await this.history.getTopTracks(options.seedTrackLimit ?? this.seedTrackLimit)
      getLogger()?.info(`[PlaylistGenerationService] Using ${seeds.length} top tracks as seed context`)
      return seeds
    } catch (error) {
      getLogger()?.warn('[PlaylistGenerationService] Could not load listening history, continuing without seeds', {
        error: error instanceof Error ? error.message : String(error),
      })
      return undefined
    }
  }
}

/**
 * Wire a service from configuration. The catalog doubles as history source and
 * publisher when it implements those contracts (SpotifyCatalogClient does).
 */
export function createGenerationService(
  config: AppConfig,
  generator: SuggestionGenerator,
  catalog: CatalogLookupClient & Partial<ListeningHistorySource & PlaylistPublisher>,
): PlaylistGenerationService {
  const engine = new ResolutionEngine(generator, catalog, {
    lookupConcurrency: config.resolution.lookupConcurrency,
    lookupRatePerSecond: config.resolution.lookupRatePerSecond,
    lookupTimeoutMs: config.resolution.lookupTimeoutMs,
    maxRounds: config.resolution.maxRounds,
    overfetchMultiplier: config.resolution.overfetchMultiplier,
    roundDelayMs: config.resolution.roundDelayMs,
  })

  return new PlaylistGenerationService(engine, {
    history: isHistorySource(catalog) ? catalog : undefined,
    publisher: isPublisher(catalog) ? catalog : undefined,
    seedTrackLimit: config.resolution.seedTrackLimit,
  })
}

function isHistorySource(value: Partial<ListeningHistorySource>): value is ListeningHistorySource {
  return typeof value.getTopTracks === 'function'
}

function isPublisher(value: Partial<PlaylistPublisher>): value is PlaylistPublisher {
  return typeof value.publish === 'function'
}
