/**
 * Collaborator contracts consumed by the resolution engine and the generation service
 */

import type {
  PlaylistPayload,
  PublishedPlaylist,
  SeedTrack,
  SongRef,
  SpotifyTimeRange,
  Suggestion,
} from '@moodlist/shared-types'

/**
 * Proposes candidate songs for a mood prompt.
 * Must throw GenerationError on provider failure (auth, quota, malformed output);
 * an empty array means the provider had nothing to suggest.
 */
export interface SuggestionGenerator {
  generate(
    prompt: string,
    count: number,
    exclude: readonly SongRef[],
    seedContext?: readonly SeedTrack[],
  ): Promise<Suggestion[]>
}

/**
 * Resolves a (title, artist) pair to a catalog id.
 * `null` is a normal "no match"; LookupError is reserved for transport failures.
 */
export interface CatalogLookupClient {
  find(title: string, artist: string, signal?: AbortSignal): Promise<null | string>
}

export interface ListeningHistorySource {
  getTopTracks(limit: number, timeRange?: SpotifyTimeRange): Promise<SeedTrack[]>
}

export interface PublishOptions {
  public: boolean
}

export interface PlaylistPublisher {
  publish(payload: PlaylistPayload, options: PublishOptions): Promise<PublishedPlaylist>
}

/**
 * Round-by-round observer. Called without awaiting; a slow sink never delays the engine.
 */
export interface ProgressSink {
  onRound(roundNumber: number, resolvedCount: number, requestedCount: number): Promise<void> | void
}
