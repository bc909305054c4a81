/**
 * AISuggestionGenerator
 * Asks Claude for songs matching a mood prompt, honoring exclusions and seed context.
 */

import {type SeedTrack, type SongRef, type Suggestion, SuggestedSongsResponseSchema} from '@moodlist/shared-types'

import type {SuggestionGenerator} from './types'

import {LLM} from '../constants'
import {GenerationError} from '../errors'
import {buildPlaylistSuggestionsPrompt, SYSTEM_PROMPTS} from '../lib/ai-prompts'
import type {AIService} from '../lib/ai-service'
import {getLogger} from '../utils/LoggerContext'

export interface AISuggestionGeneratorOptions {
  maxTokens?: number
  temperature?: number
}

/**
 * Response budget for a list of `count` songs; grows with the round size so
 * large overfetched rounds are not cut off mid-JSON
 */
export function suggestionTokenBudget(count: number): number {
  return LLM.SUGGESTION_BASE_TOKENS + count * LLM.TOKENS_PER_SONG
}

export class AISuggestionGenerator implements SuggestionGenerator {
  constructor(
    private readonly aiService: AIService,
    private readonly options: AISuggestionGeneratorOptions = {},
  ) {}

  async generate(
    prompt: string,
    count: number,
    exclude: readonly SongRef[],
    seedContext?: readonly SeedTrack[],
  ): Promise<Suggestion[]> {
    const response = await this.aiService.promptForJSON(
      buildPlaylistSuggestionsPrompt({count, exclude, prompt, seedTracks: seedContext}),
      SuggestedSongsResponseSchema,
      {
        maxTokens: this.options.maxTokens ?? suggestionTokenBudget(count),
        system: SYSTEM_PROMPTS.CURATOR,
        temperature: this.options.temperature ?? LLM.TEMPERATURE,
      },
    )

    if (response.data === null) {
      throw new GenerationError(`Suggestion generation failed: ${response.error ?? 'empty response'}`)
    }

    const songs = response.data.songs.slice(0, count)
    getLogger()?.debug('[AISuggestionGenerator] Received suggestions', {
      received: response.data.songs.length,
      requested: count,
      usage: response.usage,
    })

    return songs.map((song, rank) => ({artist: song.artist, rank, title: song.title}))
  }
}
