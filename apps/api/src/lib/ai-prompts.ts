/**
 * AI Prompts - Prompt templates for playlist generation
 *
 * Prompts ask for structured JSON so responses can be validated with zod.
 */

import type {SeedTrack, SongRef} from '@moodlist/shared-types'

import {CONTENT_LIMITS} from '../constants'
import {formatSong} from './song-key'

// =============================================================================
// PLAYLIST PROMPTS
// =============================================================================

/**
 * Prompt for one round of song suggestions.
 * Only the most recent exclusions and the first seeds are listed to keep the prompt bounded.
 */
export function buildPlaylistSuggestionsPrompt(args: {
  count: number
  exclude: readonly SongRef[]
  prompt: string
  seedTracks?: readonly SeedTrack[]
}): string {
  const seeds = (args.seedTracks ?? []).slice(0, CONTENT_LIMITS.MAX_SEEDS_IN_PROMPT)
  const excluded = args.exclude.slice(-CONTENT_LIMITS.MAX_EXCLUDED_IN_PROMPT)

  return `<task>
You are a music curator building a playlist that matches a listener's mood or activity. Select ${args.count} real songs that fit the request below.
</task>

<user_intent>
USER REQUEST: "${args.prompt}"
</user_intent>
${
  seeds.length > 0
    ? `
<listening_history>
The listener's top tracks, for inspiration only. Matching the mood matters more than reusing these:
${seeds.map(song => `- ${formatSong(song)}`).join('\n')}
</listening_history>
`
    : ''
}${
  excluded.length > 0
    ? `
<already_suggested>
Do NOT suggest any of these songs again; pick completely different ones:
${excluded.map(song => `- ${formatSong(song)}`).join('\n')}
</already_suggested>
`
    : ''
}
<guidelines>
- Only suggest songs that really exist and are widely available on Spotify
- Spell song titles and artist names exactly as released, in their original language
- List the best fits first
- Each song at most once
</guidelines>

<output_format>
Return ONLY valid JSON:
{
  "songs": [
    {"title": "Song Title", "artist": "Artist Name"}
  ]
}

Return exactly ${args.count} songs. No markdown code blocks.
</output_format>`
}

// =============================================================================
// SYSTEM PROMPTS
// =============================================================================

export const SYSTEM_PROMPTS = {
  CURATOR: 'You are a music curator. Suggest real tracks that exist on Spotify. Return only valid JSON.',
} as const
