/**
 * Playlist API contracts
 * Mood-prompt generation and publishing to Spotify
 */

import {
  GeneratePlaylistRequestSchema,
  PlaylistPayloadSchema,
  PublishedPlaylistSchema,
  SavePlaylistRequestSchema,
} from '@moodlist/shared-types'
import {createRoute, z} from '@hono/zod-openapi'

const ErrorResponseSchema = z.object({
  error: z.string(),
})

const errorResponse = (description: string) => ({
  content: {
    'application/json': {
      schema: ErrorResponseSchema,
    },
  },
  description,
})

const spotifyAuthHeaders = z.object({
  authorization: z.string().regex(/^Bearer .+$/),
})

/**
 * POST /api/playlists/generate
 * Resolve a mood prompt into up to `requestedCount` Spotify tracks
 */
export const generatePlaylist = createRoute({
  description: 'Generate a playlist from a mood prompt. Returns a partial playlist when the catalog runs dry.',
  method: 'post',
  path: '/api/playlists/generate',
  request: {
    body: {
      content: {
        'application/json': {
          schema: GeneratePlaylistRequestSchema,
        },
      },
    },
    headers: spotifyAuthHeaders,
  },
  responses: {
    200: {
      content: {
        'application/json': {
          schema: PlaylistPayloadSchema,
        },
      },
      description: 'Playlist generated (check status and achievedCount for shortfall)',
    },
    400: errorResponse('Invalid request body'),
    401: errorResponse('Unauthorized'),
    500: errorResponse('Internal server error'),
    502: errorResponse('Suggestion provider failed before any track was resolved'),
  },
  tags: ['Playlists'],
})

/**
 * POST /api/playlists/save
 * Publish a generated playlist to the user's Spotify account
 */
export const savePlaylist = createRoute({
  description: "Create a Spotify playlist from a generated payload",
  method: 'post',
  path: '/api/playlists/save',
  request: {
    body: {
      content: {
        'application/json': {
          schema: SavePlaylistRequestSchema,
        },
      },
    },
    headers: spotifyAuthHeaders,
  },
  responses: {
    200: {
      content: {
        'application/json': {
          schema: PublishedPlaylistSchema,
        },
      },
      description: 'Playlist created',
    },
    400: errorResponse('Invalid request body'),
    401: errorResponse('Unauthorized'),
    500: errorResponse('Internal server error'),
    502: errorResponse('Spotify API failure'),
  },
  tags: ['Playlists'],
})
