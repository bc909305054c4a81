/**
 * Playlist API routes using OpenAPI contracts
 */

import type {OpenAPIHono} from '@hono/zod-openapi'

import {generatePlaylist, savePlaylist} from '@moodlist/api-contracts'
import type {GeneratePlaylistRequest, PlaylistSpec} from '@moodlist/shared-types'

import type {AppDependencies} from '../index'

import {extractBearerToken, publishErrorStatus} from '../lib/guards'
import {createGenerationService} from '../services/PlaylistGenerationService'
import {cancellationFromSignal} from '../utils/Cancellation'
import {getLogger} from '../utils/LoggerContext'

export function toPlaylistSpec(request: GeneratePlaylistRequest): PlaylistSpec {
  return {
    prompt: request.prompt,
    requestedCount: request.requestedCount,
    seedContext: request.seedContext,
    title: request.title,
  }
}

/**
 * Register playlist routes on the provided OpenAPI app
 */
export function registerPlaylistRoutes(app: OpenAPIHono, deps: AppDependencies) {
  // POST /api/playlists/generate - Resolve a mood prompt into tracks
  app.openapi(generatePlaylist, async c => {
    const token = extractBearerToken(c.req.valid('header').authorization)
    if (!token) {
      return c.json({error: 'No authorization token'}, 401)
    }

    const body = c.req.valid('json')
    const service = createGenerationService(deps.config, deps.createGenerator(), deps.createCatalog(token))

    try {
      const payload = await service.generate(toPlaylistSpec(body), {
        cancel: cancellationFromSignal(c.req.raw.signal),
        maxRounds: body.maxRounds,
        seedTrackLimit: body.seedTrackLimit,
        useListeningHistory: body.useListeningHistory,
      })

      if (payload.status === 'partial-generator-error' && payload.achievedCount === 0) {
        return c.json({error: payload.error ?? 'Suggestion generation failed'}, 502)
      }

      return c.json(payload, 200)
    } catch (error) {
      getLogger()?.error('Playlist generation failed', error)
      return c.json({error: error instanceof Error ? error.message : 'Failed to generate playlist'}, 500)
    }
  })

  // POST /api/playlists/save - Publish a generated playlist to Spotify
  app.openapi(savePlaylist, async c => {
    const token = extractBearerToken(c.req.valid('header').authorization)
    if (!token) {
      return c.json({error: 'No authorization token'}, 401)
    }

    const {payload, public: isPublic} = c.req.valid('json')

    try {
      const published = await deps.createCatalog(token).publish(payload, {public: isPublic})
      getLogger()?.info(`Published "${payload.title}" with ${published.addedCount} tracks`)
      return c.json(published, 200)
    } catch (error) {
      getLogger()?.error('Playlist save failed', error)
      const message = error instanceof Error ? error.message : 'Failed to save playlist'
      const status = publishErrorStatus(error)
      switch (status) {
        case 400:
          return c.json({error: message}, 400)
        case 401:
          return c.json({error: message}, 401)
        case 502:
          return c.json({error: message}, 502)
        default:
          return c.json({error: message}, 500)
      }
    }
  })
}
