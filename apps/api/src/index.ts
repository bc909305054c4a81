import {randomUUID} from 'node:crypto'

import {OPENAPI_INFO} from '@moodlist/api-contracts'
import {type HealthResponse, formatZodError} from '@moodlist/shared-types'
import {swaggerUI} from '@hono/swagger-ui'
import {OpenAPIHono} from '@hono/zod-openapi'
import {cors} from 'hono/cors'
import {HTTPException} from 'hono/http-exception'
import {secureHeaders} from 'hono/secure-headers'

import type {AppConfig} from './config'
import type {CatalogLookupClient, ListeningHistorySource, PlaylistPublisher, SuggestionGenerator} from './services/types'

import {extractBearerToken} from './lib/guards'
import {registerGenerateStreamRoute} from './routes/generate-stream'
import {registerPlaylistRoutes} from './routes/playlists-openapi'
import {getLogger, runWithLogger} from './utils/LoggerContext'
import {ServiceLogger} from './utils/ServiceLogger'

export type SpotifyClient = CatalogLookupClient & ListeningHistorySource & PlaylistPublisher

/**
 * Everything request handlers need, injected so tests can swap in fakes
 */
export interface AppDependencies {
  config: AppConfig
  createCatalog: (accessToken: string) => SpotifyClient
  createGenerator: () => SuggestionGenerator
}

export function createApp(deps: AppDependencies): OpenAPIHono {
  const app = new OpenAPIHono({
    defaultHook: (result, c) => {
      if (!result.success) {
        return c.json({error: formatZodError(result.error)}, 400)
      }
    },
  })

  // Security headers middleware
  app.use(
    '*',
    secureHeaders({
      referrerPolicy: 'strict-origin-when-cross-origin',
      xContentTypeOptions: 'nosniff',
      xFrameOptions: 'DENY',
    }),
  )

  app.use(
    '*',
    cors({
      allowHeaders: ['Content-Type', 'Authorization'],
      allowMethods: ['GET', 'POST', 'OPTIONS'],
      origin: deps.config.frontendUrl ?? '*',
    }),
  )

  // Per-request logger context
  app.use('*', async (c, next) => {
    const logger = new ServiceLogger(`Request:${randomUUID().substring(0, 8)}`, {minLevel: deps.config.logLevel})
    await runWithLogger(logger, async () => {
      logger.debug(`${c.req.method} ${c.req.path}`)
      await next()
    })
  })

  // Every playlist route acts on the caller's Spotify account
  app.use('/api/playlists/*', async (c, next) => {
    if (!extractBearerToken(c.req.header('authorization'))) {
      return c.json({error: 'No authorization token'}, 401)
    }
    await next()
  })

  app.onError((error, c) => {
    if (error instanceof HTTPException) {
      return c.json({error: error.message}, error.status)
    }
    getLogger()?.error('Unhandled error', error)
    return c.json({error: 'Internal server error'}, 500)
  })

  // Health check
  app.get('/health', c => c.json({status: 'healthy'} satisfies HealthResponse))

  registerPlaylistRoutes(app, deps)
  registerGenerateStreamRoute(app, deps)

  // Configure OpenAPI documentation
  app.doc('/api/openapi.json', OPENAPI_INFO)

  // Serve Swagger UI at /api/docs
  app.get('/api/docs', swaggerUI({url: '/api/openapi.json'}))

  return app
}
