/**
 * Streaming playlist generation
 * Emits per-round progress, forwarded service logs, then the result as Server-Sent Events.
 * A client disconnect cancels the run at the next round boundary.
 */

import {randomUUID} from 'node:crypto'

import type {OpenAPIHono} from '@hono/zod-openapi'

import {GeneratePlaylistRequestSchema, formatZodError, safeParse} from '@moodlist/shared-types'

import type {AppDependencies} from '../index'

import {STREAMING} from '../constants'
import {extractBearerToken} from '../lib/guards'
import {createGenerationService} from '../services/PlaylistGenerationService'
import {cancellationFromSignal} from '../utils/Cancellation'
import {getLogger, runWithLogger} from '../utils/LoggerContext'
import {SSEWriter} from '../utils/SSEWriter'
import {ServiceLogger} from '../utils/ServiceLogger'
import {toPlaylistSpec} from './playlists-openapi'

export function registerGenerateStreamRoute(app: OpenAPIHono, deps: AppDependencies) {
  app.post('/api/playlists/generate-stream', async c => {
    const requestId = randomUUID().substring(0, 8)

    const token = extractBearerToken(c.req.header('authorization'))
    if (!token) {
      return c.json({error: 'No authorization token'}, 401)
    }

    let rawBody: unknown
    try {
      rawBody = await c.req.json()
    } catch (error) {
      getLogger()?.warn(`[Stream:${requestId}] Failed to parse request body`, {error: String(error)})
      return c.json({error: 'Invalid JSON'}, 400)
    }

    const parsed = safeParse(GeneratePlaylistRequestSchema, rawBody)
    if (!parsed.success) {
      return c.json({error: formatZodError(parsed.error)}, 400)
    }
    const body = parsed.data

    // Client disconnect handling
    const abortController = new AbortController()
    const onAbort = () => {
      getLogger()?.info(`[Stream:${requestId}] Client disconnected, cancelling`)
      abortController.abort()
    }
    c.req.raw.signal.addEventListener('abort', onAbort)

    // highWaterMark bounds memory while a slow client catches up
    const {readable, writable} = new TransformStream<Uint8Array, Uint8Array>(undefined, {
      highWaterMark: STREAMING.HIGH_WATER_MARK,
    })
    const sseWriter = new SSEWriter(writable.getWriter())

    const headers = new Headers({
      'Cache-Control': 'no-cache, no-transform',
      'Content-Encoding': 'identity',
      'Content-Type': 'text/event-stream',
      'X-Accel-Buffering': 'no',
    })

    const streamLogger = new ServiceLogger(`Stream:${requestId}`, {minLevel: deps.config.logLevel, sseWriter})
    const service = createGenerationService(deps.config, deps.createGenerator(), deps.createCatalog(token))

    const processStream = async () => {
      await runWithLogger(streamLogger, async () => {
        const heartbeatInterval = setInterval(() => {
          void sseWriter.writeHeartbeat()
        }, STREAMING.HEARTBEAT_INTERVAL_MS)

        try {
          const payload = await service.generate(toPlaylistSpec(body), {
            cancel: cancellationFromSignal(abortController.signal),
            maxRounds: body.maxRounds,
            progress: {
              onRound: (roundNumber, resolvedCount, requestedCount) => {
                sseWriter.writeAsync({data: {requestedCount, resolvedCount, roundNumber}, type: 'progress'})
              },
            },
            seedTrackLimit: body.seedTrackLimit,
            useListeningHistory: body.useListeningHistory,
          })

          if (payload.status === 'partial-generator-error' && payload.achievedCount === 0) {
            await sseWriter.write({data: payload.error ?? 'Suggestion generation failed', type: 'error'})
          } else {
            await sseWriter.write({data: payload, type: 'result'})
          }
        } catch (error) {
          getLogger()?.error('Stream processing error', error)
          await sseWriter.write({
            data: error instanceof Error ? error.message : 'An error occurred',
            type: 'error',
          })
        } finally {
          // Always send done so the client knows the stream is complete
          await sseWriter.write({data: null, type: 'done'})
          clearInterval(heartbeatInterval)
          c.req.raw.signal.removeEventListener('abort', onAbort)
          await sseWriter.close()
        }
      })
    }

    // Start processing without blocking the response
    processStream().catch((error: unknown) => {
      streamLogger.error('Unhandled error in processStream', error)
    })

    return new Response(readable, {headers})
  })
}
