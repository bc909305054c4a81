/**
 * Moodlist CLI
 * Runs the same generation pipeline as the HTTP API from a terminal.
 */

import {GeneratePlaylistRequestSchema, formatZodError, safeParse} from '@moodlist/shared-types'

import type {AppConfig} from '../config'
import type {CliOptions} from './args'

import {loadConfig} from '../config'
import {createAIService} from '../lib/ai-service'
import {createGenerationService} from '../services/PlaylistGenerationService'
import {SpotifyCatalogClient} from '../services/SpotifyCatalogClient'
import {AISuggestionGenerator} from '../services/SuggestionGenerator'
import {CancellationSource} from '../utils/Cancellation'
import {runWithLogger} from '../utils/LoggerContext'
import {ServiceLogger} from '../utils/ServiceLogger'
import {CliUsageError, HELP_TEXT, parseArgs} from './args'
import {defaultTitle, formatPlaylist, formatProgress, formatTrackList} from './format'

/**
 * Run one CLI invocation and return the process exit code
 */
export async function runCli(argv: readonly string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  let options: CliOptions
  try {
    options = parseArgs(argv)
  } catch (error) {
    if (error instanceof CliUsageError) {
      console.error(`Error: ${error.message}`)
      console.log(HELP_TEXT)
      return 1
    }
    throw error
  }

  if (options.command === 'help') {
    console.log(HELP_TEXT)
    return 0
  }

  const command = options.command
  const config = loadConfig(env)
  const token = config.spotifyAccessToken
  if (!token) {
    console.error('Error: SPOTIFY_ACCESS_TOKEN is not set')
    return 1
  }

  // info goes to stdout, which --json reserves for the payload
  const logger = new ServiceLogger('Moodlist', {minLevel: options.json ? 'warn' : config.logLevel})
  const spotify = new SpotifyCatalogClient(token)

  return runWithLogger(logger, async () => {
    switch (command) {
      case 'whoami': {
        const user = await spotify.getCurrentUser()
        console.log(`Logged in as ${user.displayName ?? user.id}`)
        return 0
      }
      case 'top': {
        const tracks = await spotify.getTopTracks(options.limit)
        if (tracks.length === 0) {
          console.log('No top tracks found for this account')
          return 0
        }
        console.log(`Your top tracks:\n${formatTrackList(tracks)}`)
        return 0
      }
      case 'generate':
        return generate(options, config, spotify)
    }
  })
}

async function generate(options: CliOptions, config: AppConfig, spotify: SpotifyCatalogClient): Promise<number> {
  const prompt = options.prompt ?? ''
  const request = safeParse(GeneratePlaylistRequestSchema, {
    maxRounds: options.maxRounds,
    prompt,
    requestedCount: options.count,
    title: options.title ?? defaultTitle(prompt),
    useListeningHistory: options.useHistory,
  })
  if (!request.success) {
    console.error(`Error: ${formatZodError(request.error)}`)
    return 1
  }

  const apiKey = config.anthropic.apiKey
  if (!apiKey) {
    console.error('Error: ANTHROPIC_API_KEY is not set')
    return 1
  }

  const generator = new AISuggestionGenerator(createAIService({apiKey, defaultModel: config.anthropic.model}))
  const service = createGenerationService(config, generator, spotify)

  // First Ctrl-C stops at the next round boundary; a second one exits immediately
  const cancellation = new CancellationSource()
  const onSigint = () => {
    console.error('\nCancelling after the current round...')
    cancellation.cancel()
  }
  process.once('SIGINT', onSigint)

  try {
    const {maxRounds, prompt: moodPrompt, requestedCount, title, useListeningHistory} = request.data
    const payload = await service.generate(
      {prompt: moodPrompt, requestedCount, title},
      {
        cancel: cancellation.token,
        maxRounds,
        progress: {
          onRound: (roundNumber, resolvedCount, total) => {
            if (!options.json) console.error(formatProgress(roundNumber, resolvedCount, total))
          },
        },
        useListeningHistory,
      },
    )

    console.log(options.json ? JSON.stringify(payload, null, 2) : formatPlaylist(payload))

    if (payload.achievedCount === 0) {
      console.error('No tracks could be resolved')
      return 1
    }

    if (options.save) {
      const published = await service.publish(payload, {public: options.public})
      console.log(`Saved ${published.addedCount} tracks: ${published.playlistUrl}`)
    }
    return 0
  } finally {
    process.removeListener('SIGINT', onSigint)
  }
}
