/**
 * Command-line parsing for the `moodlist` binary.
 *
 * Usage:
 *   moodlist whoami
 *   moodlist top [--limit=N]
 *   moodlist generate --prompt=<text> [--title=<text>] [--count=N] [--max-rounds=N]
 *                     [--no-history] [--save] [--public] [--json]
 */

export type CliCommand = 'generate' | 'help' | 'top' | 'whoami'

export interface CliOptions {
  command: CliCommand
  count: number
  json: boolean
  limit: number
  maxRounds?: number
  prompt?: string
  public: boolean
  save: boolean
  title?: string
  useHistory: boolean
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'CliUsageError'
  }
}

export const DEFAULT_COUNT = 25
export const DEFAULT_TOP_LIMIT = 10

const COMMANDS: readonly CliCommand[] = ['generate', 'help', 'top', 'whoami']

function isCommand(value: string): value is CliCommand {
  return COMMANDS.some(command => command === value)
}

function parsePositiveInt(flag: string, value: string): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new CliUsageError(`${flag} expects a positive integer, got "${value}"`)
  }
  return parsed
}

export function parseArgs(args: readonly string[]): CliOptions {
  const options: CliOptions = {
    command: 'help',
    count: DEFAULT_COUNT,
    json: false,
    limit: DEFAULT_TOP_LIMIT,
    public: false,
    save: false,
    useHistory: true,
  }
  let commandSeen = false

  for (const arg of args) {
    if (arg === '--help' || arg === '-h') {
      options.command = 'help'
      return options
    }

    if (!arg.startsWith('-')) {
      if (commandSeen) throw new CliUsageError(`Unexpected argument "${arg}"`)
      if (!isCommand(arg)) throw new CliUsageError(`Unknown command "${arg}"`)
      options.command = arg
      commandSeen = true
      continue
    }

    const eq = arg.indexOf('=')
    const flag = eq === -1 ? arg : arg.slice(0, eq)
    const value = eq === -1 ? undefined : arg.slice(eq + 1)

    switch (flag) {
      case '--count':
        options.count = parsePositiveInt(flag, requireValue(flag, value))
        break
      case '--json':
        options.json = true
        break
      case '--limit':
        options.limit = parsePositiveInt(flag, requireValue(flag, value))
        break
      case '--max-rounds':
        options.maxRounds = parsePositiveInt(flag, requireValue(flag, value))
        break
      case '--no-history':
        options.useHistory = false
        break
      case '--prompt':
        options.prompt = requireValue(flag, value)
        break
      case '--public':
        options.public = true
        break
      case '--save':
        options.save = true
        break
      case '--title':
        options.title = requireValue(flag, value)
        break
      default:
        throw new CliUsageError(`Unknown option "${flag}"`)
    }
  }

  if (options.command === 'generate' && !options.prompt?.trim()) {
    throw new CliUsageError('generate requires --prompt=<text>')
  }

  return options
}

function requireValue(flag: string, value: string | undefined): string {
  if (value === undefined || value === '') {
    throw new CliUsageError(`${flag} requires a value (${flag}=...)`)
  }
  return value
}

export const HELP_TEXT = `
Moodlist - mood-driven Spotify playlists

Usage:
  moodlist <command> [options]

Commands:
  whoami              Check the Spotify token and show the account name
  top                 List your top tracks
  generate            Build a playlist from a mood prompt

Options:
  --prompt=<text>     Mood or activity to match (generate)
  --title=<text>      Playlist title (default: derived from the prompt)
  --count=N           Tracks wanted, 1-100 (default: ${DEFAULT_COUNT})
  --max-rounds=N      Suggestion rounds before giving up (default: MAX_ROUNDS)
  --no-history        Do not use your top tracks as inspiration
  --save              Publish the playlist to your Spotify account
  --public            Make the saved playlist public
  --json              Print the playlist payload as JSON
  --limit=N           Number of top tracks to list (top, default: ${DEFAULT_TOP_LIMIT})
  --help, -h          Show this help message

Environment:
  SPOTIFY_ACCESS_TOKEN  Spotify bearer token with playlist-modify and user-top-read scopes
  ANTHROPIC_API_KEY     Claude API key (generate)
`
