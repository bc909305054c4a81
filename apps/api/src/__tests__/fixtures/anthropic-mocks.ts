/**
 * Anthropic SDK Mocks
 * Builders for the message responses the mocked client returns
 */

export interface MessageCreateParams {
  max_tokens: number
  messages: {content: string; role: string}[]
  model: string
  system?: string
  temperature?: number
}

export interface MockMessage {
  content: {text: string; type: 'text'}[]
  stop_reason: 'end_turn' | 'max_tokens'
  usage: {input_tokens: number; output_tokens: number}
}

export function buildTextMessage(text: string, usage = {input_tokens: 120, output_tokens: 80}): MockMessage {
  return {
    content: [{text, type: 'text'}],
    stop_reason: 'end_turn',
    usage,
  }
}

export function buildTruncatedMessage(text: string): MockMessage {
  return {...buildTextMessage(text), stop_reason: 'max_tokens'}
}

export function buildSongsMessage(songs: {artist: string; title: string}[]): MockMessage {
  return buildTextMessage(JSON.stringify({songs}))
}
