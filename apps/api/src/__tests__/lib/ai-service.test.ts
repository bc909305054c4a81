/**
 * ai-service.ts Tests
 * JSON extraction and schema validation of Claude responses
 */

import {SuggestedSongsResponseSchema} from '@moodlist/shared-types'
import {beforeEach, describe, expect, it, vi} from 'vitest'

import type {MessageCreateParams, MockMessage} from '../fixtures/anthropic-mocks'

import {AIService} from '../../lib/ai-service'
import {buildTextMessage, buildTruncatedMessage} from '../fixtures/anthropic-mocks'

const createMock = vi.hoisted(() => vi.fn<(params: MessageCreateParams) => Promise<MockMessage>>())

vi.mock('@anthropic-ai/sdk', () => ({
  default: class MockAnthropic {
    messages = {create: createMock}
  },
}))

describe('AIService', () => {
  let service: AIService

  beforeEach(() => {
    service = new AIService({apiKey: 'test-secret', defaultModel: 'test-model'})
  })

  describe('promptForJSON', () => {
    it('returns validated data from a fenced JSON response', async () => {
      createMock.mockResolvedValueOnce(
        buildTextMessage('Here you go:\n```json\n{"songs":[{"title":"Holocene","artist":"Bon Iver"}]}\n```', {
          input_tokens: 10,
          output_tokens: 20,
        }),
      )

      const response = await service.promptForJSON('suggest songs', SuggestedSongsResponseSchema)

      expect(response.error).toBeNull()
      expect(response.data).toEqual({songs: [{artist: 'Bon Iver', title: 'Holocene'}]})
      expect(response.usage).toEqual({inputTokens: 10, outputTokens: 20})
    })

    it('sends model, system prompt and sampling options', async () => {
      createMock.mockResolvedValueOnce(buildTextMessage('{"songs":[]}'))

      await service.promptForJSON('suggest songs', SuggestedSongsResponseSchema, {
        maxTokens: 100,
        system: 'You are a curator.',
        temperature: 0.5,
      })

      expect(createMock).toHaveBeenCalledWith({
        max_tokens: 100,
        messages: [{content: 'suggest songs', role: 'user'}],
        model: 'test-model',
        system: 'You are a curator.',
        temperature: 0.5,
      })
    })

    it('reports a response without JSON', async () => {
      createMock.mockResolvedValueOnce(buildTextMessage('Sorry, I cannot help with that.'))

      const response = await service.promptForJSON('suggest songs', SuggestedSongsResponseSchema)

      expect(response.data).toBeNull()
      expect(response.error).toBe('No JSON found in response')
      expect(response.rawText).toBe('Sorry, I cannot help with that.')
    })

    it('reports JSON that does not match the schema', async () => {
      createMock.mockResolvedValueOnce(buildTextMessage('{"songs":[{"title":"Holocene"}]}'))

      const response = await service.promptForJSON('suggest songs', SuggestedSongsResponseSchema)

      expect(response.data).toBeNull()
      expect(response.error).toBe('Invalid response format: songs.0.artist: Required')
    })

    it('reports a reply cut off at the token limit', async () => {
      createMock.mockResolvedValueOnce(buildTruncatedMessage('{"songs":[{"title":"Holocene"'))

      const response = await service.promptForJSON('suggest songs', SuggestedSongsResponseSchema)

      expect(response.data).toBeNull()
      expect(response.error).toBe('Response truncated at max_tokens')
      expect(response.rawText).toBe('{"songs":[{"title":"Holocene"')
    })

    it('returns the API error instead of throwing', async () => {
      createMock.mockRejectedValueOnce(new Error('401 invalid x-api-key'))

      const response = await service.promptForJSON('suggest songs', SuggestedSongsResponseSchema)

      expect(response).toEqual({data: null, error: '401 invalid x-api-key', rawText: ''})
    })
  })

  describe('extractJSON', () => {
    it('extracts an object surrounded by prose', () => {
      expect(service.extractJSON('Sure! {"a":1} Enjoy.')).toBe('{"a":1}')
    })

    it('returns null when there is no JSON', () => {
      expect(service.extractJSON('no json here')).toBeNull()
    })
  })
})
