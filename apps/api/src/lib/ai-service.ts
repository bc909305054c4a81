/**
 * AI Service - Claude/Anthropic integration
 *
 * Wraps the Anthropic client for structured JSON prompts:
 * - Client management
 * - JSON extraction from free-form responses
 * - Schema validation of the extracted payload
 */

import Anthropic from '@anthropic-ai/sdk'
import {formatZodError, safeParseJson} from '@moodlist/shared-types'
import type {z} from 'zod'

import {LLM} from '../constants'
import {getLogger} from '../utils/LoggerContext'

// =============================================================================
// TYPES
// =============================================================================

export interface AIServiceConfig {
  apiKey: string
  defaultModel?: string
  defaultTemperature?: number
}

export interface AIRequestOptions {
  /** Maximum tokens in response */
  maxTokens?: number
  /** Override the default model */
  model?: string
  /** System prompt */
  system?: string
  /** Temperature for response creativity (0-1) */
  temperature?: number
}

export interface AIResponse<T> {
  data: null | T
  error: null | string
  rawText: string
  /** Token usage stats */
  usage?: {
    inputTokens: number
    outputTokens: number
  }
}

// =============================================================================
// AI SERVICE CLASS
// =============================================================================

export class AIService {
  private client: Anthropic
  private defaultModel: string
  private defaultTemperature: number

  constructor(config: AIServiceConfig) {
    this.client = new Anthropic({apiKey: config.apiKey})
    this.defaultModel = config.defaultModel ?? LLM.MODEL
    this.defaultTemperature = config.defaultTemperature ?? LLM.TEMPERATURE
  }

  /**
   * Send a prompt to Claude and validate the JSON it returns.
   * Never throws: transport and parse failures come back in `error`.
   */
  async promptForJSON<S extends z.ZodTypeAny>(
    prompt: string,
    schema: S,
    options: AIRequestOptions = {},
  ): Promise<AIResponse<z.infer<S>>> {
    try {
      const response = await this.client.messages.create({
        max_tokens: options.maxTokens ?? LLM.MAX_TOKENS,
        messages: [{content: prompt, role: 'user'}],
        model: options.model ?? this.defaultModel,
        system: options.system ?? 'You are an AI assistant. Return only valid JSON.',
        temperature: options.temperature ?? this.defaultTemperature,
      })

      const rawText = response.content
        .filter((block): block is Anthropic.TextBlock => block.type === 'text')
        .map(block => block.text)
        .join('')

      const usage = {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
      }

      if (response.stop_reason === 'max_tokens') {
        getLogger()?.warn('[AIService] Response hit the token limit', {outputTokens: usage.outputTokens})
        return {data: null, error: 'Response truncated at max_tokens', rawText, usage}
      }

      const json = this.extractJSON(rawText)
      if (json === null) {
        return {data: null, error: 'No JSON found in response', rawText, usage}
      }

      const parsed = safeParseJson(json, schema)
      if (!parsed.success) {
        getLogger()?.warn('[AIService] Response failed validation', {error: formatZodError(parsed.error)})
        return {data: null, error: `Invalid response format: ${formatZodError(parsed.error)}`, rawText, usage}
      }

      return {data: parsed.data, error: null, rawText, usage}
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error)
      getLogger()?.error('[AIService] API call failed', error)

      return {
        data: null,
        error: errorMessage,
        rawText: '',
      }
    }
  }

  /**
   * Extract the JSON text from a response (handles markdown code blocks, leading prose, etc.)
   */
  extractJSON(text: string): null | string {
    const jsonMatch = /\{[\s\S]*\}|\[[\s\S]*\]/.exec(text)
    if (!jsonMatch) {
      getLogger()?.warn('[AIService] No JSON found in response')
      return null
    }
    return jsonMatch[0]
  }
}

/**
 * Create a new AI service instance
 */
export function createAIService(config: AIServiceConfig): AIService {
  return new AIService(config)
}
