/**
 * Zod schemas for Server-Sent Events (SSE) streaming
 * Provides type-safe parsing for playlist generation progress events
 */

import {z} from 'zod'

import {PlaylistPayloadSchema, RoundProgressSchema} from './playlist-schemas'

// ===== Log Data =====

export const StreamLogDataSchema = z.object({
  level: z.enum(['debug', 'error', 'info', 'warn']),
  message: z.string(),
})

// ===== Event Types =====

export const StreamProgressEventSchema = z.object({
  data: RoundProgressSchema,
  type: z.literal('progress'),
})

export const StreamLogEventSchema = z.object({
  data: StreamLogDataSchema,
  type: z.literal('log'),
})

export const StreamResultEventSchema = z.object({
  data: PlaylistPayloadSchema,
  type: z.literal('result'),
})

export const StreamErrorEventSchema = z.object({
  data: z.string(),
  type: z.literal('error'),
})

export const StreamDoneEventSchema = z.object({
  data: z.null(),
  type: z.literal('done'),
})

// ===== Union of All Events =====

export const GenerationStreamEventSchema = z.discriminatedUnion('type', [
  StreamProgressEventSchema,
  StreamLogEventSchema,
  StreamResultEventSchema,
  StreamErrorEventSchema,
  StreamDoneEventSchema,
])

// ===== Type Exports =====

export type StreamLogData = z.infer<typeof StreamLogDataSchema>

export type StreamProgressEvent = z.infer<typeof StreamProgressEventSchema>
export type StreamLogEvent = z.infer<typeof StreamLogEventSchema>
export type StreamResultEvent = z.infer<typeof StreamResultEventSchema>
export type StreamErrorEvent = z.infer<typeof StreamErrorEventSchema>
export type StreamDoneEvent = z.infer<typeof StreamDoneEventSchema>

export type GenerationStreamEvent = z.infer<typeof GenerationStreamEventSchema>
