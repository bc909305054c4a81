export interface HealthResponse {
  status: 'healthy';
}

export * from './validation';
export * from './schemas/playlist-schemas';
export * from './schemas/spotify-schemas';
export * from './schemas/llm-response-schemas';
export * from './schemas/sse-schemas';
