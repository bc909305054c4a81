/**
 * API Contracts Package
 * Contract-first API definitions using Hono + Zod + OpenAPI
 */

export * from './routes/playlists';

export const OPENAPI_INFO = {
  info: {
    description: 'Mood-driven Spotify playlist generator',
    title: 'Moodlist API',
    version: '1.0.0',
  },
  openapi: '3.0.0',
  servers: [
    {
      description: 'Local development',
      url: 'http://localhost:8787',
    },
  ],
};
