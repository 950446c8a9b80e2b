/**
 * API Contracts Package
 * Contract-first API definitions using Hono + Zod + OpenAPI
 */

// Export route definitions
export * from './routes/auth'
export * from './routes/radio'

/**
 * OpenAPI document metadata served at /api/openapi.json
 */
export const openApiDocument = {
  info: {
    description: 'Builds a radio from the currently playing Spotify track',
    title: 'Now Playing Radio API',
    version: '1.0.0',
  },
  openapi: '3.0.0',
  servers: [
    {
      description: 'Local development',
      url: 'http://localhost:5002',
    },
  ],
}
