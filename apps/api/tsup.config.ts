import {defineConfig} from 'tsup'

export default defineConfig({
  entry: ['src/server.ts'],
  format: ['esm'],
  platform: 'node',
  target: 'node20',
  splitting: false,
  sourcemap: true,
  clean: true,
  treeshake: true,
  // Workspace packages ship TypeScript sources, so they are bundled in
  noExternal: [/^@radio\//],
})
