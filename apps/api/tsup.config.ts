import {defineConfig} from 'tsup'

export default defineConfig({
  entry: {
    'bin/moodlist': 'src/bin/moodlist.ts',
    server: 'src/server.ts',
  },
  format: ['esm'],
  platform: 'node',
  target: 'node20',
  splitting: false,
  sourcemap: true,
  clean: true,
  treeshake: true,
  skipNodeModulesBundle: true, // Don't bundle all node_modules
  // Workspace packages ship TypeScript sources, so they are compiled into the bundle
  noExternal: [/^@moodlist\//],
})
