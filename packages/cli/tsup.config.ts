import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/bin/tradekit.ts', 'src/bin/download-data.ts'],
  format: ['esm'],
  platform: 'node',
  target: 'node20',
  sourcemap: true,
  clean: true,
  outDir: 'dist/bin',
  splitting: false,
  // Workspace packages export their TypeScript sources, so they go into the bundle
  noExternal: [/^@tradekit\//],
});
