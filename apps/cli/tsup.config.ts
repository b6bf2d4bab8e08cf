import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  clean: true,
  bundle: true,
  // Workspace packages ship TypeScript sources, so they go into the bundle
  noExternal: [/^@hunkwise\//],
  minify: false,
  sourcemap: true,
  outDir: 'dist',
  target: 'node20',
});
