import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/bin.ts'],
  format: ['esm'],
  platform: 'node',
  target: 'node20',
  // workspace packages export TypeScript sources, so they are bundled in
  noExternal: [/^@reword\//],
  clean: true,
  sourcemap: true,
});
