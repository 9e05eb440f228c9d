import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  sourcemap: true,
  clean: true,
  target: 'node20',
  banner: { js: '#!/usr/bin/env node' },
  // The core workspace exports TypeScript sources, so it is bundled into the binary
  noExternal: ['@taskloom/core'],
});
