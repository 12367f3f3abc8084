import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  platform: 'node',
  target: 'node20',
  sourcemap: true,
  banner: {
    js: '#!/usr/bin/env node',
  },
  clean: true,
  noExternal: ['@region-complete/completion-core'],
});
