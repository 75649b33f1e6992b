import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  dts: true,
  outDir: 'dist',
  clean: true,
  // Workspace packages ship TypeScript sources, so they are bundled in.
  noExternal: [/^@pixel-recolor\//],
  banner: {
    js: '#!/usr/bin/env node',
  },
});
