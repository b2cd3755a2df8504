import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/main.ts'],
  format: ['esm'],
  target: 'node20',
  sourcemap: true,
  clean: true,
  shims: true,
  platform: 'node',
  noExternal: ['@actions/core', '@actions/exec', '@actions/github'],
  banner: {
    js: [
      "import { createRequire as __createRequire } from 'node:module';",
      "const require = __createRequire(import.meta.url);",
      "globalThis.require ??= require;"
    ].join('\n')
  }
});
