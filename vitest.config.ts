import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const root = fileURLToPath(new URL('.', import.meta.url));

export default defineConfig({
  resolve: {
    conditions: ['development'],
    // NOTE: Vite does not match the `#$/*` package import, so test helpers are
    // aliased to their sources here; tsc and Node still read package.json
    alias: [{ find: /^#\$\/(.*)\.js$/, replacement: `${root}test/$1.ts` }],
  },
  ssr: {
    resolve: {
      conditions: ['development'],
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['test/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
  },
});
