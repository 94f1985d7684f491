import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import tsconfigPaths from 'vite-tsconfig-paths';
import { defineConfig } from 'vitest/config';

const here = fileURLToPath(new URL('.', import.meta.url));

export default defineConfig({
  plugins: [tsconfigPaths({ projects: [resolve(here, '../../tsconfig.json')] })],
  resolve: {
    alias: [
      {
        find: /^@mirrorsync\/core\/(.*)\.js$/,
        replacement: resolve(here, '../core/src/$1.ts'),
      },
    ],
  },
  test: {
    name: 'cli',
    environment: 'node',
    include: ['src/**/*.test.ts'],
    exclude: ['**/dist/**'],
    setupFiles: ['./tests/setup.ts'],
  },
});
