import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/unit/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
  },
  resolve: {
    // More specific aliases first: the first matching prefix wins.
    alias: [
      { find: '@/tests', replacement: path.resolve(rootDir, './tests') },
      { find: '@', replacement: path.resolve(rootDir, './src') },
    ],
  },
});
