import { defineConfig } from 'vitest/config';
import path from 'path';
import { fileURLToPath } from 'url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      // The engine is reachable only through its barrel.
      { find: /^@engine$/, replacement: path.resolve(__dirname, 'src/leverage-engine/index.ts') },
      { find: '@shared', replacement: path.resolve(__dirname, 'src/shared') },
      { find: '@desk', replacement: path.resolve(__dirname, 'src/leverage-desk') },
      { find: '@api', replacement: path.resolve(__dirname, 'src/leverage-api') },
      { find: '@ui', replacement: path.resolve(__dirname, 'src/leverage-ui') },
      { find: '@db', replacement: path.resolve(__dirname, 'src/db') },
    ],
  },
  test: {
    globals: false,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
  },
});
