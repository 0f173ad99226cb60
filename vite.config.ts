import { defineConfig } from 'vite';
import react from '@vitejs/plugin-react';
import path from 'path';
import { fileURLToPath } from 'url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  plugins: [react()],
  root: '.',
  publicDir: 'public',
  resolve: {
    alias: [
      { find: /^@engine$/, replacement: path.resolve(__dirname, 'src/leverage-engine/index.ts') },
      { find: '@ui', replacement: path.resolve(__dirname, 'src/leverage-ui') },
      { find: '@shared', replacement: path.resolve(__dirname, 'src/shared') },
      { find: '@desk', replacement: path.resolve(__dirname, 'src/leverage-desk') },
    ],
  },
  server: {
    port: 5174,
    proxy: {
      '/api': { target: 'http://localhost:3002', changeOrigin: true },
      '/ws': { target: 'ws://localhost:3002', ws: true },
    },
  },
  build: {
    outDir: 'dist/client',
    emptyOutDir: true,
    sourcemap: true,
  },
});
