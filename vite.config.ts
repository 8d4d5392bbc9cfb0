import { defineConfig } from 'vite';
import react from '@vitejs/plugin-react';

// The backend listens on 8000 by default; the dev server forwards API calls to it.
export default defineConfig({
  root: 'frontend',
  plugins: [react()],
  server: {
    proxy: {
      '/api': 'http://localhost:8000',
    },
  },
  build: {
    outDir: '../dist/frontend',
    emptyOutDir: true,
  },
});
