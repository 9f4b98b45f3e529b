import { defineConfig, loadEnv } from 'vite'
import react from '@vitejs/plugin-react'

// https://vite.dev/config/
export default defineConfig(({ mode }) => {
  const env = loadEnv(mode, process.cwd(), '')
  // Sub-path deployments (e.g. GitHub Pages) set this; the router reads it back via BASE_URL
  const base = env.VITE_CATALOG_BASE_PATH || '/'
  return {
    base,
    plugins: [react()],
    server: {
      host: true,
      port: 5173,
    },
    build: {
      target: 'es2020',
      rollupOptions: {
        output: {
          manualChunks: {
            'vendor-react': ['react', 'react-dom', 'react-router-dom'],
            'vendor-motion': ['framer-motion'],
          },
        },
      },
    },
  }
})
