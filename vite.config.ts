/// <reference types="vitest" />
import { defineConfig, loadEnv } from 'vite'
import react from '@vitejs/plugin-react'
import { DEV_SERVER_PORT, PREVIEW_PORT, resolveProxyTarget } from './src/utils/proxyTarget'

export default defineConfig(({ mode, isPreview = false }) => {
  const env = loadEnv(mode, process.cwd(), '')
  const target = resolveProxyTarget({ configured: env.API_PROXY_TARGET, isPreview })

  const proxy = {
    '/api': { target, changeOrigin: true },
    '/auth': { target, changeOrigin: true },
    '/health': { target, changeOrigin: true },
  }

  return {
    plugins: [react()],
    server: {
      port: DEV_SERVER_PORT,
      strictPort: true,
      proxy,
    },
    preview: {
      port: PREVIEW_PORT,
      proxy,
    },
    test: {
      globals: true,
      environment: 'jsdom',
      setupFiles: ['./src/tests/setup.ts'],
      include: ['src/**/*.test.{ts,tsx}'],
      css: { include: [/index\.css/] },
    },
  }
})
