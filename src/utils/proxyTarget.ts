/**
 * Picks the upstream the dev and preview servers forward `/api`, `/auth`
 * and `/health` to. Loaded by vite.config.ts.
 */

export const DEV_SERVER_PORT = 5173
export const PREVIEW_PORT = 8000
export const DEFAULT_API_TARGET = 'http://localhost:8000'

const LOOPBACK_HOSTS = new Set(['localhost', '127.0.0.1', '0.0.0.0', '[::1]'])

interface ProxyTargetOptions {
  /** Value of `API_PROXY_TARGET`, if set. */
  configured?: string
  isPreview: boolean
}

function pointsAtPort(target: string, port: number): boolean {
  let url: URL
  try {
    url = new URL(target)
  } catch {
    throw new Error(`API_PROXY_TARGET is not a valid URL: ${target}`)
  }
  const targetPort = url.port || (url.protocol === 'https:' ? '443' : '80')
  return LOOPBACK_HOSTS.has(url.hostname) && targetPort === String(port)
}

export function resolveProxyTarget({ configured, isPreview }: ProxyTargetOptions): string {
  if (!isPreview) {
    return configured || DEFAULT_API_TARGET
  }

  // the preview server owns port 8000, so the API has to live elsewhere
  if (!configured) {
    throw new Error(
      `API_PROXY_TARGET must be set for the preview server: it listens on port ${PREVIEW_PORT} itself`,
    )
  }
  if (pointsAtPort(configured, PREVIEW_PORT)) {
    throw new Error(
      `API_PROXY_TARGET (${configured}) points back at the preview server on port ${PREVIEW_PORT}`,
    )
  }
  return configured
}
