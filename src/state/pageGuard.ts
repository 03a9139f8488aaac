import { PROTECTED_PATHS } from '../constants'
import { checkAuth } from './authStore'
import { logger } from '../utils/logger'

export function isProtectedPath(pathname: string): boolean {
  return PROTECTED_PATHS.some((path) => path === pathname)
}

/** Resolves false when the visitor was sent to the login page. */
export async function guardProtectedPage(pathname: string): Promise<boolean> {
  if (!isProtectedPath(pathname)) return true
  const allowed = await checkAuth()
  if (!allowed) {
    logger.info(`No access token for ${pathname}, redirecting to login`)
  }
  return allowed
}

/**
 * Runs the token check once the document has loaded. Returns a function
 * that removes the listener.
 */
export function installPageGuard(target: Pick<Document, 'addEventListener' | 'removeEventListener'> = document): () => void {
  function onLoaded() {
    guardProtectedPage(window.location.pathname).catch((err: unknown) => {
      logger.error('Page guard failed:', err)
    })
  }
  target.addEventListener('DOMContentLoaded', onLoaded)
  return () => target.removeEventListener('DOMContentLoaded', onLoaded)
}
