/**
 * Access token storage and the login redirect.
 *
 * The token check here is a client-side convenience only; the API decides
 * whether a token is actually valid.
 */

import { LOGIN_PATH, TOKEN_KEY } from '../constants'

export type RedirectHandler = (path: string) => void

function navigateWithPageLoad(path: string): void {
  window.location.href = path
}

let redirectHandler: RedirectHandler = navigateWithPageLoad

export function getToken(): string | null {
  return localStorage.getItem(TOKEN_KEY)
}

export function setToken(token: string): void {
  localStorage.setItem(TOKEN_KEY, token)
}

export function removeToken(): void {
  localStorage.removeItem(TOKEN_KEY)
}

export function isAuthenticated(): boolean {
  return !!getToken()
}

/** Overrides how `redirectToLogin` navigates; `null` restores a full page load. */
export function setRedirectHandler(handler: RedirectHandler | null): void {
  redirectHandler = handler ?? navigateWithPageLoad
}

export function redirectToLogin(): void {
  redirectHandler(LOGIN_PATH)
}

export async function checkAuth(): Promise<boolean> {
  if (!getToken()) {
    redirectToLogin()
    return false
  }
  return true
}
