import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { guardProtectedPage, installPageGuard, isProtectedPath } from '../state/pageGuard'
import { setRedirectHandler, setToken } from '../state/authStore'

describe('isProtectedPath', () => {
  it.each(['/dashboard', '/analysis', '/history'])('protects %s', (path) => {
    expect(isProtectedPath(path)).toBe(true)
  })

  it.each(['/', '/login', '/dashboard/', '/history/2', '/Analysis'])('leaves %s open', (path) => {
    expect(isProtectedPath(path)).toBe(false)
  })
})

describe('guardProtectedPage', () => {
  const redirect = vi.fn()

  beforeEach(() => {
    redirect.mockReset()
    setRedirectHandler(redirect)
  })

  it('redirects to login on a protected path without a token', async () => {
    await expect(guardProtectedPage('/analysis')).resolves.toBe(false)
    expect(redirect).toHaveBeenCalledWith('/login')
  })

  it('allows a protected path with a token', async () => {
    setToken('test-token')
    await expect(guardProtectedPage('/history')).resolves.toBe(true)
    expect(redirect).not.toHaveBeenCalled()
  })

  it('never redirects on an open path', async () => {
    await expect(guardProtectedPage('/login')).resolves.toBe(true)
    expect(redirect).not.toHaveBeenCalled()
  })
})

describe('installPageGuard', () => {
  const redirect = vi.fn()

  beforeEach(() => {
    redirect.mockReset()
    setRedirectHandler(redirect)
  })

  afterEach(() => {
    window.history.pushState({}, '', '/')
  })

  it('checks the current path once the document has loaded', async () => {
    window.history.pushState({}, '', '/dashboard')
    const uninstall = installPageGuard()

    expect(redirect).not.toHaveBeenCalled()
    document.dispatchEvent(new Event('DOMContentLoaded'))

    await vi.waitFor(() => expect(redirect).toHaveBeenCalledWith('/login'))
    uninstall()
  })

  it('stops listening after uninstall', async () => {
    window.history.pushState({}, '', '/history')
    const uninstall = installPageGuard()
    uninstall()

    document.dispatchEvent(new Event('DOMContentLoaded'))
    await Promise.resolve()
    expect(redirect).not.toHaveBeenCalled()
  })

  it('does nothing on an open page', async () => {
    window.history.pushState({}, '', '/')
    const uninstall = installPageGuard()

    document.dispatchEvent(new Event('DOMContentLoaded'))
    await Promise.resolve()
    expect(redirect).not.toHaveBeenCalled()
    uninstall()
  })
})
