/**
 * HTTP client for the advisor API.
 */

import { ApiError, AuthenticationError, NetworkError } from './errors'
import { removeToken } from '../state/authStore'
import { logger } from '../utils/logger'

const API_BASE = import.meta.env.VITE_API_URL ?? ''

export type FormFields = Record<string, string | number>

interface ErrorBody {
  detail?: unknown
  error?: unknown
}

function authHeaders(token?: string): Record<string, string> {
  return token ? { Authorization: `Bearer ${token}` } : {}
}

function describeError(body: ErrorBody, fallback: string): string {
  const { detail, error } = body
  if (typeof detail === 'string' && detail) return detail
  if (detail !== undefined && detail !== null) return JSON.stringify(detail)
  if (typeof error === 'string' && error) return error
  return fallback
}

async function send<T>(path: string, init: RequestInit): Promise<T> {
  let res: Response
  try {
    res = await fetch(`${API_BASE}${path}`, init)
  } catch (err) {
    logger.error(`Request to ${path} failed:`, err)
    throw new NetworkError('Unable to reach the server. Please try again.')
  }

  if (!res.ok) {
    const body: ErrorBody = await res.json().catch(() => ({}))
    const message = describeError(body, res.statusText || `HTTP ${res.status}`)
    if (res.status === 401) {
      logger.warn('401 Unauthorized - clearing stored token')
      removeToken()
      throw new AuthenticationError(message, body)
    }
    throw new ApiError(message, res.status, body)
  }
  return res.json()
}

export async function get<T>(path: string, token?: string): Promise<T> {
  return send<T>(path, { headers: authHeaders(token), cache: 'no-store' })
}

export async function post<T>(path: string, body: unknown, token?: string): Promise<T> {
  return send<T>(path, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', ...authHeaders(token) },
    body: JSON.stringify(body),
  })
}

/** POST as `application/x-www-form-urlencoded`, the encoding form endpoints expect. */
export async function postForm<T>(path: string, fields: FormFields, token?: string): Promise<T> {
  const body = new URLSearchParams()
  for (const [name, value] of Object.entries(fields)) {
    body.append(name, String(value))
  }
  return send<T>(path, {
    method: 'POST',
    headers: authHeaders(token),
    body,
  })
}
