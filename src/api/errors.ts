/**
 * Error types raised by the API client.
 */

export class ApiError extends Error {
  constructor(
    message: string,
    public statusCode: number,
    public details?: unknown,
  ) {
    super(message)
    this.name = 'ApiError'
  }
}

/** The API refused the request because the token is missing or no longer valid. */
export class AuthenticationError extends ApiError {
  constructor(message = 'Authentication required', details?: unknown) {
    super(message, 401, details)
    this.name = 'AuthenticationError'
  }
}

export class NetworkError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'NetworkError'
  }
}

/** Turns anything thrown into text fit for an alert. */
export function getErrorMessage(error: unknown, fallback = 'An unexpected error occurred'): string {
  if (error instanceof NetworkError) {
    return 'Network connection failed. Please check your internet connection.'
  }
  if (error instanceof Error && error.message) {
    return error.message
  }
  if (typeof error === 'string' && error) {
    return error
  }
  return fallback
}

/** True when the API rejected the stored token. */
export function isAuthError(error: unknown): boolean {
  return error instanceof ApiError && error.statusCode === 401
}
