import { useEffect, useState } from 'react'
import { getHealth, type HealthStatus } from '../api/analysis'
import { getErrorMessage } from '../api/errors'
import { logger } from '../utils/logger'

export function BackendStatus() {
  const [health, setHealth] = useState<HealthStatus | null>(null)
  const [error, setError] = useState<string | null>(null)

  useEffect(() => {
    let active = true
    getHealth()
      .then((status) => {
        if (active) setHealth(status)
      })
      .catch((err: unknown) => {
        logger.warn('Health check failed:', err)
        if (active) setError(getErrorMessage(err, 'Service unavailable'))
      })
    return () => {
      active = false
    }
  }, [])

  if (error) {
    return (
      <div className="flex-center gap-sm" role="status">
        <span className="status-dot status-dot-danger" />
        <span className="text-secondary text-sm">Service offline: {error}</span>
      </div>
    )
  }

  if (!health) {
    return (
      <div className="flex-center gap-sm" role="status">
        <span className="status-dot status-dot-offline" />
        <span className="text-muted text-sm">Checking service…</span>
      </div>
    )
  }

  const ready = health.ml_system === 'loaded'
  return (
    <div className="flex-center gap-sm" role="status">
      <span className={`status-dot ${ready ? 'status-dot-success' : 'status-dot-warning'}`} />
      <span className="text-secondary text-sm">
        {ready ? 'Advisor ready' : 'Advisor is still loading, try again in a moment'}
      </span>
    </div>
  )
}
