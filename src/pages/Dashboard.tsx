import { useEffect, useState } from 'react'
import { Link } from 'react-router-dom'
import { getAnalysisHistory, type AnalysisHistoryEntry } from '../api/analysis'
import { getErrorMessage, isAuthError } from '../api/errors'
import { redirectToLogin } from '../state/authStore'
import { HistoryEntryCard } from '../components/HistoryEntryCard'
import { BackendStatus } from '../components/BackendStatus'
import { logger } from '../utils/logger'

const RECENT_LIMIT = 3

export default function Dashboard() {
  const [recent, setRecent] = useState<AnalysisHistoryEntry[]>([])
  const [total, setTotal] = useState(0)
  const [loading, setLoading] = useState(true)
  const [loadError, setLoadError] = useState<string | null>(null)

  useEffect(() => {
    let active = true
    getAnalysisHistory()
      .then((data) => {
        if (!active) return
        setRecent(data.history.slice(-RECENT_LIMIT).reverse())
        setTotal(data.total)
      })
      .catch((err: unknown) => {
        logger.error('Failed to load dashboard:', err)
        if (isAuthError(err)) {
          redirectToLogin()
          return
        }
        if (active) setLoadError(getErrorMessage(err, 'Failed to load dashboard'))
      })
      .finally(() => {
        if (active) setLoading(false)
      })
    return () => {
      active = false
    }
  }, [])

  if (loading) {
    return (
      <div className="page-container animate-in">
        <div className="loading-shimmer skeleton-heading mb-4" />
        <div className="grid-2 mb-8">
          <div className="card loading-shimmer skeleton-card" />
          <div className="card loading-shimmer skeleton-card" />
        </div>
      </div>
    )
  }

  const latest = recent[0]

  return (
    <div className="page-container">
      <div className="page-header animate-in">
        <h1 className="heading-xl">Dashboard</h1>
        <div className="mt-2">
          <BackendStatus />
        </div>
      </div>

      {loadError && (
        <div className="alert alert-danger animate-in mb-6" role="alert">
          {loadError}
        </div>
      )}

      <div className="grid-2 mb-6">
        <section className="card stat">
          <span className="text-muted text-xs">Analyses recorded</span>
          <strong className="heading-lg" data-testid="total-analyses">{total}</strong>
        </section>
        <section className="card stat">
          <span className="text-muted text-xs">Next period</span>
          <strong className="heading-lg" data-testid="next-period">
            {latest ? `in ${latest.analysis.predictions.next_period_in_days} days` : '—'}
          </strong>
        </section>
      </div>

      <section className="card mb-6">
        <div className="flex-between mb-4">
          <h2 className="heading-md">Recent analyses</h2>
          <Link to="/analysis" className="btn btn-primary btn-sm">New analysis</Link>
        </div>
        {recent.length === 0 ? (
          <p className="text-muted text-sm">No analyses yet. Start your first one.</p>
        ) : (
          <div className="flex-col gap-sm">
            {recent.map((entry) => (
              <HistoryEntryCard key={entry.id} entry={entry} />
            ))}
          </div>
        )}
        {total > recent.length && (
          <Link to="/history" className="text-sm">See all history</Link>
        )}
      </section>
    </div>
  )
}
