import { useEffect, useState } from 'react'
import { getAnalysisHistory, type AnalysisHistoryEntry } from '../api/analysis'
import { getErrorMessage, isAuthError } from '../api/errors'
import { redirectToLogin } from '../state/authStore'
import { HistoryEntryCard } from '../components/HistoryEntryCard'
import { logger } from '../utils/logger'

export default function History() {
  const [entries, setEntries] = useState<AnalysisHistoryEntry[]>([])
  const [total, setTotal] = useState(0)
  const [loading, setLoading] = useState(true)
  const [loadError, setLoadError] = useState<string | null>(null)

  useEffect(() => {
    let active = true

    async function load() {
      try {
        const data = await getAnalysisHistory()
        if (!active) return
        setEntries([...data.history].reverse())
        setTotal(data.total)
      } catch (err) {
        logger.error('Failed to load analysis history:', err)
        if (isAuthError(err)) {
          redirectToLogin()
          return
        }
        if (active) setLoadError(getErrorMessage(err, 'Failed to load history'))
      } finally {
        if (active) setLoading(false)
      }
    }

    void load()
    return () => {
      active = false
    }
  }, [])

  if (loading) {
    return (
      <div className="page-container animate-in">
        <h1 className="heading-lg">Analysis History</h1>
        <div className="card loading-shimmer skeleton-card mt-6" aria-busy="true" />
      </div>
    )
  }

  return (
    <div className="page-container animate-in">
      <h1 className="heading-lg mb-2">Analysis History</h1>
      <p className="text-secondary text-sm mb-6">
        Showing {entries.length} of {total} analyses
      </p>

      {loadError && (
        <div className="alert alert-danger mb-6" role="alert">
          {loadError}
        </div>
      )}

      {entries.length === 0 && !loadError ? (
        <div className="card">
          <p className="text-muted text-sm text-center">No analyses yet.</p>
        </div>
      ) : (
        <div className="flex-col gap-sm">
          {entries.map((entry) => (
            <HistoryEntryCard key={entry.id} entry={entry} />
          ))}
        </div>
      )}
    </div>
  )
}
