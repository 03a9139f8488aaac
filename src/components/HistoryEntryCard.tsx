import type { AnalysisHistoryEntry } from '../api/analysis'

interface HistoryEntryCardProps {
  entry: AnalysisHistoryEntry
}

function formatDate(iso: string): string {
  const d = new Date(iso)
  const now = new Date()
  if (now.toDateString() === d.toDateString()) {
    return `Today ${d.toLocaleTimeString([], { hour: '2-digit', minute: '2-digit' })}`
  }
  return d.toLocaleDateString(undefined, {
    month: 'short',
    day: 'numeric',
    hour: '2-digit',
    minute: '2-digit',
  })
}

function getPainClass(score: number): string {
  if (score >= 6) return 'pain-score-high'
  if (score >= 3) return 'pain-score-mid'
  return 'pain-score-low'
}

export function HistoryEntryCard({ entry }: HistoryEntryCardProps) {
  const { user_data: input, analysis } = entry
  const symptoms = analysis.knowledge_graph_recommendations.symptoms_identified

  return (
    <article className="card card-hover mb-3" aria-label={`Analysis ${entry.id}`}>
      <div className="flex-between mb-3" style={{ flexWrap: 'wrap', gap: '4px' }}>
        <div className="flex-center gap-sm">
          <span className={`pain-score-badge ${getPainClass(input.pain_nrs)}`} title="Pain level">
            {input.pain_nrs}
          </span>
          <span className="heading-sm">{input.phase} phase · day {input.day_in_cycle}</span>
        </div>
        <span className="text-muted text-xs">{formatDate(entry.timestamp)}</span>
      </div>

      <p className="text-secondary text-sm mb-2">
        Next period in {analysis.predictions.next_period_in_days} days
      </p>

      {symptoms.length > 0 && (
        <div className="flex-center gap-xs" style={{ flexWrap: 'wrap', justifyContent: 'flex-start' }}>
          {symptoms.map((s) => (
            <span key={s} className="badge">
              {s.replace(/_/g, ' ')}
            </span>
          ))}
        </div>
      )}
    </article>
  )
}
