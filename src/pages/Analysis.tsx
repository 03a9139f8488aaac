import { useState } from 'react'
import { Link } from 'react-router-dom'
import type { AnalysisOutcome } from '../api/analysis'
import { AnalysisForm } from '../components/AnalysisForm'
import { AnalysisResultCard } from '../components/AnalysisResultCard'

export default function Analysis() {
  const [outcome, setOutcome] = useState<AnalysisOutcome | null>(null)

  return (
    <div className="page-container animate-in">
      <div className="page-header">
        <h1 className="heading-lg">New Analysis</h1>
        <p className="text-secondary mt-2">
          Tell us about today and we&apos;ll suggest relief options and predict your next period.
        </p>
      </div>

      <AnalysisForm onAnalyzed={setOutcome} />

      {outcome && (
        <>
          <AnalysisResultCard result={outcome.analysis} />
          <p className="text-muted text-xs">
            Analysis {outcome.analysisId} · saved to <Link to="/history">your history</Link>
          </p>
        </>
      )}
    </div>
  )
}
