import type { AnalysisResult } from '../api/analysis'

interface AnalysisResultCardProps {
  result: AnalysisResult
}

function humanize(value: string): string {
  return value.replace(/_/g, ' ')
}

function RecommendationList({ title, items }: { title: string; items?: string[] }) {
  if (!items || items.length === 0) return null
  return (
    <div className="mb-4">
      <h4 className="heading-xs mb-2">{title}</h4>
      <ul className="flex-col gap-xs">
        {items.map((item) => (
          <li key={item} className="text-sm">
            {humanize(item)}
          </li>
        ))}
      </ul>
    </div>
  )
}

export function AnalysisResultCard({ result }: AnalysisResultCardProps) {
  const kg = result.knowledge_graph_recommendations
  const { predictions } = result

  return (
    <section className="card mb-6" aria-labelledby="analysis-result-title">
      <h3 id="analysis-result-title" className="heading-sm mb-4">Your recommendations</h3>

      <div className="grid-2 mb-4">
        <div className="stat">
          <span className="text-muted text-xs">Next period in</span>
          <strong className="heading-md">{predictions.next_period_in_days} days</strong>
        </div>
        <div className="stat">
          <span className="text-muted text-xs">Predicted phase</span>
          <strong className="heading-md">{predictions.predicted_phase}</strong>
        </div>
      </div>

      {kg.risk_alerts && kg.risk_alerts.length > 0 && (
        <div className="alert alert-warning mb-4">
          {kg.risk_alerts.map((risk) => (
            <p key={risk}>{risk}</p>
          ))}
        </div>
      )}

      <RecommendationList title="Symptoms addressed" items={kg.symptoms_identified} />
      <RecommendationList title="Medication options" items={kg.medications} />
      <RecommendationList title="Hygiene products" items={kg.hygiene_products} />
      <RecommendationList title="Lifestyle tips" items={kg.lifestyle_tips} />
      <RecommendationList title="Phase insights" items={kg.phase_specific} />

      <details>
        <summary className="text-secondary text-sm">Full advice</summary>
        <p className="advice-text text-sm mt-2">{result.advice}</p>
      </details>

      <div className="flex-center gap-xs mt-3" style={{ justifyContent: 'flex-start' }}>
        {result.kg_used && <span className="badge badge-info">Knowledge graph</span>}
        {result.llm_used && <span className="badge badge-info">Language model</span>}
      </div>
    </section>
  )
}
