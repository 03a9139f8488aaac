import type { AnalysisHistoryEntry, AnalysisResult } from '../api/analysis'

export const sampleResult: AnalysisResult = {
  advice: 'Based on your symptoms and menstrual phase, here are personalized recommendations:',
  knowledge_graph_recommendations: {
    medications: ['ibuprofen', 'naproxen'],
    hygiene_products: ['menstrual_cup'],
    lifestyle_tips: ['For cramps: relieved_by with exercise'],
    phase_specific: ['During menstrual phase: cramps'],
    risk_alerts: [],
    symptoms_identified: ['cramps', 'fatigue'],
  },
  symptoms_identified: ['cramps', 'fatigue'],
  predictions: {
    next_period_in_days: 26,
    predicted_phase: 'menstrual',
  },
  llm_used: false,
  kg_used: true,
}

export function historyEntry(id: string, overrides: Partial<AnalysisHistoryEntry> = {}): AnalysisHistoryEntry {
  return {
    id,
    user_data: {
      age: 25,
      phase: 'menstrual',
      pain_nrs: 6,
      flow_intensity: 'heavy',
      contraception_type: 'None',
      mood: 'N/A',
      sleep_hours: 7,
      fatigue: 'High',
      headaches: 'Low',
      bloating: 'Low',
      day_in_cycle: 2,
    },
    analysis: sampleResult,
    timestamp: '2026-01-01T09:00:00Z',
    ...overrides,
  }
}
