/**
 * Cycle analysis API client.
 */

import { get, postForm } from './http'
import { ApiError } from './errors'
import { getToken } from '../state/authStore'
import type { CyclePhase, FlowIntensity, SymptomLevel } from '../constants'

export interface AnalysisInput {
  phase: CyclePhase
  pain_level: number
  flow_intensity: FlowIntensity
  mood: string
  sleep_hours: number
  fatigue: SymptomLevel
  headaches: SymptomLevel
  bloating: SymptomLevel
  day_in_cycle: number
  age: number
  contraception_type: string
}

export const DEFAULT_ANALYSIS_INPUT: AnalysisInput = {
  phase: 'menstrual',
  pain_level: 0,
  flow_intensity: 'moderate',
  mood: 'N/A',
  sleep_hours: 7,
  fatigue: 'Medium',
  headaches: 'Medium',
  bloating: 'Medium',
  day_in_cycle: 15,
  age: 25,
  contraception_type: 'None',
}

export interface KnowledgeGraphRecommendations {
  medications: string[]
  hygiene_products: string[]
  lifestyle_tips: string[]
  phase_specific?: string[]
  risk_alerts?: string[]
  symptoms_identified: string[]
}

export interface CyclePredictions {
  next_period_in_days: number
  predicted_phase: string
}

export interface AnalysisResult {
  advice: string
  knowledge_graph_recommendations: KnowledgeGraphRecommendations
  symptoms_identified?: string[]
  predictions: CyclePredictions
  llm_used: boolean
  kg_used: boolean
}

/** Input as the server records it; the pain level is stored as `pain_nrs`. */
export interface RecordedInput extends Omit<AnalysisInput, 'pain_level'> {
  pain_nrs: number
}

export interface AnalysisHistoryEntry {
  id: string
  user_data: RecordedInput
  analysis: AnalysisResult
  timestamp: string
}

export interface AnalysisHistory {
  history: AnalysisHistoryEntry[]
  total: number
}

export interface AnalysisOutcome {
  analysis: AnalysisResult
  analysisId: string
  timestamp: string
  llmUsed: boolean
}

export interface HealthStatus {
  status: string
  timestamp: string
  ml_system: 'loaded' | 'loading'
}

interface AnalyzeSuccess {
  success: true
  analysis: AnalysisResult
  analysis_id: string
  timestamp: string
  llm_used?: boolean
}

interface AnalyzeFailure {
  success: false
  error: string
  detail?: string
}

interface HistoryResponse {
  success: boolean
  history: AnalysisHistoryEntry[]
  total_analyses: number
}

export async function analyzeHealthData(input: AnalysisInput): Promise<AnalysisOutcome> {
  const res = await postForm<AnalyzeSuccess | AnalyzeFailure>(
    '/api/analyze',
    { ...input },
    getToken() ?? undefined,
  )
  if (!res.success) {
    throw new ApiError(res.error, 200, res.detail)
  }
  return {
    analysis: res.analysis,
    analysisId: res.analysis_id,
    timestamp: res.timestamp,
    llmUsed: res.llm_used ?? res.analysis.llm_used,
  }
}

/** The server returns its ten most recent analyses, oldest first. */
export async function getAnalysisHistory(): Promise<AnalysisHistory> {
  const res = await get<HistoryResponse>('/api/analysis/history', getToken() ?? undefined)
  return { history: res.history, total: res.total_analyses }
}

export async function getHealth(): Promise<HealthStatus> {
  return get<HealthStatus>('/health')
}
