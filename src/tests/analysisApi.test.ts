import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import {
  analyzeHealthData,
  DEFAULT_ANALYSIS_INPUT,
  getAnalysisHistory,
  getHealth,
} from '../api/analysis'
import { ApiError } from '../api/errors'
import { setToken } from '../state/authStore'
import { historyEntry, sampleResult } from './fixtures'

function jsonResponse(body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
  })
}

describe('analysis API', () => {
  const fetchMock = vi.fn<typeof fetch>()

  beforeEach(() => {
    fetchMock.mockReset()
    vi.stubGlobal('fetch', fetchMock)
  })

  afterEach(() => {
    vi.unstubAllGlobals()
  })

  it('posts every field of the input as a form', async () => {
    setToken('test-token')
    fetchMock.mockResolvedValue(
      jsonResponse({
        success: true,
        analysis: sampleResult,
        analysis_id: 'a1b2c3d4',
        timestamp: '2026-01-01T09:00:00Z',
        ml_system_used: true,
        llm_used: false,
      }),
    )

    const outcome = await analyzeHealthData({
      ...DEFAULT_ANALYSIS_INPUT,
      phase: 'luteal',
      pain_level: 7,
      flow_intensity: 'heavy',
    })

    const [url, init] = fetchMock.mock.calls[0]
    expect(url).toBe('/api/analyze')
    expect(init?.headers).toEqual({ Authorization: 'Bearer test-token' })
    const body = new URLSearchParams(String(init?.body))
    expect(Object.fromEntries(body)).toEqual({
      phase: 'luteal',
      pain_level: '7',
      flow_intensity: 'heavy',
      mood: 'N/A',
      sleep_hours: '7',
      fatigue: 'Medium',
      headaches: 'Medium',
      bloating: 'Medium',
      day_in_cycle: '15',
      age: '25',
      contraception_type: 'None',
    })

    expect(outcome).toEqual({
      analysis: sampleResult,
      analysisId: 'a1b2c3d4',
      timestamp: '2026-01-01T09:00:00Z',
      llmUsed: false,
    })
  })

  it('takes llmUsed from the analysis when the envelope omits it', async () => {
    fetchMock.mockResolvedValue(
      jsonResponse({
        success: true,
        analysis: { ...sampleResult, llm_used: true },
        analysis_id: 'ffff0000',
        timestamp: '2026-01-02T09:00:00Z',
      }),
    )

    const outcome = await analyzeHealthData(DEFAULT_ANALYSIS_INPUT)
    expect(outcome.llmUsed).toBe(true)
  })

  it('sends no Authorization header when signed out', async () => {
    fetchMock.mockResolvedValue(
      jsonResponse({ success: true, analysis: sampleResult, analysis_id: 'x', timestamp: 't' }),
    )

    await analyzeHealthData(DEFAULT_ANALYSIS_INPUT)
    expect(fetchMock.mock.calls[0][1]?.headers).toEqual({})
  })

  it('turns a success:false reply into an ApiError', async () => {
    fetchMock.mockResolvedValue(
      jsonResponse({ success: false, error: 'System still loading. Please try again in a moment.' }),
    )

    const error = await analyzeHealthData(DEFAULT_ANALYSIS_INPUT).catch((err: unknown) => err)
    expect(error).toBeInstanceOf(ApiError)
    expect(error).toMatchObject({
      message: 'System still loading. Please try again in a moment.',
      statusCode: 200,
    })
  })

  it('keeps the failure detail', async () => {
    fetchMock.mockResolvedValue(
      jsonResponse({ success: false, error: 'Analysis failed', detail: 'bad phase' }),
    )

    await expect(analyzeHealthData(DEFAULT_ANALYSIS_INPUT)).rejects.toMatchObject({
      message: 'Analysis failed',
      details: 'bad phase',
    })
  })

  it('maps the history envelope', async () => {
    const entries = [historyEntry('aaaa1111'), historyEntry('bbbb2222')]
    fetchMock.mockResolvedValue(jsonResponse({ success: true, history: entries, total_analyses: 14 }))

    await expect(getAnalysisHistory()).resolves.toEqual({ history: entries, total: 14 })
    expect(fetchMock.mock.calls[0][0]).toBe('/api/analysis/history')
  })

  it('reads the service health', async () => {
    const health = { status: 'healthy', timestamp: '2026-01-01T09:00:00', ml_system: 'loaded' }
    fetchMock.mockResolvedValue(jsonResponse(health))

    await expect(getHealth()).resolves.toEqual(health)
    expect(fetchMock.mock.calls[0][0]).toBe('/health')
  })
})
