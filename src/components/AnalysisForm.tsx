import { useRef, useState } from 'react'
import {
  analyzeHealthData,
  DEFAULT_ANALYSIS_INPUT,
  type AnalysisInput,
  type AnalysisOutcome,
} from '../api/analysis'
import { getErrorMessage } from '../api/errors'
import { hideLoading, showAlert, showLoading } from '../lib/formHelpers'
import { logger } from '../utils/logger'
import {
  CONTRACEPTION_TYPES,
  CYCLE_PHASES,
  FLOW_INTENSITIES,
  SYMPTOM_LEVELS,
  type SymptomLevel,
} from '../constants'

interface AnalysisFormProps {
  onAnalyzed: (outcome: AnalysisOutcome) => void
}

/** Returns the first problem with the input, or null when it can be sent. */
export function validateAnalysisInput(input: AnalysisInput): string | null {
  if (!Number.isInteger(input.pain_level) || input.pain_level < 0 || input.pain_level > 10) {
    return 'Pain level must be a whole number from 0 to 10.'
  }
  if (!Number.isInteger(input.day_in_cycle) || input.day_in_cycle < 1 || input.day_in_cycle > 40) {
    return 'Day in cycle must be a whole number from 1 to 40.'
  }
  if (!(input.sleep_hours >= 0 && input.sleep_hours <= 24)) {
    return 'Sleep hours must be between 0 and 24.'
  }
  if (!Number.isInteger(input.age) || input.age < 8 || input.age > 70) {
    return 'Age must be a whole number from 8 to 70.'
  }
  return null
}

function pick<T extends string>(options: readonly T[], value: string, fallback: T): T {
  return options.find((option) => option === value) ?? fallback
}

const SYMPTOM_FIELDS = [
  { key: 'fatigue', label: 'Fatigue' },
  { key: 'headaches', label: 'Headaches' },
  { key: 'bloating', label: 'Bloating' },
] as const

export function AnalysisForm({ onAnalyzed }: AnalysisFormProps) {
  const [input, setInput] = useState<AnalysisInput>(DEFAULT_ANALYSIS_INPUT)
  const submitRef = useRef<HTMLButtonElement>(null)

  function update<K extends keyof AnalysisInput>(key: K, value: AnalysisInput[K]) {
    setInput((prev) => ({ ...prev, [key]: value }))
  }

  function setSymptom(key: (typeof SYMPTOM_FIELDS)[number]['key'], value: string) {
    update(key, pick<SymptomLevel>(SYMPTOM_LEVELS, value, 'Medium'))
  }

  async function handleSubmit(e: React.FormEvent) {
    e.preventDefault()
    const problem = validateAnalysisInput(input)
    if (problem) {
      showAlert(problem, 'warning')
      return
    }

    const button = submitRef.current
    if (button) showLoading(button)
    try {
      const outcome = await analyzeHealthData({ ...input, mood: input.mood.trim() || 'N/A' })
      onAnalyzed(outcome)
      showAlert('Analysis complete.', 'success')
    } catch (err) {
      logger.error('Analysis request failed:', err)
      showAlert(getErrorMessage(err, 'Analysis failed'), 'danger')
    } finally {
      if (button) hideLoading(button)
    }
  }

  return (
    <form onSubmit={handleSubmit} className="card mb-6" aria-label="Cycle analysis">
      <h3 className="heading-sm mb-4">How is your cycle going?</h3>
      <div className="divider mb-4" />

      <div className="grid-2 gap-md">
        <div className="input-group">
          <label htmlFor="analysis-phase">Current phase</label>
          <select
            id="analysis-phase"
            className="input"
            value={input.phase}
            onChange={(e) =>
              update('phase', CYCLE_PHASES.find((p) => p.value === e.target.value)?.value ?? 'menstrual')
            }
          >
            {CYCLE_PHASES.map((p) => (
              <option key={p.value} value={p.value}>
                {p.label}
              </option>
            ))}
          </select>
        </div>

        <div className="input-group">
          <label htmlFor="analysis-day">Day in cycle</label>
          <input
            id="analysis-day"
            type="number"
            className="input"
            min={1}
            max={40}
            value={input.day_in_cycle}
            onChange={(e) => update('day_in_cycle', Number(e.target.value))}
          />
        </div>

        <div className="input-group">
          <label htmlFor="analysis-pain">Pain level (0-10)</label>
          <input
            id="analysis-pain"
            type="number"
            className="input"
            min={0}
            max={10}
            value={input.pain_level}
            onChange={(e) => update('pain_level', Number(e.target.value))}
          />
        </div>

        <div className="input-group">
          <label htmlFor="analysis-flow">Flow intensity</label>
          <select
            id="analysis-flow"
            className="input"
            value={input.flow_intensity}
            onChange={(e) => update('flow_intensity', pick(FLOW_INTENSITIES, e.target.value, 'moderate'))}
          >
            {FLOW_INTENSITIES.map((f) => (
              <option key={f} value={f}>
                {f}
              </option>
            ))}
          </select>
        </div>

        {SYMPTOM_FIELDS.map(({ key, label }) => (
          <div key={key} className="input-group">
            <label htmlFor={`analysis-${key}`}>{label}</label>
            <select
              id={`analysis-${key}`}
              className="input"
              value={input[key]}
              onChange={(e) => setSymptom(key, e.target.value)}
            >
              {SYMPTOM_LEVELS.map((level) => (
                <option key={level} value={level}>
                  {level}
                </option>
              ))}
            </select>
          </div>
        ))}

        <div className="input-group">
          <label htmlFor="analysis-sleep">Sleep (hours)</label>
          <input
            id="analysis-sleep"
            type="number"
            className="input"
            min={0}
            max={24}
            step={0.5}
            value={input.sleep_hours}
            onChange={(e) => update('sleep_hours', Number(e.target.value))}
          />
        </div>

        <div className="input-group">
          <label htmlFor="analysis-age">Age</label>
          <input
            id="analysis-age"
            type="number"
            className="input"
            min={8}
            max={70}
            value={input.age}
            onChange={(e) => update('age', Number(e.target.value))}
          />
        </div>

        <div className="input-group">
          <label htmlFor="analysis-contraception">Contraception</label>
          <select
            id="analysis-contraception"
            className="input"
            value={input.contraception_type}
            onChange={(e) => update('contraception_type', e.target.value)}
          >
            {CONTRACEPTION_TYPES.map((c) => (
              <option key={c} value={c}>
                {c}
              </option>
            ))}
          </select>
        </div>
      </div>

      <div className="input-group mt-4">
        <label htmlFor="analysis-mood">Mood (optional)</label>
        <input
          id="analysis-mood"
          type="text"
          className="input"
          value={input.mood === 'N/A' ? '' : input.mood}
          onChange={(e) => update('mood', e.target.value)}
          placeholder="calm, irritable, tired..."
        />
      </div>

      {/* Label is static: showLoading swaps the markup while a request runs. */}
      <button ref={submitRef} type="submit" className="btn btn-primary mt-4">
        Analyze
      </button>
    </form>
  )
}
