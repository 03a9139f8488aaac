/**
 * Application-wide constants.
 */

/** localStorage key holding the access token. */
export const TOKEN_KEY = 'access_token'

export const LOGIN_PATH = '/login'

/** Paths that require a stored token on page load. */
export const PROTECTED_PATHS = ['/dashboard', '/analysis', '/history'] as const

export const ALERT_DISMISS_MS = 5000

export const CYCLE_PHASES = [
  { value: 'menstrual', label: 'Menstrual' },
  { value: 'follicular', label: 'Follicular' },
  { value: 'ovulatory', label: 'Ovulatory' },
  { value: 'luteal', label: 'Luteal' },
] as const

export type CyclePhase = (typeof CYCLE_PHASES)[number]['value']

export const FLOW_INTENSITIES = ['light', 'moderate', 'heavy'] as const

export type FlowIntensity = (typeof FLOW_INTENSITIES)[number]

export const SYMPTOM_LEVELS = ['Low', 'Medium', 'High', 'Very High'] as const

export type SymptomLevel = (typeof SYMPTOM_LEVELS)[number]

export const CONTRACEPTION_TYPES = ['None', 'Pill', 'IUD', 'Implant', 'Injection', 'Other'] as const
