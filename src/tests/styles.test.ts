import { describe, it, expect } from 'vitest'
import css from '../index.css?raw'
import { ALERT_TYPES } from '../lib/formHelpers'

describe('stylesheet', () => {
  it.each(ALERT_TYPES)('styles the %s alert', (type) => {
    expect(css).toContain(`.alert-${type}`)
  })

  it('draws and spins the loading icon', () => {
    expect(css).toMatch(/\.fa-spinner \{[^}]*border-radius: 50%/)
    expect(css).toMatch(/\.fa-spin \{ animation: spin /)
    expect(css).toContain('@keyframes spin')
  })
})
