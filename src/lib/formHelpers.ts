/**
 * DOM helpers for form submit buttons and alert banners.
 *
 * These work on plain elements so they can be used from React refs as well
 * as from server-rendered markup.
 */

import { ALERT_DISMISS_MS } from '../constants'

const ORIGINAL_TEXT_ATTR = 'data-original-text'
const LOADING_MARKUP = '<i class="fas fa-spinner fa-spin"></i> Loading...'

export const ALERT_TYPES = [
  'primary',
  'secondary',
  'success',
  'danger',
  'warning',
  'info',
  'light',
  'dark',
] as const

export type AlertType = (typeof ALERT_TYPES)[number]

export interface AlertOptions {
  /** Element the alert is prepended to. Defaults to the first `.container`, then `document.body`. */
  container?: HTMLElement
  /** Milliseconds before the alert removes itself. */
  timeoutMs?: number
}

export function showLoading(button: HTMLButtonElement): void {
  button.setAttribute(ORIGINAL_TEXT_ATTR, button.innerHTML)
  button.disabled = true
  button.innerHTML = LOADING_MARKUP
}

export function hideLoading(button: HTMLButtonElement): void {
  button.disabled = false
  const originalText = button.getAttribute(ORIGINAL_TEXT_ATTR)
  if (originalText !== null) {
    button.innerHTML = originalText
    button.removeAttribute(ORIGINAL_TEXT_ATTR)
  }
}

function findAlertContainer(): HTMLElement {
  return document.querySelector<HTMLElement>('.container') ?? document.body
}

export function showAlert(
  message: string,
  type: AlertType = 'info',
  options: AlertOptions = {},
): HTMLDivElement {
  const alertDiv = document.createElement('div')
  alertDiv.className = `alert alert-${type} alert-dismissible fade show`
  alertDiv.setAttribute('role', 'alert')
  alertDiv.append(document.createTextNode(message))

  const closeButton = document.createElement('button')
  closeButton.type = 'button'
  closeButton.className = 'btn-close'
  closeButton.setAttribute('data-bs-dismiss', 'alert')
  closeButton.setAttribute('aria-label', 'Close')
  closeButton.addEventListener('click', () => alertDiv.remove())
  alertDiv.append(closeButton)

  const container = options.container ?? findAlertContainer()
  container.insertBefore(alertDiv, container.firstChild)

  setTimeout(() => {
    if (alertDiv.parentNode) {
      alertDiv.remove()
    }
  }, options.timeoutMs ?? ALERT_DISMISS_MS)

  return alertDiv
}
