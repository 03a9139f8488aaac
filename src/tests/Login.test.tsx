import { describe, it, expect, vi, beforeEach } from 'vitest'
import { render, screen, fireEvent, waitFor } from '@testing-library/react'
import { MemoryRouter, Routes, Route } from 'react-router-dom'
import Login from '../pages/Login'
import { login } from '../api/auth'
import { ApiError } from '../api/errors'
import { getToken } from '../state/authStore'

vi.mock('../api/auth', () => ({
  login: vi.fn(),
}))

function renderLogin(state?: unknown) {
  return render(
    <MemoryRouter initialEntries={[{ pathname: '/login', state }]}>
      <Routes>
        <Route path="/login" element={<Login />} />
        <Route path="/dashboard" element={<div>Dashboard Page</div>} />
        <Route path="/history" element={<div>History Page</div>} />
      </Routes>
    </MemoryRouter>,
  )
}

function fillAndSubmit() {
  fireEvent.change(screen.getByLabelText(/email/i), { target: { value: 'user@example.com' } })
  fireEvent.change(screen.getByLabelText(/^password$/i), { target: { value: 'test-password' } })
  fireEvent.click(screen.getByRole('button', { name: /sign in/i }))
}

describe('Login', () => {
  beforeEach(() => {
    vi.mocked(login).mockReset()
  })

  it('renders login form', () => {
    renderLogin()
    expect(screen.getByRole('heading', { name: /sign in/i })).toBeInTheDocument()
    expect(screen.getByLabelText(/email/i)).toBeInTheDocument()
    expect(screen.getByLabelText(/^password$/i)).toBeInTheDocument()
  })

  it('stores the token and opens the dashboard', async () => {
    vi.mocked(login).mockResolvedValue({ access_token: 'test-token', token_type: 'bearer' })
    renderLogin()
    fillAndSubmit()

    await screen.findByText('Dashboard Page')
    expect(login).toHaveBeenCalledWith({ email: 'user@example.com', password: 'test-password' })
    expect(getToken()).toBe('test-token')
  })

  it('returns to the page that required login', async () => {
    vi.mocked(login).mockResolvedValue({ access_token: 'test-token', token_type: 'bearer' })
    renderLogin({ from: { pathname: '/history' } })
    fillAndSubmit()

    await screen.findByText('History Page')
  })

  it('shows the server error and stores nothing', async () => {
    vi.mocked(login).mockRejectedValue(new ApiError('Incorrect email or password', 401))
    renderLogin()
    fillAndSubmit()

    expect(await screen.findByRole('alert')).toHaveTextContent('Incorrect email or password')
    expect(getToken()).toBeNull()
    await waitFor(() => expect(screen.getByRole('button', { name: /sign in/i })).toBeEnabled())
  })
})
