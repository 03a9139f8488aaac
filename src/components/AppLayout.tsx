import { Link, useNavigate, useLocation } from 'react-router-dom'
import { isAuthenticated, removeToken } from '../state/authStore'
import { LOGIN_PATH } from '../constants'

interface AppLayoutProps {
  children: React.ReactNode
}

export function AppLayout({ children }: AppLayoutProps) {
  const navigate = useNavigate()
  const location = useLocation()
  const authenticated = isAuthenticated()

  function handleLogout() {
    removeToken()
    navigate(LOGIN_PATH, { replace: true })
  }

  function navClass(path: string) {
    const isActive =
      path === '/' ? location.pathname === '/' : location.pathname.startsWith(path)
    return `nav-link${isActive ? ' active' : ''}`
  }

  return (
    <div className="app-container">
      <header className="app-header">
        <Link to="/" className="brand-logo-link" aria-label="Cycle Advisor home">
          <span className="brand-logo">Cycle Advisor</span>
        </Link>

        <nav className="flex-center gap-sm">
          {authenticated ? (
            <>
              <Link to="/dashboard" className={navClass('/dashboard')}>
                Dashboard
              </Link>
              <Link to="/analysis" className={navClass('/analysis')}>
                New Analysis
              </Link>
              <Link to="/history" className={navClass('/history')}>
                History
              </Link>
              <button
                type="button"
                onClick={handleLogout}
                className="btn btn-ghost btn-sm"
              >
                Logout
              </button>
            </>
          ) : (
            <Link to={LOGIN_PATH} className={navClass(LOGIN_PATH)}>
              Login
            </Link>
          )}
        </nav>
      </header>

      <main className="app-main container">{children}</main>

      <footer className="app-footer text-muted text-xs">
        Recommendations are informational and do not replace advice from a healthcare professional.
      </footer>
    </div>
  )
}
