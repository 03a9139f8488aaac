import { Navigate, useLocation } from 'react-router-dom'
import { isAuthenticated } from '../state/authStore'
import { LOGIN_PATH } from '../constants'

interface ProtectedRouteProps {
  children: React.ReactNode
}

export function ProtectedRoute({ children }: ProtectedRouteProps) {
  const location = useLocation()
  if (!isAuthenticated()) {
    return <Navigate to={LOGIN_PATH} replace state={{ from: location }} />
  }
  return <>{children}</>
}
