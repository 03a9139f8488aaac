import { lazy, Suspense } from 'react'
import { ProtectedRoute } from '../components/ProtectedRoute'

const Home = lazy(() => import('../pages/Home'))
const Login = lazy(() => import('../pages/Login'))
const Dashboard = lazy(() => import('../pages/Dashboard'))
const Analysis = lazy(() => import('../pages/Analysis'))
const History = lazy(() => import('../pages/History'))

export const routes = [
  {
    path: '/',
    element: (
      <Suspense fallback={<div>Loading...</div>}>
        <Home />
      </Suspense>
    ),
  },
  {
    path: '/login',
    element: (
      <Suspense fallback={<div>Loading...</div>}>
        <Login />
      </Suspense>
    ),
  },
  {
    path: '/dashboard',
    element: (
      <Suspense fallback={<div>Loading...</div>}>
        <ProtectedRoute>
          <Dashboard />
        </ProtectedRoute>
      </Suspense>
    ),
  },
  {
    path: '/analysis',
    element: (
      <Suspense fallback={<div>Loading...</div>}>
        <ProtectedRoute>
          <Analysis />
        </ProtectedRoute>
      </Suspense>
    ),
  },
  {
    path: '/history',
    element: (
      <Suspense fallback={<div>Loading...</div>}>
        <ProtectedRoute>
          <History />
        </ProtectedRoute>
      </Suspense>
    ),
  },
]
