import { Link } from 'react-router-dom'
import { BackendStatus } from '../components/BackendStatus'
import { isAuthenticated } from '../state/authStore'

export default function Home() {
  const authenticated = isAuthenticated()

  return (
    <div className="page-container animate-in">
      <div className="page-header">
        <h1 className="heading-xl">Cycle Advisor</h1>
        <p className="text-secondary text-lg mt-2">
          Symptom-aware recommendations and cycle predictions for every phase.
        </p>
      </div>

      <section className="card mb-6">
        <h2 className="heading-md mb-4">Service status</h2>
        <BackendStatus />
      </section>

      <div className="flex-center gap-sm" style={{ justifyContent: 'flex-start' }}>
        {authenticated ? (
          <>
            <Link to="/analysis" className="btn btn-primary">Start an analysis</Link>
            <Link to="/dashboard" className="btn btn-ghost">Go to dashboard</Link>
          </>
        ) : (
          <Link to="/login" className="btn btn-primary">Sign in to get started</Link>
        )}
      </div>
    </div>
  )
}
