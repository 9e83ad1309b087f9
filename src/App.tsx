import { Routes, Route, NavLink } from 'react-router-dom'
import { FlaskConical } from 'lucide-react'
import Dashboard from './pages/Dashboard'
import { DASHBOARD_CONFIG } from './config'
import type { StartupResult } from './services/startup'

export default function App({ startup }: { startup: Promise<StartupResult> }) {
  return (
    <div className="min-h-screen bg-gradient-to-br from-slate-50 to-slate-200">
      <header className="sticky top-0 z-[1000] bg-white/70 backdrop-blur border-b">
        <div className="max-w-7xl mx-auto px-4 py-3 flex items-center justify-between">
          <NavLink
            to="/"
            end
            className="flex items-center gap-2 text-xl md:text-2xl font-semibold rounded-lg px-2 py-1 hover:bg-slate-100 focus-visible:outline-none focus-visible:ring-2 focus-visible:ring-slate-400"
            aria-label="Go to dashboard"
          >
            <FlaskConical className="text-teal-700" aria-hidden />
            {DASHBOARD_CONFIG.title}
          </NavLink>
          <span className="hidden sm:block text-sm text-slate-500">{DASHBOARD_CONFIG.subtitle}</span>
        </div>
      </header>

      <main className="max-w-7xl mx-auto px-4 py-6 space-y-6">
        <Routes>
          <Route path="*" element={<Dashboard startup={startup} />} />
        </Routes>
      </main>

      <footer className="border-t py-6 text-center text-sm text-slate-500">
        Boundaries: Tunisian governorates (GeoJSON). Values are summed per governorate.
      </footer>
    </div>
  )
}
