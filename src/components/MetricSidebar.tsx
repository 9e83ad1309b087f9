import { Dna, FlaskConical, Microscope, Satellite, Stethoscope, type LucideIcon } from 'lucide-react'
import { METRIC_CATEGORIES, metricLabel, type CategoryId } from '../utils/taxonomy'

const CATEGORY_ICONS: Record<CategoryId, LucideIcon> = {
  'pre-analytics': Dna,
  'core-reagents': FlaskConical,
  'routine-pcr': Microscope,
  'advanced-pcr': Satellite,
  clinical: Stethoscope,
}

export default function MetricSidebar({
  activeMetric,
  onSelect,
}: {
  activeMetric: string
  onSelect: (metric: string) => void
}) {
  return (
    <nav aria-label="Metrics" className="space-y-4">
      {METRIC_CATEGORIES.map(cat => {
        const Icon = CATEGORY_ICONS[cat.id]
        return (
          <section key={cat.id}>
            <h3 className="flex items-center gap-2 text-xs font-semibold uppercase tracking-wide text-slate-500">
              <Icon size={14} aria-hidden />
              {cat.label}
            </h3>
            <ul className="mt-2 space-y-1">
              {cat.metrics.map(m => {
                const on = m === activeMetric
                return (
                  <li key={m}>
                    <button
                      type="button"
                      aria-pressed={on}
                      onClick={() => onSelect(m)}
                      className={[
                        'w-full text-left rounded-xl px-3 py-2 text-sm transition',
                        on ? 'bg-teal-700 text-white shadow' : 'bg-white text-slate-600 hover:bg-teal-600 hover:text-white',
                      ].join(' ')}
                    >
                      {metricLabel(m)}
                    </button>
                  </li>
                )
              })}
            </ul>
          </section>
        )
      })}
    </nav>
  )
}
