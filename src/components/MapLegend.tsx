import { DASHBOARD_CONFIG } from '../config'

const { colors } = DASHBOARD_CONFIG

// Ratio to the national average, on the fixed [0, 2] color domain
const TICKS = [
  { ratio: 0.2, label: 'Low' },
  { ratio: 1.0, label: 'Average' },
  { ratio: 1.8, label: 'High' },
]

export default function MapLegend() {
  return (
    <div className="text-[12px] text-slate-600 space-y-2" aria-label="Map legend">
      <div className="font-semibold text-slate-700">Performance</div>
      <div
        className="relative h-3 rounded"
        style={{ background: `linear-gradient(to right, ${colors.low}, ${colors.average} 50%, ${colors.high})` }}
      >
        {TICKS.map(t => (
          <span
            key={t.label}
            className="absolute top-4 -translate-x-1/2 whitespace-nowrap"
            style={{ left: `${(t.ratio / 2) * 100}%` }}
          >
            {t.label}
          </span>
        ))}
      </div>
      <div className="pt-5 flex items-center gap-2">
        <span className="inline-block w-3 h-3 rounded-sm border" style={{ background: colors.missing }} />
        No data
      </div>
    </div>
  )
}
