import type { ReactNode } from 'react'
import { AlertTriangle, MapPin } from 'lucide-react'
import type { InsightsSummary } from '../utils/insights'
import { formatValue } from '../utils/format'

function Callout({
  tone,
  icon,
  title,
  region,
  value,
}: {
  tone: 'info' | 'warn'
  icon: ReactNode
  title: string
  region: string
  value: number
}) {
  const palette = tone === 'info'
    ? 'bg-sky-50 border-sky-200 text-sky-900'
    : 'bg-amber-50 border-amber-200 text-amber-900'
  return (
    <div className={`rounded-xl border px-3 py-2 text-sm flex items-start gap-2 ${palette}`}>
      {icon}
      <p>
        <span className="font-semibold">{title}:</span> {region} with{' '}
        <span className="tabular-nums">{formatValue(value)}</span>
      </p>
    </div>
  )
}

export default function InsightsPanel({ summary }: { summary: InsightsSummary }) {
  return (
    <div className="grid gap-6 md:grid-cols-2">
      <div>
        <h3 className="mb-2 text-sm font-medium">Region ranking</h3>
        <table className="w-full text-sm">
          <thead>
            <tr className="text-left text-xs text-slate-500 border-b">
              <th className="py-1 pr-2 w-10">#</th>
              <th className="py-1 pr-2">Region</th>
              <th className="py-1 text-right">Value</th>
            </tr>
          </thead>
          <tbody>
            {summary.ranked.map(r => (
              <tr key={r.region} className="border-b last:border-0">
                <td className="py-1 pr-2 text-slate-500 tabular-nums">{r.rank}</td>
                <td className="py-1 pr-2">{r.region}</td>
                <td className="py-1 text-right tabular-nums">{formatValue(r.value)}</td>
              </tr>
            ))}
          </tbody>
        </table>
      </div>

      <div className="space-y-3">
        <h3 className="text-sm font-medium">Insights</h3>
        <Callout
          tone="info"
          icon={<MapPin size={16} className="mt-0.5 shrink-0" aria-hidden />}
          title="Leading region"
          region={summary.leader.region}
          value={summary.leader.value}
        />
        <Callout
          tone="warn"
          icon={<AlertTriangle size={16} className="mt-0.5 shrink-0" aria-hidden />}
          title="Lagging region"
          region={summary.laggard.region}
          value={summary.laggard.value}
        />
        <dl className="grid grid-cols-2 gap-3 text-sm">
          <div className="rounded-xl border bg-white px-3 py-2">
            <dt className="text-xs text-slate-500">National mean</dt>
            <dd className="text-lg font-semibold tabular-nums">{formatValue(summary.mean)}</dd>
          </div>
          <div className="rounded-xl border bg-white px-3 py-2">
            <dt className="text-xs text-slate-500">National total</dt>
            <dd className="text-lg font-semibold tabular-nums">{formatValue(summary.total, 2)}</dd>
          </div>
        </dl>
        <div className="text-[12px] text-slate-600 space-y-1">
          <div className="font-semibold text-slate-700">Reading the map</div>
          <ul className="list-disc pl-5 space-y-0.5">
            <li>Green regions sit well above the national average.</li>
            <li>Yellow marks the national average ({formatValue(summary.mean)}).</li>
            <li>Red regions sit below the average and may need attention.</li>
            <li>Grey means there is no data for the region.</li>
          </ul>
        </div>
      </div>
    </div>
  )
}
