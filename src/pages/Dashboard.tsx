import { useEffect, useMemo, useReducer, useState } from 'react'
import { BarChart3, Map as MapIcon } from 'lucide-react'
import Card from '../components/Card'
import Loading from '../components/Loading'
import ErrorState from '../components/ErrorState'
import MetricSidebar from '../components/MetricSidebar'
import LazyChoroplethMap from '../components/LazyChoroplethMap'
import MapLegend from '../components/MapLegend'
import InsightsPanel from '../components/InsightsPanel'
import RankingChart from '../components/RankingChart'
import type { StartupResult } from '../services/startup'
import { DashboardError, errorMessage } from '../services/errors'
import { buildDashboardView } from '../utils/dashboardView'
import { initialSelection, selectionReducer } from '../utils/selection'

export default function Dashboard({ startup }: { startup: Promise<StartupResult> }) {
  const [result, setResult] = useState<StartupResult | null>(null)
  const [selection, dispatch] = useReducer(selectionReducer, initialSelection)

  useEffect(() => {
    let alive = true
    void startup.then(
      r => { if (alive) setResult(r) },
      (err: unknown) => {
        if (alive) setResult({ ok: false, errors: [new DashboardError(errorMessage(err), { cause: err })] })
      }
    )
    return () => { alive = false }
  }, [startup])

  const context = result?.ok ? result.context : null
  const view = useMemo(
    () => (context ? buildDashboardView(context, selection.activeMetric) : null),
    [context, selection.activeMetric]
  )

  if (!result) return <Loading label="Loading metrics and boundaries…" />

  if (!result.ok || !context || !view) {
    return (
      <ErrorState
        message="Unable to start the dashboard. Check your internet connection and the data files."
        details={result.ok ? [] : result.errors.map(e => e.message)}
      />
    )
  }

  return (
    <div className="grid gap-6 lg:grid-cols-[240px_1fr]">
      <aside className="lg:sticky lg:top-20 self-start rounded-2xl border bg-white/90 p-4 shadow-sm">
        <MetricSidebar
          activeMetric={selection.activeMetric}
          onSelect={metric => dispatch({ type: 'select', metric })}
        />
      </aside>

      <div className="space-y-6 min-w-0">
        <h1 className="text-2xl font-bold text-slate-800">{view.label}</h1>

        <Card title="Geographic distribution" icon={<MapIcon size={16} aria-hidden />}>
          {view.map.ok ? (
            <div className="grid gap-4 md:grid-cols-[1fr_160px]">
              <LazyChoroplethMap boundaries={context.boundaries} artifact={view.map.value} />
              <MapLegend />
            </div>
          ) : (
            <ErrorState message={view.map.message} />
          )}
        </Card>

        <Card title="Regions" icon={<BarChart3 size={16} aria-hidden />}>
          {view.insights.ok ? (
            <div className="space-y-6">
              <InsightsPanel summary={view.insights.value} />
              <RankingChart summary={view.insights.value} />
            </div>
          ) : (
            <ErrorState message={view.insights.message} />
          )}
        </Card>
      </div>
    </div>
  )
}
