// src/utils/dashboardView.ts
// Everything the page draws for one (context, metric) pair. Pure: same inputs, same view.

import { MetricUnavailableError } from '../services/errors'
import type { DashboardContext } from '../services/startup'
import { buildChoropleth, type ChoroplethArtifact } from './choropleth'
import { summarize, type InsightsSummary } from './insights'
import { metricLabel } from './taxonomy'

export type Panel<T> = { ok: true; value: T } | { ok: false; message: string }

export type DashboardView = {
  metric: string
  label: string
  map: Panel<ChoroplethArtifact>
  insights: Panel<InsightsSummary>
}

function panel<T>(build: () => T): Panel<T> {
  try {
    return { ok: true, value: build() }
  } catch (err) {
    if (err instanceof MetricUnavailableError) return { ok: false, message: err.message }
    throw err
  }
}

export function buildDashboardView(context: DashboardContext, metric: string): DashboardView {
  return {
    metric,
    label: metricLabel(metric),
    map: panel(() => buildChoropleth(context.metrics, context.boundaries, metric)),
    insights: panel(() => summarize(context.metrics, metric)),
  }
}
