// src/utils/insights.ts
// Ranking, leader/laggard and national aggregates over the data rows (not the map).

import { MetricUnavailableError } from '../services/errors'
import type { MetricRow, MetricTable } from '../services/metrics'

export type RankedRegion = { rank: number; region: string; value: number }

export type InsightsSummary = {
  metric: string
  /** Descending by value; ties keep the table's region order. */
  ranked: RankedRegion[]
  leader: RankedRegion
  laggard: RankedRegion
  mean: number
  total: number
}

const valueOf = (row: MetricRow, metric: string) => row.values[metric] ?? 0

export function summarize(table: MetricTable, metric: string): InsightsSummary {
  if (!table.metrics.includes(metric)) {
    throw new MetricUnavailableError(metric, 'column not found in the dataset')
  }
  if (table.rows.length === 0) {
    throw new MetricUnavailableError(metric, 'the dataset is empty')
  }

  // Array.prototype.sort is stable
  const ranked = [...table.rows]
    .sort((a, b) => valueOf(b, metric) - valueOf(a, metric))
    .map((row, i) => ({ rank: i + 1, region: row.region, value: valueOf(row, metric) }))

  const total = ranked.reduce((sum, r) => sum + r.value, 0)

  return {
    metric,
    ranked,
    leader: ranked[0],
    laggard: ranked[ranked.length - 1],
    mean: total / ranked.length,
    total,
  }
}
