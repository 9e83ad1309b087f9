// src/utils/choropleth.ts
// Ratio-to-average per region, joined onto every boundary feature, plus its fill color.

import { scaleLinear } from 'd3-scale'
import { DASHBOARD_CONFIG } from '../config'
import type { BoundaryCollection } from '../services/boundaries'
import { MetricUnavailableError } from '../services/errors'
import { createLogger } from '../services/logger'
import type { MetricTable } from '../services/metrics'
import { formatValue } from './format'

const log = createLogger('choropleth')

/** Ratio carried by regions that have no data row. Real ratios are never negative. */
export const MISSING_RATIO = -1

export type RegionStatus = 'ok' | 'missing'

export type JoinedRegion = {
  region: string
  value: number
  ratio: number
  status: RegionStatus
  fill: string
  hoverText: string
}

export type ChoroplethArtifact = {
  metric: string
  average: number
  /** One entry per boundary feature, in feature order. */
  regions: JoinedRegion[]
  /** Data regions with no boundary feature; counted in insights, not drawn. */
  unmatched: string[]
}

const { colors } = DASHBOARD_CONFIG

// Yellow sits on the average (ratio 1); the domain is fixed to [0, 2]
const ratioScale = scaleLinear<string>()
  .domain([0, 1, 2])
  .range([colors.low, colors.average, colors.high])
  .clamp(true)

export function ratioColor(ratio: number, status: RegionStatus): string {
  return status === 'missing' ? colors.missing : ratioScale(ratio)
}

/** Mean of `metric` over every data row; throws when it cannot serve as a divisor. */
export function metricAverage(table: MetricTable, metric: string): number {
  if (!table.metrics.includes(metric)) {
    throw new MetricUnavailableError(metric, 'column not found in the dataset')
  }
  if (table.rows.length === 0) {
    throw new MetricUnavailableError(metric, 'the dataset is empty')
  }
  const total = table.rows.reduce((sum, row) => sum + (row.values[metric] ?? 0), 0)
  const average = total / table.rows.length
  if (!Number.isFinite(average) || average === 0) {
    throw new MetricUnavailableError(metric, 'the national average is zero')
  }
  return average
}

export function buildChoropleth(
  table: MetricTable,
  boundaries: BoundaryCollection,
  metric: string
): ChoroplethArtifact {
  const average = metricAverage(table, metric)

  const byRegion = new Map<string, number>()
  for (const row of table.rows) byRegion.set(row.region, row.values[metric] ?? 0)

  const regions = boundaries.regions.map((region): JoinedRegion => {
    const raw = byRegion.get(region)
    const status: RegionStatus = raw === undefined ? 'missing' : 'ok'
    const value = raw ?? 0
    const ratio = raw === undefined ? MISSING_RATIO : raw / average
    return {
      region,
      value,
      ratio,
      status,
      fill: ratioColor(ratio, status),
      hoverText: `${region}: ${formatValue(value)}`,
    }
  })

  const drawn = new Set(boundaries.regions)
  const unmatched = table.rows.map(r => r.region).filter(r => !drawn.has(r))
  if (unmatched.length) log.warn(`no boundary for ${unmatched.length} region(s): ${unmatched.join(', ')}`)

  return { metric, average, regions, unmatched }
}
