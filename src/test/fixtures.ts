// Small hand-made inputs shared by the unit tests.

import { parseBoundaries, type BoundaryCollection } from '../services/boundaries'
import type { MetricTable } from '../services/metrics'

/** Rows of `{ region, ...metricValues }`, kept in the given order. */
export function makeTable(rows: Array<{ region: string } & Record<string, number | string>>): MetricTable {
  const metrics = [...new Set(rows.flatMap(r => Object.keys(r).filter(k => k !== 'region')))]
  return {
    regionColumn: 'Location',
    metrics,
    rows: rows.map(({ region, ...rest }) => ({
      region,
      values: Object.fromEntries(
        Object.entries(rest).map(([k, v]): [string, number] => [k, typeof v === 'number' ? v : Number(v)])
      ),
    })),
  }
}

export function square(x: number, y: number): number[][][] {
  return [[[x, y], [x + 1, y], [x + 1, y + 1], [x, y + 1], [x, y]]]
}

export function boundaryDoc(names: string[], key = 'gov_name_f') {
  return {
    type: 'FeatureCollection',
    features: names.map((name, i) => ({
      type: 'Feature',
      properties: { [key]: name, id: i },
      geometry: { type: 'Polygon', coordinates: square(i, 0) },
    })),
  }
}

export function makeBoundaries(names: string[]): BoundaryCollection {
  return parseBoundaries(boundaryDoc(names), 'gov_name_f')
}
