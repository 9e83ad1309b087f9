// src/utils/mapStyle.ts
// Per-feature lookup, path style and tooltip for the choropleth layer.

import type { PathOptions } from 'leaflet'
import type { Feature, Geometry } from 'geojson'
import { DASHBOARD_CONFIG } from '../config'
import type { BoundaryProperties } from '../services/boundaries'
import { normalizeRegionName } from '../services/metrics'
import type { ChoroplethArtifact, JoinedRegion } from './choropleth'

export const BORDER_COLOR = '#2D3748'

export type RegionLookup = (feature?: Feature<Geometry, BoundaryProperties>) => JoinedRegion | undefined

/** Match a boundary feature to its joined region by its (trimmed) name property. */
export function createRegionLookup(artifact: ChoroplethArtifact, regionKey: string): RegionLookup {
  const byRegion = new Map<string, JoinedRegion>(artifact.regions.map(r => [r.region, r]))
  return feature => {
    const name = feature?.properties?.[regionKey]
    return typeof name === 'string' ? byRegion.get(normalizeRegionName(name)) : undefined
  }
}

export function regionStyle(region: JoinedRegion | undefined): PathOptions {
  return {
    fillColor: region?.fill ?? DASHBOARD_CONFIG.colors.missing,
    fillOpacity: 1,
    color: BORDER_COLOR,
    weight: 1.5,
  }
}

export function regionTooltip(region: JoinedRegion | undefined): string | undefined {
  return region?.hoverText
}
