// src/components/ChoroplethMap.tsx
import { MapContainer, GeoJSON, useMap } from 'react-leaflet'
import L, { type Layer, type PathOptions } from 'leaflet'
import type { Feature, Geometry } from 'geojson'
import { useCallback, useEffect, useMemo } from 'react'
import 'leaflet/dist/leaflet.css'
import type { BoundaryCollection, BoundaryProperties } from '../services/boundaries'
import type { ChoroplethArtifact } from '../utils/choropleth'
import { createRegionLookup, regionStyle, regionTooltip } from '../utils/mapStyle'

/** Fit the view to the boundary polygons once they are on the map. */
function FitBounds({ boundaries }: { boundaries: BoundaryCollection }) {
  const map = useMap()
  useEffect(() => {
    const bounds = L.geoJSON(boundaries.collection).getBounds()
    if (bounds.isValid()) map.fitBounds(bounds, { padding: [12, 12] })
  }, [map, boundaries])
  return null
}

export default function ChoroplethMap({
  boundaries,
  artifact,
}: {
  boundaries: BoundaryCollection
  artifact: ChoroplethArtifact
}) {
  const lookup = useMemo(
    () => createRegionLookup(artifact, boundaries.regionKey),
    [artifact, boundaries.regionKey]
  )

  const style = useCallback(
    (feature?: Feature<Geometry, BoundaryProperties>): PathOptions => regionStyle(lookup(feature)),
    [lookup]
  )

  const onEachFeature = useCallback(
    (feature: Feature<Geometry, BoundaryProperties>, layer: Layer) => {
      const text = regionTooltip(lookup(feature))
      if (text) layer.bindTooltip(text, { sticky: true })
    },
    [lookup]
  )

  return (
    <div className="h-[520px] md:h-[650px] rounded-xl overflow-hidden border bg-transparent">
      <MapContainer
        center={[34, 9.5]}
        zoom={6}
        scrollWheelZoom={true}
        zoomSnap={0.25}
        attributionControl={false}
        style={{ height: '100%', width: '100%', background: 'transparent' }}
      >
        {/* Remount on metric change so every feature is restyled and re-bound */}
        <GeoJSON
          key={artifact.metric}
          data={boundaries.collection}
          style={style}
          onEachFeature={onEachFeature}
        />
        <FitBounds boundaries={boundaries} />
      </MapContainer>
    </div>
  )
}
