import React, { Suspense } from 'react'
import type { BoundaryCollection } from '../services/boundaries'
import type { ChoroplethArtifact } from '../utils/choropleth'
import Loading from './Loading'
const ChoroplethMap = React.lazy(() => import('./ChoroplethMap'))

// Warm the Leaflet chunk while the inputs are still loading
if (typeof window !== 'undefined') {
  const preload = () => {
    void import('./ChoroplethMap')
  }
  if ('requestIdleCallback' in window) window.requestIdleCallback(preload)
  else setTimeout(preload, 0)
}

export default function LazyChoroplethMap({
  boundaries,
  artifact,
}: {
  boundaries: BoundaryCollection
  artifact: ChoroplethArtifact
}) {
  return (
    <Suspense fallback={<div className="h-64 flex items-center justify-center"><Loading label="Loading map…" /></div>}>
      <ChoroplethMap boundaries={boundaries} artifact={artifact} />
    </Suspense>
  )
}
