import { describe, expect, it, vi } from 'vitest'
import { DASHBOARD_CONFIG } from '../config'
import { makeBoundaries, makeTable } from '../test/fixtures'
import type { loadBoundaries } from './boundaries'
import { DataLoadError, DashboardError, GeoLoadError } from './errors'
import type { loadMetrics } from './metrics'
import { bootstrapDashboard } from './startup'

const table = makeTable([{ region: 'A', m: 1 }])
const boundaries = makeBoundaries(['A'])

describe('bootstrapDashboard', () => {
  it('loads both inputs into a frozen context', async () => {
    const metricsLoader = vi.fn<typeof loadMetrics>().mockResolvedValue(table)
    const boundariesLoader = vi.fn<typeof loadBoundaries>().mockResolvedValue(boundaries)

    const result = await bootstrapDashboard(DASHBOARD_CONFIG, {
      loadMetrics: metricsLoader,
      loadBoundaries: boundariesLoader,
    })

    expect(metricsLoader).toHaveBeenCalledWith(
      DASHBOARD_CONFIG.metricsUrl,
      expect.objectContaining({ regionColumn: 'Location', timeoutMs: 12000, retries: 2 })
    )
    expect(boundariesLoader).toHaveBeenCalledWith(
      DASHBOARD_CONFIG.boundariesUrl,
      expect.objectContaining({ regionKey: 'gov_name_f' })
    )
    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.context.metrics).toBe(table)
    expect(result.context.boundaries).toBe(boundaries)
    expect(Object.isFrozen(result.context)).toBe(true)
  })

  it('reports every failed load instead of rejecting', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {})

    const result = await bootstrapDashboard(DASHBOARD_CONFIG, {
      loadMetrics: vi.fn<typeof loadMetrics>().mockRejectedValue(new DataLoadError('bad csv')),
      loadBoundaries: vi.fn<typeof loadBoundaries>().mockRejectedValue(new GeoLoadError('offline')),
    })

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.errors.map(e => e.message)).toEqual(['bad csv', 'offline'])
    expect(console.error).toHaveBeenCalledTimes(2)
  })

  it('fails when only one input is missing', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {})

    const result = await bootstrapDashboard(DASHBOARD_CONFIG, {
      loadMetrics: vi.fn<typeof loadMetrics>().mockResolvedValue(table),
      loadBoundaries: vi.fn<typeof loadBoundaries>().mockRejectedValue(new Error('boom')),
    })

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.errors).toHaveLength(1)
    expect(result.errors[0]).toBeInstanceOf(DashboardError)
    expect(result.errors[0].message).toBe('boom')
  })
})
