import { beforeEach, describe, expect, it, vi } from 'vitest'
import { MetricUnavailableError } from '../services/errors'
import { makeBoundaries, makeTable } from '../test/fixtures'
import { MISSING_RATIO, buildChoropleth, metricAverage, ratioColor } from './choropleth'
import { summarize } from './insights'

const GREY = '#E2E8F0'
const RED = 'rgb(231, 76, 60)'
const YELLOW = 'rgb(241, 196, 15)'
const GREEN = 'rgb(46, 204, 113)'

const table = makeTable([
  { region: 'A', m: 10 },
  { region: 'B', m: 20 },
  { region: 'C', m: 30 },
])

describe('buildChoropleth', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {})
  })

  it('divides by the national average and keeps every boundary region', () => {
    const art = buildChoropleth(table, makeBoundaries(['A', 'B', 'C', 'D']), 'm')

    expect(art.average).toBe(20)
    expect(art.regions.map(r => r.region)).toEqual(['A', 'B', 'C', 'D'])
    expect(art.regions.map(r => r.ratio)).toEqual([0.5, 1, 1.5, -1])
    expect(art.regions.map(r => r.status)).toEqual(['ok', 'ok', 'ok', 'missing'])
  })

  it('gives regions without data the sentinel ratio, zero value and grey fill', () => {
    const art = buildChoropleth(table, makeBoundaries(['A', 'B', 'C', 'D']), 'm')
    expect(art.regions[3]).toEqual({
      region: 'D',
      value: 0,
      ratio: MISSING_RATIO,
      status: 'missing',
      fill: GREY,
      hoverText: 'D: 0.000',
    })
  })

  it('colors the average yellow and shows the raw value on hover', () => {
    const art = buildChoropleth(table, makeBoundaries(['B']), 'm')
    expect(art.regions[0].fill).toBe(YELLOW)
    expect(art.regions[0].hoverText).toBe('B: 20.000')
  })

  it('has one row per boundary feature whatever the data covers', () => {
    const art = buildChoropleth(table, makeBoundaries(['B']), 'm')
    expect(art.regions).toHaveLength(1)
    expect(art.unmatched).toEqual(['A', 'C'])
  })

  it('leaves data-only regions off the map but in the insights', () => {
    const withExtra = makeTable([
      { region: 'A', m: 10 },
      { region: 'B', m: 20 },
      { region: 'E', m: 30 },
    ])
    const art = buildChoropleth(withExtra, makeBoundaries(['A', 'B']), 'm')
    const summary = summarize(withExtra, 'm')

    expect(art.regions.map(r => r.region)).toEqual(['A', 'B'])
    expect(art.unmatched).toEqual(['E'])
    expect(summary.ranked).toHaveLength(3)
    expect(summary.leader.region).toBe('E')
    expect(art.average).toBe(summary.mean)
  })

  it('refuses a metric whose average is zero', () => {
    const zeros = makeTable([
      { region: 'A', m: 0 },
      { region: 'B', m: 0 },
    ])
    expect(() => buildChoropleth(zeros, makeBoundaries(['A']), 'm')).toThrow(MetricUnavailableError)
  })

  it('refuses an empty dataset or an unknown column', () => {
    const empty = { regionColumn: 'Location', metrics: ['m'], rows: [] }
    expect(() => metricAverage(empty, 'm')).toThrow('Metric "m" is unavailable: the dataset is empty')
    expect(() => metricAverage(table, 'qpcr')).toThrow('Metric "qpcr" is unavailable: column not found in the dataset')
  })
})

describe('ratioColor', () => {
  it('maps the [0, 2] ratio domain onto red, yellow and green', () => {
    expect(ratioColor(0, 'ok')).toBe(RED)
    expect(ratioColor(1, 'ok')).toBe(YELLOW)
    expect(ratioColor(2, 'ok')).toBe(GREEN)
  })

  it('saturates outside the domain', () => {
    expect(ratioColor(7.5, 'ok')).toBe(GREEN)
    expect(ratioColor(-0.4, 'ok')).toBe(RED)
  })

  it('uses grey for missing regions whatever the ratio', () => {
    expect(ratioColor(MISSING_RATIO, 'missing')).toBe(GREY)
    expect(ratioColor(1, 'missing')).toBe(GREY)
  })
})
