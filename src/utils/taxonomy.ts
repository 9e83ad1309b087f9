// src/utils/taxonomy.ts
// Fixed metric taxonomy shown in the sidebar. Not data-driven.

export type CategoryId = 'pre-analytics' | 'core-reagents' | 'routine-pcr' | 'advanced-pcr' | 'clinical'

export type MetricCategory = {
  id: CategoryId
  label: string
  metrics: readonly string[]
}

export const METRIC_CATEGORIES: readonly MetricCategory[] = [
  { id: 'pre-analytics', label: 'Pre-analytics', metrics: ['extraction adn', 'cfdna', 'zymo'] },
  { id: 'core-reagents', label: 'Core reagents', metrics: ['amorces pcr', 'réactifs pcr', 'taq polymerase'] },
  { id: 'routine-pcr', label: 'Routine PCR', metrics: ['kit pcr', 'qpcr', 'rt-pcr'] },
  { id: 'advanced-pcr', label: 'Advanced PCR', metrics: ['pcr digital'] },
  { id: 'clinical', label: 'Clinical applications', metrics: ['hla b51', 'pylori'] },
]

export const ALL_METRICS: readonly string[] = METRIC_CATEGORIES.flatMap(c => c.metrics)

export const DEFAULT_METRIC: string = METRIC_CATEGORIES[0].metrics[0]

export function isKnownMetric(metric: string): boolean {
  return ALL_METRICS.includes(metric)
}

/** "extraction adn" → "Extraction adn" */
export function metricLabel(metric: string): string {
  return metric.charAt(0).toUpperCase() + metric.slice(1)
}
