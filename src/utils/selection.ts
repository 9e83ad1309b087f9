// src/utils/selection.ts
// The only mutable UI state: which metric is active. Driven through useReducer.

import { DEFAULT_METRIC, isKnownMetric } from './taxonomy'

export type SelectionState = Readonly<{ activeMetric: string }>

export type SelectionAction = { type: 'select'; metric: string }

export const initialSelection: SelectionState = Object.freeze({ activeMetric: DEFAULT_METRIC })

/**
 * Returns the same object when nothing changes (re-selecting the active metric,
 * or a metric outside the taxonomy) so React skips the re-render.
 */
export function selectionReducer(state: SelectionState, action: SelectionAction): SelectionState {
  switch (action.type) {
    case 'select':
      if (action.metric === state.activeMetric || !isKnownMetric(action.metric)) return state
      return Object.freeze({ activeMetric: action.metric })
    default:
      return state
  }
}
