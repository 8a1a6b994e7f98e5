/**
 * Interaction state machine
 *
 * ViewState only changes through these actions. The reducer keeps the
 * focus invariant: with a subject focused, a selected course either
 * belongs to that subject or the selection is dropped.
 */

import type { CourseMeta, InteractionPhase, ViewState } from '../types'

export type ViewAction =
  | { type: 'toggleFocus'; subject: string | null }
  | { type: 'select'; id: string }
  | { type: 'clearSelection' }

export const INITIAL_VIEW_STATE: ViewState = {
  selectedId: null,
  focusedSubject: null
}

export function interactionPhase(state: ViewState): InteractionPhase {
  if (state.focusedSubject && state.selectedId) return 'focusedAndSelected'
  if (state.focusedSubject) return 'focused'
  if (state.selectedId) return 'selected'
  return 'idle'
}

/**
 * Builds the reducer over a course index (needed to look up the category
 * of the current selection when focus changes).
 */
export function createViewReducer(courses: Map<string, CourseMeta>) {
  return function viewReducer(state: ViewState, action: ViewAction): ViewState {
    switch (action.type) {
      case 'toggleFocus': {
        // Legend "All" and a second click on the active subject both clear focus
        const next = action.subject === null || state.focusedSubject === action.subject
          ? null
          : action.subject
        if (next === state.focusedSubject) return state

        let selectedId = state.selectedId
        if (next && selectedId) {
          const selected = courses.get(selectedId)
          if (!selected || selected.category !== next) selectedId = null
        }
        return { selectedId, focusedSubject: next }
      }

      case 'select': {
        if (state.selectedId === action.id) return state
        // Courses hidden by the focus can't be pinned
        if (state.focusedSubject && courses.get(action.id)?.category !== state.focusedSubject) {
          return state
        }
        return { ...state, selectedId: action.id }
      }

      case 'clearSelection':
        if (state.selectedId === null) return state
        return { ...state, selectedId: null }

      default:
        return state
    }
  }
}
