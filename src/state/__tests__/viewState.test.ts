import { describe, expect, test } from 'vitest'
import { buildCourseworkModel } from '../../utils/courseIndex'
import { SAMPLE_DATA } from '../../test/fixtures'
import { createViewReducer, INITIAL_VIEW_STATE, interactionPhase } from '../viewState'

const { courses } = buildCourseworkModel(SAMPLE_DATA)
const reduce = createViewReducer(courses)

describe('viewReducer', () => {
  test('selecting keeps the focus', () => {
    const focused = reduce(INITIAL_VIEW_STATE, { type: 'toggleFocus', subject: 'Physics' })
    const next = reduce(focused, { type: 'select', id: 'PHYS201' })
    expect(next).toEqual({ selectedId: 'PHYS201', focusedSubject: 'Physics' })
    expect(interactionPhase(next)).toBe('focusedAndSelected')
  })

  test('focusing another subject drops the selection', () => {
    const selected = reduce(INITIAL_VIEW_STATE, { type: 'select', id: 'CS201' })
    const next = reduce(selected, { type: 'toggleFocus', subject: 'Physics' })
    expect(next).toEqual({ selectedId: null, focusedSubject: 'Physics' })
  })

  test('focusing the selected course subject keeps the selection', () => {
    const selected = reduce(INITIAL_VIEW_STATE, { type: 'select', id: 'CS201' })
    const next = reduce(selected, { type: 'toggleFocus', subject: 'Computer Science' })
    expect(next).toEqual({ selectedId: 'CS201', focusedSubject: 'Computer Science' })
  })

  test('toggling the active subject or "All" clears the focus', () => {
    const focused = reduce(INITIAL_VIEW_STATE, { type: 'toggleFocus', subject: 'Physics' })
    expect(reduce(focused, { type: 'toggleFocus', subject: 'Physics' }).focusedSubject).toBeNull()
    expect(reduce(focused, { type: 'toggleFocus', subject: null }).focusedSubject).toBeNull()
  })

  test('clearing the focus keeps the selection', () => {
    const state = { selectedId: 'PHYS101', focusedSubject: 'Physics' }
    expect(reduce(state, { type: 'toggleFocus', subject: null })).toEqual({
      selectedId: 'PHYS101',
      focusedSubject: null
    })
  })

  test('a focus refuses courses of other subjects', () => {
    const focused = reduce(INITIAL_VIEW_STATE, { type: 'toggleFocus', subject: 'Physics' })
    expect(reduce(focused, { type: 'select', id: 'econ-intro' })).toBe(focused)
    expect(reduce(focused, { type: 'select', id: 'UNKNOWN' })).toBe(focused)
    expect(reduce(INITIAL_VIEW_STATE, { type: 'select', id: 'econ-intro' }).selectedId).toBe('econ-intro')
  })

  test('clearSelection returns to idle', () => {
    const selected = reduce(INITIAL_VIEW_STATE, { type: 'select', id: 'CS101' })
    expect(interactionPhase(selected)).toBe('selected')
    const cleared = reduce(selected, { type: 'clearSelection' })
    expect(cleared).toEqual(INITIAL_VIEW_STATE)
    expect(interactionPhase(cleared)).toBe('idle')
  })

  test('no-op actions return the same state object', () => {
    const selected = reduce(INITIAL_VIEW_STATE, { type: 'select', id: 'CS101' })
    expect(reduce(selected, { type: 'select', id: 'CS101' })).toBe(selected)
    expect(reduce(INITIAL_VIEW_STATE, { type: 'clearSelection' })).toBe(INITIAL_VIEW_STATE)
    expect(reduce(INITIAL_VIEW_STATE, { type: 'toggleFocus', subject: null })).toBe(INITIAL_VIEW_STATE)
  })
})
