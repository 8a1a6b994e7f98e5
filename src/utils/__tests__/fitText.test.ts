import { describe, expect, test } from 'vitest'
import type { CourseMeta } from '../../types'
import { courseTileLabel, estimateTextWidth, fitText } from '../fitText'

describe('fitText', () => {
  test('keeps text that fits', () => {
    expect(fitText('Mechanics', 100, 10)).toBe('Mechanics')
  })

  test('truncates with an ellipsis, trimming trailing spaces', () => {
    expect(fitText('Quantum Mechanics', 50, 10)).toBe('Quantum…')
  })

  test('returns an empty string when not even the ellipsis fits', () => {
    expect(fitText('abc', 3, 10)).toBe('')
  })

  test('never splits a surrogate pair', () => {
    const codePoints = (value: string) => Array.from(value).length
    expect(fitText('ab😀cd', 4, 10, codePoints)).toBe('ab😀…')
    expect(fitText('ab😀cd', 3, 10, codePoints)).toBe('ab…')
    expect(estimateTextWidth('😀', 10)).toBe(5.5)
  })

  test('uses a custom measure', () => {
    expect(fitText('abcdef', 3, 10, value => value.length)).toBe('ab…')
  })
})

describe('courseTileLabel', () => {
  const base: CourseMeta = {
    id: 'x',
    code: null,
    name: 'Principles of Economics',
    full: 'Principles of Economics',
    category: 'Economics',
    group: null,
    year: null,
    description: null,
    stages: []
  }

  test('prefers the code', () => {
    expect(courseTileLabel({ ...base, code: 'ECON101' })).toBe('ECON101')
  })

  test('shortens long names', () => {
    expect(courseTileLabel(base)).toBe('Principles of …')
    expect(courseTileLabel({ ...base, name: 'Short name' })).toBe('Short name')
  })

  test('is empty for an unknown course', () => {
    expect(courseTileLabel(undefined)).toBe('')
  })
})
