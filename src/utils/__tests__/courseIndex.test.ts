import { describe, expect, test } from 'vitest'
import {
  buildCourseworkModel,
  buildLinkIndex,
  DuplicateCourseIdError,
  inferYear,
  normalizeHierarchy,
  resolveYear,
  UNKNOWN_CATEGORY
} from '../courseIndex'
import { SAMPLE_DATA } from '../../test/fixtures'

describe('inferYear', () => {
  test('uses the leading digit of the first 3-digit run', () => {
    expect(inferYear('PHYS301')).toBe('Year 3')
    expect(inferYear('MATH2040')).toBe('Year 2')
  })

  test('returns null without a 3-digit run', () => {
    expect(inferYear('CS10')).toBeNull()
    expect(inferYear(null)).toBeNull()
  })
})

describe('resolveYear', () => {
  test('explicit values win over the code', () => {
    expect(resolveYear(1, 'CS301')).toBe('Year 1')
    expect(resolveYear('Graduate', 'CS101')).toBe('Graduate')
  })

  test('falls back to the code', () => {
    expect(resolveYear(undefined, 'CS201')).toBe('Year 2')
  })
})

describe('normalizeHierarchy', () => {
  test('defaults missing names and skips malformed entries', () => {
    const tree = normalizeHierarchy({
      children: [
        { children: [{ name: 'Group', children: [{ code: 'X100', name: 'X' }, 42] }] },
        'junk'
      ]
    })

    expect(tree.name).toBe('Coursework')
    expect(tree.children).toHaveLength(1)
    const subject = tree.children[0]
    expect(subject.name).toBe(UNKNOWN_CATEGORY)
    expect(subject.children[0].children).toHaveLength(1)
    const course = subject.children[0].children[0]
    expect(course.courseId).toBe('X100')
    expect(course.key).toBe('s0.g0.c0')
  })

  test('treats a missing document as an empty tree', () => {
    const tree = normalizeHierarchy(undefined)
    expect(tree.kind).toBe('root')
    expect(tree.children).toEqual([])
  })
})

describe('buildCourseworkModel', () => {
  const model = buildCourseworkModel(SAMPLE_DATA)

  test('indexes every course under a unique id', () => {
    expect(model.courses.size).toBe(6)
    expect(model.subjects).toEqual(['Physics', 'Computer Science', 'Economics'])
  })

  test('resolves category, group, year and stages', () => {
    const meta = model.courses.get('PHYS301')
    expect(meta).toEqual({
      id: 'PHYS301',
      code: 'PHYS301',
      name: 'Quantum Mechanics',
      full: 'PHYS301 · Quantum Mechanics',
      category: 'Physics',
      group: 'Core',
      year: 'Year 3',
      description: null,
      stages: [{ name: 'Specialisation', description: '' }]
    })
  })

  test('uses the name alone when a course has no code', () => {
    const meta = model.courses.get('econ-intro')
    expect(meta?.full).toBe('Principles of Economics')
    expect(meta?.year).toBe('Year 1')
    expect(meta?.stages.map(s => s.name)).toEqual(['Foundations'])
  })

  test('links prerequisites both ways and drops dangling edges', () => {
    expect(model.links.incoming.get('CS201')).toEqual(['CS101'])
    expect(model.links.outgoing.get('CS101')).toEqual(['CS201'])
    expect(model.links.incoming.has('GHOST999')).toBe(false)
  })

  test('throws on a duplicate course id', () => {
    const duplicated = {
      hierarchy: {
        children: [
          { name: 'A', children: [{ name: 'g', children: [{ id: 'X1', name: 'One' }] }] },
          { name: 'B', children: [{ name: 'g', children: [{ id: 'X1', name: 'Two' }] }] }
        ]
      }
    }
    expect(() => buildCourseworkModel(duplicated)).toThrow(DuplicateCourseIdError)
  })

  test('degrades to an empty model for a non-object document', () => {
    const empty = buildCourseworkModel(null)
    expect(empty.courses.size).toBe(0)
    expect(empty.subjects).toEqual([])
    expect(empty.links.incoming.size).toBe(0)
  })
})

describe('buildLinkIndex', () => {
  const model = buildCourseworkModel({
    hierarchy: {
      children: [
        {
          name: 'CS',
          children: [{
            name: 'g',
            children: [
              { id: 'cs-a', code: 'CSA100', name: 'A' },
              { id: 'cs-b', code: 'CSB200', name: 'B' }
            ]
          }]
        }
      ]
    }
  })

  test('resolves endpoints by course code', () => {
    const links = buildLinkIndex([{ source: 'CSA100', target: 'cs-b' }], model.courses)
    expect(links.outgoing.get('cs-a')).toEqual(['cs-b'])
    expect(links.incoming.get('cs-b')).toEqual(['cs-a'])
  })

  test('collapses repeated edges', () => {
    const links = buildLinkIndex(
      [{ source: 'cs-a', target: 'cs-b' }, { source: 'cs-a', target: 'cs-b' }],
      model.courses
    )
    expect(links.outgoing.get('cs-a')).toEqual(['cs-b'])
  })
})
