import { StrictMode } from 'react'
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest'
import { fireEvent, render, screen, waitFor, within } from '@testing-library/react'
import { CourseworkViz } from '../CourseworkViz'
import type { FetchLike } from '../../utils/loadCoursework'
import { jsonResponse, SAMPLE_DATA } from '../../test/fixtures'

const okFetch: FetchLike = async () => jsonResponse(SAMPLE_DATA)

function rect(width: number, height: number): DOMRect {
  return { x: 0, y: 0, top: 0, left: 0, right: width, bottom: height, width, height, toJSON: () => ({}) }
}

async function findTile(id: string): Promise<Element> {
  return waitFor(() => {
    const tile = document.querySelector(`[data-cw-id="${id}"]`)
    if (!tile) throw new Error(`tile ${id} not drawn`)
    return tile
  })
}

beforeEach(() => {
  vi.spyOn(Element.prototype, 'getBoundingClientRect').mockReturnValue(rect(800, 400))
})

afterEach(() => {
  vi.restoreAllMocks()
})

describe('CourseworkViz', () => {
  test('shows the failure text when the resource is unavailable', async () => {
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => undefined)
    render(<CourseworkViz dataUrl="/data.json" fetchImpl={async () => jsonResponse({}, 500)} />)

    expect((await screen.findByRole('alert')).textContent).toBe('Failed to load visualization.')
    expect(consoleError).toHaveBeenCalled()
    expect(document.querySelector('svg')).toBeNull()
  })

  test('treats a duplicate course id as a load failure', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined)
    const duplicated = {
      hierarchy: {
        children: [
          { name: 'A', children: [{ name: 'g', children: [{ id: 'X1', name: 'One' }, { id: 'X1', name: 'Two' }] }] }
        ]
      }
    }
    render(<CourseworkViz dataUrl="/data.json" fetchImpl={async () => jsonResponse(duplicated)} />)

    expect(await screen.findByText('Failed to load visualization.')).toBeDefined()
  })

  test('draws one tile per course and shows the placeholder', async () => {
    render(<CourseworkViz dataUrl="/data.json" fetchImpl={okFetch} initialLayout="treemap" />)

    await findTile('CS201')
    expect(document.querySelectorAll('.cw-tile')).toHaveLength(6)
    expect(screen.getByText(
      'Select a course tile to see its description, plan stages, and prerequisite links.'
    )).toBeDefined()
  })

  test('selecting a tile fills the detail panel', async () => {
    render(<CourseworkViz dataUrl="/data.json" fetchImpl={okFetch} initialLayout="treemap" />)

    fireEvent.click(await findTile('CS201'))

    expect(await screen.findByRole('heading', { name: 'CS201 · Data Structures' })).toBeDefined()
    const prerequisites = screen.getByRole('region', { name: 'Prerequisites' })
    expect(within(prerequisites).getByRole('button', { name: 'CS101 · Intro to Programming' })).toBeDefined()
    const unlocks = screen.getByRole('region', { name: 'Unlocks' })
    expect(within(unlocks).getByText('No downstream links recorded.')).toBeDefined()

    const tile = await findTile('CS201')
    expect(tile.classList.contains('is-selected')).toBe(true)
    expect(document.querySelectorAll('.cw-tile.is-selected')).toHaveLength(1)
  })

  test('Escape clears the selection', async () => {
    render(<CourseworkViz dataUrl="/data.json" fetchImpl={okFetch} initialLayout="treemap" />)

    fireEvent.click(await findTile('PHYS101'))
    await screen.findByRole('heading', { name: 'PHYS101 · Mechanics' })
    expect(document.querySelector('.cw-viz')?.getAttribute('data-cw-phase')).toBe('selected')

    fireEvent.keyDown(window, { key: 'Escape' })
    expect(await screen.findByText(
      'Select a course tile to see its description, plan stages, and prerequisite links.'
    )).toBeDefined()
    expect(document.querySelectorAll('.cw-tile.is-selected')).toHaveLength(0)
    expect(document.querySelector('.cw-viz')?.getAttribute('data-cw-phase')).toBe('idle')
  })

  test('focusing another subject drops the selection and the other tiles', async () => {
    render(<CourseworkViz dataUrl="/data.json" fetchImpl={okFetch} initialLayout="treemap" />)

    fireEvent.click(await findTile('CS201'))
    await screen.findByRole('heading', { name: 'CS201 · Data Structures' })

    const legend = screen.getByRole('group', { name: 'Filter by subject' })
    fireEvent.click(within(legend).getByRole('button', { name: 'Physics' }))

    await waitFor(() => {
      expect(document.querySelectorAll('.cw-tile')).toHaveLength(3)
    })
    expect(document.querySelector('[data-cw-id="CS201"]')).toBeNull()
    expect(screen.queryByRole('heading', { name: 'CS201 · Data Structures' })).toBeNull()
  })

  test('hovering a tile shows its tooltip', async () => {
    render(<CourseworkViz dataUrl="/data.json" fetchImpl={okFetch} initialLayout="treemap" />)

    fireEvent.mouseEnter(await findTile('CS201'))

    const tooltip = await screen.findByRole('tooltip')
    expect(within(tooltip).getByText('Specialisation')).toBeDefined()
    expect(within(tooltip).getByText('Click to pin details →')).toBeDefined()
  })

  test('switching layouts keeps the selection', async () => {
    render(<CourseworkViz dataUrl="/data.json" fetchImpl={okFetch} initialLayout="treemap" />)

    fireEvent.click(await findTile('CS201'))
    fireEvent.click(screen.getByRole('tab', { name: 'Sunburst' }))

    await waitFor(() => {
      expect(document.querySelector('svg')?.getAttribute('aria-label')).toBe('Coursework sunburst')
    })
    expect((await findTile('CS201')).classList.contains('is-selected')).toBe(true)
    expect(screen.getByRole('heading', { name: 'CS201 · Data Structures' })).toBeDefined()
  })

  test('requests the resource once under StrictMode', async () => {
    const fetchImpl = vi.fn(okFetch)
    render(
      <StrictMode>
        <CourseworkViz dataUrl="/data.json" fetchImpl={fetchImpl} initialLayout="treemap" />
      </StrictMode>
    )

    await findTile('CS201')
    expect(fetchImpl).toHaveBeenCalledTimes(1)
  })

  test('with a focus, links to other subjects cannot be followed', async () => {
    render(<CourseworkViz dataUrl="/data.json" fetchImpl={okFetch} initialLayout="treemap" />)
    await findTile('PHYS301')

    const legend = screen.getByRole('group', { name: 'Filter by subject' })
    fireEvent.click(within(legend).getByRole('button', { name: 'Physics' }))
    await waitFor(() => {
      expect(document.querySelectorAll('.cw-tile')).toHaveLength(3)
    })

    fireEvent.click(await findTile('PHYS301'))
    await screen.findByRole('heading', { name: 'PHYS301 · Quantum Mechanics' })

    const prerequisites = screen.getByRole('region', { name: 'Prerequisites' })
    expect(within(prerequisites).queryByRole('button', { name: 'Principles of Economics' })).toBeNull()
    fireEvent.click(within(prerequisites).getByText('Principles of Economics'))

    expect(screen.getByRole('heading', { name: 'PHYS301 · Quantum Mechanics' })).toBeDefined()
    expect(document.querySelector('.cw-viz')?.getAttribute('data-cw-phase')).toBe('focusedAndSelected')
  })

  test('courses dimmed by the focus ignore the keyboard', async () => {
    render(<CourseworkViz dataUrl="/data.json" fetchImpl={okFetch} initialLayout="radial-tree" />)
    await findTile('CS201')

    const legend = screen.getByRole('group', { name: 'Filter by subject' })
    fireEvent.click(within(legend).getByRole('button', { name: 'Physics' }))

    await waitFor(() => {
      expect(document.querySelector('[data-cw-id="CS201"]')?.getAttribute('tabindex')).toBe('-1')
    })
    const dimmed = await findTile('CS201')
    expect(dimmed.getAttribute('aria-hidden')).toBe('true')
    expect((await findTile('PHYS101')).getAttribute('tabindex')).toBe('0')

    fireEvent.keyDown(dimmed, { key: 'Enter' })
    fireEvent.click(dimmed)

    expect(screen.getByText(
      'Select a course tile to see its description, plan stages, and prerequisite links.'
    )).toBeDefined()
    expect(document.querySelector('.cw-viz')?.getAttribute('data-cw-phase')).toBe('focused')
  })

  test('the tooltip lists stage descriptions', async () => {
    render(<CourseworkViz dataUrl="/data.json" fetchImpl={okFetch} initialLayout="treemap" />)

    fireEvent.mouseEnter(await findTile('PHYS101'))

    const tooltip = await screen.findByRole('tooltip')
    expect(within(tooltip).getByText('Foundations')).toBeDefined()
    expect(within(tooltip).getByText('First-year core')).toBeDefined()
  })
})
