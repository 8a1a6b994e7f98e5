/**
 * Fetches the coursework resource once per page view.
 */

import type { CourseworkModel } from '../types'
import { buildCourseworkModel } from './courseIndex'
import { debug } from './debug'

export class CourseworkLoadError extends Error {
  readonly status: number | null

  constructor(message: string, status: number | null = null) {
    super(message)
    this.name = 'CourseworkLoadError'
    this.status = status
  }
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>

/**
 * GETs the JSON document and builds the model from it.
 *
 * @throws CourseworkLoadError on network failure, non-2xx status or a body
 *   that is not JSON
 * @throws DuplicateCourseIdError when the hierarchy repeats a course id
 */
export async function loadCoursework(
  url: string,
  fetchImpl: FetchLike = (input, init) => fetch(input, init)
): Promise<CourseworkModel> {
  let response: Response
  try {
    response = await fetchImpl(url, { cache: 'no-store' })
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err)
    throw new CourseworkLoadError(`Network error loading ${url}: ${reason}`)
  }

  if (!response.ok) {
    throw new CourseworkLoadError(`Failed to load: ${response.status}`, response.status)
  }

  let data: unknown
  try {
    data = await response.json()
  } catch {
    throw new CourseworkLoadError(`Invalid JSON in ${url}`, response.status)
  }

  debug.data('Loaded', url)
  return buildCourseworkModel(data)
}
