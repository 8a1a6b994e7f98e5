import type { CourseworkData } from '../types'

export const SAMPLE_DATA: CourseworkData = {
  hierarchy: {
    name: 'Coursework',
    children: [
      {
        name: 'Physics',
        children: [
          {
            name: 'Core',
            children: [
              { id: 'PHYS101', code: 'PHYS101', name: 'Mechanics' },
              { id: 'PHYS201', code: 'PHYS201', name: 'Waves' },
              { id: 'PHYS301', code: 'PHYS301', name: 'Quantum Mechanics' }
            ]
          }
        ]
      },
      {
        name: 'Computer Science',
        children: [
          {
            name: 'Programming',
            children: [
              {
                id: 'CS101',
                code: 'CS101',
                name: 'Intro to Programming',
                description: 'Variables, control flow and functions.'
              },
              { id: 'CS201', code: 'CS201', name: 'Data Structures' }
            ]
          }
        ]
      },
      {
        name: 'Economics',
        children: [
          {
            name: 'Electives',
            children: [
              { id: 'econ-intro', name: 'Principles of Economics', year: 1 }
            ]
          }
        ]
      }
    ]
  },
  links: [
    { source: 'CS101', target: 'CS201' },
    { source: 'PHYS101', target: 'PHYS201' },
    { source: 'PHYS201', target: 'PHYS301' },
    { source: 'econ-intro', target: 'PHYS301' },
    { source: 'CS101', target: 'GHOST999' }
  ],
  stages: [
    { name: 'Foundations', description: 'First-year core', courses: ['PHYS101', 'CS101', 'econ-intro'] },
    { name: 'Specialisation', courses: ['PHYS301', 'CS201'] }
  ]
}

export function jsonResponse(body: unknown, status: number = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' }
  })
}
