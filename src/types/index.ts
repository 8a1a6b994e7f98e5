/**
 * Type definitions for the coursework hierarchy visualization
 */

// ============================================
// Raw resource (courses.json)
// ============================================

export interface RawCourse {
  id?: string
  code?: string
  name: string
  year?: string | number
  description?: string
}

export interface RawGroup {
  name: string
  children?: RawCourse[]
}

export interface RawSubject {
  name: string
  children?: RawGroup[]
}

export interface RawHierarchy {
  name?: string
  children?: RawSubject[]
}

export interface RawLink {
  source: string
  target: string
}

export interface RawStage {
  name: string
  description?: string
  courses?: string[]
}

export interface CourseworkData {
  hierarchy: RawHierarchy
  links?: RawLink[]
  stages?: RawStage[]
}

// ============================================
// Normalized model
// ============================================

export type TreeNodeKind = 'root' | 'subject' | 'group' | 'course'

export interface CourseFields {
  code: string | null
  year: string | null
  description: string | null
}

/** Normalized hierarchy node; depth is fixed by kind (0..3) */
export interface CourseTreeNode {
  key: string
  name: string
  kind: TreeNodeKind
  courseId?: string
  course?: CourseFields
  children: CourseTreeNode[]
}

export interface PlanStage {
  name: string
  description: string
}

export interface CourseMeta {
  id: string
  code: string | null
  name: string
  full: string          // "CODE · Name" or just the name
  category: string      // Depth-1 ancestor (subject)
  group: string | null  // Depth-2 ancestor
  year: string | null
  description: string | null
  stages: PlanStage[]
}

export interface LinkIndex {
  incoming: Map<string, string[]>  // prerequisites
  outgoing: Map<string, string[]>  // unlocks
}

export interface CourseworkModel {
  tree: CourseTreeNode
  courses: Map<string, CourseMeta>
  links: LinkIndex
  subjects: string[]
}

// ============================================
// View state
// ============================================

export interface ViewState {
  selectedId: string | null
  focusedSubject: string | null
}

export type InteractionPhase = 'idle' | 'focused' | 'selected' | 'focusedAndSelected'

export type ThemeMode = 'light' | 'dark'

export interface Size {
  width: number
  height: number
}
