/// <reference types="vite/client" />

interface ImportMetaEnv {
  /** One of treemap | sunburst | radial-tree | circle-pack */
  readonly VITE_COURSEWORK_LAYOUT?: string
}

interface ImportMeta {
  readonly env: ImportMetaEnv
}
