import React from 'react'
import ReactDOM from 'react-dom/client'
import CourseworkViz from './components/CourseworkViz'
import './styles/coursework.css'

const mount = document.getElementById('cw-viz')

if (mount) {
  ReactDOM.createRoot(mount).render(
    <React.StrictMode>
      <CourseworkViz />
    </React.StrictMode>
  )
} else {
  console.error('Coursework visualization mount point #cw-viz not found')
}
