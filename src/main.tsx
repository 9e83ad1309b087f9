import { StrictMode } from 'react'
import { createRoot } from 'react-dom/client'
import { BrowserRouter } from 'react-router-dom'
import App from './App'
import { bootstrapDashboard } from './services/startup'
import './index.css'

// Load once, before the first render; the page only ever reads the result
const startup = bootstrapDashboard()

const root = document.getElementById('root')
if (!root) throw new Error('Missing #root element')

createRoot(root).render(
  <StrictMode>
    <BrowserRouter>
      <App startup={startup} />
    </BrowserRouter>
  </StrictMode>
)
