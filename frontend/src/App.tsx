import { BrowserRouter, Routes, Route } from 'react-router-dom'
import { LanguageProvider } from './contexts/LanguageContext'
import { ErrorBoundary } from './components/ErrorBoundary'
import { Dashboard } from './pages/Dashboard'
import { FireMode } from './pages/FireMode'
import { ComingSoon } from './pages/ComingSoon'
import './index.css'

function AppContent() {
  return (
    <Routes>
      <Route path="/" element={<Dashboard />} />
      <Route path="/fire-mode" element={<FireMode />} />
      <Route path="/start-the-day" element={<ComingSoon titleKey="start_day.title" />} />
      <Route path="/end-of-day" element={<ComingSoon titleKey="end_day.title" />} />
      <Route path="/rituals" element={<ComingSoon titleKey="routines.title" />} />
    </Routes>
  )
}

function App() {
  return (
    <LanguageProvider>
      <ErrorBoundary>
        <BrowserRouter>
          <AppContent />
        </BrowserRouter>
      </ErrorBoundary>
    </LanguageProvider>
  )
}

export default App
