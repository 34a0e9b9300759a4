import { Component } from 'react'
import type { ErrorInfo, ReactNode } from 'react'
import { Warning } from '@phosphor-icons/react'
import { useTranslation } from 'react-i18next'

interface Props {
  children: ReactNode
}

interface State {
  hasError: boolean
  error: Error | null
}

function ErrorPanel({ error, onReload }: { error: Error | null; onReload: () => void }) {
  const { t } = useTranslation()

  return (
    <div className="min-h-screen flex items-center justify-center bg-forest-dark p-6">
      <div className="max-w-md w-full gradient-forest grain rounded-xl border border-status-error/40 shadow-lg p-6">
        <div className="flex items-center gap-3 mb-4">
          <Warning className="w-6 h-6 text-status-error" weight="fill" />
          <h1 className="text-xl font-bold font-mono text-earth-cream">{t('common.error_title')}</h1>
        </div>
        <p className="text-sm font-mono text-earth-cream/60 mb-4">
          {error?.message || t('common.error_fallback')}
        </p>
        <button
          onClick={onReload}
          className="w-full px-4 py-2 bg-status-error text-earth-cream rounded-lg font-mono font-semibold hover:bg-status-error/80 transition-colors"
        >
          {t('common.reload')}
        </button>
      </div>
    </div>
  )
}

export class ErrorBoundary extends Component<Props, State> {
  constructor(props: Props) {
    super(props)
    this.state = { hasError: false, error: null }
  }

  static getDerivedStateFromError(error: Error): State {
    return { hasError: true, error }
  }

  componentDidCatch(error: Error, errorInfo: ErrorInfo) {
    console.error('Error caught by boundary:', error, errorInfo)
  }

  render() {
    if (this.state.hasError) {
      return (
        <ErrorPanel
          error={this.state.error}
          onReload={() => {
            this.setState({ hasError: false, error: null })
            window.location.reload()
          }}
        />
      )
    }

    return this.props.children
  }
}
