import { Link } from 'react-router-dom'
import { ArrowLeft } from '@phosphor-icons/react'
import { useTranslation } from 'react-i18next'

interface ComingSoonProps {
    titleKey: string
}

// Placeholder for the check-in, review and ritual management flows
export function ComingSoon({ titleKey }: ComingSoonProps) {
    const { t } = useTranslation()

    return (
        <div className="min-h-screen bg-forest-dark flex items-center justify-center p-6">
            <div className="gradient-forest grain rounded-xl p-8 max-w-md w-full text-center">
                <div className="relative z-20 space-y-4 font-mono">
                    <h1 className="text-2xl font-bold text-earth-cream">{t(titleKey)}</h1>
                    <p className="text-earth-cream/60">{t('common.coming_soon')}</p>
                    <Link
                        to="/"
                        className="inline-flex items-center gap-2 text-earth-tan hover:text-earth-light"
                    >
                        <ArrowLeft size={16} />
                        {t('common.back_to_dashboard')}
                    </Link>
                </div>
            </div>
        </div>
    )
}
