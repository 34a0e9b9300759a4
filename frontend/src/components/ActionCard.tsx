import { motion } from 'framer-motion'
import { Flame, Moon, Sun } from '@phosphor-icons/react'
import { useTranslation } from 'react-i18next'
import { CTA_CONTENT } from '@/utils/dashboard'
import type { AdaptiveCTA, CTAIcon } from '@/utils/dashboard'

interface ActionCardProps {
    cta: AdaptiveCTA
    onAction: (cta: AdaptiveCTA) => void
}

const ICONS: Record<CTAIcon, typeof Sun> = {
    sun: Sun,
    flame: Flame,
    moon: Moon,
}

export function ActionCard({ cta, onAction }: ActionCardProps) {
    const { t } = useTranslation()
    const content = CTA_CONTENT[cta]
    const Icon = content.icon ? ICONS[content.icon] : null

    return (
        <motion.div
            className="gradient-earth grain rounded-xl p-6"
            initial={{ opacity: 0, y: 20 }}
            animate={{ opacity: 1, y: 0 }}
            transition={{ duration: 0.3 }}
        >
            <div className="relative z-20 space-y-4">
                <div className="flex items-start gap-3">
                    {Icon && <Icon size={28} weight="fill" className="text-earth-tan shrink-0" />}
                    <div>
                        <h2 className="text-lg font-bold font-mono text-earth-cream">{t(content.titleKey)}</h2>
                        <p className="text-sm font-mono text-earth-cream/70">{t(content.subtitleKey)}</p>
                    </div>
                </div>

                {cta === 'allCompleted' ? (
                    <div className="text-center font-mono font-semibold text-status-success">
                        {t('common.completed')}
                    </div>
                ) : (
                    <button
                        onClick={() => onAction(cta)}
                        className="w-full px-4 py-3 bg-earth-tan text-forest-dark font-mono font-bold rounded-lg hover:bg-earth-light transition-colors"
                    >
                        {t(content.buttonKey)}
                    </button>
                )}
            </div>
        </motion.div>
    )
}
