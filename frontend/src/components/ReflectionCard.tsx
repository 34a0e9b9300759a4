import { Link } from 'react-router-dom'
import { useTranslation } from 'react-i18next'
import { SectionHeader } from '@/components/SectionHeader'
import { cn } from '@/utils/helpers'
import type { EveningReview } from '@/types'

interface ReflectionCardProps {
    review: EveningReview
}

export function ReflectionCard({ review }: ReflectionCardProps) {
    const { t } = useTranslation()

    const entries = [
        { key: 'biggestWin', label: t('end_day.biggest_win'), emoji: '🏆', value: review.biggestWin, highlight: false },
        { key: 'bestMoment', label: t('end_day.best_moment'), emoji: '✨', value: review.bestMoment, highlight: false },
        { key: 'tomorrowGoal', label: t('end_day.tomorrow_goal'), emoji: '🎯', value: review.tomorrowGoal, highlight: true },
    ].filter((entry) => entry.value)

    return (
        <section>
            <SectionHeader
                title={t('dashboard.evening_reflection')}
                action={
                    <Link to="/end-of-day" className="text-sm font-mono text-earth-tan hover:text-earth-light">
                        {t('common.edit')}
                    </Link>
                }
            />

            <div className="gradient-forest grain rounded-xl p-5 space-y-3">
                {entries.map((entry) => (
                    <div
                        key={entry.key}
                        className={cn(
                            'relative z-20 rounded-lg p-3',
                            entry.highlight ? 'bg-earth-tan/15 border border-earth-tan/30' : 'bg-forest-dark/30'
                        )}
                    >
                        <div className="text-xs font-mono text-earth-cream/50 mb-1">
                            {entry.emoji} {entry.label}
                        </div>
                        <p className="text-sm font-mono text-earth-cream">{entry.value}</p>
                    </div>
                ))}
            </div>
        </section>
    )
}
