import { useCallback, useState } from 'react'
import { Link, useNavigate } from 'react-router-dom'
import { HandSwipeRight, Plus } from '@phosphor-icons/react'
import { useTranslation } from 'react-i18next'
import { SectionHeader } from '@/components/SectionHeader'
import { SwipeableRitualCard } from '@/components/SwipeableRitualCard'
import { Celebration } from '@/components/Celebration'
import { ritualCounts } from '@/utils/dashboard'
import type { DailyRitual } from '@/types'

interface RitualsSectionProps {
    rituals: DailyRitual[]
    onToggle: (ritual: DailyRitual) => void
}

export function RitualsSection({ rituals, onToggle }: RitualsSectionProps) {
    const { t } = useTranslation()
    const navigate = useNavigate()
    const [celebration, setCelebration] = useState<{ completed: number; total: number } | null>(null)
    const { completed, total } = ritualCounts(rituals)

    const dismissCelebration = useCallback(() => setCelebration(null), [])

    return (
        <section>
            <SectionHeader
                title={t('routines.title')}
                action={
                    <div className="flex items-center gap-3">
                        {total > 0 && (
                            <span className="px-2 py-0.5 rounded-full bg-earth-tan/20 text-earth-tan text-xs font-mono font-semibold">
                                {completed}/{total}
                            </span>
                        )}
                        <Link to="/rituals" className="text-sm font-mono text-earth-tan hover:text-earth-light">
                            {t('common.manage')}
                        </Link>
                    </div>
                }
            />

            {total === 0 ? (
                <div className="gradient-forest grain rounded-xl p-8 text-center">
                    <div className="relative z-20 space-y-3">
                        <div className="text-3xl">✨</div>
                        <div className="font-mono font-semibold text-earth-cream">{t('routines.no_routines')}</div>
                        <p className="text-sm font-mono text-earth-cream/50">{t('routines.no_routines_hint')}</p>
                        <Link
                            to="/rituals"
                            className="inline-flex items-center gap-2 px-4 py-2 bg-earth-tan text-forest-dark font-mono font-bold rounded-lg hover:bg-earth-light transition-colors"
                        >
                            <Plus weight="bold" size={16} />
                            {t('routines.add_routine')}
                        </Link>
                    </div>
                </div>
            ) : (
                <div className="space-y-2">
                    {rituals.map((ritual) => (
                        <SwipeableRitualCard
                            key={ritual.id}
                            ritual={ritual}
                            onComplete={() => onToggle(ritual)}
                            onUndo={() => onToggle(ritual)}
                            onCelebrate={() => setCelebration({ completed: completed + 1, total })}
                            onEdit={() => navigate('/rituals')}
                        />
                    ))}

                    {completed === 0 && (
                        <div className="flex items-center justify-center gap-2 pt-1 text-xs font-mono text-earth-cream/40">
                            <HandSwipeRight size={14} />
                            {t('routines.swipe_hint')}
                        </div>
                    )}
                </div>
            )}

            <Celebration
                isShowing={celebration !== null}
                completedCount={celebration?.completed ?? 0}
                totalCount={celebration?.total ?? 0}
                onDismiss={dismissCelebration}
            />
        </section>
    )
}
