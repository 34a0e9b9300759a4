import { CheckCircle, Lock } from '@phosphor-icons/react'
import { useTranslation } from 'react-i18next'
import { Sheet } from '@/components/Sheet'
import { cn } from '@/utils/helpers'
import { currentFlameLevel, daysToLevel, nextFlameLevel } from '@/utils/dashboard'
import type { StreakInfo } from '@/types'

interface FlameInfoSheetProps {
    isOpen: boolean
    streak: StreakInfo
    onClose: () => void
}

export function FlameInfoSheet({ isOpen, streak, onClose }: FlameInfoSheetProps) {
    const { t } = useTranslation()
    const current = currentFlameLevel(streak.flameLevels)
    const next = nextFlameLevel(streak.flameLevels)
    const validation = streak.todayValidation

    return (
        <Sheet isOpen={isOpen} title={t('flame.info_title')} onClose={onClose}>
            <div className="space-y-6 font-mono">
                {/* Current level */}
                <div className="gradient-flame rounded-xl p-5 text-center text-earth-cream">
                    <div className="text-5xl mb-2">{current?.icon ?? '🔥'}</div>
                    {current && <div className="text-lg font-bold">{current.name}</div>}
                    <div className="text-sm opacity-90">{t('streak.day_count', { day: streak.currentStreak })}</div>
                </div>

                {/* Next level */}
                {next ? (
                    <div className="bg-forest-light rounded-xl p-4">
                        <div className="text-xs text-earth-cream/50 mb-2">{t('flame.next_level')}</div>
                        <div className="flex items-center justify-between">
                            <div className="flex items-center gap-2 text-earth-cream">
                                <span className="text-2xl">{next.icon}</span>
                                <span className="font-semibold">{next.name}</span>
                            </div>
                            <span className="text-sm text-earth-tan">
                                {t('flame.days_remaining', { count: daysToLevel(next, streak.currentStreak) })}
                            </span>
                        </div>
                        <div className="mt-3 h-2 bg-forest-dark/60 rounded-full overflow-hidden">
                            <div
                                className="h-full bg-flame rounded-full"
                                style={{ width: `${Math.min(100, (streak.currentStreak / Math.max(1, next.daysRequired)) * 100)}%` }}
                            />
                        </div>
                        <div className="text-xs text-earth-cream/50 mt-1 text-right">
                            {streak.currentStreak}/{next.daysRequired}
                        </div>
                    </div>
                ) : (
                    streak.flameLevels.length > 0 && (
                        <p className="text-sm text-center text-earth-tan">{t('flame.max_level')}</p>
                    )
                )}

                {/* All levels */}
                {streak.flameLevels.length > 0 && (
                    <div>
                        <h3 className="text-sm font-semibold text-earth-cream/70 mb-2">{t('flame.all_levels')}</h3>
                        <ul className="space-y-2">
                            {streak.flameLevels.map((level) => (
                                <li
                                    key={level.level}
                                    data-state={level.isCurrent ? 'current' : level.isUnlocked ? 'unlocked' : 'locked'}
                                    className={cn(
                                        'flex items-center gap-3 rounded-lg px-3 py-2',
                                        level.isCurrent ? 'bg-flame/20 border border-flame/50' : 'bg-forest-light',
                                        !level.isUnlocked && 'opacity-50'
                                    )}
                                >
                                    <span className="text-xl">{level.icon}</span>
                                    <span className="flex-1 text-sm text-earth-cream">{level.name}</span>
                                    <span className="text-xs text-earth-cream/50">{t('flame.days_required', { count: level.daysRequired })}</span>
                                    {level.isCurrent ? (
                                        <span className="text-xs text-flame font-semibold">{t('flame.current')}</span>
                                    ) : level.isUnlocked ? (
                                        <CheckCircle size={16} weight="fill" className="text-status-success" />
                                    ) : (
                                        <Lock size={16} className="text-earth-cream/40" />
                                    )}
                                </li>
                            ))}
                        </ul>
                    </div>
                )}

                {/* Today's requirements */}
                <div>
                    <h3 className="text-sm font-semibold text-earth-cream/70 mb-2">{t('flame.how_to_maintain')}</h3>
                    {validation ? (
                        <ul className="space-y-2 text-sm">
                            <li className="flex items-center gap-2 text-earth-cream">
                                <CheckCircle
                                    size={16}
                                    weight={validation.meetsCompletionRate ? 'fill' : 'regular'}
                                    className={validation.meetsCompletionRate ? 'text-status-success' : 'text-earth-cream/40'}
                                />
                                {t('streak.requirement_completion', { percent: validation.requiredCompletionRate })}
                            </li>
                            <li className="flex items-center gap-2 text-earth-cream">
                                <CheckCircle
                                    size={16}
                                    weight={validation.meetsMinTasks ? 'fill' : 'regular'}
                                    className={validation.meetsMinTasks ? 'text-status-success' : 'text-earth-cream/40'}
                                />
                                {t('streak.requirement_tasks', { count: validation.requiredMinTasks })}
                            </li>
                        </ul>
                    ) : (
                        <p className="text-sm text-earth-cream/50">{t('flame.requirements_loading')}</p>
                    )}
                </div>
            </div>
        </Sheet>
    )
}
