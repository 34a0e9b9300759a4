import { useMemo, useState } from 'react'
import { Link } from 'react-router-dom'
import { CaretDown, CaretRight, HandSwipeLeft, PlusCircle } from '@phosphor-icons/react'
import { useTranslation } from 'react-i18next'
import { useLanguage } from '@/contexts/LanguageContext'
import { SectionHeader } from '@/components/SectionHeader'
import { SwipeableSessionCard } from '@/components/SwipeableSessionCard'
import { formatDayHeader, formatDayMonth } from '@/utils/helpers'
import {
    groupSessionsByDay,
    hiddenSessionCount,
    showSwipeHint,
    thisWeekSessions,
    totalActualMinutes,
    visibleSessions,
    weekBounds,
} from '@/utils/sessions'
import type { DayGroup } from '@/utils/sessions'
import type { FocusSession, Quest } from '@/types'

interface WeekSessionsSectionProps {
    sessions: FocusSession[]
    quests: Quest[]
    now: Date
    onEdit: (session: FocusSession) => void
    onDelete: (session: FocusSession) => void
}

export function WeekSessionsSection({ sessions, quests, now, onEdit, onDelete }: WeekSessionsSectionProps) {
    const { t } = useTranslation()
    const { locale } = useLanguage()
    const [expandedDays, setExpandedDays] = useState<Set<string>>(() => new Set())
    const [isYesterdayOpen, setIsYesterdayOpen] = useState(false)

    const weekSessions = useMemo(() => thisWeekSessions(sessions, now), [sessions, now])
    const groups = useMemo(() => groupSessionsByDay(sessions, now), [sessions, now])
    const { start, end } = weekBounds(now)

    if (weekSessions.length === 0) return null

    const questTitle = (questId?: string) => quests.find((quest) => quest.id === questId)?.title

    const toggleExpanded = (key: string) => {
        setExpandedDays((current) => {
            const next = new Set(current)
            if (next.has(key)) {
                next.delete(key)
            } else {
                next.add(key)
            }
            return next
        })
    }

    const renderSessions = (group: DayGroup) => {
        const isExpanded = expandedDays.has(group.key)
        const hidden = hiddenSessionCount(group.sessions)
        return (
            <div className="space-y-2">
                {visibleSessions(group.sessions, isExpanded).map((session) => (
                    <SwipeableSessionCard
                        key={session.id}
                        session={session}
                        questTitle={questTitle(session.questId)}
                        onEdit={onEdit}
                        onDelete={onDelete}
                    />
                ))}
                {hidden > 0 && (
                    <button
                        onClick={() => toggleExpanded(group.key)}
                        className="w-full py-2 text-xs font-mono text-earth-tan hover:text-earth-light"
                    >
                        {isExpanded ? t('common.show_less') : t('common.see_more', { count: hidden })}
                    </button>
                )}
            </div>
        )
    }

    const dayHeaderClass = 'text-xs font-mono font-semibold uppercase text-earth-cream/50'

    return (
        <section>
            <SectionHeader
                title={t('dashboard.sessions_this_week')}
                subtitle={`${formatDayMonth(start, locale)} - ${formatDayMonth(end, locale)}`}
            />

            <div className="gradient-forest grain rounded-xl p-5 space-y-5">
                <div className="relative z-20 flex items-center justify-between">
                    <div>
                        <div className="font-mono font-semibold text-earth-cream">{t('stats.focus_sessions')}</div>
                        <div className="text-xs font-mono text-earth-cream/50">
                            {t('dashboard.sessions_summary', { count: weekSessions.length, total: `${totalActualMinutes(weekSessions)}m` })}
                        </div>
                    </div>
                    <Link to="/fire-mode" className="flex items-center gap-1 text-xs font-mono text-earth-tan hover:text-earth-light">
                        <PlusCircle size={16} weight="fill" />
                        {t('common.new')}
                    </Link>
                </div>

                {groups.map((group) => (
                    <div key={group.key} className="relative z-20 space-y-2">
                        {group.kind === 'today' && (
                            <>
                                <div className={dayHeaderClass}>{t('time.today')}</div>
                                {renderSessions(group)}
                            </>
                        )}

                        {group.kind === 'yesterday' && (
                            <>
                                <button
                                    onClick={() => setIsYesterdayOpen((open) => !open)}
                                    aria-expanded={isYesterdayOpen}
                                    className={`${dayHeaderClass} w-full flex items-center justify-between hover:text-earth-cream`}
                                >
                                    <span>{t('time.yesterday')} ({group.sessions.length})</span>
                                    {isYesterdayOpen ? <CaretDown size={14} /> : <CaretRight size={14} />}
                                </button>
                                {isYesterdayOpen && renderSessions(group)}
                            </>
                        )}

                        {group.kind === 'older' && (
                            <div className={`${dayHeaderClass} flex items-center justify-between`}>
                                <span>{formatDayHeader(group.date, locale)}</span>
                                <span>{group.sessions.length}</span>
                            </div>
                        )}
                    </div>
                ))}

                {showSwipeHint(weekSessions.length) && (
                    <div className="relative z-20 flex items-center justify-center gap-2 text-xs font-mono text-earth-cream/40">
                        <HandSwipeLeft size={14} />
                        {t('dashboard.swipe_hint')}
                    </div>
                )}
            </div>
        </section>
    )
}
