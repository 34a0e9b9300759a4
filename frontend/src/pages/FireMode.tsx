import { useMemo, useState } from 'react'
import { Link, useLocation } from 'react-router-dom'
import { ArrowLeft, ClockCounterClockwise, Pause, Play, Stop } from '@phosphor-icons/react'
import { useTranslation } from 'react-i18next'
import CountdownTimer from '@/components/CountdownTimer'
import { DayTimeline } from '@/components/DayTimeline'
import { LogSessionSheet } from '@/components/sheets/LogSessionSheet'
import { useFocusTimer } from '@/hooks/useFocusTimer'
import { useDashboard } from '@/hooks/useDashboard'
import { cn } from '@/utils/helpers'
import { designSystem } from '@/utils/designSystem'
import { launchFromState, timerProgress } from '@/utils/fireMode'
import type { TimerStatus } from '@/utils/fireMode'

const CAPTION_KEYS: Record<TimerStatus, string> = {
    idle: 'fire.ready_to_focus',
    running: 'fire.focus',
    paused: 'fire.paused',
    completed: 'fire.complete',
}

export function FireMode() {
    const { t } = useTranslation()
    const location = useLocation()
    const launch = useMemo(() => launchFromState(location.state), [location.state])
    const { timer, start, pause, resume, stop } = useFocusTimer(launch)
    const { data, logSession } = useDashboard()
    const [isLogOpen, setIsLogOpen] = useState(false)

    const questTitle = data?.quests.find((quest) => quest.id === launch.questId)?.title

    return (
        <div className="min-h-screen bg-forest-dark px-4 py-8">
            <div className="relative z-10 max-w-xl mx-auto space-y-8">
                <div className="flex items-center gap-3">
                    <Link
                        to="/"
                        aria-label={t('common.back_to_dashboard')}
                        className="p-2 rounded-lg text-earth-cream/60 hover:text-earth-cream hover:bg-forest-light"
                    >
                        <ArrowLeft size={20} />
                    </Link>
                    <div>
                        <h1 className="text-3xl font-bold font-mono text-earth-cream">🔥 {t('fire.title')}</h1>
                        <p className="text-earth-cream/60 font-mono text-sm">{t('fire.subtitle')}</p>
                    </div>
                </div>

                {(launch.description || questTitle) && (
                    <div className={cn(designSystem.card.subtle, 'font-mono text-sm space-y-1')}>
                        {launch.description && <p className="text-earth-cream">{launch.description}</p>}
                        {questTitle && (
                            <p className="text-earth-cream/60">
                                {t('fire.quest')}: {questTitle}
                            </p>
                        )}
                    </div>
                )}

                <CountdownTimer
                    remainingSeconds={timer.remainingSeconds}
                    progress={timerProgress(timer)}
                    caption={t(CAPTION_KEYS[timer.status])}
                />

                {/* Controls */}
                <div className="flex justify-center gap-3">
                    {timer.status === 'idle' && (
                        <button onClick={start} className={cn(designSystem.button.primary, 'px-8')}>
                            <Play size={18} weight="fill" />
                            {t('fire.start_session')}
                        </button>
                    )}
                    {timer.status === 'running' && (
                        <button onClick={pause} className={designSystem.button.secondary}>
                            <Pause size={18} weight="fill" />
                            {t('fire.pause')}
                        </button>
                    )}
                    {timer.status === 'paused' && (
                        <button onClick={resume} className={designSystem.button.secondary}>
                            <Play size={18} weight="fill" />
                            {t('fire.resume')}
                        </button>
                    )}
                    {(timer.status === 'running' || timer.status === 'paused') && (
                        <button onClick={stop} className={designSystem.button.danger}>
                            <Stop size={18} weight="fill" />
                            {t('fire.stop_session')}
                        </button>
                    )}
                    {timer.status === 'completed' && (
                        <p className="font-mono font-semibold text-status-success">{t('fire.great_work')}</p>
                    )}
                </div>

                {timer.status === 'idle' && (
                    <div className="flex justify-center">
                        <button onClick={() => setIsLogOpen(true)} className={designSystem.button.secondary}>
                            <ClockCounterClockwise size={18} />
                            {t('fire.log_past_session')}
                        </button>
                    </div>
                )}

                {data && data.todaysSessions.length > 0 ? (
                    <DayTimeline label={t('time.today')} sessions={data.todaysSessions} />
                ) : (
                    <p className="text-center text-sm font-mono text-earth-cream/50">{t('fire.ready_subtitle')}</p>
                )}
            </div>

            <LogSessionSheet
                isOpen={isLogOpen}
                quests={data?.quests ?? []}
                onClose={() => setIsLogOpen(false)}
                onLog={(log) => void logSession(log)}
            />
        </div>
    )
}
