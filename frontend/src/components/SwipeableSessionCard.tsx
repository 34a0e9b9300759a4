import { useState } from 'react'
import { motion } from 'framer-motion'
import { Fire, PencilSimple, Trash } from '@phosphor-icons/react'
import { useTranslation } from 'react-i18next'
import { useSwipeGesture } from '@/hooks/useSwipeGesture'
import { dragOffset, resolveSessionRelease, revealProgress, SESSION_OPEN_OFFSET } from '@/utils/swipe'
import { formatClock } from '@/utils/helpers'
import { formatSessionDuration, sessionStatus } from '@/utils/sessions'
import { haptic } from '@/utils/haptics'
import type { FocusSession } from '@/types'

interface SwipeableSessionCardProps {
    session: FocusSession
    questTitle?: string
    onEdit: (session: FocusSession) => void
    onDelete: (session: FocusSession) => void
}

const SPRING = { type: 'spring', stiffness: 400, damping: 30 } as const

export function SwipeableSessionCard({ session, questTitle, onEdit, onDelete }: SwipeableSessionCardProps) {
    const { t } = useTranslation()
    const [offset, setOffset] = useState(0)
    const [isOpen, setIsOpen] = useState(false)
    const [isDragging, setIsDragging] = useState(false)

    const close = () => {
        setOffset(0)
        setIsOpen(false)
    }

    const gesture = useSwipeGesture({
        onDrag: (translation) => {
            const next = dragOffset(translation, 'left')
            if (next === null) return
            setIsDragging(true)
            setOffset(next)
        },
        onRelease: (translation) => {
            setIsDragging(false)
            if (resolveSessionRelease(translation) === 'open') {
                setOffset(SESSION_OPEN_OFFSET)
                setIsOpen(true)
                haptic('light')
            } else {
                close()
            }
        },
        onTap: () => {
            if (isOpen) close()
        },
    })

    const progress = revealProgress(offset)
    const status = sessionStatus(session)

    return (
        <div className="relative overflow-hidden rounded-xl">
            {/* Revealed actions, mounted only while the card is pulled left */}
            {offset < 0 && (
                <div
                    className="absolute inset-y-0 right-0 flex"
                    style={{ opacity: progress, transform: `scale(${0.8 + progress * 0.2})` }}
                >
                    <button
                        onClick={() => {
                            close()
                            onEdit(session)
                        }}
                        aria-label={t('common.edit')}
                        className="w-[60px] flex flex-col items-center justify-center gap-1 bg-earth-tan text-forest-dark text-xs font-mono"
                    >
                        <PencilSimple size={18} weight="bold" />
                        {t('common.edit')}
                    </button>
                    <button
                        onClick={() => {
                            close()
                            onDelete(session)
                        }}
                        aria-label={t('common.delete')}
                        className="w-[60px] flex flex-col items-center justify-center gap-1 bg-status-error text-earth-cream text-xs font-mono"
                    >
                        <Trash size={18} weight="bold" />
                        {t('common.delete')}
                    </button>
                </div>
            )}

            {/* Card */}
            <motion.div
                data-testid="session-card"
                {...gesture}
                animate={{ x: offset }}
                transition={isDragging ? { duration: 0 } : SPRING}
                style={{ touchAction: 'pan-y' }}
                className="relative bg-forest-light rounded-xl border border-earth-cream/5 p-3 flex items-center gap-3 cursor-grab select-none"
            >
                <div className="w-9 h-9 rounded-full bg-flame/15 flex items-center justify-center shrink-0">
                    <Fire size={18} weight="fill" className="text-flame" />
                </div>

                <div className="flex-1 min-w-0">
                    <div className="text-sm font-mono font-semibold text-earth-cream truncate">
                        {session.description || t('fire.focus_session')}
                    </div>
                    <div className="text-xs font-mono text-earth-cream/50 truncate">
                        {formatClock(session.startTime)}
                        {questTitle && ` · ${questTitle}`}
                        {status === 'inProgress' && ` · ${t('fire.in_progress')}`}
                    </div>
                </div>

                <span className="text-sm font-mono font-bold text-earth-tan">
                    {formatSessionDuration(session)}
                </span>
            </motion.div>
        </div>
    )
}
