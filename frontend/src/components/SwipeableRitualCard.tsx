import { useState } from 'react'
import { motion } from 'framer-motion'
import { ArrowUUpLeft, Check } from '@phosphor-icons/react'
import { useSwipeGesture } from '@/hooks/useSwipeGesture'
import { useTimeouts } from '@/hooks/useTimeouts'
import {
    dragOffset,
    resolveRitualRelease,
    revealProgress,
    RITUAL_COMPLETE_NUDGE,
    RITUAL_UNDO_NUDGE,
    ritualSwipeDirection,
} from '@/utils/swipe'
import { cn } from '@/utils/helpers'
import { haptic } from '@/utils/haptics'
import type { DailyRitual } from '@/types'

export const NUDGE_MS = 150
export const COMPLETE_SETTLE_MS = 500
export const UNDO_SETTLE_MS = 300

interface SwipeableRitualCardProps {
    ritual: DailyRitual
    onComplete: () => void
    onUndo?: () => void
    onCelebrate?: () => void
    onEdit?: () => void
}

const SPRING = { type: 'spring', stiffness: 380, damping: 28 } as const

export function SwipeableRitualCard({ ritual, onComplete, onUndo, onCelebrate, onEdit }: SwipeableRitualCardProps) {
    const schedule = useTimeouts()
    const [offset, setOffset] = useState(0)
    const [scale, setScale] = useState(1)
    const [isDragging, setIsDragging] = useState(false)
    const [isAnimating, setIsAnimating] = useState(false)
    const [showSuccess, setShowSuccess] = useState(false)

    const completeRitual = () => {
        setIsAnimating(true)
        haptic('success')
        setOffset(RITUAL_COMPLETE_NUDGE)
        setScale(0.98)

        schedule(() => {
            setOffset(0)
            setScale(1)
            setShowSuccess(true)
            onCelebrate?.()
            onComplete()
            schedule(() => {
                setIsAnimating(false)
                setShowSuccess(false)
            }, COMPLETE_SETTLE_MS)
        }, NUDGE_MS)
    }

    const undoRitual = () => {
        setIsAnimating(true)
        haptic('light')
        setOffset(RITUAL_UNDO_NUDGE)
        setScale(0.98)

        schedule(() => {
            setOffset(0)
            setScale(1)
            onUndo?.()
            schedule(() => setIsAnimating(false), UNDO_SETTLE_MS)
        }, NUDGE_MS)
    }

    const gesture = useSwipeGesture({
        disabled: isAnimating,
        onDrag: (translation) => {
            const next = dragOffset(translation, ritualSwipeDirection(ritual.isCompleted))
            if (next === null) return
            setIsDragging(true)
            setOffset(next)
        },
        onRelease: (translation) => {
            setIsDragging(false)
            const release = resolveRitualRelease(translation, ritual.isCompleted)
            if (release === 'complete') {
                completeRitual()
            } else if (release === 'undo') {
                undoRitual()
            } else {
                setOffset(0)
            }
        },
        onTap: onEdit
            ? () => {
                haptic('light')
                onEdit()
            }
            : undefined,
    })

    const progress = revealProgress(offset)
    const checked = ritual.isCompleted || showSuccess

    return (
        <div className="relative rounded-xl">
            {/* Complete (right swipe) */}
            {offset > 0 && !ritual.isCompleted && (
                <div
                    className="absolute inset-y-0 left-0 rounded-xl bg-status-success flex items-center justify-center"
                    style={{ width: Math.max(0, offset + 20) }}
                >
                    <Check
                        size={18}
                        weight="bold"
                        className="text-earth-cream"
                        style={{ opacity: progress, transform: `scale(${progress > 0.5 ? 1 : 0.5})` }}
                    />
                </div>
            )}

            {/* Undo (left swipe) */}
            {offset < 0 && ritual.isCompleted && (
                <div
                    className="absolute inset-y-0 right-0 rounded-xl bg-status-warning flex items-center justify-center"
                    style={{ width: Math.max(0, Math.abs(offset) + 20) }}
                >
                    <ArrowUUpLeft
                        size={16}
                        weight="bold"
                        className="text-earth-cream"
                        style={{ opacity: progress, transform: `scale(${progress > 0.5 ? 1 : 0.5})` }}
                    />
                </div>
            )}

            <motion.div
                data-testid="ritual-card"
                {...gesture}
                animate={{ x: offset, scale }}
                transition={isDragging ? { duration: 0 } : SPRING}
                style={{ touchAction: 'pan-y' }}
                className={cn(
                    'relative bg-forest-light rounded-xl border p-3 flex items-center gap-3 select-none',
                    checked ? 'border-status-success/20' : 'border-earth-cream/10',
                    onEdit && 'cursor-pointer'
                )}
            >
                <div
                    className={cn(
                        'w-8 h-8 rounded-full flex items-center justify-center shrink-0',
                        showSuccess ? 'bg-status-success' : ritual.isCompleted ? 'bg-status-success/15' : 'bg-forest-dark/60'
                    )}
                >
                    {checked ? (
                        <motion.span
                            initial={showSuccess ? { scale: 1.2 } : false}
                            animate={{ scale: 1 }}
                            transition={{ type: 'spring', stiffness: 500, damping: 12, delay: 0.1 }}
                        >
                            <Check
                                size={14}
                                weight="bold"
                                className={showSuccess ? 'text-earth-cream' : 'text-status-success'}
                            />
                        </motion.span>
                    ) : (
                        <span className="text-base">{ritual.icon}</span>
                    )}
                </div>

                <div className="flex-1 min-w-0">
                    <div
                        className={cn(
                            'text-sm font-mono truncate',
                            ritual.isCompleted ? 'text-earth-cream/50 line-through' : 'text-earth-cream'
                        )}
                    >
                        {ritual.title}
                    </div>
                    {ritual.scheduledTime && (
                        <div className="text-xs font-mono text-earth-cream/40">{ritual.scheduledTime}</div>
                    )}
                </div>

                {ritual.isCompleted && <span className="text-base">{ritual.icon}</span>}
            </motion.div>
        </div>
    )
}
