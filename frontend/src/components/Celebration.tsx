import { useEffect } from 'react'
import { AnimatePresence, motion } from 'framer-motion'
import { Fire } from '@phosphor-icons/react'
import { useTranslation } from 'react-i18next'

export const CELEBRATION_VISIBLE_MS = 800
export const CELEBRATION_FADE_MS = 250

interface CelebrationProps {
    isShowing: boolean
    completedCount: number
    totalCount: number
    onDismiss: () => void
}

export function Celebration({ isShowing, completedCount, totalCount, onDismiss }: CelebrationProps) {
    const { t } = useTranslation()

    useEffect(() => {
        if (!isShowing) return
        const timeout = setTimeout(onDismiss, CELEBRATION_VISIBLE_MS)
        return () => clearTimeout(timeout)
    }, [isShowing, onDismiss])

    return (
        <AnimatePresence>
            {isShowing && (
                <motion.div
                    role="status"
                    className="fixed inset-0 z-50 flex flex-col items-center justify-center gap-4 gradient-flame pointer-events-none"
                    initial={{ opacity: 0, scale: 0.8 }}
                    animate={{ opacity: 1, scale: 1 }}
                    exit={{ opacity: 0, scale: 0.8, transition: { duration: CELEBRATION_FADE_MS / 1000 } }}
                    transition={{ type: 'spring', stiffness: 260, damping: 20 }}
                >
                    <motion.div initial={{ y: 30 }} animate={{ y: 0 }}>
                        <Fire size={96} weight="fill" className="text-earth-cream" />
                    </motion.div>
                    <motion.div
                        className="text-center font-mono text-earth-cream"
                        initial={{ y: 20 }}
                        animate={{ y: 0 }}
                        transition={{ delay: 0.1 }}
                    >
                        <div className="text-2xl font-bold">{t('routines.celebration')}</div>
                        <div className="text-base opacity-90">
                            {completedCount}/{totalCount}
                        </div>
                    </motion.div>
                </motion.div>
            )}
        </AnimatePresence>
    )
}
