import { useEffect } from 'react'
import type { ReactNode } from 'react'
import { motion } from 'framer-motion'
import { X } from '@phosphor-icons/react'
import { useTranslation } from 'react-i18next'
import { cn } from '@/utils/helpers'

interface SheetProps {
    isOpen: boolean
    title: string
    onClose: () => void
    children: ReactNode
    footer?: ReactNode
    className?: string
}

/** Bottom sheet on small screens, centered modal on wider ones. */
export function Sheet({ isOpen, title, onClose, children, footer, className }: SheetProps) {
    const { t } = useTranslation()

    useEffect(() => {
        if (!isOpen) return
        const onKeyDown = (event: KeyboardEvent) => {
            if (event.key === 'Escape') onClose()
        }
        window.addEventListener('keydown', onKeyDown)
        return () => window.removeEventListener('keydown', onKeyDown)
    }, [isOpen, onClose])

    if (!isOpen) return null

    return (
        <div
            className="fixed inset-0 z-50 flex items-end sm:items-center justify-center sm:p-4 bg-black/50 backdrop-blur-sm"
            onClick={onClose}
        >
            <motion.div
                role="dialog"
                aria-modal="true"
                aria-label={title}
                className={cn(
                    'bg-forest-dark border border-earth-cream/10 rounded-t-2xl sm:rounded-xl w-full max-w-md max-h-[90vh] flex flex-col shadow-2xl',
                    className
                )}
                initial={{ opacity: 0, y: 40 }}
                animate={{ opacity: 1, y: 0 }}
                transition={{ duration: 0.25 }}
                onClick={(event) => event.stopPropagation()}
            >
                <div className="flex justify-between items-center px-6 pt-6 pb-4">
                    <h2 className="text-xl font-bold font-mono text-earth-cream">{title}</h2>
                    <button
                        onClick={onClose}
                        aria-label={t('common.close')}
                        className="text-earth-cream/50 hover:text-earth-cream transition-colors"
                    >
                        <X size={24} />
                    </button>
                </div>

                <div className="px-6 pb-6 overflow-y-auto flex-1">
                    {children}
                </div>

                {footer && (
                    <div className="px-6 pb-6 pt-2 border-t border-earth-cream/10">
                        {footer}
                    </div>
                )}
            </motion.div>
        </div>
    )
}
