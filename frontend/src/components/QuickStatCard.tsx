import type { ReactNode } from 'react'
import { cn } from '@/utils/helpers'
import { motion } from 'framer-motion'

interface QuickStatCardProps {
    label: string
    value: string | number
    icon: ReactNode
    className?: string
}

export function QuickStatCard({ label, value, icon, className }: QuickStatCardProps) {
    return (
        <motion.div
            className={cn('card-hover gradient-forest grain overflow-hidden', className)}
            initial={{ opacity: 0, y: 20 }}
            animate={{ opacity: 1, y: 0 }}
            transition={{ duration: 0.3 }}
        >
            <div className="relative z-20 flex flex-col items-center gap-1 text-center">
                <span className="text-xl text-earth-tan">{icon}</span>
                <div className="text-2xl font-bold font-mono text-earth-cream">
                    {value}
                </div>
                <span className="text-earth-cream/60 text-xs font-mono">{label}</span>
            </div>
        </motion.div>
    )
}
