import type { ReactNode } from 'react'

interface SectionHeaderProps {
    title: string
    subtitle?: string
    action?: ReactNode
}

export function SectionHeader({ title, subtitle, action }: SectionHeaderProps) {
    return (
        <div className="flex items-center justify-between mb-3">
            <div>
                <h2 className="text-lg font-bold font-mono text-earth-cream">{title}</h2>
                {subtitle && <p className="text-xs font-mono text-earth-cream/50">{subtitle}</p>}
            </div>
            {action}
        </div>
    )
}
