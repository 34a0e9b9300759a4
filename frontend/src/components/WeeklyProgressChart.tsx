import { useMemo } from 'react'
import { useTranslation } from 'react-i18next'
import { useLanguage } from '@/contexts/LanguageContext'
import { cn, formatDuration, isSameDay } from '@/utils/helpers'
import type { DayProgress } from '@/types'

interface WeeklyProgressChartProps {
    data: DayProgress[]
    today?: Date
}

export function WeeklyProgressChart({ data, today = new Date() }: WeeklyProgressChartProps) {
    const { t } = useTranslation()
    const { locale } = useLanguage()

    const peak = useMemo(() => Math.max(1, ...data.map((d) => d.minutes)), [data])
    const weekday = useMemo(() => new Intl.DateTimeFormat(locale, { weekday: 'narrow' }), [locale])

    return (
        <div className="gradient-forest grain rounded-xl p-6 flex flex-col">
            <h3 className="text-earth-cream font-mono font-bold text-lg mb-6">
                {t('dashboard.weekly_progress')}
            </h3>

            <div className="flex-1 flex items-end gap-2 h-[140px]">
                {data.map((d) => {
                    const isToday = isSameDay(d.date, today)
                    return (
                        <div key={d.day} className="flex-1 h-full flex flex-col items-center justify-end gap-2 group relative">
                            {/* Tooltip */}
                            <div className="absolute bottom-full mb-2 opacity-0 group-hover:opacity-100 transition-opacity bg-forest-dark border border-earth-cream/10 p-2 rounded text-xs font-mono text-earth-cream z-10 pointer-events-none whitespace-nowrap">
                                {formatDuration(d.minutes)}
                            </div>

                            {/* Bar */}
                            <div
                                className={cn(
                                    'w-full rounded-t-sm transition-all duration-500',
                                    isToday ? 'bg-earth-tan' : 'bg-earth-tan/40 group-hover:bg-earth-tan/60'
                                )}
                                style={{ height: `${(d.minutes / peak) * 100}%`, minHeight: d.minutes > 0 ? 4 : 0 }}
                            />

                            <span className={cn('text-[10px] font-mono', isToday ? 'text-earth-tan' : 'text-earth-cream/50')}>
                                {weekday.format(d.date)}
                            </span>
                        </div>
                    )
                })}
            </div>
        </div>
    )
}
