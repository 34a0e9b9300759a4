import { useMemo } from 'react'
import { formatDuration } from '@/utils/helpers'
import { totalActualMinutes } from '@/utils/sessions'
import { TIMELINE_MIN_BLOCK_PX, TIMELINE_TICKS, timelineBlocks } from '@/utils/timeline'
import type { FocusSession } from '@/types'

interface DayTimelineProps {
    label: string
    sessions: FocusSession[]
}

export function DayTimeline({ label, sessions }: DayTimelineProps) {
    const blocks = useMemo(() => timelineBlocks(sessions), [sessions])
    const total = totalActualMinutes(sessions)

    return (
        <div className="gradient-forest grain rounded-xl p-5">
            <div className="relative z-20 flex items-center justify-between mb-3 font-mono">
                <span className="text-sm font-semibold text-earth-cream uppercase">{label}</span>
                <span className="text-sm text-earth-tan">{formatDuration(total)}</span>
            </div>

            <div className="relative z-20 h-6 rounded-md bg-forest-dark/50 overflow-hidden">
                {blocks.map((block) => (
                    <div
                        key={block.session.id}
                        data-testid="timeline-block"
                        className="absolute inset-y-0 rounded-sm bg-flame"
                        style={{
                            left: `${block.start * 100}%`,
                            width: `${block.width * 100}%`,
                            minWidth: TIMELINE_MIN_BLOCK_PX,
                        }}
                    />
                ))}
            </div>

            <div className="relative z-20 flex justify-between mt-1 text-[10px] font-mono text-earth-cream/40">
                {TIMELINE_TICKS.map((tick) => (
                    <span key={tick}>{tick}</span>
                ))}
            </div>
        </div>
    )
}
