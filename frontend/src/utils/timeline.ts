import type { FocusSession } from '@/types'
import { actualMinutes } from '@/utils/sessions'

export const TIMELINE_START_HOUR = 6
export const TIMELINE_MINUTES = 18 * 60
export const TIMELINE_MIN_BLOCK_PX = 4

export interface TimelineBlock {
    session: FocusSession
    /** Fraction of the bar width where the block begins. */
    start: number
    width: number
}

export function timelineBlock(session: FocusSession): TimelineBlock | null {
    const hour = session.startTime.getHours()
    if (hour < TIMELINE_START_HOUR) return null
    const minutesFromStart = (hour - TIMELINE_START_HOUR) * 60 + session.startTime.getMinutes()
    const start = minutesFromStart / TIMELINE_MINUTES
    const width = Math.min(1 - start, actualMinutes(session) / TIMELINE_MINUTES)
    return { session, start, width }
}

export function timelineBlocks(sessions: FocusSession[]): TimelineBlock[] {
    return sessions.flatMap((session) => {
        const block = timelineBlock(session)
        return block ? [block] : []
    })
}

export const TIMELINE_TICKS = ['06:00', '12:00', '18:00', '24:00']
