import type { FocusSession, SessionStatus } from '@/types'
import { addDays, formatDuration, isSameDay, startOfDay, startOfWeek, toDateKey } from '@/utils/helpers'

export const SESSIONS_PREVIEW_COUNT = 3

export type DayGroupKind = 'today' | 'yesterday' | 'older'

export interface DayGroup {
    key: string
    date: Date
    kind: DayGroupKind
    sessions: FocusSession[]
}

export function sessionStatus(session: FocusSession): SessionStatus {
    if (!session.endTime) return 'inProgress'
    return session.endTime.getTime() > session.startTime.getTime() ? 'completed' : 'cancelled'
}

/**
 * Minutes actually spent in the session. Sessions still running report
 * their planned duration; finished ones count at least one minute.
 */
export function actualMinutes(session: FocusSession): number {
    if (!session.endTime) return session.durationMinutes
    const seconds = (session.endTime.getTime() - session.startTime.getTime()) / 1000
    return Math.max(1, Math.floor(seconds / 60))
}

export function formatSessionDuration(session: FocusSession): string {
    return formatDuration(actualMinutes(session))
}

export function totalActualMinutes(sessions: FocusSession[]): number {
    return sessions.reduce((sum, session) => sum + actualMinutes(session), 0)
}

export function weekBounds(now: Date): { start: Date; end: Date } {
    const start = startOfWeek(now)
    return { start, end: addDays(start, 6) }
}

/** Sessions started in the Monday-to-Sunday week of `now`, newest first. */
export function thisWeekSessions(sessions: FocusSession[], now: Date): FocusSession[] {
    const start = startOfWeek(now).getTime()
    const limit = addDays(startOfWeek(now), 7).getTime()
    return sessions
        .filter((session) => {
            const time = session.startTime.getTime()
            return time >= start && time < limit
        })
        .sort((a, b) => b.startTime.getTime() - a.startTime.getTime())
}

export function groupSessionsByDay(sessions: FocusSession[], now: Date): DayGroup[] {
    const yesterday = addDays(now, -1)
    const groups = new Map<string, DayGroup>()

    for (const session of thisWeekSessions(sessions, now)) {
        const key = toDateKey(session.startTime)
        let group = groups.get(key)
        if (!group) {
            const date = startOfDay(session.startTime)
            const kind: DayGroupKind = isSameDay(date, now)
                ? 'today'
                : isSameDay(date, yesterday) ? 'yesterday' : 'older'
            group = { key, date, kind, sessions: [] }
            groups.set(key, group)
        }
        group.sessions.push(session)
    }

    return [...groups.values()].sort((a, b) => b.date.getTime() - a.date.getTime())
}

export function visibleSessions(sessions: FocusSession[], expanded: boolean): FocusSession[] {
    return expanded ? sessions : sessions.slice(0, SESSIONS_PREVIEW_COUNT)
}

export function hiddenSessionCount(sessions: FocusSession[]): number {
    return Math.max(0, sessions.length - SESSIONS_PREVIEW_COUNT)
}

/** The swipe hint is only useful while the list is short enough to notice it. */
export function showSwipeHint(weekSessionCount: number): boolean {
    return weekSessionCount >= 1 && weekSessionCount <= 3
}
