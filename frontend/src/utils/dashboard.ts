import type { DashboardData, DailyRitual, DayProgress, FlameLevel } from '@/types'

export type AdaptiveCTA = 'startTheDay' | 'startFireMode' | 'endOfDay' | 'allCompleted'

export type CTAIcon = 'sun' | 'flame' | 'moon'

export interface CTAContent {
    titleKey: string
    subtitleKey: string
    buttonKey: string
    icon: CTAIcon | null
    route: string
}

export function adaptiveCTA(data: Pick<DashboardData, 'morningCheckIn' | 'todaysSessions' | 'eveningReview'>): AdaptiveCTA {
    if (!data.morningCheckIn) return 'startTheDay'
    if (data.todaysSessions.length === 0) return 'startFireMode'
    if (!data.eveningReview) return 'endOfDay'
    return 'allCompleted'
}

export const CTA_CONTENT: Record<AdaptiveCTA, CTAContent> = {
    startTheDay: {
        titleKey: 'cta.start_the_day.title',
        subtitleKey: 'cta.start_the_day.subtitle',
        buttonKey: 'cta.start_the_day.button',
        icon: 'sun',
        route: '/start-the-day',
    },
    startFireMode: {
        titleKey: 'cta.start_fire_mode.title',
        subtitleKey: 'cta.start_fire_mode.subtitle',
        buttonKey: 'cta.start_fire_mode.button',
        icon: 'flame',
        route: '/fire-mode',
    },
    endOfDay: {
        titleKey: 'cta.end_of_day.title',
        subtitleKey: 'cta.end_of_day.subtitle',
        buttonKey: 'cta.end_of_day.button',
        icon: 'moon',
        route: '/end-of-day',
    },
    allCompleted: {
        titleKey: 'cta.all_completed.title',
        subtitleKey: 'cta.all_completed.subtitle',
        buttonKey: 'cta.all_completed.button',
        icon: null,
        route: '/',
    },
}

export function ritualCounts(rituals: DailyRitual[]): { completed: number; total: number } {
    return {
        completed: rituals.filter((ritual) => ritual.isCompleted).length,
        total: rituals.length,
    }
}

export function hasWeeklyProgress(progress: DayProgress[]): boolean {
    return progress.some((day) => day.minutes > 0)
}

export function currentFlameLevel(levels: FlameLevel[]): FlameLevel | undefined {
    return levels.find((level) => level.isCurrent) ?? levels.filter((level) => level.isUnlocked).pop()
}

export function nextFlameLevel(levels: FlameLevel[]): FlameLevel | undefined {
    return levels.find((level) => !level.isUnlocked)
}

export function daysToLevel(level: FlameLevel, streak: number): number {
    return Math.max(0, level.daysRequired - streak)
}

export const DASHBOARD_ANCHORS = ['intentions', 'rituals', 'reflection', 'sessions'] as const

export type DashboardAnchor = (typeof DASHBOARD_ANCHORS)[number]

export function parseAnchor(hash: string): DashboardAnchor | null {
    const value = hash.replace(/^#/, '')
    return DASHBOARD_ANCHORS.find((anchor) => anchor === value) ?? null
}
