import { describe, expect, it } from 'vitest'
import {
    adaptiveCTA,
    CTA_CONTENT,
    currentFlameLevel,
    daysToLevel,
    hasWeeklyProgress,
    nextFlameLevel,
    parseAnchor,
    ritualCounts,
} from '@/utils/dashboard'
import type { DailyRitual, EveningReview, FlameLevel, FocusSession, MorningCheckIn } from '@/types'

const checkIn: MorningCheckIn = { id: 'checkin-1', feeling: 'calm', sleepQuality: 4, intentions: [] }
const review: EveningReview = { id: 'review-1', date: '2024-03-13' }
const session: FocusSession = {
    id: 'session-1',
    durationMinutes: 25,
    startTime: new Date(2024, 2, 13, 9, 0),
}

describe('adaptiveCTA', () => {
    it('starts the day without a morning check-in', () => {
        expect(adaptiveCTA({ todaysSessions: [session] })).toBe('startTheDay')
    })

    it('suggests FireMode when nothing was focused today', () => {
        expect(adaptiveCTA({ morningCheckIn: checkIn, todaysSessions: [] })).toBe('startFireMode')
    })

    it('suggests the evening review after a session', () => {
        expect(adaptiveCTA({ morningCheckIn: checkIn, todaysSessions: [session] })).toBe('endOfDay')
    })

    it('is done once the review exists', () => {
        expect(adaptiveCTA({ morningCheckIn: checkIn, todaysSessions: [session], eveningReview: review }))
            .toBe('allCompleted')
    })

    it('has no icon once everything is done', () => {
        expect(CTA_CONTENT.allCompleted.icon).toBeNull()
        expect(CTA_CONTENT.endOfDay.route).toBe('/end-of-day')
    })
})

describe('ritualCounts', () => {
    it('counts completed rituals', () => {
        const rituals: DailyRitual[] = [
            { id: 'r1', title: 'Stretch', icon: '🧘', isCompleted: true, frequency: 'daily' },
            { id: 'r2', title: 'Read', icon: '📖', isCompleted: false, frequency: 'daily' },
            { id: 'r3', title: 'Walk', icon: '🚶', isCompleted: true, frequency: 'weekdays' },
        ]
        expect(ritualCounts(rituals)).toEqual({ completed: 2, total: 3 })
    })
})

describe('hasWeeklyProgress', () => {
    it('needs at least one day with minutes', () => {
        const day = (minutes: number) => ({ day: '2024-03-13', minutes, date: new Date(2024, 2, 13) })
        expect(hasWeeklyProgress([day(0), day(0)])).toBe(false)
        expect(hasWeeklyProgress([day(0), day(15)])).toBe(true)
    })
})

describe('flame levels', () => {
    const level = (n: number, daysRequired: number, isUnlocked: boolean, isCurrent = false): FlameLevel => ({
        level: n,
        name: `Level ${n}`,
        icon: '🔥',
        daysRequired,
        isUnlocked,
        isCurrent,
    })

    it('prefers the level flagged as current', () => {
        const levels = [level(1, 0, true), level(2, 3, true, true), level(3, 7, true), level(4, 14, false)]
        expect(currentFlameLevel(levels)?.level).toBe(2)
    })

    it('falls back to the last unlocked level', () => {
        const levels = [level(1, 0, true), level(2, 3, true), level(3, 7, false)]
        expect(currentFlameLevel(levels)?.level).toBe(2)
        expect(nextFlameLevel(levels)?.level).toBe(3)
    })

    it('has no next level once everything is unlocked', () => {
        expect(nextFlameLevel([level(1, 0, true)])).toBeUndefined()
    })

    it('counts the days left', () => {
        expect(daysToLevel(level(3, 7, false), 5)).toBe(2)
        expect(daysToLevel(level(3, 7, false), 9)).toBe(0)
    })
})

describe('parseAnchor', () => {
    it('accepts the section anchors', () => {
        expect(parseAnchor('#rituals')).toBe('rituals')
        expect(parseAnchor('sessions')).toBe('sessions')
    })

    it('rejects anything else', () => {
        expect(parseAnchor('#settings')).toBeNull()
        expect(parseAnchor('')).toBeNull()
    })
})
