import { describe, expect, it } from 'vitest'
import {
    areaFromSlug,
    fallbackStreak,
    feelingFromEmoji,
    mapDashboard,
    mapEveningReview,
    mapMorningCheckIn,
    mapQuest,
    mapRitual,
    mapStreak,
    parseDateKey,
} from '@/services/mappers'
import { dashboardResponse, streakResponse } from '@/test/fixtures'

const areas = dashboardResponse().areas

describe('scalar mapping', () => {
    it('parses date keys as local dates', () => {
        const date = parseDateKey('2024-03-05')
        expect([date.getFullYear(), date.getMonth(), date.getDate(), date.getHours()]).toEqual([2024, 2, 5, 0])
    })

    it('maps area slugs case-insensitively', () => {
        expect(areaFromSlug('Career')).toBe('career')
        expect(areaFromSlug('gardening')).toBe('other')
        expect(areaFromSlug(null)).toBe('other')
    })

    it('maps mood emojis to feelings', () => {
        expect(feelingFromEmoji('😌')).toBe('calm')
        expect(feelingFromEmoji('🙃')).toBe('neutral')
    })
})

describe('mapRitual', () => {
    it('fills in the icon and frequency defaults', () => {
        expect(mapRitual({ id: 'r', title: 'Journal', frequency: 'fortnightly', icon: '', completed: null })).toEqual({
            id: 'r',
            areaId: undefined,
            title: 'Journal',
            icon: '✨',
            isCompleted: false,
            frequency: 'daily',
            scheduledTime: undefined,
        })
    })
})

describe('mapQuest', () => {
    it('derives progress and the area', () => {
        const quest = mapQuest(
            { id: 'q', area_id: 'area-career', title: 'Ship', status: 'paused', current_value: 3, target_value: 4 },
            areas
        )
        expect(quest).toMatchObject({ id: 'q', area: 'career', progress: 0.75, status: 'paused' })
        expect(quest.targetDate).toBeUndefined()
    })

    it('reports no progress without a target', () => {
        const quest = mapQuest(
            { id: 'q', area_id: 'area-unknown', title: 'Ship', status: 'unknown', current_value: 3, target_value: 0 },
            areas
        )
        expect(quest).toMatchObject({ area: 'other', progress: 0, status: 'active' })
    })
})

describe('mapMorningCheckIn', () => {
    it('orders intentions by position', () => {
        const checkIn = mapMorningCheckIn(
            {
                id: 'c',
                mood_rating: 4,
                mood_emoji: '😊',
                sleep_rating: 3,
                sleep_emoji: '😴',
                intentions: [
                    { id: 'i2', area_id: 'area-health', content: 'Run', position: 2 },
                    { id: 'i1', area_id: null, content: 'Plan', position: 1 },
                ],
            },
            areas
        )

        expect(checkIn.feeling).toBe('happy')
        expect(checkIn.sleepQuality).toBe(3)
        expect(checkIn.intentions).toEqual([
            { id: 'i1', intention: 'Plan', area: 'other', isCompleted: false },
            { id: 'i2', intention: 'Run', area: 'health', isCompleted: false },
        ])
    })
})

describe('mapEveningReview', () => {
    it('maps challenges to blockers', () => {
        expect(mapEveningReview({
            id: 'e',
            date: '2024-03-13',
            biggest_win: 'Finished the draft',
            challenges: 'Meetings',
            best_moment: null,
            goal_for_tomorrow: 'Send it',
        })).toEqual({
            id: 'e',
            date: '2024-03-13',
            biggestWin: 'Finished the draft',
            blockers: 'Meetings',
            bestMoment: undefined,
            tomorrowGoal: 'Send it',
        })
    })
})

describe('mapStreak', () => {
    it('maps levels and today validation', () => {
        const streak = mapStreak(streakResponse())
        expect(streak.currentStreak).toBe(5)
        expect(streak.longestStreak).toBe(12)
        expect(streak.flameLevels[1]).toEqual({
            level: 2,
            name: 'Flame',
            icon: '🔥',
            daysRequired: 3,
            isUnlocked: true,
            isCurrent: true,
        })
        expect(streak.todayValidation).toMatchObject({ requiredCompletionRate: 60, requiredMinTasks: 3, meetsMinTasks: true })
    })

    it('leaves validation out when unknown', () => {
        expect(mapStreak(streakResponse({ today_validation: null })).todayValidation).toBeUndefined()
    })

    it('falls back to the dashboard streak', () => {
        expect(fallbackStreak(4)).toEqual({ currentStreak: 4, longestStreak: 4, flameLevels: [] })
    })
})

describe('mapDashboard', () => {
    const now = new Date(2024, 2, 13, 12, 0)

    it('assembles the dashboard', () => {
        const data = mapDashboard(dashboardResponse(), mapStreak(streakResponse()), now)

        expect(data.user).toMatchObject({ id: 'user-1', pseudo: 'samf', firstName: 'Sam', age: 30, currentStreak: 5, longestStreak: 12 })
        expect(data.user.lastName).toBeUndefined()
        expect(data.rituals.map((ritual) => ritual.icon)).toEqual(['🧘', '✨'])
        expect(data.quests.map((quest) => quest.title)).toEqual(['Ship the report'])
        expect(data.morningCheckIn).toBeUndefined()
        expect(data.eveningReview).toBeUndefined()
        expect(data.weeklyProgress.map((day) => [day.day, day.minutes])).toEqual([['2024-03-11', 25], ['2024-03-13', 50]])
        expect(data.weekSessions.map((session) => session.id)).toEqual(['session-1', 'session-2'])
        expect(data.todaysSessions.map((session) => session.id)).toEqual(['session-2'])
        expect(data.focusedMinutesToday).toBe(50)
    })

    it('maps session times and optional fields', () => {
        const [finished, running] = mapDashboard(dashboardResponse(), fallbackStreak(4), now).weekSessions

        expect(finished.endTime?.getTime()).toBe(new Date(2024, 2, 11, 9, 25).getTime())
        expect(finished.questId).toBeUndefined()
        expect(running.startTime.getTime()).toBe(new Date(2024, 2, 13, 10, 0).getTime())
        expect(running.endTime).toBeUndefined()
        expect(running.description).toBe('Write the report')
    })

    it('tolerates missing session and quest lists', () => {
        const response = dashboardResponse({
            active_quests: null,
            week_sessions: { total_minutes: 0, total_sessions: 0, days: [], sessions: null },
        })
        const data = mapDashboard(response, fallbackStreak(0), now)
        expect(data.quests).toEqual([])
        expect(data.weekSessions).toEqual([])
        expect(data.todaysSessions).toEqual([])
    })
})
