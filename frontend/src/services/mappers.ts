import type {
    AreaResponse,
    DailyIntention,
    DailyRitual,
    DashboardData,
    DashboardIntentions,
    DashboardResponse,
    DayProgress,
    EveningReview,
    Feeling,
    FocusSession,
    FocusSessionResponse,
    MorningCheckIn,
    ProductivityPeak,
    Quest,
    QuestArea,
    QuestResponse,
    QuestStatus,
    ReflectionResponse,
    RitualFrequency,
    RoutineResponse,
    StreakInfo,
    StreakResponse,
    UserResponse,
    User,
} from '@/types'
import { FEELING_EMOJI } from '@/utils/designSystem'
import { isSameDay } from '@/utils/helpers'

const QUEST_AREAS: readonly QuestArea[] = ['health', 'learning', 'career', 'relationships', 'creativity', 'other']
const QUEST_STATUSES: readonly QuestStatus[] = ['active', 'completed', 'paused', 'archived']
const RITUAL_FREQUENCIES: readonly RitualFrequency[] = [
    'daily', 'weekdays', 'weekends', 'weekly',
    'monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday', 'sunday',
]
const PRODUCTIVITY_PEAKS: readonly ProductivityPeak[] = ['morning', 'afternoon', 'evening']
const FEELINGS: readonly Feeling[] = ['sad', 'anxious', 'frustrated', 'tired', 'neutral', 'calm', 'happy', 'excited']

function oneOf<T extends string>(values: readonly T[], value: string | null | undefined): T | undefined {
    return values.find((candidate) => candidate === value)
}

const optional = <T>(value: T | null | undefined): T | undefined => value ?? undefined

/** Parses a `YYYY-MM-DD` key as a local calendar date. */
export function parseDateKey(key: string): Date {
    const [year, month, day] = key.split('-').map(Number)
    return new Date(year, month - 1, day)
}

export function areaFromSlug(slug: string | null | undefined): QuestArea {
    return oneOf(QUEST_AREAS, slug?.toLowerCase()) ?? 'other'
}

function areaFor(areaId: string | null | undefined, areas: AreaResponse[]): QuestArea {
    const area = areas.find((candidate) => candidate.id === areaId)
    return areaFromSlug(area?.slug)
}

export function feelingFromEmoji(emoji: string): Feeling {
    return FEELINGS.find((feeling) => FEELING_EMOJI[feeling] === emoji) ?? 'neutral'
}

export function mapUser(response: UserResponse, streak: Pick<StreakInfo, 'currentStreak' | 'longestStreak'>): User {
    return {
        id: response.id,
        email: response.email ?? '',
        pseudo: optional(response.pseudo),
        firstName: optional(response.first_name),
        lastName: optional(response.last_name),
        avatarUrl: optional(response.avatar_url),
        gender: optional(response.gender),
        age: optional(response.age),
        description: optional(response.description),
        hobbies: optional(response.hobbies),
        lifeGoal: optional(response.life_goal),
        productivityPeak: oneOf(PRODUCTIVITY_PEAKS, response.productivity_peak),
        currentStreak: streak.currentStreak,
        longestStreak: streak.longestStreak,
    }
}

export function mapFocusSession(response: FocusSessionResponse): FocusSession {
    return {
        id: response.id,
        durationMinutes: response.duration_minutes,
        startTime: new Date(response.started_at),
        endTime: response.completed_at ? new Date(response.completed_at) : undefined,
        questId: optional(response.quest_id),
        description: optional(response.description),
    }
}

export function mapQuest(response: QuestResponse, areas: AreaResponse[]): Quest {
    return {
        id: response.id,
        title: response.title,
        area: areaFor(response.area_id, areas),
        progress: response.target_value > 0 ? response.current_value / response.target_value : 0,
        status: oneOf(QUEST_STATUSES, response.status) ?? 'active',
        targetDate: response.target_date ? parseDateKey(response.target_date) : undefined,
    }
}

export function mapRitual(response: RoutineResponse): DailyRitual {
    return {
        id: response.id,
        areaId: optional(response.area_id),
        title: response.title,
        icon: response.icon || '✨',
        isCompleted: response.completed ?? false,
        frequency: oneOf(RITUAL_FREQUENCIES, response.frequency) ?? 'daily',
        scheduledTime: optional(response.scheduled_time),
    }
}

export function mapMorningCheckIn(response: DashboardIntentions, areas: AreaResponse[]): MorningCheckIn {
    const intentions: DailyIntention[] = [...response.intentions]
        .sort((a, b) => a.position - b.position)
        .map((item) => ({
            id: item.id,
            intention: item.content,
            area: areaFor(item.area_id, areas),
            isCompleted: false,
        }))

    return {
        id: response.id,
        feeling: feelingFromEmoji(response.mood_emoji),
        sleepQuality: response.sleep_rating,
        intentions,
    }
}

export function mapEveningReview(response: ReflectionResponse): EveningReview {
    return {
        id: response.id,
        date: response.date,
        biggestWin: optional(response.biggest_win),
        blockers: optional(response.challenges),
        bestMoment: optional(response.best_moment),
        tomorrowGoal: optional(response.goal_for_tomorrow),
    }
}

export function mapStreak(response: StreakResponse): StreakInfo {
    const validation = response.today_validation
    return {
        currentStreak: response.current_streak,
        longestStreak: response.longest_streak,
        streakStart: optional(response.streak_start),
        flameLevels: response.flame_levels.map((level) => ({
            level: level.level,
            name: level.name,
            icon: level.icon,
            daysRequired: level.days_required,
            isUnlocked: level.is_unlocked,
            isCurrent: level.is_current,
        })),
        todayValidation: validation
            ? {
                date: validation.date,
                overallRate: validation.overall_rate,
                totalItems: validation.total_items,
                isValid: validation.is_valid,
                requiredCompletionRate: validation.required_completion_rate,
                requiredMinTasks: validation.required_min_tasks,
                meetsCompletionRate: validation.meets_completion_rate,
                meetsMinTasks: validation.meets_min_tasks,
            }
            : undefined,
    }
}

/** Streak shown when the streak endpoint is unavailable. */
export function fallbackStreak(streakDays: number): StreakInfo {
    return { currentStreak: streakDays, longestStreak: streakDays, flameLevels: [] }
}

export function mapDashboard(response: DashboardResponse, streak: StreakInfo, now: Date): DashboardData {
    const weekSessions = (response.week_sessions.sessions ?? []).map(mapFocusSession)
    const weeklyProgress: DayProgress[] = response.week_sessions.days.map((day) => ({
        day: day.date,
        minutes: day.minutes,
        date: parseDateKey(day.date),
    }))

    return {
        user: mapUser(response.user, streak),
        rituals: response.todays_routines.map(mapRitual),
        quests: (response.active_quests ?? []).map((quest) => mapQuest(quest, response.areas)),
        morningCheckIn: response.today_intentions
            ? mapMorningCheckIn(response.today_intentions, response.areas)
            : undefined,
        eveningReview: response.today_reflection ? mapEveningReview(response.today_reflection) : undefined,
        weeklyProgress,
        weekSessions,
        todaysSessions: weekSessions.filter((session) => isSameDay(session.startTime, now)),
        focusedMinutesToday: response.stats.focused_today,
        streak,
    }
}
