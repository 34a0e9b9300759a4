// Domain models rendered by the dashboard

export type ProductivityPeak = 'morning' | 'afternoon' | 'evening'

export interface User {
    id: string
    email: string
    pseudo?: string
    firstName?: string
    lastName?: string
    avatarUrl?: string
    gender?: string
    age?: number
    description?: string
    hobbies?: string
    lifeGoal?: string
    productivityPeak?: ProductivityPeak
    currentStreak: number
    longestStreak: number
}

export type SessionStatus = 'inProgress' | 'completed' | 'cancelled'

export interface FocusSession {
    id: string
    durationMinutes: number
    startTime: Date
    endTime?: Date
    questId?: string
    description?: string
}

export type QuestArea = 'health' | 'learning' | 'career' | 'relationships' | 'creativity' | 'other'

export type QuestStatus = 'active' | 'completed' | 'paused' | 'archived'

export interface Quest {
    id: string
    title: string
    area: QuestArea
    progress: number
    status: QuestStatus
    targetDate?: Date
}

export type RitualFrequency =
    | 'daily'
    | 'weekdays'
    | 'weekends'
    | 'weekly'
    | 'monday'
    | 'tuesday'
    | 'wednesday'
    | 'thursday'
    | 'friday'
    | 'saturday'
    | 'sunday'

export interface DailyRitual {
    id: string
    areaId?: string
    title: string
    icon: string
    isCompleted: boolean
    frequency: RitualFrequency
    scheduledTime?: string
}

export interface DailyIntention {
    id: string
    intention: string
    area: QuestArea
    isCompleted: boolean
}

export type Feeling = 'sad' | 'anxious' | 'frustrated' | 'tired' | 'neutral' | 'calm' | 'happy' | 'excited'

export interface MorningCheckIn {
    id: string
    feeling: Feeling
    sleepQuality: number
    intentions: DailyIntention[]
}

export interface EveningReview {
    id: string
    date: string
    biggestWin?: string
    blockers?: string
    bestMoment?: string
    tomorrowGoal?: string
}

export interface DayProgress {
    day: string
    minutes: number
    date: Date
}

export interface FlameLevel {
    level: number
    name: string
    icon: string
    daysRequired: number
    isUnlocked: boolean
    isCurrent: boolean
}

export interface DayValidation {
    date: string
    overallRate: number
    totalItems: number
    isValid: boolean
    requiredCompletionRate: number
    requiredMinTasks: number
    meetsCompletionRate: boolean
    meetsMinTasks: boolean
}

export interface StreakInfo {
    currentStreak: number
    longestStreak: number
    streakStart?: string
    flameLevels: FlameLevel[]
    todayValidation?: DayValidation
}

export interface DashboardData {
    user: User
    rituals: DailyRitual[]
    quests: Quest[]
    morningCheckIn?: MorningCheckIn
    eveningReview?: EveningReview
    weeklyProgress: DayProgress[]
    weekSessions: FocusSession[]
    todaysSessions: FocusSession[]
    focusedMinutesToday: number
    streak: StreakInfo
}

export interface ProfileUpdate {
    pseudo: string | null
    firstName: string | null
    lastName: string | null
    gender: string | null
    age: number | null
    description: string | null
    hobbies: string | null
    lifeGoal: string | null
}

export interface SessionEdit {
    description: string | null
    durationMinutes: number | null
}

export interface FireModeLaunch {
    durationMinutes: number
    questId: string | null
    description: string | null
}

/** A session that already happened, logged after the fact. */
export interface ManualSessionLog extends FireModeLaunch {
    startedAt: Date
}

// Wire format (snake_case, as sent by the backend)

export interface UserResponse {
    id: string
    email?: string | null
    pseudo?: string | null
    first_name?: string | null
    last_name?: string | null
    gender?: string | null
    age?: number | null
    description?: string | null
    hobbies?: string | null
    life_goal?: string | null
    avatar_url?: string | null
    productivity_peak?: string | null
}

export interface AreaResponse {
    id: string
    name: string
    slug: string
    icon: string
}

export interface QuestResponse {
    id: string
    area_id: string
    title: string
    status: string
    current_value: number
    target_value: number
    target_date?: string | null
}

export interface RoutineResponse {
    id: string
    area_id?: string | null
    title: string
    frequency: string
    icon?: string | null
    completed?: boolean | null
    scheduled_time?: string | null
}

export interface FocusSessionResponse {
    id: string
    quest_id?: string | null
    description?: string | null
    duration_minutes: number
    status: string
    started_at: string
    completed_at?: string | null
}

export interface DashboardIntentionItem {
    id: string
    area_id?: string | null
    content: string
    position: number
}

export interface DashboardIntentions {
    id: string
    mood_rating: number
    mood_emoji: string
    sleep_rating: number
    sleep_emoji: string
    intentions: DashboardIntentionItem[]
}

export interface ReflectionResponse {
    id: string
    date: string
    biggest_win?: string | null
    challenges?: string | null
    best_moment?: string | null
    goal_for_tomorrow?: string | null
}

export interface DailySessionStat {
    date: string
    minutes: number
    sessions: number
}

export interface DashboardResponse {
    user: UserResponse
    areas: AreaResponse[]
    todays_routines: RoutineResponse[]
    today_intentions?: DashboardIntentions | null
    today_reflection?: ReflectionResponse | null
    stats: {
        focused_today: number
        streak_days: number
    }
    week_sessions: {
        total_minutes: number
        total_sessions: number
        days: DailySessionStat[]
        sessions?: FocusSessionResponse[] | null
    }
    active_quests?: QuestResponse[] | null
}

export interface FlameLevelResponse {
    level: number
    name: string
    icon: string
    days_required: number
    is_unlocked: boolean
    is_current: boolean
}

export interface DayValidationResponse {
    date: string
    overall_rate: number
    total_items: number
    is_valid: boolean
    required_completion_rate: number
    required_min_tasks: number
    meets_completion_rate: boolean
    meets_min_tasks: boolean
}

export interface StreakResponse {
    current_streak: number
    longest_streak: number
    streak_start?: string | null
    today_validation?: DayValidationResponse | null
    flame_levels: FlameLevelResponse[]
    current_flame_level: number
}
