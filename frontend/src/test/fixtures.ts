import type { DashboardResponse, StreakResponse } from '@/types'

export function dashboardResponse(overrides: Partial<DashboardResponse> = {}): DashboardResponse {
    return {
        user: {
            id: 'user-1',
            email: 'sam@example.com',
            pseudo: 'samf',
            first_name: 'Sam',
            last_name: null,
            age: 30,
            avatar_url: null,
            productivity_peak: 'morning',
        },
        areas: [
            { id: 'area-health', name: 'Health', slug: 'health', icon: '💪' },
            { id: 'area-career', name: 'Career', slug: 'Career', icon: '💼' },
        ],
        todays_routines: [
            { id: 'routine-1', title: 'Stretch', frequency: 'daily', icon: '🧘', completed: false },
            { id: 'routine-2', title: 'Journal', frequency: 'fortnightly', icon: '', completed: true },
        ],
        today_intentions: null,
        today_reflection: null,
        stats: { focused_today: 50, streak_days: 4 },
        week_sessions: {
            total_minutes: 75,
            total_sessions: 2,
            days: [
                { date: '2024-03-11', minutes: 25, sessions: 1 },
                { date: '2024-03-13', minutes: 50, sessions: 1 },
            ],
            sessions: [
                {
                    id: 'session-1',
                    duration_minutes: 25,
                    status: 'completed',
                    started_at: '2024-03-11T09:00:00',
                    completed_at: '2024-03-11T09:25:00',
                },
                {
                    id: 'session-2',
                    quest_id: 'quest-1',
                    description: 'Write the report',
                    duration_minutes: 50,
                    status: 'in_progress',
                    started_at: '2024-03-13T10:00:00',
                    completed_at: null,
                },
            ],
        },
        active_quests: [
            {
                id: 'quest-1',
                area_id: 'area-career',
                title: 'Ship the report',
                status: 'active',
                current_value: 3,
                target_value: 4,
                target_date: '2024-04-01',
            },
        ],
        ...overrides,
    }
}

export function streakResponse(overrides: Partial<StreakResponse> = {}): StreakResponse {
    return {
        current_streak: 5,
        longest_streak: 12,
        streak_start: '2024-03-09',
        today_validation: {
            date: '2024-03-13',
            overall_rate: 50,
            total_items: 4,
            is_valid: false,
            required_completion_rate: 60,
            required_min_tasks: 3,
            meets_completion_rate: false,
            meets_min_tasks: true,
        },
        flame_levels: [
            { level: 1, name: 'Spark', icon: '✨', days_required: 1, is_unlocked: true, is_current: false },
            { level: 2, name: 'Flame', icon: '🔥', days_required: 3, is_unlocked: true, is_current: true },
            { level: 3, name: 'Blaze', icon: '☄️', days_required: 7, is_unlocked: false, is_current: false },
        ],
        current_flame_level: 2,
        ...overrides,
    }
}
