import axios, { isAxiosError } from 'axios'
import type {
    DashboardResponse,
    FireModeLaunch,
    FocusSessionResponse,
    ProfileUpdate,
    SessionEdit,
    StreakResponse,
} from '@/types'

export const AUTH_TOKEN_KEY = 'focus-auth-token'

export class ApiError extends Error {
    readonly status: number | null

    constructor(message: string, status: number | null) {
        super(message)
        this.name = 'ApiError'
        this.status = status
    }
}

function serverMessage(data: unknown): string | null {
    if (typeof data !== 'object' || data === null) return null
    if ('error' in data && typeof data.error === 'string') return data.error
    if ('message' in data && typeof data.message === 'string') return data.message
    return null
}

const api = axios.create({
    baseURL: import.meta.env.VITE_API_URL || 'http://localhost:8080/api/v1',
    timeout: Number(import.meta.env.VITE_API_TIMEOUT) || 10000,
})

api.interceptors.request.use((config) => {
    const token = localStorage.getItem(AUTH_TOKEN_KEY)
    if (token) {
        config.headers.set('Authorization', `Bearer ${token}`)
    }
    return config
})

api.interceptors.response.use(
    (response) => response,
    (error: unknown) => {
        if (isAxiosError(error)) {
            const status = error.response?.status ?? null
            return Promise.reject(new ApiError(serverMessage(error.response?.data) ?? error.message, status))
        }
        return Promise.reject(error)
    }
)

// Dashboard
export const getDashboard = async (date: string) => {
    const { data } = await api.get<DashboardResponse>('/dashboard', { params: { date } })
    return data
}

export const getStreak = async (date: string) => {
    const { data } = await api.get<StreakResponse>('/streak', { params: { date } })
    return data
}

// Rituals
export const completeRoutine = async (id: string) => {
    await api.post(`/routines/${id}/complete`)
}

export const uncompleteRoutine = async (id: string) => {
    await api.delete(`/routines/${id}/complete`)
}

// Profile
export const updateProfile = async (update: ProfileUpdate) => {
    await api.patch('/me', {
        pseudo: update.pseudo,
        first_name: update.firstName,
        last_name: update.lastName,
        gender: update.gender,
        age: update.age,
        description: update.description,
        hobbies: update.hobbies,
        life_goal: update.lifeGoal,
    })
}

export const uploadAvatar = async (imageBase64: string, contentType: string) => {
    const { data } = await api.post<{ avatar_url: string }>('/me/avatar', {
        image_base64: imageBase64,
        content_type: contentType,
    })
    return data.avatar_url
}

export const deleteAvatar = async () => {
    await api.delete('/me/avatar')
}

// Focus sessions
export const createFocusSession = async (launch: FireModeLaunch, startedAt?: Date) => {
    const { data } = await api.post<FocusSessionResponse>('/focus-sessions', {
        duration_minutes: launch.durationMinutes,
        quest_id: launch.questId,
        description: launch.description,
        started_at: startedAt?.toISOString(),
    })
    return data
}

export const updateFocusSession = async (id: string, edit: SessionEdit) => {
    await api.patch(`/focus-sessions/${id}`, {
        description: edit.description,
        duration_minutes: edit.durationMinutes,
    })
}

export const completeFocusSession = async (id: string) => {
    await api.patch(`/focus-sessions/${id}`, { status: 'completed' })
}

export const deleteFocusSession = async (id: string) => {
    await api.delete(`/focus-sessions/${id}`)
}

export default api
