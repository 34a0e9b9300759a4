import { formatClock, toDateKey } from '@/utils/helpers'
import type { FireModeLaunch, ManualSessionLog } from '@/types'

export const FIRE_MODE_DURATIONS = [15, 25, 45, 60, 90] as const
export const DEFAULT_FIRE_MODE_DURATION = 25

export const SESSION_DURATION_PRESETS = [15, 25, 30, 45, 60, 90, 120] as const
export const SESSION_DURATION_STEP = 5
export const MIN_SESSION_DURATION = 5
export const MAX_SESSION_DURATION = 180

export function stepSessionDuration(minutes: number, direction: 1 | -1): number {
    const next = minutes + direction * SESSION_DURATION_STEP
    return Math.min(MAX_SESSION_DURATION, Math.max(MIN_SESSION_DURATION, next))
}

// Start FireMode sheet: duration, then quest, then description

export type FireModeStep = 1 | 2 | 3

export interface FireModeFlowState {
    step: FireModeStep
    duration: number
    questId: string | null
    description: string
}

export type FireModeFlowAction =
    | { type: 'setDuration'; duration: number }
    | { type: 'selectQuest'; questId: string | null }
    | { type: 'skipQuest' }
    | { type: 'setDescription'; description: string }
    | { type: 'next' }
    | { type: 'back' }

export const initialFireModeFlow: FireModeFlowState = {
    step: 1,
    duration: DEFAULT_FIRE_MODE_DURATION,
    questId: null,
    description: '',
}

export function fireModeFlowReducer(state: FireModeFlowState, action: FireModeFlowAction): FireModeFlowState {
    switch (action.type) {
        case 'setDuration':
            return { ...state, duration: action.duration }
        case 'selectQuest':
            return { ...state, questId: action.questId }
        case 'skipQuest':
            return { ...state, questId: null, step: 3 }
        case 'setDescription':
            return { ...state, description: action.description }
        case 'next':
            return state.step === 1 ? { ...state, step: 2 } : { ...state, step: 3 }
        case 'back':
            return state.step === 3 ? { ...state, step: 2 } : { ...state, step: 1 }
    }
}

export function fireModeLaunch(state: FireModeFlowState): FireModeLaunch {
    const description = state.description.trim()
    return {
        durationMinutes: state.duration,
        questId: state.questId,
        description: description === '' ? null : description,
    }
}

// Logging a past session

export interface ManualSessionForm {
    /** `datetime-local` input value, `YYYY-MM-DDTHH:mm` in local time */
    startedAt: string
    duration: number
    questId: string | null
    description: string
}

export function toDateTimeInputValue(date: Date): string {
    return `${toDateKey(date)}T${formatClock(date)}`
}

export function initialManualSessionForm(now: Date): ManualSessionForm {
    return {
        startedAt: toDateTimeInputValue(now),
        duration: DEFAULT_FIRE_MODE_DURATION,
        questId: null,
        description: '',
    }
}

/** Null while the start time is missing, unparseable or in the future. */
export function manualSessionLog(form: ManualSessionForm, now: Date): ManualSessionLog | null {
    if (form.startedAt === '') return null
    const startedAt = new Date(form.startedAt)
    if (Number.isNaN(startedAt.getTime()) || startedAt > now) return null
    const description = form.description.trim()
    return {
        startedAt,
        durationMinutes: form.duration,
        questId: form.questId,
        description: description === '' ? null : description,
    }
}

// FireMode countdown

export type TimerStatus = 'idle' | 'running' | 'paused' | 'completed'

export interface TimerState {
    status: TimerStatus
    totalSeconds: number
    remainingSeconds: number
}

export type TimerAction =
    | { type: 'configure'; minutes: number }
    | { type: 'start'; minutes: number }
    | { type: 'tick' }
    | { type: 'pause' }
    | { type: 'resume' }
    | { type: 'stop' }
    | { type: 'reset' }

export function idleTimer(minutes: number): TimerState {
    return { status: 'idle', totalSeconds: minutes * 60, remainingSeconds: minutes * 60 }
}

export function timerReducer(state: TimerState, action: TimerAction): TimerState {
    switch (action.type) {
        case 'configure':
            return state.status === 'idle' ? idleTimer(action.minutes) : state
        case 'start':
            return { status: 'running', totalSeconds: action.minutes * 60, remainingSeconds: action.minutes * 60 }
        case 'tick': {
            if (state.status !== 'running') return state
            const remainingSeconds = Math.max(0, state.remainingSeconds - 1)
            return {
                ...state,
                remainingSeconds,
                status: remainingSeconds === 0 ? 'completed' : 'running',
            }
        }
        case 'pause':
            return state.status === 'running' ? { ...state, status: 'paused' } : state
        case 'resume':
            return state.status === 'paused' ? { ...state, status: 'running' } : state
        case 'stop':
        case 'reset':
            return { ...state, status: 'idle', remainingSeconds: state.totalSeconds }
    }
}

export function timerProgress(state: TimerState): number {
    if (state.totalSeconds === 0) return 0
    return 1 - state.remainingSeconds / state.totalSeconds
}

export function isFireModeLaunch(value: unknown): value is FireModeLaunch {
    if (typeof value !== 'object' || value === null) return false
    const durationMinutes: unknown = Reflect.get(value, 'durationMinutes')
    const questId: unknown = Reflect.get(value, 'questId')
    const description: unknown = Reflect.get(value, 'description')
    return (
        typeof durationMinutes === 'number' &&
        durationMinutes > 0 &&
        (questId === null || typeof questId === 'string') &&
        (description === null || typeof description === 'string')
    )
}

export function launchFromState(state: unknown): FireModeLaunch {
    if (isFireModeLaunch(state)) return state
    return { durationMinutes: DEFAULT_FIRE_MODE_DURATION, questId: null, description: null }
}
