import { type ClassValue, clsx } from "clsx"
import { twMerge } from "tailwind-merge"

export function cn(...inputs: ClassValue[]) {
    return twMerge(clsx(inputs))
}

export function formatDuration(minutes: number): string {
    if (minutes < 60) return `${minutes}m`
    const hours = Math.floor(minutes / 60)
    const mins = minutes % 60
    return mins > 0 ? `${hours}h ${mins}m` : `${hours}h`
}

const pad = (value: number) => value.toString().padStart(2, '0')

/** Local calendar date as `YYYY-MM-DD`, the format the backend keys days by. */
export function toDateKey(date: Date): string {
    return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`
}

export function startOfDay(date: Date): Date {
    return new Date(date.getFullYear(), date.getMonth(), date.getDate())
}

export function addDays(date: Date, days: number): Date {
    return new Date(date.getFullYear(), date.getMonth(), date.getDate() + days)
}

export function isSameDay(a: Date, b: Date): boolean {
    return toDateKey(a) === toDateKey(b)
}

/** Monday of the week containing `date`, at midnight. */
export function startOfWeek(date: Date): Date {
    const day = startOfDay(date)
    const offset = (day.getDay() + 6) % 7
    return addDays(day, -offset)
}

function shortMonth(date: Date, locale: string): string {
    return new Intl.DateTimeFormat(locale, { month: 'short' }).format(date)
}

// d MMM
export function formatDayMonth(date: Date, locale = 'en'): string {
    return `${date.getDate()} ${shortMonth(date, locale)}`
}

// EEEE, d MMM
export function formatDayHeader(date: Date, locale = 'en'): string {
    const weekday = new Intl.DateTimeFormat(locale, { weekday: 'long' }).format(date)
    return `${weekday}, ${formatDayMonth(date, locale)}`
}

// MMM d, HH:mm
export function formatTimestamp(date: Date, locale = 'en'): string {
    return `${shortMonth(date, locale)} ${date.getDate()}, ${formatClock(date)}`
}

export function formatClock(date: Date): string {
    return `${pad(date.getHours())}:${pad(date.getMinutes())}`
}

/** `mm:ss`, used by the FireMode countdown. */
export function formatCountdown(totalSeconds: number): string {
    const seconds = Math.max(0, Math.floor(totalSeconds))
    return `${pad(Math.floor(seconds / 60))}:${pad(seconds % 60)}`
}
