export const SWIPE_THRESHOLD = 80
export const MAX_SWIPE = 120
export const RUBBER_BAND = 0.3
export const MIN_DRAG_DISTANCE = 20
export const HORIZONTAL_RATIO = 1.5

export const SESSION_OPEN_OFFSET = -MAX_SWIPE
export const RITUAL_COMPLETE_NUDGE = 60
export const RITUAL_UNDO_NUDGE = -60

export type SwipeDirection = 'left' | 'right'

export interface DragTranslation {
    dx: number
    dy: number
}

/** Vertical drags belong to page scrolling. */
export function isHorizontalDrag({ dx, dy }: DragTranslation): boolean {
    return Math.abs(dx) > Math.abs(dy) * HORIZONTAL_RATIO
}

export function hasPassedMinimumDistance({ dx, dy }: DragTranslation): boolean {
    return Math.hypot(dx, dy) >= MIN_DRAG_DISTANCE
}

export function rubberBand(dx: number): number {
    const distance = Math.abs(dx)
    if (distance < MAX_SWIPE) return dx
    return Math.sign(dx) * (MAX_SWIPE + (distance - MAX_SWIPE) * RUBBER_BAND)
}

/**
 * Offset for an in-flight drag, or null when the move should leave the
 * card where it is.
 */
export function dragOffset(translation: DragTranslation, allowed: SwipeDirection | null): number | null {
    if (!allowed || !hasPassedMinimumDistance(translation) || !isHorizontalDrag(translation)) {
        return null
    }
    const { dx } = translation
    if (allowed === 'left' && dx >= 0) return null
    if (allowed === 'right' && dx <= 0) return null
    return rubberBand(dx)
}

export function revealProgress(offset: number): number {
    return Math.min(Math.abs(offset) / SWIPE_THRESHOLD, 1)
}

export type SessionRelease = 'open' | 'close'

export function resolveSessionRelease(translation: DragTranslation): SessionRelease {
    if (!isHorizontalDrag(translation)) return 'close'
    return translation.dx < -SWIPE_THRESHOLD ? 'open' : 'close'
}

export type RitualRelease = 'complete' | 'undo' | 'reset'

export function ritualSwipeDirection(isCompleted: boolean): SwipeDirection {
    return isCompleted ? 'left' : 'right'
}

export function resolveRitualRelease(translation: DragTranslation, isCompleted: boolean): RitualRelease {
    if (!isHorizontalDrag(translation)) return 'reset'
    if (translation.dx > SWIPE_THRESHOLD && !isCompleted) return 'complete'
    if (translation.dx < -SWIPE_THRESHOLD && isCompleted) return 'undo'
    return 'reset'
}
