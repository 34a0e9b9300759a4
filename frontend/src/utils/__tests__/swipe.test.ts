import { describe, expect, it } from 'vitest'
import {
    dragOffset,
    hasPassedMinimumDistance,
    isHorizontalDrag,
    resolveRitualRelease,
    resolveSessionRelease,
    revealProgress,
    ritualSwipeDirection,
    rubberBand,
} from '@/utils/swipe'

describe('drag recognition', () => {
    it('needs the horizontal component to dominate by 1.5x', () => {
        expect(isHorizontalDrag({ dx: 30, dy: 20 })).toBe(false)
        expect(isHorizontalDrag({ dx: -31, dy: 20 })).toBe(true)
    })

    it('waits for 20px of travel', () => {
        expect(hasPassedMinimumDistance({ dx: 10, dy: 10 })).toBe(false)
        expect(hasPassedMinimumDistance({ dx: 12, dy: 16 })).toBe(true)
    })
})

describe('rubberBand', () => {
    it('follows the finger up to the max swipe', () => {
        expect(rubberBand(100)).toBe(100)
        expect(rubberBand(-120)).toBe(-120)
    })

    it('resists past the max swipe', () => {
        expect(rubberBand(150)).toBeCloseTo(129)
        expect(rubberBand(-150)).toBeCloseTo(-129)
    })
})

describe('dragOffset', () => {
    it('follows drags in the allowed direction', () => {
        expect(dragOffset({ dx: 50, dy: 0 }, 'right')).toBe(50)
        expect(dragOffset({ dx: -200, dy: 0 }, 'left')).toBeCloseTo(-144)
    })

    it('ignores drags in the other direction', () => {
        expect(dragOffset({ dx: 50, dy: 0 }, 'left')).toBeNull()
        expect(dragOffset({ dx: -50, dy: 0 }, 'right')).toBeNull()
    })

    it('ignores short, vertical or disabled drags', () => {
        expect(dragOffset({ dx: 15, dy: 0 }, 'right')).toBeNull()
        expect(dragOffset({ dx: 40, dy: 40 }, 'right')).toBeNull()
        expect(dragOffset({ dx: 50, dy: 0 }, null)).toBeNull()
    })
})

describe('release', () => {
    it('reports how far the actions are revealed', () => {
        expect(revealProgress(40)).toBe(0.5)
        expect(revealProgress(-200)).toBe(1)
    })

    it('opens session cards past the threshold', () => {
        expect(resolveSessionRelease({ dx: -81, dy: 0 })).toBe('open')
        expect(resolveSessionRelease({ dx: -80, dy: 0 })).toBe('close')
        expect(resolveSessionRelease({ dx: -100, dy: -90 })).toBe('close')
    })

    it('swipes rituals right to complete and left to undo', () => {
        expect(ritualSwipeDirection(false)).toBe('right')
        expect(ritualSwipeDirection(true)).toBe('left')
        expect(resolveRitualRelease({ dx: 90, dy: 0 }, false)).toBe('complete')
        expect(resolveRitualRelease({ dx: 90, dy: 0 }, true)).toBe('reset')
        expect(resolveRitualRelease({ dx: -90, dy: 0 }, true)).toBe('undo')
        expect(resolveRitualRelease({ dx: -90, dy: 0 }, false)).toBe('reset')
        expect(resolveRitualRelease({ dx: 60, dy: 0 }, false)).toBe('reset')
    })
})
