import { useRef } from 'react'
import type { PointerEvent } from 'react'
import { hasPassedMinimumDistance } from '@/utils/swipe'
import type { DragTranslation } from '@/utils/swipe'

interface SwipeGestureOptions {
  disabled?: boolean
  onDrag: (translation: DragTranslation) => void
  onRelease: (translation: DragTranslation) => void
  onTap?: () => void
}

interface DragOrigin {
  pointerId: number
  x: number
  y: number
}

/**
 * Tracks one pointer from press to release. Moves under the minimum drag
 * distance count as a tap; the click that follows a drag is dropped.
 */
export function useSwipeGesture({ disabled, onDrag, onRelease, onTap }: SwipeGestureOptions) {
  const origin = useRef<DragOrigin | null>(null)
  const dragging = useRef(false)
  const suppressClick = useRef(false)

  const translationOf = (event: PointerEvent<HTMLElement>, from: DragOrigin): DragTranslation => ({
    dx: event.clientX - from.x,
    dy: event.clientY - from.y,
  })

  const onPointerDown = (event: PointerEvent<HTMLElement>) => {
    if (disabled) return
    origin.current = { pointerId: event.pointerId, x: event.clientX, y: event.clientY }
    dragging.current = false
    suppressClick.current = false
  }

  const onPointerMove = (event: PointerEvent<HTMLElement>) => {
    const from = origin.current
    if (!from || from.pointerId !== event.pointerId || disabled) return
    const translation = translationOf(event, from)
    if (!dragging.current) {
      if (!hasPassedMinimumDistance(translation)) return
      dragging.current = true
      if (typeof event.currentTarget.setPointerCapture === 'function') {
        event.currentTarget.setPointerCapture(event.pointerId)
      }
    }
    onDrag(translation)
  }

  const onPointerUp = (event: PointerEvent<HTMLElement>) => {
    const from = origin.current
    origin.current = null
    if (!from || !dragging.current) return
    dragging.current = false
    suppressClick.current = true
    onRelease(translationOf(event, from))
  }

  const onPointerCancel = () => {
    const wasDragging = dragging.current
    origin.current = null
    dragging.current = false
    if (wasDragging) onRelease({ dx: 0, dy: 0 })
  }

  const onClick = () => {
    if (suppressClick.current) {
      suppressClick.current = false
      return
    }
    if (!disabled) onTap?.()
  }

  return { onPointerDown, onPointerMove, onPointerUp, onPointerCancel, onClick }
}
