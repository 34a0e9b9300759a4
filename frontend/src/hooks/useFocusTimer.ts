import { useCallback, useEffect, useReducer, useRef } from 'react'
import { useSWRConfig } from 'swr'
import { completeFocusSession, createFocusSession } from '@/services/api'
import { DASHBOARD_KEY } from '@/hooks/useDashboard'
import { idleTimer, timerReducer } from '@/utils/fireMode'
import type { FireModeLaunch } from '@/types'

export const COMPLETED_DISPLAY_MS = 2000

export function useFocusTimer(launch: FireModeLaunch) {
  const { mutate } = useSWRConfig()
  const [timer, dispatch] = useReducer(timerReducer, launch.durationMinutes, idleTimer)
  const pendingSession = useRef<Promise<string | null> | null>(null)

  useEffect(() => {
    dispatch({ type: 'configure', minutes: launch.durationMinutes })
  }, [launch.durationMinutes])

  const finishSession = useCallback(async () => {
    const pending = pendingSession.current
    pendingSession.current = null
    if (!pending) return
    const sessionId = await pending
    if (!sessionId) return
    try {
      await completeFocusSession(sessionId)
      await mutate(DASHBOARD_KEY)
    } catch (error) {
      console.error('Failed to complete focus session:', error)
    }
  }, [mutate])

  const start = useCallback(() => {
    dispatch({ type: 'start', minutes: launch.durationMinutes })
    pendingSession.current = createFocusSession(launch)
      .then((session) => session.id)
      .catch((error: unknown) => {
        console.error('Failed to create focus session:', error)
        return null
      })
  }, [launch])

  const pause = useCallback(() => dispatch({ type: 'pause' }), [])
  const resume = useCallback(() => dispatch({ type: 'resume' }), [])

  // Stopping early still logs the minutes spent so far
  const stop = useCallback(() => {
    dispatch({ type: 'stop' })
    void finishSession()
  }, [finishSession])

  // Leaving the page mid-session still logs the minutes spent
  const finishOnLeave = useRef(finishSession)
  finishOnLeave.current = finishSession
  useEffect(() => () => {
    void finishOnLeave.current()
  }, [])

  useEffect(() => {
    if (timer.status !== 'running') return
    const interval = setInterval(() => dispatch({ type: 'tick' }), 1000)
    return () => clearInterval(interval)
  }, [timer.status])

  useEffect(() => {
    if (timer.status !== 'completed') return
    void finishSession()
    const timeout = setTimeout(() => dispatch({ type: 'reset' }), COMPLETED_DISPLAY_MS)
    return () => clearTimeout(timeout)
  }, [timer.status, finishSession])

  return { timer, start, pause, resume, stop }
}
