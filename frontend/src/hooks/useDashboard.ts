import { useCallback } from 'react'
import useSWR from 'swr'
import {
  completeFocusSession,
  completeRoutine,
  createFocusSession,
  deleteAvatar,
  deleteFocusSession,
  getDashboard,
  getStreak,
  uncompleteRoutine,
  updateFocusSession,
  updateProfile,
  uploadAvatar,
} from '@/services/api'
import { fallbackStreak, mapDashboard, mapStreak } from '@/services/mappers'
import { toDateKey } from '@/utils/helpers'
import type { EncodedImage } from '@/utils/crop'
import type { DailyRitual, DashboardData, ManualSessionLog, ProfileUpdate, SessionEdit } from '@/types'

export const DASHBOARD_KEY = '/dashboard'
export const DASHBOARD_REFRESH_INTERVAL = 60000

export async function fetchDashboard(now: Date = new Date()): Promise<DashboardData> {
  const date = toDateKey(now)
  const [dashboard, streak] = await Promise.all([
    getDashboard(date),
    getStreak(date).catch((error: unknown) => {
      console.warn('Streak unavailable, falling back to dashboard stats:', error)
      return null
    }),
  ])
  return mapDashboard(
    dashboard,
    streak ? mapStreak(streak) : fallbackStreak(dashboard.stats.streak_days),
    now
  )
}

function withRitualCompleted(data: DashboardData, ritualId: string, isCompleted: boolean): DashboardData {
  return {
    ...data,
    rituals: data.rituals.map((ritual) => (ritual.id === ritualId ? { ...ritual, isCompleted } : ritual)),
  }
}

export function useDashboard() {
  const { data, error, isLoading, mutate } = useSWR<DashboardData>(DASHBOARD_KEY, () => fetchDashboard(), {
    refreshInterval: DASHBOARD_REFRESH_INTERVAL,
    revalidateOnFocus: true,
  })

  const refresh = useCallback(async () => {
    await mutate()
  }, [mutate])

  // Optimistic: the card flips immediately. A failure flips back only this
  // ritual, since others may have changed while the request was in flight.
  const toggleRitual = useCallback(async (ritual: DailyRitual) => {
    const isCompleted = !ritual.isCompleted
    const flip = (value: boolean) => (current: DashboardData | undefined) =>
      current && withRitualCompleted(current, ritual.id, value)

    await mutate(flip(isCompleted), { revalidate: false })
    try {
      if (isCompleted) {
        await completeRoutine(ritual.id)
      } else {
        await uncompleteRoutine(ritual.id)
      }
    } catch (error) {
      console.error('Failed to toggle ritual:', error)
      await mutate(flip(ritual.isCompleted), { revalidate: false })
    }
    await mutate()
  }, [mutate])

  const changeAvatar = useCallback(async (image: EncodedImage) => {
    try {
      await uploadAvatar(image.base64, image.contentType)
      await mutate()
    } catch (error) {
      console.error('Failed to upload avatar:', error)
    }
  }, [mutate])

  const removeAvatar = useCallback(async () => {
    try {
      await deleteAvatar()
      await mutate()
    } catch (error) {
      console.error('Failed to delete avatar:', error)
    }
  }, [mutate])

  const saveProfile = useCallback(async (update: ProfileUpdate) => {
    try {
      await updateProfile(update)
      await mutate()
    } catch (error) {
      console.error('Failed to update profile:', error)
    }
  }, [mutate])

  const editSession = useCallback(async (sessionId: string, edit: SessionEdit) => {
    try {
      await updateFocusSession(sessionId, edit)
      await mutate()
    } catch (error) {
      console.error('Failed to update focus session:', error)
    }
  }, [mutate])

  // Past sessions are created and completed straight away
  const logSession = useCallback(async (log: ManualSessionLog) => {
    try {
      const session = await createFocusSession(log, log.startedAt)
      await completeFocusSession(session.id)
      await mutate()
    } catch (error) {
      console.error('Failed to log focus session:', error)
    }
  }, [mutate])

  const removeSession = useCallback(async (sessionId: string) => {
    try {
      await deleteFocusSession(sessionId)
      await mutate()
    } catch (error) {
      console.error('Failed to delete focus session:', error)
    }
  }, [mutate])

  return {
    data,
    error: error instanceof Error ? error : null,
    isLoading,
    refresh,
    toggleRitual,
    uploadAvatar: changeAvatar,
    deleteAvatar: removeAvatar,
    updateProfile: saveProfile,
    editSession,
    deleteSession: removeSession,
    logSession,
  }
}

export type DashboardViewModel = ReturnType<typeof useDashboard>
