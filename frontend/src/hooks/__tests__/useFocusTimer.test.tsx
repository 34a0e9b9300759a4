import { afterEach, describe, expect, it, vi } from 'vitest'
import { act, renderHook, waitFor } from '@testing-library/react'
import { SWRConfig } from 'swr'
import type { ReactNode } from 'react'
import { completeFocusSession, createFocusSession } from '@/services/api'
import { COMPLETED_DISPLAY_MS, useFocusTimer } from '@/hooks/useFocusTimer'
import type { FireModeLaunch } from '@/types'

vi.mock('@/services/api')

const wrapper = ({ children }: { children: ReactNode }) => (
    <SWRConfig value={{ provider: () => new Map(), dedupingInterval: 0, shouldRetryOnError: false }}>{children}</SWRConfig>
)

const launch: FireModeLaunch = { durationMinutes: 1, questId: 'quest-1', description: 'Write the report' }

function serveSession() {
    vi.mocked(createFocusSession).mockResolvedValue({
        id: 'session-9',
        quest_id: 'quest-1',
        description: 'Write the report',
        duration_minutes: 1,
        status: 'in_progress',
        started_at: '2024-03-13T10:00:00',
    })
    vi.mocked(completeFocusSession).mockResolvedValue(undefined)
}

afterEach(() => {
    vi.useRealTimers()
})

describe('useFocusTimer', () => {
    it('waits idle at the launch duration', () => {
        const { result } = renderHook(() => useFocusTimer(launch), { wrapper })

        expect(result.current.timer.status).toBe('idle')
        expect(result.current.timer.remainingSeconds).toBe(60)
        expect(createFocusSession).not.toHaveBeenCalled()
    })

    it('creates the session on start and completes it on stop', async () => {
        serveSession()
        const { result } = renderHook(() => useFocusTimer(launch), { wrapper })

        act(() => result.current.start())

        expect(createFocusSession).toHaveBeenCalledWith(launch)
        expect(result.current.timer.status).toBe('running')

        act(() => result.current.stop())

        expect(result.current.timer.status).toBe('idle')
        await waitFor(() => expect(completeFocusSession).toHaveBeenCalledWith('session-9'))
    })

    it('completes the session at zero and resets after the completion display', async () => {
        vi.useFakeTimers()
        serveSession()
        const { result } = renderHook(() => useFocusTimer(launch), { wrapper })

        act(() => result.current.start())
        await act(async () => {
            await vi.advanceTimersByTimeAsync(60_000)
        })

        expect(result.current.timer.status).toBe('completed')
        expect(result.current.timer.remainingSeconds).toBe(0)

        await act(async () => {
            await vi.advanceTimersByTimeAsync(COMPLETED_DISPLAY_MS - 1)
        })

        expect(result.current.timer.status).toBe('completed')
        expect(completeFocusSession).toHaveBeenCalledWith('session-9')
        expect(completeFocusSession).toHaveBeenCalledTimes(1)

        await act(async () => {
            await vi.advanceTimersByTimeAsync(1)
        })

        expect(result.current.timer.status).toBe('idle')
        expect(result.current.timer.remainingSeconds).toBe(60)
    })

    it('completes an unfinished session when the page is left', async () => {
        serveSession()
        const { result, unmount } = renderHook(() => useFocusTimer(launch), { wrapper })

        act(() => result.current.start())
        unmount()

        await waitFor(() => expect(completeFocusSession).toHaveBeenCalledWith('session-9'))
        expect(completeFocusSession).toHaveBeenCalledTimes(1)
    })

    it('skips completion when the session could not be created', async () => {
        const failure = new Error('offline')
        vi.mocked(createFocusSession).mockRejectedValue(failure)
        const logError = vi.spyOn(console, 'error').mockImplementation(() => undefined)
        const { result } = renderHook(() => useFocusTimer(launch), { wrapper })

        act(() => result.current.start())
        await waitFor(() => expect(logError).toHaveBeenCalledWith('Failed to create focus session:', failure))
        act(() => result.current.stop())

        await act(async () => {
            await Promise.resolve()
        })
        expect(completeFocusSession).not.toHaveBeenCalled()
    })
})
