import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { fireEvent, screen } from '@testing-library/react'
import { LogSessionSheet } from '@/components/sheets/LogSessionSheet'
import { renderWithProviders } from '@/test/render'
import type { Quest } from '@/types'

const quest: Quest = { id: 'quest-1', title: 'Ship the report', area: 'career', progress: 0.75, status: 'active' }

beforeEach(() => {
    vi.useFakeTimers({ toFake: ['Date'] })
    vi.setSystemTime(new Date(2024, 2, 13, 12, 0))
})

afterEach(() => {
    vi.useRealTimers()
})

describe('LogSessionSheet', () => {
    it('starts from now with the default duration', () => {
        renderWithProviders(<LogSessionSheet isOpen quests={[quest]} onClose={vi.fn()} onLog={vi.fn()} />)

        expect(screen.getByLabelText<HTMLInputElement>('When?').value).toBe('2024-03-13T12:00')
        expect(screen.getByTestId('log-duration').textContent).toBe('25 min')
    })

    it('logs the filled-in session and closes', () => {
        const onLog = vi.fn()
        const onClose = vi.fn()
        renderWithProviders(<LogSessionSheet isOpen quests={[quest]} onClose={onClose} onLog={onLog} />)

        fireEvent.change(screen.getByLabelText('When?'), { target: { value: '2024-03-13T09:30' } })
        fireEvent.change(screen.getByLabelText('Duration'), { target: { value: '45' } })
        fireEvent.change(screen.getByLabelText('Link to Quest (optional)'), { target: { value: 'quest-1' } })
        fireEvent.change(screen.getByLabelText('What did you work on?'), { target: { value: '  Wrote tests  ' } })
        fireEvent.click(screen.getByRole('button', { name: 'Log Session' }))

        expect(onLog).toHaveBeenCalledWith({
            startedAt: new Date(2024, 2, 13, 9, 30),
            durationMinutes: 45,
            questId: 'quest-1',
            description: 'Wrote tests',
        })
        expect(onClose).toHaveBeenCalledTimes(1)
    })

    it('will not log a session that starts in the future', () => {
        const onLog = vi.fn()
        renderWithProviders(<LogSessionSheet isOpen quests={[]} onClose={vi.fn()} onLog={onLog} />)

        fireEvent.change(screen.getByLabelText('When?'), { target: { value: '2024-03-14T09:00' } })
        const submit = screen.getByRole('button', { name: 'Log Session' })

        expect(submit.hasAttribute('disabled')).toBe(true)
        fireEvent.click(submit)
        expect(onLog).not.toHaveBeenCalled()
    })

    it('only offers quests when there are some', () => {
        renderWithProviders(<LogSessionSheet isOpen quests={[]} onClose={vi.fn()} onLog={vi.fn()} />)

        expect(screen.queryByLabelText('Link to Quest (optional)')).toBeNull()
    })

    it('closes without logging on cancel', () => {
        const onLog = vi.fn()
        const onClose = vi.fn()
        renderWithProviders(<LogSessionSheet isOpen quests={[quest]} onClose={onClose} onLog={onLog} />)

        fireEvent.click(screen.getByRole('button', { name: 'Cancel' }))

        expect(onClose).toHaveBeenCalledTimes(1)
        expect(onLog).not.toHaveBeenCalled()
    })
})
