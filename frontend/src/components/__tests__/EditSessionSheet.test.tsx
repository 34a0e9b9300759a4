import { describe, expect, it, vi } from 'vitest'
import { fireEvent, screen } from '@testing-library/react'
import { EditSessionSheet } from '@/components/sheets/EditSessionSheet'
import { renderWithProviders } from '@/test/render'
import type { FocusSession } from '@/types'

const session: FocusSession = {
    id: 'session-1',
    durationMinutes: 25,
    startTime: new Date(2024, 2, 13, 10, 0),
    endTime: new Date(2024, 2, 13, 10, 25),
    description: 'Deep work',
}

function renderSheet(target: FocusSession | null = session) {
    const handlers = { onClose: vi.fn(), onSave: vi.fn(), onDelete: vi.fn() }
    renderWithProviders(<EditSessionSheet session={target} {...handlers} />)
    return handlers
}

describe('EditSessionSheet', () => {
    it('stays closed without a session', () => {
        renderSheet(null)
        expect(screen.queryByRole('dialog')).toBeNull()
    })

    it('shows the session timestamps', () => {
        renderSheet()

        expect(screen.getByText('Mar 13, 10:00')).toBeTruthy()
        expect(screen.getByText('Mar 13, 10:25')).toBeTruthy()
        expect(screen.getByTestId('session-duration').textContent).toBe('25 min')
    })

    it('steps the duration by five minutes', () => {
        renderSheet()

        fireEvent.click(screen.getByRole('button', { name: '+5' }))
        expect(screen.getByTestId('session-duration').textContent).toBe('30 min')

        fireEvent.click(screen.getByRole('button', { name: '-5' }))
        fireEvent.click(screen.getByRole('button', { name: '-5' }))
        expect(screen.getByTestId('session-duration').textContent).toBe('20 min')
    })

    it('disables the stepper at the lower bound', () => {
        renderSheet({ ...session, durationMinutes: 5 })

        expect(screen.getByRole('button', { name: '-5' }).hasAttribute('disabled')).toBe(true)
        expect(screen.getByRole('button', { name: '+5' }).hasAttribute('disabled')).toBe(false)
    })

    it('saves the preset duration and a cleared description as null', () => {
        const { onSave, onClose } = renderSheet()

        fireEvent.click(screen.getByRole('button', { name: '90 min' }))
        fireEvent.change(screen.getByLabelText('What will you work on?'), { target: { value: '  ' } })
        fireEvent.click(screen.getByRole('button', { name: 'Save' }))

        expect(onSave).toHaveBeenCalledWith('session-1', { description: null, durationMinutes: 90 })
        expect(onClose).toHaveBeenCalledTimes(1)
    })

    it('deletes only after confirmation', () => {
        const { onDelete, onClose } = renderSheet()

        fireEvent.click(screen.getByRole('button', { name: 'Delete Session' }))
        expect(screen.getByRole('alertdialog', { name: 'Delete Session?' })).toBeTruthy()
        expect(onDelete).not.toHaveBeenCalled()

        fireEvent.click(screen.getByRole('button', { name: 'Delete' }))

        expect(onDelete).toHaveBeenCalledWith('session-1')
        expect(onClose).toHaveBeenCalledTimes(1)
    })

    it('keeps the session when the confirmation is cancelled', () => {
        const { onDelete } = renderSheet()

        fireEvent.click(screen.getByRole('button', { name: 'Delete Session' }))
        const cancelButtons = screen.getAllByRole('button', { name: 'Cancel' })
        fireEvent.click(cancelButtons[cancelButtons.length - 1])

        expect(screen.queryByRole('alertdialog')).toBeNull()
        expect(onDelete).not.toHaveBeenCalled()
    })
})
