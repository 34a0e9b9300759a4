import { describe, expect, it, vi } from 'vitest'
import { fireEvent, screen } from '@testing-library/react'
import { WeekSessionsSection } from '@/components/WeekSessionsSection'
import { renderWithProviders } from '@/test/render'
import type { FocusSession } from '@/types'

// Wednesday 13 March 2024, noon
const now = new Date(2024, 2, 13, 12, 0)

function session(id: string, startTime: Date): FocusSession {
    return { id, durationMinutes: 25, startTime }
}

const todaySessions = [7, 8, 9, 10, 11].map((hour) => session(`today-${hour}`, new Date(2024, 2, 13, hour, 0)))
const yesterdaySessions = [9, 14].map((hour) => session(`yesterday-${hour}`, new Date(2024, 2, 12, hour, 0)))
const mondaySession = session('monday', new Date(2024, 2, 11, 9, 0))
const lastWeekSession = session('last-week', new Date(2024, 2, 8, 9, 0))

function renderSection(sessions: FocusSession[]) {
    return renderWithProviders(
        <WeekSessionsSection sessions={sessions} quests={[]} now={now} onEdit={vi.fn()} onDelete={vi.fn()} />
    )
}

const cardCount = () => screen.queryAllByTestId('session-card').length

describe('WeekSessionsSection', () => {
    it('renders nothing without sessions this week', () => {
        const { container } = renderSection([lastWeekSession])
        expect(container.innerHTML).toBe('')
    })

    it('summarizes the week', () => {
        renderSection([...todaySessions, ...yesterdaySessions, mondaySession, lastWeekSession])

        expect(screen.getByText('11 Mar - 17 Mar')).toBeTruthy()
        expect(screen.getByText('8 sessions · 200m total')).toBeTruthy()
        expect(screen.getByRole('link', { name: 'New' }).getAttribute('href')).toBe('/fire-mode')
    })

    it('previews three of today and expands the rest', () => {
        renderSection(todaySessions)

        expect(cardCount()).toBe(3)
        fireEvent.click(screen.getByRole('button', { name: 'See 2 more' }))
        expect(cardCount()).toBe(5)
        fireEvent.click(screen.getByRole('button', { name: 'Show less' }))
        expect(cardCount()).toBe(3)
    })

    it('collapses yesterday by default', () => {
        renderSection([...yesterdaySessions])

        const header = screen.getByRole('button', { name: 'Yesterday (2)' })
        expect(header.getAttribute('aria-expanded')).toBe('false')
        expect(cardCount()).toBe(0)

        fireEvent.click(header)

        expect(header.getAttribute('aria-expanded')).toBe('true')
        expect(cardCount()).toBe(2)
    })

    it('shows only a header and count for older days', () => {
        renderSection([mondaySession, ...todaySessions])

        expect(screen.getByText('Monday, 11 Mar')).toBeTruthy()
        expect(screen.queryByText('09:00')).toBeNull()
        expect(cardCount()).toBe(3)
    })

    it('shows the swipe hint for short weeks only', () => {
        const { unmount } = renderSection([mondaySession])
        expect(screen.getByText('Swipe left to edit or delete')).toBeTruthy()
        unmount()

        renderSection(todaySessions)
        expect(screen.queryByText('Swipe left to edit or delete')).toBeNull()
    })
})
