import { describe, expect, it, vi } from 'vitest'
import { fireEvent, screen, waitFor } from '@testing-library/react'
import { Sheet } from '@/components/Sheet'
import { renderWithProviders } from '@/test/render'
import { LANGUAGE_STORAGE_KEY } from '@/utils/i18n'

describe('Sheet', () => {
    it('renders nothing while closed', () => {
        renderWithProviders(<Sheet isOpen={false} title="Details" onClose={vi.fn()}>Body</Sheet>)

        expect(screen.queryByRole('dialog')).toBeNull()
    })

    it('closes from the close button and Escape', () => {
        const onClose = vi.fn()
        renderWithProviders(<Sheet isOpen title="Details" onClose={onClose}>Body</Sheet>)

        fireEvent.click(screen.getByRole('button', { name: 'Close' }))
        fireEvent.keyDown(window, { key: 'Escape' })

        expect(onClose).toHaveBeenCalledTimes(2)
    })

    it('labels the close button in the chosen language', async () => {
        localStorage.setItem(LANGUAGE_STORAGE_KEY, 'fr')
        renderWithProviders(<Sheet isOpen title="Détails" onClose={vi.fn()}>Contenu</Sheet>)

        await waitFor(() => expect(screen.getByRole('button', { name: 'Fermer' })).toBeTruthy())
    })
})
