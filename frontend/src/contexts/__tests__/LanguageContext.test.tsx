import { describe, expect, it, vi } from 'vitest'
import { act, renderHook, waitFor } from '@testing-library/react'
import { useTranslation } from 'react-i18next'
import type { ReactNode } from 'react'
import { LanguageProvider, useLanguage } from '@/contexts/LanguageContext'
import { LANGUAGE_STORAGE_KEY } from '@/utils/i18n'

const wrapper = ({ children }: { children: ReactNode }) => <LanguageProvider>{children}</LanguageProvider>

function useLocalized() {
    const { t } = useTranslation()
    return { ...useLanguage(), t }
}

describe('LanguageProvider', () => {
    it('follows the browser language by default', async () => {
        vi.spyOn(navigator, 'language', 'get').mockReturnValue('fr-FR')

        const { result } = renderHook(() => useLocalized(), { wrapper })

        await waitFor(() => expect(result.current.locale).toBe('fr'))
        expect(result.current.language).toBe('system')
        expect(result.current.t('common.cancel')).toBe('Annuler')
    })

    it('restores the stored language', async () => {
        localStorage.setItem(LANGUAGE_STORAGE_KEY, 'es')

        const { result } = renderHook(() => useLocalized(), { wrapper })

        await waitFor(() => expect(result.current.locale).toBe('es'))
        expect(result.current.language).toBe('es')
    })

    it('ignores unknown stored values', () => {
        localStorage.setItem(LANGUAGE_STORAGE_KEY, 'klingon')
        vi.spyOn(navigator, 'language', 'get').mockReturnValue('en-US')

        const { result } = renderHook(() => useLocalized(), { wrapper })

        expect(result.current.language).toBe('system')
        expect(result.current.locale).toBe('en')
    })

    it('switches and persists the language', async () => {
        const { result } = renderHook(() => useLocalized(), { wrapper })

        await act(async () => result.current.setLanguage('fr'))

        expect(result.current.t('streak.day_count', { day: 3 })).toBe('Jour 3')
        expect(localStorage.getItem(LANGUAGE_STORAGE_KEY)).toBe('fr')
        expect(document.documentElement.lang).toBe('fr')
    })

    it('throws outside the provider', () => {
        vi.spyOn(console, 'error').mockImplementation(() => undefined)

        expect(() => renderHook(() => useLanguage())).toThrow('useLanguage must be used within LanguageProvider')
    })
})
