import { createContext, useContext, useEffect, useMemo, useState } from 'react'
import type { ReactNode } from 'react'
import { useTranslation } from 'react-i18next'
import { isLocale, languageFor, LANGUAGE_STORAGE_KEY, storedLanguageChoice } from '@/utils/i18n'
import type { LanguageChoice, Locale } from '@/utils/i18n'

interface LanguageContextType {
    language: LanguageChoice
    locale: Locale
    setLanguage: (language: LanguageChoice) => void
}

const LanguageContext = createContext<LanguageContextType | undefined>(undefined)

/** Keeps the user's language choice, including "follow the system", and hands it to i18next. */
export function LanguageProvider({ children }: { children: ReactNode }) {
    const { i18n } = useTranslation()
    const [language, setLanguage] = useState<LanguageChoice>(storedLanguageChoice)
    const locale: Locale = isLocale(i18n.resolvedLanguage) ? i18n.resolvedLanguage : 'en'

    useEffect(() => {
        localStorage.setItem(LANGUAGE_STORAGE_KEY, language)
        i18n.changeLanguage(languageFor(language)).catch((error: unknown) => {
            console.error('Failed to change language:', error)
        })
    }, [i18n, language])

    useEffect(() => {
        document.documentElement.lang = locale
    }, [locale])

    const value = useMemo(() => ({ language, locale, setLanguage }), [language, locale])

    return (
        <LanguageContext.Provider value={value}>
            {children}
        </LanguageContext.Provider>
    )
}

export function useLanguage() {
    const context = useContext(LanguageContext)
    if (!context) {
        throw new Error('useLanguage must be used within LanguageProvider')
    }
    return context
}
