import i18n from 'i18next'
import { initReactI18next } from 'react-i18next'
import en from '@/locales/en.json'
import fr from '@/locales/fr.json'
import es from '@/locales/es.json'

export type Locale = 'en' | 'fr' | 'es'
export type LanguageChoice = 'system' | Locale

export const LANGUAGE_STORAGE_KEY = 'focus-language'
export const SUPPORTED_LOCALES: Locale[] = ['en', 'fr', 'es']

export const LANGUAGE_OPTIONS: { value: LanguageChoice; label: string | null }[] = [
    { value: 'system', label: null },
    { value: 'en', label: 'English' },
    { value: 'fr', label: 'Français' },
    { value: 'es', label: 'Español' },
]

export function isLanguageChoice(value: string | null): value is LanguageChoice {
    return value === 'system' || value === 'en' || value === 'fr' || value === 'es'
}

export function isLocale(value: string | undefined): value is Locale {
    return value === 'en' || value === 'fr' || value === 'es'
}

export function storedLanguageChoice(): LanguageChoice {
    const saved = localStorage.getItem(LANGUAGE_STORAGE_KEY)
    return isLanguageChoice(saved) ? saved : 'system'
}

/** `system` passes the browser language through; i18next narrows `fr-CA` to `fr` and anything else to English. */
export function languageFor(choice: LanguageChoice): string {
    return choice === 'system' ? navigator.language : choice
}

void i18n
    .use(initReactI18next)
    .init({
        resources: {
            en: { translation: en },
            fr: { translation: fr },
            es: { translation: es },
        },
        lng: languageFor(storedLanguageChoice()),
        fallbackLng: 'en',
        supportedLngs: SUPPORTED_LOCALES,
        nonExplicitSupportedLngs: true,
        load: 'languageOnly',
        cleanCode: true,
        // Keys are flat, e.g. "fire.title"
        keySeparator: false,
        interpolation: { escapeValue: false },
        initImmediate: false,
    })

export default i18n
