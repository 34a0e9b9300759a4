import type { ProfileUpdate, User } from '@/types'

export const GENDER_OPTIONS = [
    { value: '', labelKey: 'edit_profile.gender_none' },
    { value: 'male', labelKey: 'edit_profile.gender_male' },
    { value: 'female', labelKey: 'edit_profile.gender_female' },
    { value: 'other', labelKey: 'edit_profile.gender_other' },
    { value: 'prefer_not_to_say', labelKey: 'edit_profile.gender_prefer_not' },
] as const

export interface ProfileForm {
    pseudo: string
    firstName: string
    lastName: string
    gender: string
    age: string
    description: string
    hobbies: string
    lifeGoal: string
}

export function displayName(user: User): string {
    if (user.pseudo) return user.pseudo
    if (user.firstName) {
        return user.lastName ? `${user.firstName} ${user.lastName}` : user.firstName
    }
    const prefix = user.email.split('@')[0]
    return prefix || 'User'
}

export function initials(user: User): string {
    return displayName(user).charAt(0).toUpperCase()
}

export function profileFormFromUser(user: User): ProfileForm {
    return {
        pseudo: user.pseudo ?? '',
        firstName: user.firstName ?? '',
        lastName: user.lastName ?? '',
        gender: user.gender ?? '',
        age: user.age !== undefined ? String(user.age) : '',
        description: user.description ?? '',
        hobbies: user.hobbies ?? '',
        lifeGoal: user.lifeGoal ?? '',
    }
}

const orNull = (value: string) => (value.trim() === '' ? null : value)

export function parseAge(value: string): number | null {
    const trimmed = value.trim()
    return /^-?\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : null
}

/** Blank fields are sent as null so the backend clears them. */
export function buildProfileUpdate(form: ProfileForm): ProfileUpdate {
    return {
        pseudo: orNull(form.pseudo),
        firstName: orNull(form.firstName),
        lastName: orNull(form.lastName),
        gender: orNull(form.gender),
        age: parseAge(form.age),
        description: orNull(form.description),
        hobbies: orNull(form.hobbies),
        lifeGoal: orNull(form.lifeGoal),
    }
}
