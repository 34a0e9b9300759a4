import { describe, expect, it } from 'vitest'
import { buildProfileUpdate, displayName, initials, parseAge, profileFormFromUser } from '@/utils/profile'
import type { User } from '@/types'

const user: User = {
    id: 'user-1',
    email: 'sam@example.com',
    currentStreak: 3,
    longestStreak: 8,
}

describe('displayName', () => {
    it('prefers the pseudo', () => {
        expect(displayName({ ...user, pseudo: 'samf', firstName: 'Sam' })).toBe('samf')
    })

    it('joins first and last names', () => {
        expect(displayName({ ...user, firstName: 'Sam', lastName: 'Fox' })).toBe('Sam Fox')
        expect(displayName({ ...user, firstName: 'Sam' })).toBe('Sam')
    })

    it('falls back to the email prefix', () => {
        expect(displayName(user)).toBe('sam')
        expect(displayName({ ...user, email: '' })).toBe('User')
    })

    it('takes the first letter as initials', () => {
        expect(initials(user)).toBe('S')
    })
})

describe('profile form', () => {
    it('prefills from the user', () => {
        const form = profileFormFromUser({ ...user, pseudo: 'samf', age: 30, gender: 'other' })
        expect(form).toEqual({
            pseudo: 'samf',
            firstName: '',
            lastName: '',
            gender: 'other',
            age: '30',
            description: '',
            hobbies: '',
            lifeGoal: '',
        })
    })

    it('parses integer ages only', () => {
        expect(parseAge(' 42 ')).toBe(42)
        expect(parseAge('4.5')).toBeNull()
        expect(parseAge('abc')).toBeNull()
        expect(parseAge('')).toBeNull()
    })

    it('sends blank fields as null', () => {
        expect(buildProfileUpdate({
            pseudo: 'samf',
            firstName: '  ',
            lastName: 'Fox',
            gender: '',
            age: 'twenty',
            description: 'Builds things',
            hobbies: '',
            lifeGoal: 'Ship it',
        })).toEqual({
            pseudo: 'samf',
            firstName: null,
            lastName: 'Fox',
            gender: null,
            age: null,
            description: 'Builds things',
            hobbies: null,
            lifeGoal: 'Ship it',
        })
    })
})
