import { useState } from 'react'
import type { FormEvent } from 'react'
import { useTranslation } from 'react-i18next'
import { Sheet } from '@/components/Sheet'
import { cn } from '@/utils/helpers'
import { designSystem } from '@/utils/designSystem'
import { buildProfileUpdate, GENDER_OPTIONS, profileFormFromUser } from '@/utils/profile'
import type { ProfileForm } from '@/utils/profile'
import type { ProfileUpdate, User } from '@/types'

interface EditProfileSheetProps {
    isOpen: boolean
    user: User
    onClose: () => void
    onSave: (update: ProfileUpdate) => void
}

export function EditProfileSheet({ isOpen, user, onClose, onSave }: EditProfileSheetProps) {
    const { t } = useTranslation()

    return (
        <Sheet isOpen={isOpen} title={t('edit_profile.title')} onClose={onClose}>
            <EditProfileForm user={user} onClose={onClose} onSave={onSave} />
        </Sheet>
    )
}

function EditProfileForm({ user, onClose, onSave }: Omit<EditProfileSheetProps, 'isOpen'>) {
    const { t } = useTranslation()
    const [form, setForm] = useState<ProfileForm>(() => profileFormFromUser(user))

    const field = (key: keyof ProfileForm) => ({
        id: `profile-${key}`,
        value: form[key],
        onChange: (event: { target: { value: string } }) => setForm((current) => ({ ...current, [key]: event.target.value })),
    })

    const handleSubmit = (event: FormEvent) => {
        event.preventDefault()
        onSave(buildProfileUpdate(form))
        onClose()
    }

    const textFields: { key: keyof ProfileForm; label: string }[] = [
        { key: 'pseudo', label: t('edit_profile.display_name') },
        { key: 'firstName', label: t('edit_profile.first_name') },
        { key: 'lastName', label: t('edit_profile.last_name') },
    ]

    return (
        <form onSubmit={handleSubmit} className="space-y-4">
            {textFields.map(({ key, label }) => (
                <div key={key}>
                    <label htmlFor={`profile-${key}`} className={designSystem.label}>{label}</label>
                    <input type="text" className={designSystem.input.base} {...field(key)} />
                </div>
            ))}

            <div className="grid grid-cols-2 gap-3">
                <div>
                    <label htmlFor="profile-gender" className={designSystem.label}>{t('edit_profile.gender')}</label>
                    <select className={designSystem.input.base} {...field('gender')}>
                        {GENDER_OPTIONS.map((option) => (
                            <option key={option.value} value={option.value}>
                                {t(option.labelKey)}
                            </option>
                        ))}
                    </select>
                </div>
                <div>
                    <label htmlFor="profile-age" className={designSystem.label}>{t('edit_profile.age')}</label>
                    <input type="text" inputMode="numeric" className={designSystem.input.base} {...field('age')} />
                </div>
            </div>

            <div>
                <label htmlFor="profile-description" className={designSystem.label}>{t('edit_profile.bio')}</label>
                <textarea rows={3} className={designSystem.input.base} {...field('description')} />
            </div>

            <div>
                <label htmlFor="profile-hobbies" className={designSystem.label}>{t('edit_profile.hobbies')}</label>
                <input type="text" className={designSystem.input.base} {...field('hobbies')} />
            </div>

            <div>
                <label htmlFor="profile-lifeGoal" className={designSystem.label}>{t('edit_profile.life_goal')}</label>
                <input type="text" className={designSystem.input.base} {...field('lifeGoal')} />
            </div>

            <div className="flex gap-3 pt-2">
                <button type="button" onClick={onClose} className={cn(designSystem.button.secondary, 'flex-1')}>
                    {t('common.cancel')}
                </button>
                <button type="submit" className={cn(designSystem.button.primary, 'flex-1')}>
                    {t('common.save')}
                </button>
            </div>
        </form>
    )
}
