import { useRef } from 'react'
import type { ChangeEvent } from 'react'
import { Camera, Check, Image as ImageIcon, PencilSimple, Trash } from '@phosphor-icons/react'
import { useTranslation } from 'react-i18next'
import { Sheet } from '@/components/Sheet'
import { Avatar } from '@/components/Avatar'
import { useLanguage } from '@/contexts/LanguageContext'
import { cn } from '@/utils/helpers'
import { designSystem } from '@/utils/designSystem'
import { displayName } from '@/utils/profile'
import { LANGUAGE_OPTIONS } from '@/utils/i18n'
import type { User } from '@/types'

interface ProfilePhotoSheetProps {
    isOpen: boolean
    user: User
    isUploading: boolean
    onClose: () => void
    onEditProfile: () => void
    onPickImage: (file: File) => void
    onRemovePhoto: () => void
}

export function ProfilePhotoSheet({
    isOpen,
    user,
    isUploading,
    onClose,
    onEditProfile,
    onPickImage,
    onRemovePhoto,
}: ProfilePhotoSheetProps) {
    const { t } = useTranslation()
    const { language, setLanguage } = useLanguage()
    const selfieInput = useRef<HTMLInputElement>(null)
    const galleryInput = useRef<HTMLInputElement>(null)

    const handleFile = (event: ChangeEvent<HTMLInputElement>) => {
        const file = event.target.files?.[0]
        event.target.value = ''
        if (file) onPickImage(file)
    }

    const actionClass = cn(designSystem.button.secondary, 'flex-1 flex-col py-3 text-xs')

    return (
        <Sheet
            isOpen={isOpen}
            title={t('profile.title')}
            onClose={onClose}
            footer={
                <button onClick={onClose} className={cn(designSystem.button.primary, 'w-full')}>
                    {t('common.done')}
                </button>
            }
        >
            <div className="space-y-6">
                <div className="flex flex-col items-center gap-3">
                    <div className="relative">
                        <Avatar user={user} size={96} />
                        {isUploading && (
                            <div className="absolute inset-0 rounded-full bg-black/60 flex items-center justify-center text-xs font-mono text-earth-cream">
                                {t('profile.uploading')}
                            </div>
                        )}
                    </div>
                    <div className="text-center">
                        <div className="font-mono font-bold text-earth-cream">{displayName(user)}</div>
                        {user.description && (
                            <p className="text-sm font-mono text-earth-cream/50 mt-1">{user.description}</p>
                        )}
                    </div>
                    <button
                        onClick={onEditProfile}
                        className="flex items-center gap-1 text-sm font-mono text-earth-tan hover:text-earth-light"
                    >
                        <PencilSimple size={14} />
                        {t('profile.edit_profile')}
                    </button>
                </div>

                <div className="flex gap-2">
                    <button disabled={isUploading} onClick={() => selfieInput.current?.click()} className={actionClass}>
                        <Camera size={20} />
                        {t('profile.selfie')}
                    </button>
                    <button disabled={isUploading} onClick={() => galleryInput.current?.click()} className={actionClass}>
                        <ImageIcon size={20} />
                        {t('profile.gallery')}
                    </button>
                    {user.avatarUrl && (
                        <button
                            disabled={isUploading}
                            onClick={onRemovePhoto}
                            className={cn(designSystem.button.danger, 'flex-1 flex-col py-3 text-xs')}
                        >
                            <Trash size={20} />
                            {t('profile.remove_photo')}
                        </button>
                    )}
                </div>

                <input
                    ref={selfieInput}
                    data-testid="selfie-input"
                    type="file"
                    accept="image/*"
                    capture="user"
                    className="hidden"
                    onChange={handleFile}
                />
                <input
                    ref={galleryInput}
                    data-testid="gallery-input"
                    type="file"
                    accept="image/*"
                    className="hidden"
                    onChange={handleFile}
                />

                <div>
                    <h3 className={cn(designSystem.label, 'mb-2')}>{t('profile.language')}</h3>
                    <div className="space-y-1">
                        {LANGUAGE_OPTIONS.map((option) => (
                            <button
                                key={option.value}
                                aria-pressed={language === option.value}
                                onClick={() => setLanguage(option.value)}
                                className="w-full flex items-center justify-between px-3 py-2 rounded-lg font-mono text-sm text-earth-cream hover:bg-forest-light"
                            >
                                {option.label ?? t('profile.language_system')}
                                {language === option.value && <Check size={16} weight="bold" className="text-earth-tan" />}
                            </button>
                        ))}
                    </div>
                </div>
            </div>
        </Sheet>
    )
}
