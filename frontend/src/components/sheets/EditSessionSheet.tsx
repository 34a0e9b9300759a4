import { useState } from 'react'
import { Minus, Plus, Trash } from '@phosphor-icons/react'
import { useTranslation } from 'react-i18next'
import { Sheet } from '@/components/Sheet'
import { ConfirmDialog } from '@/components/ConfirmDialog'
import { useLanguage } from '@/contexts/LanguageContext'
import { cn, formatTimestamp } from '@/utils/helpers'
import { designSystem } from '@/utils/designSystem'
import {
    MAX_SESSION_DURATION,
    MIN_SESSION_DURATION,
    SESSION_DURATION_PRESETS,
    stepSessionDuration,
} from '@/utils/fireMode'
import type { FocusSession, SessionEdit } from '@/types'

interface EditSessionSheetProps {
    session: FocusSession | null
    onClose: () => void
    onSave: (sessionId: string, edit: SessionEdit) => void
    onDelete: (sessionId: string) => void
}

export function EditSessionSheet({ session, onClose, onSave, onDelete }: EditSessionSheetProps) {
    const { t } = useTranslation()

    return (
        <Sheet isOpen={session !== null} title={t('fire.edit_session')} onClose={onClose}>
            {session && <EditSessionForm key={session.id} session={session} onClose={onClose} onSave={onSave} onDelete={onDelete} />}
        </Sheet>
    )
}

function EditSessionForm({ session, onClose, onSave, onDelete }: EditSessionSheetProps & { session: FocusSession }) {
    const { t } = useTranslation()
    const { locale } = useLanguage()
    const [description, setDescription] = useState(session.description ?? '')
    const [duration, setDuration] = useState(session.durationMinutes)
    const [isConfirmingDelete, setIsConfirmingDelete] = useState(false)

    const save = () => {
        onSave(session.id, {
            description: description.trim() === '' ? null : description,
            durationMinutes: duration,
        })
        onClose()
    }

    return (
        <div className="space-y-5">
            <div>
                <label htmlFor="session-description" className={designSystem.label}>{t('fire.description')}</label>
                <textarea
                    id="session-description"
                    rows={3}
                    value={description}
                    onChange={(event) => setDescription(event.target.value)}
                    placeholder={t('fire.description_placeholder')}
                    className={designSystem.input.base}
                />
            </div>

            <div>
                <span className={designSystem.label}>{t('fire.duration')}</span>
                <div className="grid grid-cols-4 gap-2 mb-3">
                    {SESSION_DURATION_PRESETS.map((preset) => (
                        <button
                            key={preset}
                            aria-pressed={duration === preset}
                            onClick={() => setDuration(preset)}
                            className={cn(
                                designSystem.button.chip,
                                duration === preset ? 'bg-earth-tan/20 border-earth-tan text-earth-cream' : 'border-earth-cream/10 text-earth-cream/70'
                            )}
                        >
                            {t('fire.minutes_short', { minutes: preset })}
                        </button>
                    ))}
                </div>

                <div className="flex items-center justify-center gap-6">
                    <button
                        aria-label="-5"
                        disabled={duration <= MIN_SESSION_DURATION}
                        onClick={() => setDuration((value) => stepSessionDuration(value, -1))}
                        className={designSystem.button.secondary}
                    >
                        <Minus size={16} weight="bold" />
                    </button>
                    <span data-testid="session-duration" className="text-2xl font-bold font-mono text-earth-cream w-24 text-center">
                        {t('fire.minutes_short', { minutes: duration })}
                    </span>
                    <button
                        aria-label="+5"
                        disabled={duration >= MAX_SESSION_DURATION}
                        onClick={() => setDuration((value) => stepSessionDuration(value, 1))}
                        className={designSystem.button.secondary}
                    >
                        <Plus size={16} weight="bold" />
                    </button>
                </div>
            </div>

            <div className={cn(designSystem.card.subtle, 'space-y-1 text-sm font-mono')}>
                <div className="flex justify-between">
                    <span className="text-earth-cream/50">{t('fire.started')}</span>
                    <span className="text-earth-cream">{formatTimestamp(session.startTime, locale)}</span>
                </div>
                {session.endTime && (
                    <div className="flex justify-between">
                        <span className="text-earth-cream/50">{t('fire.ended')}</span>
                        <span className="text-earth-cream">{formatTimestamp(session.endTime, locale)}</span>
                    </div>
                )}
            </div>

            <div className="flex gap-3">
                <button onClick={onClose} className={cn(designSystem.button.secondary, 'flex-1')}>
                    {t('common.cancel')}
                </button>
                <button onClick={save} className={cn(designSystem.button.primary, 'flex-1')}>
                    {t('common.save')}
                </button>
            </div>

            <button onClick={() => setIsConfirmingDelete(true)} className={cn(designSystem.button.danger, 'w-full')}>
                <Trash size={16} />
                {t('fire.delete_session_button')}
            </button>

            <ConfirmDialog
                isOpen={isConfirmingDelete}
                title={t('fire.delete_session')}
                message={t('fire.delete_session_confirm')}
                confirmLabel={t('common.delete')}
                cancelLabel={t('common.cancel')}
                onConfirm={() => {
                    setIsConfirmingDelete(false)
                    onDelete(session.id)
                    onClose()
                }}
                onCancel={() => setIsConfirmingDelete(false)}
            />
        </div>
    )
}
