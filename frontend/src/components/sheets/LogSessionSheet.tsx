import { useState } from 'react'
import type { FormEvent } from 'react'
import { useTranslation } from 'react-i18next'
import { Sheet } from '@/components/Sheet'
import { cn } from '@/utils/helpers'
import { designSystem, QUEST_AREAS } from '@/utils/designSystem'
import {
    initialManualSessionForm,
    manualSessionLog,
    MAX_SESSION_DURATION,
    MIN_SESSION_DURATION,
    SESSION_DURATION_STEP,
    toDateTimeInputValue,
} from '@/utils/fireMode'
import type { ManualSessionForm } from '@/utils/fireMode'
import type { ManualSessionLog, Quest } from '@/types'

interface LogSessionSheetProps {
    isOpen: boolean
    quests: Quest[]
    onClose: () => void
    onLog: (log: ManualSessionLog) => void
}

export function LogSessionSheet({ isOpen, quests, onClose, onLog }: LogSessionSheetProps) {
    const { t } = useTranslation()

    return (
        <Sheet isOpen={isOpen} title={t('fire.log_past_session')} onClose={onClose}>
            <LogSessionForm quests={quests} onClose={onClose} onLog={onLog} />
        </Sheet>
    )
}

function LogSessionForm({ quests, onClose, onLog }: Omit<LogSessionSheetProps, 'isOpen'>) {
    const { t } = useTranslation()
    const [form, setForm] = useState<ManualSessionForm>(() => initialManualSessionForm(new Date()))

    const update = (patch: Partial<ManualSessionForm>) => setForm((current) => ({ ...current, ...patch }))
    const log = manualSessionLog(form, new Date())

    const handleSubmit = (event: FormEvent) => {
        event.preventDefault()
        if (!log) return
        onLog(log)
        onClose()
    }

    return (
        <form onSubmit={handleSubmit} className="space-y-5">
            <div>
                <label htmlFor="log-started-at" className={designSystem.label}>{t('fire.when')}</label>
                <input
                    id="log-started-at"
                    type="datetime-local"
                    value={form.startedAt}
                    max={toDateTimeInputValue(new Date())}
                    onChange={(event) => update({ startedAt: event.target.value })}
                    className={designSystem.input.base}
                />
            </div>

            <div>
                <div className="flex justify-between">
                    <label htmlFor="log-duration" className={designSystem.label}>{t('fire.duration')}</label>
                    <span data-testid="log-duration" className="text-sm font-mono font-bold text-earth-cream">
                        {t('fire.minutes_short', { minutes: form.duration })}
                    </span>
                </div>
                <input
                    id="log-duration"
                    type="range"
                    min={MIN_SESSION_DURATION}
                    max={MAX_SESSION_DURATION}
                    step={SESSION_DURATION_STEP}
                    value={form.duration}
                    aria-valuetext={`${form.duration} ${t('fire.minutes')}`}
                    onChange={(event) => update({ duration: Number(event.target.value) })}
                    className="w-full accent-earth-tan"
                />
            </div>

            {quests.length > 0 && (
                <div>
                    <label htmlFor="log-quest" className={designSystem.label}>{t('fire.link_quest')}</label>
                    <select
                        id="log-quest"
                        value={form.questId ?? ''}
                        onChange={(event) => update({ questId: event.target.value === '' ? null : event.target.value })}
                        className={designSystem.input.base}
                    >
                        <option value="">{t('common.none')}</option>
                        {quests.map((quest) => (
                            <option key={quest.id} value={quest.id}>
                                {`${QUEST_AREAS[quest.area].emoji} ${quest.title}`}
                            </option>
                        ))}
                    </select>
                </div>
            )}

            <div>
                <label htmlFor="log-description" className={designSystem.label}>{t('fire.what_worked_on')}</label>
                <textarea
                    id="log-description"
                    rows={3}
                    value={form.description}
                    onChange={(event) => update({ description: event.target.value })}
                    placeholder={t('fire.description_placeholder')}
                    className={designSystem.input.base}
                />
            </div>

            <div className="flex gap-3">
                <button type="button" onClick={onClose} className={cn(designSystem.button.secondary, 'flex-1')}>
                    {t('common.cancel')}
                </button>
                <button type="submit" disabled={!log} className={cn(designSystem.button.primary, 'flex-1')}>
                    {t('fire.log_session')}
                </button>
            </div>
        </form>
    )
}
