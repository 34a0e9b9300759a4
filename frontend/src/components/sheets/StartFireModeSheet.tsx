import { useReducer } from 'react'
import { Check } from '@phosphor-icons/react'
import { useTranslation } from 'react-i18next'
import { Sheet } from '@/components/Sheet'
import { cn } from '@/utils/helpers'
import { designSystem, QUEST_AREAS } from '@/utils/designSystem'
import { FIRE_MODE_DURATIONS, fireModeFlowReducer, fireModeLaunch, initialFireModeFlow } from '@/utils/fireMode'
import type { FireModeStep } from '@/utils/fireMode'
import type { Quest } from '@/types'

interface StartFireModeSheetProps {
    isOpen: boolean
    quests: Quest[]
    onClose: () => void
    onStart: (durationMinutes: number, questId: string | null, description: string | null) => void
}

export function StartFireModeSheet({ isOpen, quests, onClose, onStart }: StartFireModeSheetProps) {
    const { t } = useTranslation()

    return (
        <Sheet isOpen={isOpen} title={t('fire.start_firemode')} onClose={onClose}>
            <StartFireModeFlow quests={quests} onClose={onClose} onStart={onStart} />
        </Sheet>
    )
}

function StepDots({ step }: { step: FireModeStep }) {
    return (
        <div className="flex justify-center gap-2 mb-6" aria-label={`${step}/3`}>
            {[1, 2, 3].map((dot) => (
                <span
                    key={dot}
                    data-testid="step-dot"
                    data-active={dot <= step}
                    className={cn('h-2 rounded-full transition-all', dot <= step ? 'w-6 bg-flame' : 'w-2 bg-earth-cream/20')}
                />
            ))}
        </div>
    )
}

// Mounted only while the sheet is open, so every opening starts from step 1
function StartFireModeFlow({ quests, onClose, onStart }: Omit<StartFireModeSheetProps, 'isOpen'>) {
    const { t } = useTranslation()
    const [flow, dispatch] = useReducer(fireModeFlowReducer, initialFireModeFlow)
    const activeQuests = quests.filter((quest) => quest.status === 'active')
    const selectedQuest = activeQuests.find((quest) => quest.id === flow.questId)

    const start = () => {
        const launch = fireModeLaunch(flow)
        onStart(launch.durationMinutes, launch.questId, launch.description)
    }

    const chip = (selected: boolean) => cn(
        designSystem.button.chip,
        selected ? 'bg-flame/20 border-flame text-earth-cream' : 'border-earth-cream/10 text-earth-cream/70 hover:border-earth-cream/30'
    )

    return (
        <div>
            <StepDots step={flow.step} />

            {flow.step === 1 && (
                <div className="space-y-4">
                    <h3 className={designSystem.sectionTitle}>{t('fire.duration')}</h3>
                    <div className="grid grid-cols-3 gap-2">
                        {FIRE_MODE_DURATIONS.map((duration) => (
                            <button
                                key={duration}
                                aria-pressed={flow.duration === duration}
                                onClick={() => dispatch({ type: 'setDuration', duration })}
                                className={chip(flow.duration === duration)}
                            >
                                {t('fire.minutes_short', { minutes: duration })}
                            </button>
                        ))}
                    </div>
                </div>
            )}

            {flow.step === 2 && (
                <div className="space-y-4">
                    <div className="flex items-center justify-between">
                        <h3 className={designSystem.sectionTitle}>{t('fire.link_quest')}</h3>
                        <button
                            onClick={() => dispatch({ type: 'skipQuest' })}
                            className="text-sm font-mono text-earth-cream/50 hover:text-earth-cream"
                        >
                            {t('common.skip')}
                        </button>
                    </div>

                    <div className="space-y-2">
                        <button
                            aria-pressed={flow.questId === null}
                            onClick={() => dispatch({ type: 'selectQuest', questId: null })}
                            className={cn(chip(flow.questId === null), 'w-full text-left flex items-center justify-between')}
                        >
                            {t('fire.no_quest')}
                            {flow.questId === null && <Check size={16} weight="bold" />}
                        </button>

                        {activeQuests.map((quest) => (
                            <button
                                key={quest.id}
                                aria-pressed={flow.questId === quest.id}
                                onClick={() => dispatch({ type: 'selectQuest', questId: quest.id })}
                                className={cn(chip(flow.questId === quest.id), 'w-full text-left flex items-center gap-3')}
                            >
                                <span>{QUEST_AREAS[quest.area].emoji}</span>
                                <span className="flex-1 truncate">{quest.title}</span>
                                <span className="text-xs text-earth-cream/50">{Math.round(quest.progress * 100)}%</span>
                            </button>
                        ))}

                        {activeQuests.length === 0 && (
                            <p className="text-sm font-mono text-earth-cream/40 text-center py-2">{t('fire.no_active_quests')}</p>
                        )}
                    </div>
                </div>
            )}

            {flow.step === 3 && (
                <div className="space-y-4">
                    <h3 className={designSystem.sectionTitle}>{t('fire.description')}</h3>
                    <textarea
                        value={flow.description}
                        onChange={(event) => dispatch({ type: 'setDescription', description: event.target.value })}
                        placeholder={t('fire.description_placeholder')}
                        rows={3}
                        className={designSystem.input.base}
                    />

                    <div className={cn(designSystem.card.subtle, 'space-y-1 text-sm font-mono')}>
                        <div className="flex justify-between">
                            <span className="text-earth-cream/50">{t('fire.duration')}</span>
                            <span className="text-earth-cream">{t('fire.minutes_short', { minutes: flow.duration })}</span>
                        </div>
                        <div className="flex justify-between">
                            <span className="text-earth-cream/50">{t('fire.quest')}</span>
                            <span className="text-earth-cream truncate">{selectedQuest?.title ?? t('fire.no_quest')}</span>
                        </div>
                    </div>
                </div>
            )}

            <div className="flex gap-3 mt-6">
                {flow.step > 1 ? (
                    <button onClick={() => dispatch({ type: 'back' })} className={cn(designSystem.button.secondary, 'flex-1')}>
                        {t('common.back')}
                    </button>
                ) : (
                    <button onClick={onClose} className={cn(designSystem.button.secondary, 'flex-1')}>
                        {t('common.cancel')}
                    </button>
                )}

                {flow.step < 3 ? (
                    <button onClick={() => dispatch({ type: 'next' })} className={cn(designSystem.button.primary, 'flex-1')}>
                        {t('common.next')}
                    </button>
                ) : (
                    <button onClick={start} className={cn(designSystem.button.primary, 'flex-1 bg-flame hover:bg-flame-deep text-earth-cream')}>
                        {t('fire.start_focus')}
                    </button>
                )}
            </div>
        </div>
    )
}
