import { Link } from 'react-router-dom'
import { useTranslation } from 'react-i18next'
import { SectionHeader } from '@/components/SectionHeader'
import { FEELING_EMOJI, QUEST_AREAS } from '@/utils/designSystem'
import type { MorningCheckIn } from '@/types'

interface IntentionsCardProps {
    checkIn: MorningCheckIn
}

export function IntentionsCard({ checkIn }: IntentionsCardProps) {
    const { t } = useTranslation()

    return (
        <section>
            <SectionHeader
                title={t('dashboard.todays_intentions')}
                action={
                    <Link to="/start-the-day" className="text-sm font-mono text-earth-tan hover:text-earth-light">
                        {t('common.edit')}
                    </Link>
                }
            />

            <div className="gradient-forest grain rounded-xl p-5 space-y-4">
                <div className="relative z-20 flex items-center gap-3">
                    <span className="text-3xl">{FEELING_EMOJI[checkIn.feeling]}</span>
                    <div>
                        <div className="text-xs font-mono text-earth-cream/50">{t('start_day.feeling')}</div>
                        <div className="font-mono font-semibold text-earth-cream">{t(`feeling.${checkIn.feeling}`)}</div>
                    </div>
                </div>

                {checkIn.intentions.length > 0 && (
                    <div className="relative z-20">
                        <div className="text-xs font-mono text-earth-cream/50 mb-2">{t('start_day.focus_areas')}</div>
                        <ul className="space-y-2">
                            {checkIn.intentions.map((intention) => (
                                <li key={intention.id} className="flex items-center gap-3 font-mono text-sm text-earth-cream">
                                    <span
                                        role="img"
                                        aria-label={t(`area.${intention.area}`)}
                                        title={t(`area.${intention.area}`)}
                                        className="w-7 h-7 rounded-full flex items-center justify-center text-sm"
                                        style={{ backgroundColor: `${QUEST_AREAS[intention.area].color}26` }}
                                    >
                                        {QUEST_AREAS[intention.area].emoji}
                                    </span>
                                    {intention.intention}
                                </li>
                            ))}
                        </ul>
                    </div>
                )}
            </div>
        </section>
    )
}
