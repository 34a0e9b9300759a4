import { useEffect, useMemo, useState } from 'react'
import { useLocation, useNavigate } from 'react-router-dom'
import { ArrowClockwise, CheckSquare, Clock, Flame, Info, Warning } from '@phosphor-icons/react'
import { useTranslation } from 'react-i18next'
import { useDashboard } from '@/hooks/useDashboard'
import { ActionCard } from '@/components/ActionCard'
import { Avatar } from '@/components/Avatar'
import { QuickStatCard } from '@/components/QuickStatCard'
import { WeeklyProgressChart } from '@/components/WeeklyProgressChart'
import { IntentionsCard } from '@/components/IntentionsCard'
import { RitualsSection } from '@/components/RitualsSection'
import { ReflectionCard } from '@/components/ReflectionCard'
import { WeekSessionsSection } from '@/components/WeekSessionsSection'
import { ConfirmDialog } from '@/components/ConfirmDialog'
import { StartFireModeSheet } from '@/components/sheets/StartFireModeSheet'
import { ProfilePhotoSheet } from '@/components/sheets/ProfilePhotoSheet'
import { ImageEditorSheet } from '@/components/sheets/ImageEditorSheet'
import { EditProfileSheet } from '@/components/sheets/EditProfileSheet'
import { EditSessionSheet } from '@/components/sheets/EditSessionSheet'
import { FlameInfoSheet } from '@/components/sheets/FlameInfoSheet'
import { adaptiveCTA, CTA_CONTENT, currentFlameLevel, hasWeeklyProgress, parseAnchor, ritualCounts } from '@/utils/dashboard'
import { readFileAsDataUrl } from '@/utils/crop'
import type { EncodedImage } from '@/utils/crop'
import { formatDuration } from '@/utils/helpers'
import type { AdaptiveCTA } from '@/utils/dashboard'
import type { FireModeLaunch, FocusSession } from '@/types'

export function Dashboard() {
    const { t } = useTranslation()
    const navigate = useNavigate()
    const location = useLocation()
    const {
        data,
        error,
        isLoading,
        refresh,
        toggleRitual,
        uploadAvatar,
        deleteAvatar,
        updateProfile,
        editSession,
        deleteSession,
    } = useDashboard()

    const [isFireModeOpen, setIsFireModeOpen] = useState(false)
    const [isProfileOpen, setIsProfileOpen] = useState(false)
    const [isEditProfileOpen, setIsEditProfileOpen] = useState(false)
    const [isFlameInfoOpen, setIsFlameInfoOpen] = useState(false)
    const [imageToEdit, setImageToEdit] = useState<string | null>(null)
    const [isUploading, setIsUploading] = useState(false)
    const [sessionToEdit, setSessionToEdit] = useState<FocusSession | null>(null)
    const [sessionToDelete, setSessionToDelete] = useState<FocusSession | null>(null)

    const now = useMemo(() => new Date(), [data])

    // Deep links such as /#rituals scroll once the section exists
    useEffect(() => {
        const anchor = parseAnchor(location.hash)
        if (!anchor || !data) return
        document.getElementById(anchor)?.scrollIntoView?.({ behavior: 'smooth', block: 'start' })
        navigate({ pathname: location.pathname, hash: '' }, { replace: true })
    }, [location.hash, location.pathname, data, navigate])

    if (isLoading && !data) {
        return (
            <div className="min-h-screen bg-forest-dark flex items-center justify-center">
                <div className="text-earth-cream font-mono text-xl">{t('dashboard.loading')}</div>
            </div>
        )
    }

    if (!data) {
        return (
            <div className="min-h-screen bg-forest-dark flex items-center justify-center p-6">
                <div role="alert" className="gradient-forest grain rounded-xl p-6 max-w-md w-full text-center space-y-4">
                    <Warning size={32} weight="fill" className="relative z-20 mx-auto text-status-error" />
                    <div className="relative z-20 font-mono">
                        <h1 className="text-lg font-bold text-earth-cream">{t('dashboard.load_error')}</h1>
                        {error && <p className="text-sm text-earth-cream/60 mt-1">{error.message}</p>}
                    </div>
                    <button
                        onClick={() => void refresh()}
                        className="relative z-20 px-4 py-2 bg-earth-tan text-forest-dark font-mono font-bold rounded-lg hover:bg-earth-light transition-colors"
                    >
                        {t('common.retry')}
                    </button>
                </div>
            </div>
        )
    }

    const cta = adaptiveCTA(data)
    const rituals = ritualCounts(data.rituals)
    const flame = currentFlameLevel(data.streak.flameLevels)

    const handleAction = (action: AdaptiveCTA) => {
        if (action === 'startFireMode') {
            setIsFireModeOpen(true)
            return
        }
        navigate(CTA_CONTENT[action].route)
    }

    const launchFireMode = (durationMinutes: number, questId: string | null, description: string | null) => {
        setIsFireModeOpen(false)
        const launch: FireModeLaunch = { durationMinutes, questId, description }
        navigate('/fire-mode', { state: launch })
    }

    const pickImage = async (file: File) => {
        try {
            setImageToEdit(await readFileAsDataUrl(file))
            setIsProfileOpen(false)
        } catch (error) {
            console.error('Failed to read image:', error)
        }
    }

    const saveAvatar = async (image: EncodedImage) => {
        setImageToEdit(null)
        setIsProfileOpen(true)
        setIsUploading(true)
        try {
            await uploadAvatar(image)
        } finally {
            setIsUploading(false)
        }
    }

    const removeAvatar = async () => {
        setIsUploading(true)
        try {
            await deleteAvatar()
        } finally {
            setIsUploading(false)
        }
    }

    return (
        <div className="min-h-screen bg-forest-dark px-4 py-8">
            <div className="fixed inset-0 bg-[linear-gradient(to_right,#3F4F4410_1px,transparent_1px),linear-gradient(to_bottom,#3F4F4410_1px,transparent_1px)] bg-[size:4rem_4rem] pointer-events-none opacity-20" />

            <div className="relative z-10 max-w-2xl mx-auto space-y-8">
                {/* Header */}
                <div className="flex items-center justify-between">
                    <div>
                        <h1 className="text-3xl font-bold font-mono text-earth-cream mb-1">
                            🔥 {t('dashboard.title')}
                        </h1>
                        <p className="text-earth-cream/60 font-mono text-sm">{t('dashboard.subtitle')}</p>
                    </div>

                    <div className="flex items-center gap-3">
                        <button
                            aria-label={t('common.refresh')}
                            onClick={() => void refresh()}
                            className="p-2 rounded-lg text-earth-cream/60 hover:text-earth-cream hover:bg-forest-light transition-colors"
                        >
                            <ArrowClockwise size={20} />
                        </button>
                        <button aria-label={t('dashboard.open_profile')} onClick={() => setIsProfileOpen(true)}>
                            <Avatar user={data.user} />
                        </button>
                    </div>
                </div>

                {/* Streak */}
                <div className="gradient-flame grain rounded-xl p-6 flex items-center justify-between">
                    <div className="relative z-20 flex items-center gap-4">
                        <span className="text-5xl">{flame?.icon ?? '🔥'}</span>
                        <div className="font-mono text-earth-cream">
                            <div className="text-2xl font-bold">{t('streak.day_count', { day: data.streak.currentStreak })}</div>
                            {flame && <div className="text-sm opacity-80">{flame.name}</div>}
                        </div>
                    </div>
                    <button
                        aria-label={t('flame.info_title')}
                        onClick={() => setIsFlameInfoOpen(true)}
                        className="relative z-20 p-2 rounded-full text-earth-cream/80 hover:text-earth-cream hover:bg-black/10"
                    >
                        <Info size={22} />
                    </button>
                </div>

                <ActionCard cta={cta} onAction={handleAction} />

                {/* Quick stats */}
                <div className="grid grid-cols-3 gap-3">
                    <QuickStatCard
                        label={t('dashboard.day_streak')}
                        value={data.streak.currentStreak}
                        icon={<Flame weight="fill" />}
                    />
                    <QuickStatCard
                        label={t('dashboard.focused_today')}
                        value={formatDuration(data.focusedMinutesToday)}
                        icon={<Clock weight="bold" />}
                    />
                    <QuickStatCard
                        label={t('stats.routines')}
                        value={`${rituals.completed}/${rituals.total}`}
                        icon={<CheckSquare weight="bold" />}
                    />
                </div>

                {hasWeeklyProgress(data.weeklyProgress) && (
                    <WeeklyProgressChart data={data.weeklyProgress} today={now} />
                )}

                <button
                    onClick={() => setIsFireModeOpen(true)}
                    className="w-full gradient-flame rounded-xl px-5 py-4 flex items-center gap-3 text-left font-mono text-earth-cream card-hover"
                >
                    <Flame size={28} weight="fill" />
                    <div>
                        <div className="font-bold">{t('fire.start_firemode')}</div>
                        <div className="text-xs opacity-80">{t('fire.launch_session')}</div>
                    </div>
                </button>

                {data.morningCheckIn && (
                    <div id="intentions">
                        <IntentionsCard checkIn={data.morningCheckIn} />
                    </div>
                )}

                <div id="rituals">
                    <RitualsSection rituals={data.rituals} onToggle={(ritual) => void toggleRitual(ritual)} />
                </div>

                {data.eveningReview && (
                    <div id="reflection">
                        <ReflectionCard review={data.eveningReview} />
                    </div>
                )}

                <div id="sessions">
                    <WeekSessionsSection
                        sessions={data.weekSessions}
                        quests={data.quests}
                        now={now}
                        onEdit={setSessionToEdit}
                        onDelete={setSessionToDelete}
                    />
                </div>

                <p className="text-center text-sm font-mono text-earth-cream/50 pb-8">{t('dashboard.motivational')}</p>
            </div>

            <StartFireModeSheet
                isOpen={isFireModeOpen}
                quests={data.quests}
                onClose={() => setIsFireModeOpen(false)}
                onStart={launchFireMode}
            />

            <ProfilePhotoSheet
                isOpen={isProfileOpen}
                user={data.user}
                isUploading={isUploading}
                onClose={() => setIsProfileOpen(false)}
                onEditProfile={() => {
                    setIsProfileOpen(false)
                    setIsEditProfileOpen(true)
                }}
                onPickImage={(file) => void pickImage(file)}
                onRemovePhoto={() => void removeAvatar()}
            />

            <ImageEditorSheet
                imageSrc={imageToEdit}
                onCancel={() => {
                    setImageToEdit(null)
                    setIsProfileOpen(true)
                }}
                onSave={(image) => void saveAvatar(image)}
            />

            <EditProfileSheet
                isOpen={isEditProfileOpen}
                user={data.user}
                onClose={() => setIsEditProfileOpen(false)}
                onSave={(update) => void updateProfile(update)}
            />

            <EditSessionSheet
                session={sessionToEdit}
                onClose={() => setSessionToEdit(null)}
                onSave={(sessionId, edit) => void editSession(sessionId, edit)}
                onDelete={(sessionId) => void deleteSession(sessionId)}
            />

            <FlameInfoSheet
                isOpen={isFlameInfoOpen}
                streak={data.streak}
                onClose={() => setIsFlameInfoOpen(false)}
            />

            <ConfirmDialog
                isOpen={sessionToDelete !== null}
                title={t('fire.delete_session')}
                message={t('fire.delete_session_confirm')}
                confirmLabel={t('common.delete')}
                cancelLabel={t('common.cancel')}
                onConfirm={() => {
                    if (sessionToDelete) void deleteSession(sessionToDelete.id)
                    setSessionToDelete(null)
                }}
                onCancel={() => setSessionToDelete(null)}
            />
        </div>
    )
}
