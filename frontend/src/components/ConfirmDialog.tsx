import { designSystem } from '@/utils/designSystem'

interface ConfirmDialogProps {
    isOpen: boolean
    title: string
    message: string
    confirmLabel: string
    cancelLabel: string
    onConfirm: () => void
    onCancel: () => void
}

export function ConfirmDialog({ isOpen, title, message, confirmLabel, cancelLabel, onConfirm, onCancel }: ConfirmDialogProps) {
    if (!isOpen) return null

    return (
        <div className="fixed inset-0 z-[60] flex items-center justify-center p-4 bg-black/50 backdrop-blur-sm">
            <div
                role="alertdialog"
                aria-label={title}
                className="bg-forest-dark border border-earth-cream/10 rounded-xl p-6 w-full max-w-sm shadow-2xl"
            >
                <h2 className="text-lg font-bold font-mono text-earth-cream mb-2">{title}</h2>
                <p className="text-sm font-mono text-earth-cream/60 mb-6">{message}</p>
                <div className="flex gap-3">
                    <button onClick={onCancel} className={`${designSystem.button.secondary} flex-1`}>
                        {cancelLabel}
                    </button>
                    <button onClick={onConfirm} className={`${designSystem.button.danger} flex-1`}>
                        {confirmLabel}
                    </button>
                </div>
            </div>
        </div>
    )
}
