import { useRef, useState } from 'react'
import type { PointerEvent, WheelEvent } from 'react'
import { useTranslation } from 'react-i18next'
import { Sheet } from '@/components/Sheet'
import { cn } from '@/utils/helpers'
import { designSystem } from '@/utils/designSystem'
import {
    applyDrag,
    applyPinch,
    applyWheel,
    CROP_SIZE,
    cropRect,
    loadImage,
    MIN_SCALE,
    renderCircularCrop,
} from '@/utils/crop'
import type { EncodedImage, Point } from '@/utils/crop'

interface ImageEditorSheetProps {
    imageSrc: string | null
    onCancel: () => void
    onSave: (image: EncodedImage) => void
}

export function ImageEditorSheet({ imageSrc, onCancel, onSave }: ImageEditorSheetProps) {
    const { t } = useTranslation()

    return (
        <Sheet isOpen={imageSrc !== null} title={t('image_editor.title')} onClose={onCancel}>
            {imageSrc && <CropEditor imageSrc={imageSrc} onCancel={onCancel} onSave={onSave} />}
        </Sheet>
    )
}

const distance = (a: Point, b: Point) => Math.hypot(a.x - b.x, a.y - b.y)

function CropEditor({ imageSrc, onCancel, onSave }: { imageSrc: string; onCancel: () => void; onSave: (image: EncodedImage) => void }) {
    const { t } = useTranslation()
    const [scale, setScale] = useState(MIN_SCALE)
    const [offset, setOffset] = useState<Point>({ x: 0, y: 0 })
    const [isSaving, setIsSaving] = useState(false)

    const pointers = useRef(new Map<number, Point>())
    const lastOffset = useRef<Point>({ x: 0, y: 0 })
    const dragOrigin = useRef<Point | null>(null)
    const lastPinch = useRef<number | null>(null)

    const beginDragFromRemainingPointer = () => {
        const [remaining] = [...pointers.current.values()]
        dragOrigin.current = remaining ?? null
    }

    const onPointerDown = (event: PointerEvent<HTMLDivElement>) => {
        pointers.current.set(event.pointerId, { x: event.clientX, y: event.clientY })
        if (typeof event.currentTarget.setPointerCapture === 'function') {
            event.currentTarget.setPointerCapture(event.pointerId)
        }
        lastOffset.current = offset
        if (pointers.current.size === 2) {
            const [a, b] = [...pointers.current.values()]
            lastPinch.current = distance(a, b)
            dragOrigin.current = null
        } else if (pointers.current.size === 1) {
            dragOrigin.current = { x: event.clientX, y: event.clientY }
        }
    }

    const onPointerMove = (event: PointerEvent<HTMLDivElement>) => {
        if (!pointers.current.has(event.pointerId)) return
        pointers.current.set(event.pointerId, { x: event.clientX, y: event.clientY })

        if (pointers.current.size === 2 && lastPinch.current !== null) {
            const [a, b] = [...pointers.current.values()]
            const current = distance(a, b)
            const previous = lastPinch.current
            setScale((value) => applyPinch(value, previous, current))
            lastPinch.current = current
        } else if (dragOrigin.current) {
            setOffset(applyDrag(lastOffset.current, {
                x: event.clientX - dragOrigin.current.x,
                y: event.clientY - dragOrigin.current.y,
            }))
        }
    }

    const onPointerUp = (event: PointerEvent<HTMLDivElement>) => {
        pointers.current.delete(event.pointerId)
        lastOffset.current = offset
        if (pointers.current.size < 2) lastPinch.current = null
        beginDragFromRemainingPointer()
    }

    const onWheel = (event: WheelEvent<HTMLDivElement>) => {
        setScale((value) => applyWheel(value, event.deltaY))
    }

    const save = async () => {
        setIsSaving(true)
        try {
            const image = await loadImage(imageSrc)
            onSave(renderCircularCrop(image, scale, offset))
        } catch (error) {
            console.error('Failed to crop image:', error)
        } finally {
            setIsSaving(false)
        }
    }

    const rect = cropRect(scale, offset)

    return (
        <div className="space-y-4">
            <div
                data-testid="crop-area"
                className="relative mx-auto rounded-full overflow-hidden bg-black cursor-move select-none"
                style={{ width: CROP_SIZE, height: CROP_SIZE, touchAction: 'none' }}
                onPointerDown={onPointerDown}
                onPointerMove={onPointerMove}
                onPointerUp={onPointerUp}
                onPointerCancel={onPointerUp}
                onWheel={onWheel}
            >
                <img
                    src={imageSrc}
                    alt=""
                    draggable={false}
                    className="absolute max-w-none object-cover pointer-events-none"
                    style={{ left: rect.x, top: rect.y, width: rect.width, height: rect.height }}
                />
                <div className="absolute inset-0 rounded-full border-2 border-earth-cream/60 pointer-events-none" />
            </div>

            <p className="text-center text-xs font-mono text-earth-cream/50">{t('image_editor.hint')}</p>

            <div className="flex gap-3">
                <button onClick={onCancel} className={cn(designSystem.button.secondary, 'flex-1')}>
                    {t('common.cancel')}
                </button>
                <button onClick={() => void save()} disabled={isSaving} className={cn(designSystem.button.primary, 'flex-1')}>
                    {t('common.save')}
                </button>
            </div>
        </div>
    )
}
