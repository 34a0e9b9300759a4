export const CROP_SIZE = 280
export const MIN_SCALE = 1
export const MAX_SCALE = 5
export const JPEG_QUALITY = 0.8
export const WHEEL_ZOOM_STEP = 1.1

export interface Point {
    x: number
    y: number
}

export interface Rect extends Point {
    width: number
    height: number
}

export function clampScale(scale: number): number {
    return Math.min(MAX_SCALE, Math.max(MIN_SCALE, scale))
}

/** Applies the ratio between two successive pinch magnitudes. */
export function applyPinch(scale: number, lastValue: number, value: number): number {
    if (lastValue <= 0) return clampScale(scale)
    return clampScale(scale * (value / lastValue))
}

export function applyWheel(scale: number, deltaY: number): number {
    if (deltaY === 0) return scale
    return clampScale(deltaY < 0 ? scale * WHEEL_ZOOM_STEP : scale / WHEEL_ZOOM_STEP)
}

export function applyDrag(lastOffset: Point, translation: Point): Point {
    return { x: lastOffset.x + translation.x, y: lastOffset.y + translation.y }
}

/** Where the image lands inside the crop circle's bounding square. */
export function cropRect(scale: number, offset: Point, size = CROP_SIZE): Rect {
    const side = size * scale
    return {
        x: (size - side) / 2 + offset.x,
        y: (size - side) / 2 + offset.y,
        width: side,
        height: side,
    }
}

/** Centered square of the source image, so it fills the circle without stretching. */
export function sourceSquare(width: number, height: number): Rect {
    const side = Math.min(width, height)
    return {
        x: (width - side) / 2,
        y: (height - side) / 2,
        width: side,
        height: side,
    }
}

export interface EncodedImage {
    base64: string
    contentType: string
}

export function splitDataUrl(dataUrl: string): EncodedImage {
    const match = /^data:([^;,]+);base64,(.*)$/.exec(dataUrl)
    if (!match) {
        throw new Error('Expected a base64 data URL')
    }
    return { contentType: match[1], base64: match[2] }
}

export function readFileAsDataUrl(file: Blob): Promise<string> {
    return new Promise((resolve, reject) => {
        const reader = new FileReader()
        reader.onload = () => {
            if (typeof reader.result === 'string') {
                resolve(reader.result)
            } else {
                reject(new Error('Could not read image file'))
            }
        }
        reader.onerror = () => reject(reader.error ?? new Error('Could not read image file'))
        reader.readAsDataURL(file)
    })
}

export function loadImage(src: string): Promise<HTMLImageElement> {
    return new Promise((resolve, reject) => {
        const image = new Image()
        image.onload = () => resolve(image)
        image.onerror = () => reject(new Error('Could not decode image'))
        image.src = src
    })
}

/**
 * Rasterizes the visible part of the image, clipped to the crop circle,
 * into a square JPEG.
 */
export function renderCircularCrop(image: HTMLImageElement, scale: number, offset: Point, size = CROP_SIZE): EncodedImage {
    const canvas = document.createElement('canvas')
    canvas.width = size
    canvas.height = size
    const context = canvas.getContext('2d')
    if (!context) {
        throw new Error('Canvas 2D context is not available')
    }

    context.beginPath()
    context.arc(size / 2, size / 2, size / 2, 0, Math.PI * 2)
    context.closePath()
    context.clip()

    const source = sourceSquare(image.naturalWidth, image.naturalHeight)
    const target = cropRect(scale, offset, size)
    context.drawImage(
        image,
        source.x, source.y, source.width, source.height,
        target.x, target.y, target.width, target.height
    )

    return splitDataUrl(canvas.toDataURL('image/jpeg', JPEG_QUALITY))
}
