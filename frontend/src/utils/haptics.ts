const PATTERNS = {
    light: 10,
    success: [15, 40, 15],
} satisfies Record<string, VibratePattern>

export type HapticStyle = keyof typeof PATTERNS

export function haptic(style: HapticStyle) {
    if (typeof navigator !== 'undefined' && typeof navigator.vibrate === 'function') {
        navigator.vibrate(PATTERNS[style])
    }
}
