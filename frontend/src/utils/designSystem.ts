// Shared design tokens for Focus
import type { Feeling, QuestArea } from '@/types'

export const designSystem = {
  card: {
    base: 'gradient-forest grain rounded-xl border border-earth-cream/10 p-5',
    subtle: 'bg-forest-dark/40 rounded-xl border border-earth-cream/5 p-4',
  },

  input: {
    base: 'w-full bg-forest-light border border-earth-cream/10 rounded-lg px-4 py-2 text-earth-cream font-mono focus:outline-none focus:border-earth-tan transition-colors placeholder:text-earth-cream/30',
  },

  button: {
    primary: 'flex items-center justify-center gap-2 px-4 py-2 bg-earth-tan text-forest-dark font-mono font-bold rounded-lg hover:bg-earth-light transition-colors disabled:opacity-50',
    secondary: 'flex items-center justify-center gap-2 px-4 py-2 bg-forest-light text-earth-cream font-mono rounded-lg hover:bg-forest transition-colors disabled:opacity-50',
    danger: 'flex items-center justify-center gap-2 px-4 py-2 bg-status-error/20 text-status-error font-mono font-semibold rounded-lg hover:bg-status-error/30 transition-colors',
    chip: 'px-3 py-2 rounded-lg font-mono text-sm border transition-colors',
  },

  sectionTitle: 'text-lg font-bold font-mono text-earth-cream',
  label: 'block text-sm font-mono text-earth-cream/70 mb-1',
}

export const QUEST_AREAS: Record<QuestArea, { emoji: string; color: string }> = {
  health: { emoji: '💪', color: '#34C759' },
  learning: { emoji: '📚', color: '#5AC8FA' },
  career: { emoji: '💼', color: '#4ECDC4' },
  relationships: { emoji: '❤️', color: '#FF6B9D' },
  creativity: { emoji: '🎨', color: '#BF5AF2' },
  other: { emoji: '✨', color: '#8E8E93' },
}

// Ordered from worst to best mood
export const FEELING_EMOJI: Record<Feeling, string> = {
  sad: '😔',
  anxious: '😰',
  frustrated: '😤',
  tired: '🥱',
  neutral: '😐',
  calm: '😌',
  happy: '😊',
  excited: '🤩',
}
