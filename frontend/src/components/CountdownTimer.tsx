import { formatCountdown } from '@/utils/helpers'

interface CountdownTimerProps {
  remainingSeconds: number
  /** 0 at the start of the session, 1 when it is done. */
  progress: number
  caption: string
}

export default function CountdownTimer({ remainingSeconds, progress, caption }: CountdownTimerProps) {
  const radius = 110
  const circumference = 2 * Math.PI * radius
  const offset = circumference * progress

  return (
    <div className="relative w-64 h-64 mx-auto">
      <svg className="transform -rotate-90 w-64 h-64" viewBox="0 0 256 256">
        <circle
          cx="128"
          cy="128"
          r={radius}
          stroke="currentColor"
          strokeWidth="10"
          fill="none"
          className="text-forest-light"
        />
        <circle
          cx="128"
          cy="128"
          r={radius}
          stroke="currentColor"
          strokeWidth="10"
          fill="none"
          strokeDasharray={circumference}
          strokeDashoffset={offset}
          className="text-flame transition-all duration-1000"
          strokeLinecap="round"
        />
      </svg>
      <div className="absolute inset-0 flex flex-col items-center justify-center">
        <span role="timer" className="text-5xl font-bold font-mono text-earth-cream">
          {formatCountdown(remainingSeconds)}
        </span>
        <span className="text-xs font-mono uppercase tracking-widest text-earth-cream/50 mt-2">{caption}</span>
      </div>
    </div>
  )
}
