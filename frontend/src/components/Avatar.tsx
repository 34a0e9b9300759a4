import { cn } from '@/utils/helpers'
import { displayName, initials } from '@/utils/profile'
import type { User } from '@/types'

interface AvatarProps {
    user: User
    size?: number
    className?: string
}

export function Avatar({ user, size = 44, className }: AvatarProps) {
    const style = { width: size, height: size }

    if (user.avatarUrl) {
        return (
            <img
                src={user.avatarUrl}
                alt={displayName(user)}
                style={style}
                className={cn('rounded-full object-cover border border-earth-cream/20', className)}
            />
        )
    }

    return (
        <div
            style={{ ...style, fontSize: size * 0.4 }}
            className={cn(
                'rounded-full flex items-center justify-center bg-earth-tan/20 text-earth-tan font-mono font-bold border border-earth-cream/20',
                className
            )}
        >
            {initials(user)}
        </div>
    )
}
