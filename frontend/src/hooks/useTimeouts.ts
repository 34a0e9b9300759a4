import { useCallback, useEffect, useRef } from 'react'

/** setTimeout whose pending callbacks are dropped when the component unmounts. */
export function useTimeouts() {
  const handles = useRef(new Set<ReturnType<typeof setTimeout>>())

  useEffect(() => {
    const pending = handles.current
    return () => {
      pending.forEach(clearTimeout)
      pending.clear()
    }
  }, [])

  return useCallback((callback: () => void, delay: number) => {
    const handle = setTimeout(() => {
      handles.current.delete(handle)
      callback()
    }, delay)
    handles.current.add(handle)
  }, [])
}
