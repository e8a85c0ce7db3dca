/** Largest delay setTimeout accepts; longer delays fire after 1ms */
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1

/**
 * Wait for `ms`, or until `signal` aborts.
 *
 * Resolves true when the full delay elapsed and false when it was cut short.
 * Never rejects, so callers can use it inside retry loops without a try/catch.
 * Delays beyond MAX_TIMER_DELAY_MS are waited out in consecutive timers.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) {
    return Promise.resolve(false)
  }
  if (ms <= 0) {
    return Promise.resolve(true)
  }

  return new Promise(resolve => {
    let remaining = ms
    let timer: ReturnType<typeof setTimeout>

    const onAbort = () => {
      clearTimeout(timer)
      resolve(false)
    }
    const arm = () => {
      const delay = Math.min(remaining, MAX_TIMER_DELAY_MS)
      remaining -= delay
      timer = setTimeout(() => {
        if (remaining > 0) {
          arm()
          return
        }
        signal?.removeEventListener('abort', onAbort)
        resolve(true)
      }, delay)
    }

    arm()
    signal?.addEventListener('abort', onAbort, { once: true })
  })
}
