import type { CallOptions } from '../adaptive/contracts'

export class CallTimeoutError extends Error {
  constructor(timeout: number) {
    super(`Call did not finish within ${timeout}ms`)
    this.name = 'CallTimeoutError'
  }
}

/**
 * Aborts on the caller's signal or after `timeout` milliseconds, whichever
 * comes first. Undefined when neither is set.
 */
export function deadlineSignal(options: CallOptions): AbortSignal | undefined {
  const signals: AbortSignal[] = []
  if (options.signal)
    signals.push(options.signal)
  if (options.timeout !== undefined)
    signals.push(AbortSignal.timeout(options.timeout))
  return signals.length > 0 ? AbortSignal.any(signals) : undefined
}

/**
 * Runs `work` with the combined signal and settles as soon as that signal
 * aborts, even when `work` itself ignores it.
 */
export async function withDeadline<T>(
  options: CallOptions,
  work: (signal: AbortSignal | undefined) => Promise<T>,
): Promise<T> {
  const signal = deadlineSignal(options)
  if (!signal)
    return work(undefined)

  const abortError = () => {
    const reason: unknown = signal.reason
    if (reason instanceof Error && reason.name === 'TimeoutError' && options.timeout !== undefined)
      return new CallTimeoutError(options.timeout)
    return reason instanceof Error ? reason : new Error('Call aborted')
  }
  if (signal.aborted)
    throw abortError()

  let onAbort = () => {}
  const aborted = new Promise<never>((_resolve, reject) => {
    onAbort = () => reject(abortError())
    signal.addEventListener('abort', onAbort, { once: true })
  })
  try {
    return await Promise.race([work(signal), aborted])
  }
  finally {
    signal.removeEventListener('abort', onAbort)
  }
}
