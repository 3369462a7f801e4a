import { DEFAULT_POLL_INTERVAL_SECONDS } from '../config'
import { OperationCancelledError, TimeoutError } from './errors'

export type Sleep = (ms: number) => Promise<void>

export interface WaitOptions {
  /** Unbounded when omitted. */
  timeoutSeconds?: number
  intervalSeconds?: number
  description?: string
  signal?: AbortSignal
  sleep?: Sleep
  now?: () => number
}

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms))

/**
 * Polls until `predicate` accepts the polled value and returns that value.
 *
 * Polls are spaced by a fixed interval. When a timeout is set, the wait
 * gives up as soon as the next poll would land past the deadline.
 */
export async function waitUntil<T>(
  poll: () => Promise<T>,
  predicate: (value: T) => boolean,
  options: WaitOptions = {},
): Promise<T> {
  const pause = options.sleep ?? sleep
  const now = options.now ?? Date.now
  const intervalMs = (options.intervalSeconds ?? DEFAULT_POLL_INTERVAL_SECONDS) * 1000
  const timeoutMs = options.timeoutSeconds !== undefined ? options.timeoutSeconds * 1000 : undefined
  const description = options.description ?? 'condition'
  const startedAt = now()

  while (true) {
    if (options.signal?.aborted) {
      throw new OperationCancelledError(`cancelled while waiting for ${description}`, {
        cause: options.signal.reason,
      })
    }

    const value = await poll()
    if (predicate(value)) {
      return value
    }

    if (timeoutMs !== undefined && now() - startedAt + intervalMs > timeoutMs) {
      throw new TimeoutError(`timed out after ${options.timeoutSeconds}s waiting for ${description}`)
    }

    await pause(intervalMs)
  }
}
