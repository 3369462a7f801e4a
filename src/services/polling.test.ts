import { describe, expect, it, vi } from 'vitest'
import { createFakeClock } from '../test/helpers'
import { OperationCancelledError, TimeoutError } from './errors'
import { waitUntil } from './polling'

describe('waitUntil', () => {
  it('returns immediately when the first poll satisfies the predicate', async () => {
    const clock = createFakeClock()
    const poll = vi.fn(async () => 'Off')

    await expect(waitUntil(poll, (value) => value === 'Off', { timeoutSeconds: 10, ...clock })).resolves.toBe('Off')

    expect(poll).toHaveBeenCalledTimes(1)
    expect(clock.sleep).not.toHaveBeenCalled()
  })

  it('times out after the first poll when the timeout is shorter than the interval', async () => {
    const clock = createFakeClock()
    const poll = vi.fn(async () => 'On')

    await expect(waitUntil(poll, (value) => value === 'Off', { timeoutSeconds: 1, ...clock })).rejects.toBeInstanceOf(
      TimeoutError,
    )

    expect(poll).toHaveBeenCalledTimes(1)
    expect(clock.sleep).not.toHaveBeenCalled()
  })

  it('polls on a fixed five second interval until the predicate holds', async () => {
    const clock = createFakeClock()
    const values = ['On', 'PoweringOff', 'Off']
    const poll = vi.fn(async () => values.shift() ?? 'Off')

    await waitUntil(poll, (value) => value === 'Off', { timeoutSeconds: 60, ...clock })

    expect(poll).toHaveBeenCalledTimes(3)
    expect(clock.sleep.mock.calls).toEqual([[5000], [5000]])
  })

  it('stops polling once the next poll would pass the deadline', async () => {
    const clock = createFakeClock()
    const poll = vi.fn(async () => 'On')

    await expect(waitUntil(poll, () => false, { timeoutSeconds: 10, ...clock })).rejects.toThrow(
      'timed out after 10s waiting for condition',
    )

    // polls at 0s, 5s and 10s
    expect(poll).toHaveBeenCalledTimes(3)
  })

  it('keeps polling without a timeout', async () => {
    const clock = createFakeClock()
    let calls = 0
    const poll = vi.fn(async () => {
      calls += 1
      return calls
    })

    await expect(waitUntil(poll, (value) => value === 50, clock)).resolves.toBe(50)
    expect(clock.now()).toBe(49 * 5000)
  })

  it('honours a custom interval', async () => {
    const clock = createFakeClock()
    const values = [false, true]
    const poll = vi.fn(async () => values.shift() ?? true)

    await waitUntil(poll, (value) => value, { intervalSeconds: 2, ...clock })

    expect(clock.sleep).toHaveBeenCalledWith(2000)
  })

  it('stops when the signal is aborted', async () => {
    const clock = createFakeClock()
    const controller = new AbortController()
    const poll = vi.fn(async () => {
      controller.abort()
      return 'On'
    })

    await expect(
      waitUntil(poll, () => false, { signal: controller.signal, ...clock }),
    ).rejects.toBeInstanceOf(OperationCancelledError)
    expect(poll).toHaveBeenCalledTimes(1)
  })
})
