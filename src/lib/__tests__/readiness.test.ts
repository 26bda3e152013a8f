import { waitUntilReady } from '../readiness.js'
import { TimeoutError } from '../errors.js'
import { recordingSleep } from './helpers/fake-nifi.js'

function fakeClock(timer: { calls: number[] }): () => number {
  return () => timer.calls.reduce((sum, ms) => sum + ms, 0)
}

describe('waitUntilReady', () => {
  it('returns as soon as the probe passes', async () => {
    const timer = recordingSleep()
    const answers = [false, false, true]
    const probe = jest.fn(async () => answers.shift() ?? true)

    const result = await waitUntilReady(probe, { maxAttempts: 10, intervalMs: 5000, sleep: timer.sleep, now: fakeClock(timer) })

    expect(result).toEqual({ status: 'ready', attempts: 3, elapsedMs: 10000 })
    expect(probe).toHaveBeenCalledTimes(3)
    expect(timer.calls).toEqual([5000, 5000])
  })

  it('fails with TimeoutError after exactly maxAttempts probes', async () => {
    const timer = recordingSleep()
    const probe = jest.fn(async () => false)

    const attempt = waitUntilReady(probe, { maxAttempts: 4, intervalMs: 5000, sleep: timer.sleep, now: fakeClock(timer) })

    await expect(attempt).rejects.toThrow(TimeoutError)
    await expect(attempt).rejects.toThrow('NiFi was not ready after 4 attempts (15s elapsed)')
    expect(probe).toHaveBeenCalledTimes(4)
    expect(timer.calls).toEqual([5000, 5000, 5000])
  })

  it('counts a throwing probe as not ready and reports the last error', async () => {
    const timer = recordingSleep()
    const probe = jest.fn(async (): Promise<boolean> => {
      throw new Error('socket hang up')
    })

    await expect(
      waitUntilReady(probe, { maxAttempts: 2, intervalMs: 1000, sleep: timer.sleep, now: fakeClock(timer) })
    ).rejects.toThrow('NiFi was not ready after 2 attempts (1s elapsed): socket hang up')
    expect(probe).toHaveBeenCalledTimes(2)
  })

  it('reports each attempt', async () => {
    const seen: string[] = []

    await waitUntilReady(async () => seen.length === 2, {
      maxAttempts: 5,
      intervalMs: 10,
      sleep: recordingSleep().sleep,
      onAttempt: (attempt, max) => seen.push(`${attempt}/${max}`),
    })

    expect(seen).toEqual(['1/5', '2/5'])
  })

  it('neither probes nor waits when bypassed', async () => {
    const timer = recordingSleep()
    const probe = jest.fn(async () => false)

    const result = await waitUntilReady(probe, { bypass: true, sleep: timer.sleep })

    expect(result).toEqual({ status: 'bypassed' })
    expect(probe).not.toHaveBeenCalled()
    expect(timer.calls).toEqual([])
  })
})
