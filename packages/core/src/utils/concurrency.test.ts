import assert from 'node:assert/strict'
import { setTimeout as sleep } from 'node:timers/promises'
import { describe, it } from 'node:test'
import { runWithConcurrency } from './concurrency'

describe('runWithConcurrency', () => {
  it('should keep input order whatever the completion order', async () => {
    const results = await runWithConcurrency([30, 5, 15], 3, async (ms) => {
      await sleep(ms)
      return ms * 2
    })

    assert.deepEqual(results, [60, 10, 30])
  })

  it('should never exceed the limit', async () => {
    let inFlight = 0
    let peak = 0

    await runWithConcurrency([1, 2, 3, 4, 5, 6], 2, async () => {
      inFlight++
      peak = Math.max(peak, inFlight)
      await sleep(2)
      inFlight--
    })

    assert.equal(peak, 2)
  })

  it('should reject with the first failure', async () => {
    await assert.rejects(
      runWithConcurrency([1, 2], 2, async (n) => {
        if (n === 2) throw new Error('worker failed')
        return n
      }),
      { message: 'worker failed' }
    )
  })

  it('should resolve empty input without calling the worker', async () => {
    let calls = 0

    const results = await runWithConcurrency([], 4, async () => {
      calls++
    })

    assert.deepEqual(results, [])
    assert.equal(calls, 0)
  })
})
