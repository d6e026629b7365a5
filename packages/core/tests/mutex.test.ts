import { describe, it, expect } from 'vitest'

import { Mutex } from '../src/utils/mutex.js'

function deferred() {
  let resolve: () => void = () => {}
  const promise = new Promise<void>((r) => {
    resolve = r
  })
  return { promise, resolve }
}

describe('Mutex', () => {
  it('runs tasks one at a time in call order', async () => {
    const mutex = new Mutex()
    const gate = deferred()
    const order: string[] = []

    const first = mutex.runExclusive(async () => {
      order.push('first:start')
      await gate.promise
      order.push('first:end')
      return 1
    })
    const second = mutex.runExclusive(async () => {
      order.push('second')
      return 2
    })

    await Promise.resolve()
    expect(mutex.isLocked).toBe(true)
    gate.resolve()

    expect(await Promise.all([first, second])).toEqual([1, 2])
    expect(order).toEqual(['first:start', 'first:end', 'second'])
    expect(mutex.isLocked).toBe(false)
  })

  it('keeps going after a task fails', async () => {
    const mutex = new Mutex()

    const failing = mutex.runExclusive(async () => {
      throw new Error('task failed')
    })
    const next = mutex.runExclusive(async () => 'ok')

    await expect(failing).rejects.toThrow('task failed')
    expect(await next).toBe('ok')
  })

  it('resolves idle once queued tasks settle', async () => {
    const mutex = new Mutex()
    let done = false
    void mutex.runExclusive(async () => {
      done = true
    })

    await mutex.idle()

    expect(done).toBe(true)
  })
})
