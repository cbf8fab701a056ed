import { describe, it, expect } from 'vitest'

import { Mutex } from './mutex'

describe('Mutex', () => {
  it('should run tasks one at a time in submission order', async () => {
    const mutex = new Mutex()
    const events: string[] = []

    const task = (name: string, delayMs: number) => () =>
      new Promise<string>((resolve) => {
        events.push(`start ${name}`)
        setTimeout(() => {
          events.push(`end ${name}`)
          resolve(name)
        }, delayMs)
      })

    const results = await Promise.all([
      mutex.runExclusive(task('a', 20)),
      mutex.runExclusive(task('b', 0)),
      mutex.runExclusive(task('c', 5))
    ])

    expect(results).toEqual(['a', 'b', 'c'])
    expect(events).toEqual([
      'start a',
      'end a',
      'start b',
      'end b',
      'start c',
      'end c'
    ])
  })

  it('should pass a rejection through and keep serving', async () => {
    const mutex = new Mutex()

    const failed = mutex.runExclusive(async () => {
      throw new Error('boom')
    })
    const next = mutex.runExclusive(async () => 'ok')

    await expect(failed).rejects.toThrow('boom')
    await expect(next).resolves.toBe('ok')
  })

  it('should report whether tasks are pending', async () => {
    const mutex = new Mutex()
    expect(mutex.isLocked()).toBe(false)

    const running = mutex.runExclusive(async () => {})
    expect(mutex.isLocked()).toBe(true)

    await running
    expect(mutex.isLocked()).toBe(false)
  })
})
