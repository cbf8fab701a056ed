/**
 * Crash simulation integration tests for Store.
 * Tests recovery when a process stops without closing the store.
 */

import { describe, it, expect, afterEach } from 'vitest'
import { appendFile, readFile, truncate, stat } from 'node:fs/promises'
import { Store } from '../../store'
import { LogStore } from '../log-store'
import { createTestPaths, cleanup, type TestPaths } from './helpers'

describe('Store crash simulation', () => {
  const testPathsList: TestPaths[] = []
  const openHandles: Array<Store | LogStore> = []

  afterEach(async () => {
    for (const handle of openHandles) {
      await handle.close()
    }
    openHandles.length = 0

    await cleanup(testPathsList)
    testPathsList.length = 0
  })

  it('acknowledged writes survive a store that was never closed', async () => {
    const paths = createTestPaths('crash-no-close')
    testPathsList.push(paths)

    const crashed = await Store.open(paths.storePath)
    openHandles.push(crashed)
    await crashed.set('x', 'y')

    // Second instance replays while the first still holds its handle
    const recovered = await Store.open(paths.storePath)
    openHandles.push(recovered)

    expect(recovered.get('x')).toBe('y')
  })

  it('a record appended before the index update is recovered', async () => {
    const paths = createTestPaths('crash-before-index')
    testPathsList.push(paths)

    // Crash between append and index update: only the log has the write
    const logStore = new LogStore(paths.storePath)
    openHandles.push(logStore)
    await logStore.append({ key: 'x', value: 'y' })

    const store = await Store.open(paths.storePath)
    openHandles.push(store)

    expect(store.get('x')).toBe('y')
  })

  describe('torn final record', () => {
    it('skips a final line cut after the key', async () => {
      const paths = createTestPaths('torn-key')
      testPathsList.push(paths)

      const store1 = await Store.open(paths.storePath)
      await store1.set('a', '1')
      await store1.set('b', '2')
      await store1.close()

      await appendFile(paths.storePath, 'SET c')

      const store2 = await Store.open(paths.storePath)
      openHandles.push(store2)

      expect(store2.get('a')).toBe('1')
      expect(store2.get('b')).toBe('2')
      expect(store2.get('c')).toBeUndefined()
      expect(store2.count()).toBe(2)
    })

    it('skips a final line cut inside the keyword', async () => {
      const paths = createTestPaths('torn-keyword')
      testPathsList.push(paths)

      const store1 = await Store.open(paths.storePath)
      await store1.set('a', '1')
      await store1.close()

      await appendFile(paths.storePath, 'SE')

      const store2 = await Store.open(paths.storePath)
      openHandles.push(store2)

      expect(store2.get('a')).toBe('1')
      expect(store2.count()).toBe(1)
    })

    it('keeps a complete final record that lost only its newline', async () => {
      const paths = createTestPaths('torn-newline')
      testPathsList.push(paths)

      const store1 = await Store.open(paths.storePath)
      await store1.set('a', '1')
      await store1.set('b', '2')
      await store1.close()

      const size = (await stat(paths.storePath)).size
      await truncate(paths.storePath, size - 1)

      const store2 = await Store.open(paths.storePath)
      openHandles.push(store2)

      expect(store2.get('a')).toBe('1')
      expect(store2.get('b')).toBe('2')
    })

    it('keeps writing after recovering from a torn record', async () => {
      const paths = createTestPaths('torn-then-write')
      testPathsList.push(paths)

      const store1 = await Store.open(paths.storePath)
      await store1.set('a', '1')
      await store1.close()

      await appendFile(paths.storePath, 'SET b\n')

      const store2 = await Store.open(paths.storePath)
      await store2.set('b', '2')
      await store2.close()

      const content = await readFile(paths.storePath, 'utf8')
      expect(content).toBe('SET a 1\nSET b\nSET b 2\n')

      const store3 = await Store.open(paths.storePath)
      openHandles.push(store3)

      expect(store3.get('a')).toBe('1')
      expect(store3.get('b')).toBe('2')
    })
  })
})
