import assert from 'node:assert/strict'
import { describe, it } from 'node:test'

import { TtlCache } from '../cache.js'

function deferred<T>() {
  let resolve: (value: T) => void = () => {}
  const promise = new Promise<T>((done) => {
    resolve = done
  })
  return { promise, resolve }
}

describe('TtlCache', () => {
  it('returns value before expiry and undefined after expiry', () => {
    const cache = new TtlCache<string>()
    cache.set('k', 'v1', 1000, 100)

    assert.equal(cache.get('k', 500), 'v1')
    assert.equal(cache.get('k', 1100), undefined)
  })

  it('treats zero TTL as immediately expired', () => {
    const cache = new TtlCache<string>()
    cache.set('k', 'v1', 0, 100)
    assert.equal(cache.get('k', 100), undefined)
  })
})

describe('TtlCache.getOrLoad', () => {
  it('serves the cached instance within the TTL', async () => {
    let now = 1000
    const cache = new TtlCache<{ value: number }>(() => now)
    let calls = 0
    const loader = async () => {
      calls += 1
      return { value: calls }
    }

    const first = await cache.getOrLoad('settings', loader, 1000)
    now = 1999
    const second = await cache.getOrLoad('settings', loader, 1000)

    assert.equal(calls, 1)
    assert.equal(first, second)
  })

  it('reloads once the TTL has elapsed', async () => {
    let now = 0
    const cache = new TtlCache<number>(() => now)
    let calls = 0
    const loader = async () => ++calls

    assert.equal(await cache.getOrLoad('k', loader, 1000), 1)
    now = 1000
    assert.equal(await cache.getOrLoad('k', loader, 1000), 2)
  })

  it('shares one load between concurrent callers', async () => {
    const cache = new TtlCache<string>(() => 0)
    let calls = 0
    const loader = async () => {
      calls += 1
      return 'v'
    }

    const results = await Promise.all([
      cache.getOrLoad('k', loader, 1000),
      cache.getOrLoad('k', loader, 1000),
    ])
    assert.deepEqual(results, ['v', 'v'])
    assert.equal(calls, 1)
  })

  it('does not store a failed load', async () => {
    const cache = new TtlCache<string>(() => 0)
    await assert.rejects(
      cache.getOrLoad('k', async () => {
        throw new Error('boom')
      }, 1000),
      /boom/,
    )
    assert.equal(cache.get('k'), undefined)
    assert.equal(await cache.getOrLoad('k', async () => 'ok', 1000), 'ok')
  })

  it('delete drops one key', async () => {
    const cache = new TtlCache<number>(() => 0)
    cache.set('a', 1, 1000)
    cache.set('b', 2, 1000)
    cache.delete('a')
    assert.equal(cache.get('a'), undefined)
    assert.equal(cache.get('b'), 2)
  })

  it('does not store a load that was in flight when the key was deleted', async () => {
    const cache = new TtlCache<string>(() => 0)
    const pending = deferred<string>()
    const early = cache.getOrLoad('k', () => pending.promise, 1000)

    cache.delete('k')
    pending.resolve('old')

    assert.equal(await early, 'old')
    assert.equal(cache.get('k'), undefined)
    assert.equal(await cache.getOrLoad('k', async () => 'new', 1000), 'new')
  })

  it('keeps the newer load when an invalidated one settles after it', async () => {
    const cache = new TtlCache<string>(() => 0)
    const slow = deferred<string>()
    const early = cache.getOrLoad('k', () => slow.promise, 1000)

    cache.delete('k')
    assert.equal(await cache.getOrLoad('k', async () => 'new', 1000), 'new')
    slow.resolve('old')
    await early

    assert.equal(cache.get('k'), 'new')
  })
})
