import assert from 'node:assert/strict'
import fs from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { afterEach, describe, it } from 'node:test'

import {
  createMemoryKeyValueTier,
  createRegisterKeyValueTier,
} from '../kv_tier.js'
import type { TierReadResult } from '../tier.js'

const tmpDirs: string[] = []

async function makeTempDir() {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'quota-sync-kv-'))
  tmpDirs.push(dir)
  return dir
}

afterEach(async () => {
  await Promise.all(
    tmpDirs
      .splice(0, tmpDirs.length)
      .map((dir) => fs.rm(dir, { recursive: true, force: true })),
  )
})

function text(read: TierReadResult) {
  if (read.status !== 'found') return undefined
  return Buffer.from(read.bytes).toString('utf8')
}

describe('register key-value tier', () => {
  it('is visible to a second instance on the same register', async () => {
    const dir = await makeTempDir()
    const writer = createRegisterKeyValueTier({ dir })
    const reader = createRegisterKeyValueTier({ dir })

    assert.deepEqual(await writer.write('settings', Buffer.from('{"x":1}')), {
      ok: true,
    })
    assert.equal(text(await reader.read('settings')), '{"x":1}')
  })

  it('stores each key as its own raw value file', async () => {
    const dir = await makeTempDir()
    const tier = createRegisterKeyValueTier({ dir })
    await tier.write('activeProfileId', Buffer.from('p-1'))

    assert.deepEqual(await fs.readdir(dir), ['activeProfileId.value'])
    assert.equal(
      await fs.readFile(path.join(dir, 'activeProfileId.value'), 'utf8'),
      'p-1',
    )
  })

  it('keeps keys written at once by separate instances', async () => {
    const dir = await makeTempDir()
    const primary = createRegisterKeyValueTier({ dir })
    const background = createRegisterKeyValueTier({ dir })

    await Promise.all([
      primary.write('profiles', Buffer.from('[]')),
      background.write('usageData', Buffer.from('{}')),
      primary.write('activeProfileId', Buffer.from('p-1')),
      background.write('settings', Buffer.from('{"y":2}')),
    ])

    const reader = createRegisterKeyValueTier({ dir })
    assert.equal(text(await reader.read('profiles')), '[]')
    assert.equal(text(await reader.read('usageData')), '{}')
    assert.equal(text(await reader.read('activeProfileId')), 'p-1')
    assert.equal(text(await reader.read('settings')), '{"y":2}')
  })

  it('reports an absent register and absent keys', async () => {
    const dir = await makeTempDir()
    const tier = createRegisterKeyValueTier({
      dir: path.join(dir, 'missing'),
    })
    assert.deepEqual(await tier.read('settings'), {
      status: 'not-found',
      reason: 'absent',
    })
    await tier.write('other', Buffer.from('x'))
    assert.deepEqual(await tier.read('settings'), {
      status: 'not-found',
      reason: 'absent',
    })
  })

  it('removes a key', async () => {
    const dir = await makeTempDir()
    const tier = createRegisterKeyValueTier({ dir })
    await tier.write('a', Buffer.from('1'))
    await tier.write('b', Buffer.from('2'))
    assert.deepEqual(await tier.remove('a'), { ok: true })
    assert.equal((await tier.read('a')).status, 'not-found')
    assert.equal(text(await tier.read('b')), '2')
  })

  it('rejects keys that are not safe file names', async () => {
    const dir = await makeTempDir()
    const tier = createRegisterKeyValueTier({ dir })
    assert.deepEqual(await tier.write('../escape', Buffer.from('x')), {
      ok: false,
      reason: 'write-failed',
      message: 'invalid storage key: ../escape',
    })
    await assert.rejects(tier.read('../escape'), /invalid storage key/)
  })
})

describe('memory key-value tier', () => {
  it('copies bytes on write and lists keys', async () => {
    const tier = createMemoryKeyValueTier({ b: Buffer.from('seed') })
    const value = Buffer.from('abc')
    await tier.write('a', value)
    value[0] = 0x7a

    assert.equal(text(await tier.read('a')), 'abc')
    assert.deepEqual(tier.keys(), ['a', 'b'])
  })
})
