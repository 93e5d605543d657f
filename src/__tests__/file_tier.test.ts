import assert from 'node:assert/strict'
import fs from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { afterEach, describe, it } from 'node:test'

import { createFileTier, sharedFilePath } from '../file_tier.js'

const tmpDirs: string[] = []

async function makeTempDir() {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'quota-sync-file-'))
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

describe('file tier', () => {
  it('writes one file per key and reads it back', async () => {
    const dir = await makeTempDir()
    const tier = createFileTier({ dir })

    const result = await tier.write('snapshot', Buffer.from('{"a":1}'))
    assert.deepEqual(result, { ok: true })

    const onDisk = await fs.readFile(path.join(dir, 'snapshot.json'), 'utf8')
    assert.equal(onDisk, '{"a":1}')

    const read = await tier.read('snapshot')
    assert.equal(read.status, 'found')
    if (read.status !== 'found') return
    assert.equal(Buffer.from(read.bytes).toString('utf8'), '{"a":1}')
  })

  it('creates the shared directory on first write', async () => {
    const root = await makeTempDir()
    const dir = path.join(root, 'nested', 'shared')
    const tier = createFileTier({ dir })

    assert.deepEqual(await tier.write('settings', Buffer.from('{}')), {
      ok: true,
    })
    const stat = await fs.stat(dir)
    assert.equal(stat.isDirectory(), true)
  })

  it('reports absent keys as not-found', async () => {
    const dir = await makeTempDir()
    const tier = createFileTier({ dir })
    assert.deepEqual(await tier.read('snapshot.p-1'), {
      status: 'not-found',
      reason: 'absent',
    })
  })

  it('leaves no temp files behind', async () => {
    const dir = await makeTempDir()
    const tier = createFileTier({ dir })
    await tier.write('snapshot', Buffer.from('one'))
    await tier.write('snapshot', Buffer.from('two'))
    assert.deepEqual(await fs.readdir(dir), ['snapshot.json'])
  })

  it('refuses to read or write through a symlink', async () => {
    const dir = await makeTempDir()
    const outside = path.join(await makeTempDir(), 'target.json')
    await fs.writeFile(outside, 'secret')
    await fs.symlink(outside, path.join(dir, 'snapshot.json'))
    const tier = createFileTier({ dir })

    assert.deepEqual(await tier.read('snapshot'), {
      status: 'not-found',
      reason: 'io-error',
    })
    const write = await tier.write('snapshot', Buffer.from('overwrite'))
    assert.equal(write.ok, false)
    assert.equal(await fs.readFile(outside, 'utf8'), 'secret')
  })

  it('removes keys and tolerates removing missing ones', async () => {
    const dir = await makeTempDir()
    const tier = createFileTier({ dir })
    await tier.write('snapshot', Buffer.from('x'))

    assert.deepEqual(await tier.remove('snapshot'), { ok: true })
    assert.deepEqual(await tier.remove('snapshot'), { ok: true })
    assert.deepEqual(await tier.read('snapshot'), {
      status: 'not-found',
      reason: 'absent',
    })
  })

  it('rejects keys that could escape the directory', async () => {
    const dir = await makeTempDir()
    const tier = createFileTier({ dir })
    await assert.rejects(tier.read('../escape'), /invalid storage key/)
    assert.throws(() => sharedFilePath(dir, ''), /invalid storage key/)
  })
})
