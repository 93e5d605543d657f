import assert from 'node:assert/strict'
import fs from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { afterEach, describe, it } from 'node:test'

import { defaultConfig, loadConfig } from '../config.js'

const tmpDirs: string[] = []

async function makeTempDir() {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'quota-config-test-'))
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

describe('loadConfig', () => {
  it('returns defaults when no config exists', async () => {
    const dir = await makeTempDir()
    const config = await loadConfig([path.join(dir, 'missing.json')])
    assert.deepEqual(config, defaultConfig)
  })

  it('returns defaults for unparseable JSON', async () => {
    const dir = await makeTempDir()
    const filePath = path.join(dir, 'config.json')
    await fs.writeFile(filePath, '{ nope')
    assert.deepEqual(await loadConfig([filePath]), defaultConfig)
  })

  it('clamps numeric fields into safe ranges', async () => {
    const dir = await makeTempDir()
    const filePath = path.join(dir, 'config.json')
    await fs.writeFile(
      filePath,
      JSON.stringify({
        settingsCacheTtlMs: 999_999,
        refresh: { smallMinutes: 1, largeMinutes: 99_999 },
        poll: { intervalMs: 5 },
      }),
    )

    const config = await loadConfig([filePath])
    assert.equal(config.settingsCacheTtlMs, 60_000)
    assert.deepEqual(config.refresh, {
      smallMinutes: 5,
      mediumMinutes: 15,
      largeMinutes: 1440,
    })
    assert.equal(config.poll.intervalMs, 10_000)
  })

  it('parses booleans and trims paths', async () => {
    const dir = await makeTempDir()
    const filePath = path.join(dir, 'config.json')
    await fs.writeFile(
      filePath,
      JSON.stringify({
        mirrorSnapshotToKeyValue: true,
        sharedDir: '  /srv/quota-shared  ',
        registerDir: '   ',
      }),
    )

    const config = await loadConfig([filePath])
    assert.equal(config.mirrorSnapshotToKeyValue, true)
    assert.equal(config.sharedDir, '/srv/quota-shared')
    assert.equal('registerDir' in config, false)
  })

  it('falls back per boolean field', async () => {
    const dir = await makeTempDir()
    const filePath = path.join(dir, 'config.json')
    await fs.writeFile(
      filePath,
      JSON.stringify({ mirrorSnapshotToKeyValue: 'yes' }),
    )
    const config = await loadConfig([filePath])
    assert.equal(config.mirrorSnapshotToKeyValue, false)
  })

  it('uses the first existing path', async () => {
    const dir = await makeTempDir()
    const first = path.join(dir, 'a.json')
    const second = path.join(dir, 'b.json')
    await fs.writeFile(first, JSON.stringify({ settingsCacheTtlMs: 250 }))
    await fs.writeFile(second, JSON.stringify({ settingsCacheTtlMs: 750 }))

    const config = await loadConfig([
      path.join(dir, 'missing.json'),
      first,
      second,
    ])
    assert.equal(config.settingsCacheTtlMs, 250)
  })
})
