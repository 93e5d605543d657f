import fs from 'node:fs/promises'
import path from 'node:path'

import { debug, debugError, errorCode } from './helpers.js'
import { ensureDirNoSymlink, safeWriteFile } from './safe_write.js'
import {
  assertStorageKey,
  notFound,
  writeFailed,
  type StorageTier,
  type TierReadResult,
  type TierWriteResult,
} from './tier.js'

export function sharedFilePath(dir: string, key: string, extension = '.json') {
  return path.join(dir, `${assertStorageKey(key)}${extension}`)
}

/**
 * One file per key inside a directory every cooperating process can reach.
 * Each key is replaced on its own, so writers of different keys never
 * clobber each other.
 */
export function createFileTier(options: {
  dir: string
  /** Defaults to `file`. */
  name?: string
  /** Defaults to `.json`. */
  extension?: string
}): StorageTier {
  const tierName = options.name ?? 'file'
  const filePath = (key: string) =>
    sharedFilePath(options.dir, key, options.extension)

  const read = async (key: string): Promise<TierReadResult> => {
    const target = filePath(key)
    const stat = await fs.lstat(target).catch(() => undefined)
    if (stat?.isSymbolicLink()) {
      debug(`refusing to read symlink: ${target}`)
      return notFound('io-error')
    }

    try {
      const bytes = await fs.readFile(target)
      return { status: 'found', bytes }
    } catch (error) {
      if (errorCode(error) === 'ENOENT') return notFound('absent')
      debugError(`${tierName} tier read ${key}`, error)
      return notFound('io-error')
    }
  }

  const write = async (
    key: string,
    bytes: Uint8Array,
  ): Promise<TierWriteResult> => {
    try {
      await ensureDirNoSymlink(options.dir)
      await safeWriteFile(filePath(key), bytes)
      return { ok: true }
    } catch (error) {
      debugError(`${tierName} tier write ${key}`, error)
      return writeFailed(error)
    }
  }

  const remove = async (key: string): Promise<TierWriteResult> => {
    try {
      await fs.rm(filePath(key), { force: true })
      return { ok: true }
    } catch (error) {
      debugError(`${tierName} tier remove ${key}`, error)
      return writeFailed(error)
    }
  }

  return { name: tierName, read, write, remove }
}
