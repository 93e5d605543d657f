import { randomBytes } from 'node:crypto'
import fs from 'node:fs/promises'
import path from 'node:path'

import { debug, errorCode } from './helpers.js'

/**
 * Create `dirPath` (recursively) and verify it is a real directory, not a
 * symlink planted by another process.
 */
export async function ensureDirNoSymlink(dirPath: string) {
  const stat = await fs.lstat(dirPath).catch(() => undefined)
  if (stat?.isSymbolicLink()) {
    throw new Error(`refusing to write through symlink dir: ${dirPath}`)
  }
  if (stat && !stat.isDirectory()) {
    throw new Error(`expected directory at ${dirPath}`)
  }
  if (stat) return

  await fs.mkdir(dirPath, { recursive: true })
  const created = await fs.lstat(dirPath).catch(() => undefined)
  if (!created || created.isSymbolicLink() || !created.isDirectory()) {
    throw new Error(`unsafe directory created at ${dirPath}`)
  }
}

/**
 * Replace `filePath` in one pass: write a sibling temp file, then rename
 * over the target. Refuses to write through symlinks.
 */
export async function safeWriteFile(
  filePath: string,
  content: string | Uint8Array,
) {
  const stat = await fs.lstat(filePath).catch(() => undefined)
  if (stat?.isSymbolicLink()) {
    const message = `refusing to write through symlink: ${filePath}`
    debug(message)
    throw new Error(message)
  }

  const dir = path.dirname(filePath)
  const dirStat = await fs.lstat(dir).catch(() => undefined)
  if (dirStat?.isSymbolicLink()) {
    const message = `refusing to write through symlink dir: ${dir}`
    debug(message)
    throw new Error(message)
  }

  const name = path.basename(filePath)
  const maxAttempts = 5

  let lastError: unknown
  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    const suffix = randomBytes(4).toString('hex')
    const tmpPath = path.join(dir, `${name}.tmp.${process.pid}.${suffix}`)

    try {
      await fs.writeFile(tmpPath, content, { flag: 'wx' })
    } catch (error) {
      if (errorCode(error) === 'EEXIST') {
        lastError = error
        continue
      }
      throw error
    }

    try {
      await fs.rename(tmpPath, filePath)
      return
    } catch (error) {
      await fs.rm(tmpPath, { force: true }).catch(() => undefined)
      throw error
    }
  }

  throw lastError instanceof Error
    ? lastError
    : new Error(`safeWriteFile failed for ${filePath}`)
}
