import { createHash } from 'node:crypto'

export type NotFoundReason = 'absent' | 'io-error'

export type TierReadResult =
  | { status: 'found'; bytes: Uint8Array }
  | { status: 'not-found'; reason: NotFoundReason }

export type TierWriteResult =
  | { ok: true }
  | { ok: false; reason: 'write-failed'; message: string }

/**
 * One storage backend in the fallback chain. Implementations never throw
 * for I/O problems; they report `not-found` or `write-failed`.
 */
export type StorageTier = {
  readonly name: string
  read: (key: string) => Promise<TierReadResult>
  /** Resolves once the value is visible to other processes. */
  write: (key: string, bytes: Uint8Array) => Promise<TierWriteResult>
  remove: (key: string) => Promise<TierWriteResult>
}

const STORAGE_KEY_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]{0,127}$/

export function isStorageKey(value: string) {
  return STORAGE_KEY_PATTERN.test(value)
}

export function assertStorageKey(key: string) {
  // Keys become file names; never build paths from unchecked input.
  if (!isStorageKey(key)) {
    throw new Error(`invalid storage key: ${key}`)
  }
  return key
}

const PLAIN_PROFILE_ID = /^[A-Za-z0-9][A-Za-z0-9_-]{0,63}$/

/**
 * Key suffix for an opaque profile id. Ids that are already safe file-name
 * segments are kept readable; anything else is replaced by its digest.
 */
export function profileKeySegment(profileId: string) {
  if (PLAIN_PROFILE_ID.test(profileId)) return profileId
  const digest = createHash('sha256').update(profileId, 'utf8').digest('hex')
  return `sha256-${digest}`
}

/** `snapshot` for the unscoped legacy slot, `snapshot.<profileId>` otherwise. */
export function scopedKey(name: string, profileId?: string) {
  return assertStorageKey(
    profileId ? `${name}.${profileKeySegment(profileId)}` : name,
  )
}

export function notFound(reason: NotFoundReason): TierReadResult {
  return { status: 'not-found', reason }
}

export function writeFailed(error: unknown): TierWriteResult {
  const message = error instanceof Error ? error.message : String(error)
  return { ok: false, reason: 'write-failed', message }
}
