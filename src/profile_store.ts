import { randomUUID } from 'node:crypto'

import { decodeProfiles, encodeProfiles } from './codec.js'
import { debug } from './helpers.js'
import type { SnapshotStore } from './snapshot_store.js'
import type { StorageTier } from './tier.js'
import type { Profile, ProfileCredentials } from './types.js'

export const PROFILES_KEY = 'profiles'
export const ACTIVE_PROFILE_KEY = 'activeProfileId'

export type CredentialKind = 'session' | 'api'

export type ProfileCollectionRead =
  | { status: 'empty' }
  | { status: 'ok'; profiles: Profile[] }
  | { status: 'unreadable'; message: string }

export type ProfileFailure =
  | { ok: false; reason: 'unreadable-collection'; message: string }
  | { ok: false; reason: 'not-found'; id: string }
  | { ok: false; reason: 'last-profile' }
  | { ok: false; reason: 'write-failed'; message: string }

export type ProfileWriteResult = { ok: true } | ProfileFailure

export type ProfileStore = ReturnType<typeof createProfileStore>

export function hasSessionCredentials(credentials: ProfileCredentials) {
  return Boolean(credentials.sessionToken && credentials.organizationId)
}

export function hasApiCredentials(credentials: ProfileCredentials) {
  return Boolean(credentials.apiToken && credentials.apiOrganizationId)
}

export function hasAnyCredentials(credentials: ProfileCredentials) {
  return hasSessionCredentials(credentials) || hasApiCredentials(credentials)
}

function withoutCredentials(
  credentials: ProfileCredentials,
  kind: CredentialKind,
): ProfileCredentials {
  const next: ProfileCredentials = { ...credentials }
  if (kind === 'session') {
    delete next.sessionToken
    delete next.organizationId
  } else {
    delete next.apiToken
    delete next.apiOrganizationId
  }
  return next
}

function notFound(id: string): ProfileFailure {
  return { ok: false, reason: 'not-found', id }
}

/**
 * Profiles live as one encoded collection in the key-value tier, next to
 * the active profile id. Read-modify-write cycles in this process are
 * serialized.
 */
export function createProfileStore(deps: {
  kvTier: StorageTier
  snapshotStore: SnapshotStore
  clock?: () => number
  generateId?: () => string
}) {
  const clock = deps.clock ?? Date.now
  const generateId = deps.generateId ?? randomUUID
  let lock: Promise<unknown> = Promise.resolve()

  const locked = <T>(run: () => Promise<T>): Promise<T> => {
    const result = lock.then(run, run)
    lock = result.catch(() => undefined)
    return result
  }

  const readCollection = async (): Promise<ProfileCollectionRead> => {
    const read = await deps.kvTier.read(PROFILES_KEY)
    if (read.status === 'not-found') {
      if (read.reason === 'absent') return { status: 'empty' }
      return { status: 'unreadable', message: `tier reported ${read.reason}` }
    }
    const decoded = decodeProfiles(read.bytes)
    if (!decoded.ok) {
      debug(`profile collection unreadable: ${decoded.error.message}`)
      return { status: 'unreadable', message: decoded.error.message }
    }
    return { status: 'ok', profiles: decoded.value }
  }

  const writeCollection = (profiles: Profile[]): Promise<ProfileWriteResult> =>
    deps.kvTier.write(PROFILES_KEY, encodeProfiles(profiles))

  /** Existing profiles, or a failure that forbids writing over them. */
  const readForUpdate = async (): Promise<
    { ok: true; profiles: Profile[] } | ProfileFailure
  > => {
    const collection = await readCollection()
    if (collection.status === 'unreadable') {
      return {
        ok: false,
        reason: 'unreadable-collection',
        message: collection.message,
      }
    }
    return {
      ok: true,
      profiles: collection.status === 'ok' ? collection.profiles : [],
    }
  }

  const list = async () => {
    const collection = await readCollection()
    return collection.status === 'ok' ? collection.profiles : []
  }

  const get = async (id: string) => {
    const profiles = await list()
    return profiles.find((profile) => profile.id === id)
  }

  /**
   * Replace the whole collection. Refuses while the stored collection
   * cannot be read, unless `force` is set.
   */
  const save = (profiles: Profile[], options: { force?: boolean } = {}) =>
    locked(async (): Promise<ProfileWriteResult> => {
      if (!options.force) {
        const existing = await readForUpdate()
        if (!existing.ok) return existing
      }
      return writeCollection(profiles)
    })

  const getActiveId = async () => {
    const read = await deps.kvTier.read(ACTIVE_PROFILE_KEY)
    if (read.status === 'not-found') return undefined
    const id = Buffer.from(read.bytes).toString('utf8').trim()
    return id || undefined
  }

  /** A dangling active id counts as unset. */
  const getActive = async () => {
    const id = await getActiveId()
    if (!id) return undefined
    return get(id)
  }

  const writeActiveId = (id: string) =>
    deps.kvTier.write(ACTIVE_PROFILE_KEY, Buffer.from(id, 'utf8'))

  const setActive = (id: string) =>
    locked(async (): Promise<ProfileWriteResult> => {
      const existing = await readForUpdate()
      if (!existing.ok) return existing
      const index = existing.profiles.findIndex((profile) => profile.id === id)
      if (index < 0) return notFound(id)

      const profiles = existing.profiles.map((profile) =>
        profile.id === id ? { ...profile, lastUsedAt: clock() } : profile,
      )
      const written = await writeCollection(profiles)
      if (!written.ok) return written
      return writeActiveId(id)
    })

  const create = (
    name?: string,
    options: { copySettingsFrom?: string } = {},
  ) =>
    locked(
      async (): Promise<{ ok: true; profile: Profile } | ProfileFailure> => {
        const existing = await readForUpdate()
        if (!existing.ok) return existing

        const now = clock()
        const profile: Profile = {
          id: generateId(),
          name: name?.trim() || `Profile ${existing.profiles.length + 1}`,
          credentials: {},
          createdAt: now,
          lastUsedAt: now,
        }
        const written = await writeCollection([...existing.profiles, profile])
        if (!written.ok) return written

        if (existing.profiles.length === 0) {
          const activated = await writeActiveId(profile.id)
          if (!activated.ok) return activated
        }
        if (options.copySettingsFrom) {
          const settings = await deps.snapshotStore.loadSettings(
            options.copySettingsFrom,
          )
          const copied = await deps.snapshotStore.saveSettings(
            profile.id,
            settings,
          )
          if (!copied.ok) debug(`settings copy failed: ${copied.message}`)
        }
        return { ok: true, profile }
      },
    )

  const replaceProfile = (
    id: string,
    apply: (profile: Profile) => Profile,
  ) =>
    locked(async (): Promise<ProfileWriteResult> => {
      const existing = await readForUpdate()
      if (!existing.ok) return existing
      if (!existing.profiles.some((profile) => profile.id === id)) {
        return notFound(id)
      }
      return writeCollection(
        existing.profiles.map((profile) =>
          profile.id === id ? apply(profile) : profile,
        ),
      )
    })

  const update = (profile: Profile) => replaceProfile(profile.id, () => profile)

  /**
   * Erases the profile together with its snapshot and settings. The last
   * profile cannot be deleted.
   */
  const deleteProfile = (id: string) =>
    locked(async (): Promise<ProfileWriteResult> => {
      const existing = await readForUpdate()
      if (!existing.ok) return existing
      if (!existing.profiles.some((profile) => profile.id === id)) {
        return notFound(id)
      }
      if (existing.profiles.length <= 1) {
        return { ok: false, reason: 'last-profile' }
      }

      const remaining = existing.profiles.filter((profile) => profile.id !== id)
      const written = await writeCollection(remaining)
      if (!written.ok) return written

      const [snapshotRemoved, settingsRemoved] = await Promise.all([
        deps.snapshotStore.deleteSnapshot(id),
        deps.snapshotStore.deleteSettings(id),
      ])
      if (!snapshotRemoved.ok) debug(`snapshot erase failed for ${id}`)
      if (!settingsRemoved.ok) debug(`settings erase failed for ${id}`)

      const activeId = await getActiveId()
      if (activeId === id || activeId === undefined) {
        return writeActiveId(remaining[0].id)
      }
      return { ok: true }
    })

  const saveCredentials = (id: string, credentials: ProfileCredentials) =>
    replaceProfile(id, (profile) => ({
      ...profile,
      credentials: { ...profile.credentials, ...credentials },
    }))

  const loadCredentials = async (id: string) => {
    const profile = await get(id)
    return profile?.credentials
  }

  const removeCredentials = (id: string, kind: CredentialKind) =>
    replaceProfile(id, (profile) => ({
      ...profile,
      credentials: withoutCredentials(profile.credentials, kind),
    }))

  return {
    readCollection,
    list,
    get,
    save,
    getActiveId,
    getActive,
    setActive,
    create,
    update,
    delete: deleteProfile,
    saveCredentials,
    loadCredentials,
    removeCredentials,
  }
}
