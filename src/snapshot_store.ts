import { TtlCache } from './cache.js'
import {
  decodeSettings,
  decodeSnapshot,
  encodeSettings,
  encodeSnapshot,
  type DecodeResult,
} from './codec.js'
import { decodeKeyValueSnapshot } from './codec_compat.js'
import { debug, swallow } from './helpers.js'
import {
  defaultSettings,
  LEGACY_SETTING_FIELDS,
  LEGACY_SETTING_KEYS,
  settingsFromLegacyFields,
  type LegacySettingField,
} from './settings.js'
import { scopedKey, type StorageTier, type TierWriteResult } from './tier.js'
import type { Settings, UsageSnapshot } from './types.js'

export const SNAPSHOT_KEY = 'snapshot'
export const SETTINGS_KEY = 'settings'
/** Key-value slot shared with older single-profile producers. */
export const KV_SNAPSHOT_KEY = 'usageData'

export const DEFAULT_SETTINGS_CACHE_TTL_MS = 1000

export type SnapshotSource = 'file' | 'key-value'

export type SnapshotSaveResult =
  | { ok: true }
  | { ok: false; reason: 'stale'; storedCapturedAt: number }
  | { ok: false; reason: 'write-failed'; message: string }

export type SnapshotStore = ReturnType<typeof createSnapshotStore>

/** Settings handed out from the shared cache; callers copy before editing. */
export type ReadonlySettings = Readonly<Omit<Settings, 'statusline'>> & {
  readonly statusline: Readonly<Settings['statusline']>
}

function freezeSettings(settings: Settings): ReadonlySettings {
  return Object.freeze({
    ...settings,
    statusline: Object.freeze({ ...settings.statusline }),
  })
}

async function readDecoded<T>(
  tier: StorageTier,
  key: string,
  decode: (bytes: Uint8Array) => DecodeResult<T>,
): Promise<T | undefined> {
  const read = await tier.read(key)
  if (read.status === 'not-found') return undefined
  const decoded = decode(read.bytes)
  if (decoded.ok) return decoded.value
  debug(
    `${tier.name} tier ${key}: ${decoded.error.reason} (${decoded.error.message})`,
  )
  return undefined
}

function parseLegacyValue(bytes: Uint8Array): unknown {
  const text = Buffer.from(bytes).toString('utf8')
  try {
    return JSON.parse(text)
  } catch {
    // Bare strings are stored unquoted by some producers.
    return text.trim()
  }
}

export function createSnapshotStore(deps: {
  fileTier: StorageTier
  kvTier: StorageTier
  settingsCacheTtlMs?: number
  mirrorSnapshotToKeyValue?: boolean
  clock?: () => number
}) {
  const settingsTtlMs = deps.settingsCacheTtlMs ?? DEFAULT_SETTINGS_CACHE_TTL_MS
  const settingsCache = new TtlCache<ReadonlySettings>(deps.clock)

  /** File tier first; the key-value tier is a compatibility fallback. */
  const readSnapshot = async (
    profileId?: string,
  ): Promise<{ snapshot: UsageSnapshot; source: SnapshotSource } | undefined> => {
    const fromFile = await readDecoded(
      deps.fileTier,
      scopedKey(SNAPSHOT_KEY, profileId),
      decodeSnapshot,
    )
    if (fromFile) return { snapshot: fromFile, source: 'file' }

    const fromKeyValue = await readDecoded(
      deps.kvTier,
      scopedKey(KV_SNAPSHOT_KEY, profileId),
      decodeKeyValueSnapshot,
    )
    if (fromKeyValue) return { snapshot: fromKeyValue, source: 'key-value' }
    return undefined
  }

  const loadSnapshot = async (profileId?: string) => {
    const found = await readSnapshot(profileId)
    return found?.snapshot
  }

  const saveSnapshot = async (
    profileId: string | undefined,
    snapshot: UsageSnapshot,
  ): Promise<SnapshotSaveResult> => {
    const stored = await readSnapshot(profileId)
    if (stored && stored.snapshot.capturedAt > snapshot.capturedAt) {
      debug(
        `discarding snapshot captured at ${snapshot.capturedAt}; ${stored.source} tier holds ${stored.snapshot.capturedAt}`,
      )
      return {
        ok: false,
        reason: 'stale',
        storedCapturedAt: stored.snapshot.capturedAt,
      }
    }

    const bytes = encodeSnapshot(snapshot)
    const fileResult = await deps.fileTier.write(
      scopedKey(SNAPSHOT_KEY, profileId),
      bytes,
    )
    if (!deps.mirrorSnapshotToKeyValue) return fileResult

    const kvResult = await deps.kvTier.write(
      scopedKey(KV_SNAPSHOT_KEY, profileId),
      bytes,
    )
    if (!kvResult.ok) debug(`snapshot mirror failed: ${kvResult.message}`)
    // Either tier holding the snapshot keeps it readable.
    return fileResult.ok ? fileResult : kvResult
  }

  const deleteSnapshot = async (profileId: string): Promise<TierWriteResult> => {
    const results = await Promise.all([
      deps.fileTier.remove(scopedKey(SNAPSHOT_KEY, profileId)),
      deps.kvTier.remove(scopedKey(KV_SNAPSHOT_KEY, profileId)),
    ])
    return results.find((result) => !result.ok) ?? { ok: true }
  }

  const readLegacySettings = async () => {
    const reads = await Promise.all(
      LEGACY_SETTING_FIELDS.map((field) =>
        deps.kvTier.read(LEGACY_SETTING_KEYS[field]),
      ),
    )
    const fields: Partial<Record<LegacySettingField, unknown>> = {}
    LEGACY_SETTING_FIELDS.forEach((field, index) => {
      const read = reads[index]
      if (read.status === 'found') fields[field] = parseLegacyValue(read.bytes)
    })
    return settingsFromLegacyFields(fields)
  }

  const readSettings = async (profileId?: string): Promise<Settings> => {
    const key = scopedKey(SETTINGS_KEY, profileId)
    const fromKeyValue = await readDecoded(deps.kvTier, key, decodeSettings)
    if (fromKeyValue) return fromKeyValue

    const fromFile = await readDecoded(deps.fileTier, key, decodeSettings)
    if (fromFile) return fromFile

    return (await readLegacySettings()) ?? defaultSettings()
  }

  /**
   * Never fails; absent or unreadable settings yield the defaults. The
   * result is frozen because every reader within the TTL shares it.
   */
  const loadSettings = async (
    profileId?: string,
  ): Promise<ReadonlySettings> => {
    const key = scopedKey(SETTINGS_KEY, profileId)
    const settings = await settingsCache
      .getOrLoad(
        key,
        async () => freezeSettings(await readSettings(profileId)),
        settingsTtlMs,
      )
      .catch(swallow('loadSettings'))
    return settings ?? freezeSettings(defaultSettings())
  }

  /**
   * The key-value write is authoritative and visible to other processes
   * when this resolves; the settings file is a mirror.
   */
  const saveSettings = async (
    profileId: string | undefined,
    settings: Settings,
  ): Promise<TierWriteResult> => {
    const key = scopedKey(SETTINGS_KEY, profileId)
    const bytes = encodeSettings(settings)
    const kvResult = await deps.kvTier.write(key, bytes)
    const fileResult = await deps.fileTier.write(key, bytes)
    if (!fileResult.ok) debug(`settings file mirror failed: ${fileResult.message}`)
    settingsCache.delete(key)
    return kvResult
  }

  const deleteSettings = async (profileId: string): Promise<TierWriteResult> => {
    const key = scopedKey(SETTINGS_KEY, profileId)
    settingsCache.delete(key)
    const results = await Promise.all([
      deps.kvTier.remove(key),
      deps.fileTier.remove(key),
    ])
    return results.find((result) => !result.ok) ?? { ok: true }
  }

  return {
    readSnapshot,
    loadSnapshot,
    saveSnapshot,
    deleteSnapshot,
    loadSettings,
    saveSettings,
    deleteSettings,
  }
}
