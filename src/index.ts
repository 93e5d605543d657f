import { loadConfig, defaultConfig } from './config.js'
import { createFileTier } from './file_tier.js'
import { createRegisterKeyValueTier } from './kv_tier.js'
import { createUsagePoller, type FetchUsageData } from './poller.js'
import { createProfileStore } from './profile_store.js'
import { createRefreshScheduler } from './refresh_scheduler.js'
import { renderModel } from './render_model.js'
import { createSnapshotStore } from './snapshot_store.js'
import {
  configFilePaths,
  keyValueDir,
  resolveRegisterDir,
  resolveSharedDir,
} from './storage_paths.js'
import type { StorageTier } from './tier.js'
import type { QuotaSyncConfig, WidgetFamily } from './types.js'

export * from './cache.js'
export * from './codec.js'
export * from './codec_compat.js'
export * from './config.js'
export * from './dates.js'
export * from './file_tier.js'
export * from './format.js'
export * from './kv_tier.js'
export * from './metrics.js'
export * from './poller.js'
export * from './profile_store.js'
export * from './refresh_scheduler.js'
export * from './render_model.js'
export * from './settings.js'
export * from './snapshot_store.js'
export * from './storage_paths.js'
export * from './tier.js'
export type * from './types.js'

/**
 * Composition root: builds each store once per process. Tiers may be
 * swapped for in-process stand-ins.
 */
export function createQuotaSync(
  config: QuotaSyncConfig = defaultConfig,
  overrides: {
    fileTier?: StorageTier
    kvTier?: StorageTier
    clock?: () => number
  } = {},
) {
  const clock = overrides.clock ?? Date.now
  const sharedDir = config.sharedDir ?? resolveSharedDir()
  const registerDir = config.registerDir ?? keyValueDir(resolveRegisterDir())

  const fileTier = overrides.fileTier ?? createFileTier({ dir: sharedDir })
  const kvTier =
    overrides.kvTier ?? createRegisterKeyValueTier({ dir: registerDir })

  const store = createSnapshotStore({
    fileTier,
    kvTier,
    settingsCacheTtlMs: config.settingsCacheTtlMs,
    mirrorSnapshotToKeyValue: config.mirrorSnapshotToKeyValue,
    clock,
  })
  const profiles = createProfileStore({ kvTier, snapshotStore: store, clock })

  const refreshMinutes: Record<WidgetFamily, number> = {
    small: config.refresh.smallMinutes,
    medium: config.refresh.mediumMinutes,
    large: config.refresh.largeMinutes,
  }

  return {
    config,
    sharedDir,
    registerDir,
    store,
    profiles,
    createScheduler: (family: WidgetFamily) =>
      createRefreshScheduler({
        store,
        family,
        profiles,
        refreshMinutes,
        clock,
      }),
    createPoller: (
      fetchUsageData: FetchUsageData,
      onError?: (error: unknown) => void,
    ) =>
      createUsagePoller({
        fetchUsageData,
        store,
        profiles,
        intervalMs: config.poll.intervalMs,
        onError,
        clock,
      }),
    /** Active profile's scope unless `profileId` is given. */
    renderModel: async (profileId?: string) => {
      const id = profileId ?? (await profiles.getActive())?.id
      return renderModel(store, id, clock())
    },
  }
}

export type QuotaSync = ReturnType<typeof createQuotaSync>

export async function loadQuotaSync(paths: string[] = configFilePaths()) {
  return createQuotaSync(await loadConfig(paths))
}
