import fs from 'node:fs/promises'

import { asBoolean, asNumber, clamp, isRecord, swallow } from './helpers.js'
import { DEFAULT_SETTINGS_CACHE_TTL_MS } from './snapshot_store.js'
import type { QuotaSyncConfig } from './types.js'

// ─── Default config ──────────────────────────────────────────────────────────

export const defaultConfig: QuotaSyncConfig = {
  settingsCacheTtlMs: DEFAULT_SETTINGS_CACHE_TTL_MS,
  mirrorSnapshotToKeyValue: false,
  refresh: {
    smallMinutes: 15,
    mediumMinutes: 15,
    largeMinutes: 30,
  },
  poll: {
    intervalMs: 30_000,
  },
}

function refreshMinutes(value: unknown, fallback: number) {
  return clamp(Math.floor(asNumber(value, fallback)), 5, 24 * 60)
}

function optionalPath(value: unknown) {
  if (typeof value !== 'string') return undefined
  return value.trim() || undefined
}

// ─── Config loading ──────────────────────────────────────────────────────────

/** Reads the first existing file among `paths`; anything unusable keeps its default. */
export async function loadConfig(paths: string[]): Promise<QuotaSyncConfig> {
  const existing = await Promise.all(
    paths.map(async (filePath) => {
      const stat = await fs.stat(filePath).catch(swallow('loadConfig:stat'))
      if (!stat || !stat.isFile()) return undefined
      return filePath
    }),
  )

  const selected = existing.find((value) => value)
  if (!selected) return defaultConfig

  const parsed = await fs
    .readFile(selected, 'utf8')
    .then((value): unknown => JSON.parse(value))
    .catch(swallow('loadConfig:read'))

  if (!isRecord(parsed)) return defaultConfig

  const refresh = isRecord(parsed.refresh) ? parsed.refresh : {}
  const poll = isRecord(parsed.poll) ? parsed.poll : {}

  const config: QuotaSyncConfig = {
    settingsCacheTtlMs: clamp(
      asNumber(parsed.settingsCacheTtlMs, defaultConfig.settingsCacheTtlMs),
      0,
      60_000,
    ),
    mirrorSnapshotToKeyValue: asBoolean(
      parsed.mirrorSnapshotToKeyValue,
      defaultConfig.mirrorSnapshotToKeyValue,
    ),
    refresh: {
      smallMinutes: refreshMinutes(
        refresh.smallMinutes,
        defaultConfig.refresh.smallMinutes,
      ),
      mediumMinutes: refreshMinutes(
        refresh.mediumMinutes,
        defaultConfig.refresh.mediumMinutes,
      ),
      largeMinutes: refreshMinutes(
        refresh.largeMinutes,
        defaultConfig.refresh.largeMinutes,
      ),
    },
    poll: {
      intervalMs: clamp(
        asNumber(poll.intervalMs, defaultConfig.poll.intervalMs),
        10_000,
        24 * 60 * 60 * 1000,
      ),
    },
  }

  const sharedDir = optionalPath(parsed.sharedDir)
  const registerDir = optionalPath(parsed.registerDir)
  if (sharedDir) config.sharedDir = sharedDir
  if (registerDir) config.registerDir = registerDir
  return config
}
