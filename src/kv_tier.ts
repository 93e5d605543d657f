import { createFileTier } from './file_tier.js'
import { assertStorageKey, notFound, type StorageTier } from './tier.js'

/** In-process register; the stand-in for tests and single-process hosts. */
export function createMemoryKeyValueTier(
  initial?: Record<string, Uint8Array>,
): StorageTier & { keys: () => string[] } {
  const entries = new Map<string, Uint8Array>()
  for (const [key, bytes] of Object.entries(initial ?? {})) {
    entries.set(assertStorageKey(key), Uint8Array.from(bytes))
  }

  return {
    name: 'key-value',
    read: async (key) => {
      const bytes = entries.get(assertStorageKey(key))
      if (!bytes) return notFound('absent')
      return { status: 'found', bytes: Uint8Array.from(bytes) }
    },
    write: async (key, bytes) => {
      entries.set(assertStorageKey(key), Uint8Array.from(bytes))
      return { ok: true }
    },
    remove: async (key) => {
      entries.delete(assertStorageKey(key))
      return { ok: true }
    },
    keys: () => [...entries.keys()].sort(),
  }
}

export const KEY_VALUE_EXTENSION = '.value'

/**
 * Machine-scoped register: a directory holding one raw value file per key.
 * Each write replaces only its own key, so processes writing different keys
 * at the same time never lose each other's values.
 */
export function createRegisterKeyValueTier(options: {
  dir: string
}): StorageTier {
  return createFileTier({
    dir: options.dir,
    name: 'key-value',
    extension: KEY_VALUE_EXTENSION,
  })
}
