import { debug, swallow } from './helpers.js'
import type { ProfileStore } from './profile_store.js'
import type { SnapshotStore } from './snapshot_store.js'
import type { UsageSnapshot } from './types.js'

/** Provided by the remote client; this package never calls the network. */
export type FetchUsageData = () => Promise<UsageSnapshot>

export type PollOutcome =
  | { status: 'saved'; profileId?: string; snapshot: UsageSnapshot }
  | { status: 'stale'; profileId?: string; storedCapturedAt: number }
  | { status: 'fetch-failed'; error: unknown }
  | { status: 'write-failed'; message: string }

/**
 * Background writer: fetch, stamp, save to the active profile's scope
 * (the unscoped slot when no profile is active).
 */
export function createUsagePoller(options: {
  fetchUsageData: FetchUsageData
  store: SnapshotStore
  profiles?: ProfileStore
  intervalMs: number
  onError?: (error: unknown) => void
  clock?: () => number
}) {
  const clock = options.clock ?? Date.now
  const onError = options.onError || (() => {})
  let timer: ReturnType<typeof setTimeout> | undefined
  let running = false
  let inFlight: Promise<PollOutcome> | undefined

  const poll = async (): Promise<PollOutcome> => {
    let fetched: UsageSnapshot
    try {
      fetched = await options.fetchUsageData()
    } catch (error) {
      onError(error)
      return { status: 'fetch-failed', error }
    }

    const snapshot =
      fetched.capturedAt > 0 ? fetched : { ...fetched, capturedAt: clock() }
    const active = options.profiles
      ? await options.profiles.getActive()
      : undefined
    const profileId = active?.id

    const saved = await options.store.saveSnapshot(profileId, snapshot)
    if (saved.ok) return { status: 'saved', profileId, snapshot }
    if (saved.reason === 'stale') {
      debug(`poll result older than stored snapshot (${saved.storedCapturedAt})`)
      return {
        status: 'stale',
        profileId,
        storedCapturedAt: saved.storedCapturedAt,
      }
    }
    onError(new Error(`snapshot write failed: ${saved.message}`))
    return { status: 'write-failed', message: saved.message }
  }

  /** Overlapping calls share the in-flight poll. */
  const pollNow = () => {
    if (inFlight) return inFlight
    const promise = poll().finally(() => {
      if (inFlight === promise) inFlight = undefined
    })
    inFlight = promise
    return promise
  }

  const scheduleNext = () => {
    if (!running || timer) return
    timer = setTimeout(() => {
      timer = undefined
      void pollNow()
        .catch(swallow('poller:tick'))
        .finally(scheduleNext)
    }, options.intervalMs)
  }

  /** Polls immediately, then every `intervalMs` after each poll settles. */
  const start = () => {
    if (running) return
    running = true
    void pollNow()
      .catch(swallow('poller:start'))
      .finally(scheduleNext)
  }

  const stop = () => {
    running = false
    if (timer) clearTimeout(timer)
    timer = undefined
  }

  return {
    pollNow,
    start,
    stop,
    isRunning: () => running,
  }
}
