import { debug } from './helpers.js'
import type { ProfileStore } from './profile_store.js'
import { renderModel, type RenderModel } from './render_model.js'
import type { SnapshotStore } from './snapshot_store.js'
import type { WidgetFamily } from './types.js'

const MINUTE_MS = 60_000

export const DEFAULT_REFRESH_MINUTES: Record<WidgetFamily, number> = {
  small: 15,
  medium: 15,
  large: 30,
}

export type SchedulerState =
  | { status: 'idle' }
  | { status: 'rendering'; startedAt: number }
  | { status: 'scheduled'; renderedAt: number; nextInvocationAt: number }

export type RefreshResult = {
  model: RenderModel
  renderedAt: number
  /** The host re-invokes at or after this instant. */
  nextInvocationAt: number
}

export function refreshIntervalMs(
  family: WidgetFamily,
  minutes: Partial<Record<WidgetFamily, number>> = {},
) {
  return (minutes[family] ?? DEFAULT_REFRESH_MINUTES[family]) * MINUTE_MS
}

/**
 * Display-side: renders once per host invocation and reports when the
 * host may invoke again. Holds no timer of its own.
 */
export function createRefreshScheduler(deps: {
  store: SnapshotStore
  family: WidgetFamily
  /** When given, the active profile's scope is read. */
  profiles?: ProfileStore
  refreshMinutes?: Partial<Record<WidgetFamily, number>>
  clock?: () => number
}) {
  const clock = deps.clock ?? Date.now
  const interval = refreshIntervalMs(deps.family, deps.refreshMinutes)
  let state: SchedulerState = { status: 'idle' }
  let inFlight: Promise<RefreshResult> | undefined

  const render = async (): Promise<RefreshResult> => {
    const startedAt = clock()
    state = { status: 'rendering', startedAt }
    try {
      const active = deps.profiles ? await deps.profiles.getActive() : undefined
      const model = await renderModel(deps.store, active?.id, startedAt)
      const nextInvocationAt = startedAt + interval
      state = { status: 'scheduled', renderedAt: startedAt, nextInvocationAt }
      debug(
        `${deps.family} render done; next at ${new Date(nextInvocationAt).toISOString()}`,
      )
      return { model, renderedAt: startedAt, nextInvocationAt }
    } catch (error) {
      state = { status: 'idle' }
      throw error
    }
  }

  /** Overlapping invocations share one render. */
  const invoke = () => {
    if (inFlight) return inFlight
    const promise = render().finally(() => {
      if (inFlight === promise) inFlight = undefined
    })
    inFlight = promise
    return promise
  }

  return {
    invoke,
    state: () => state,
    intervalMs: interval,
  }
}
