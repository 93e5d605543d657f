import {
  formatExtraUsage,
  formatPercentage,
  formatResetTime,
  formatTimeRemaining,
} from './format.js'
import {
  clampPercentage,
  extraUsagePercentage,
  resolveColor,
  statusLevel,
  type Color,
} from './metrics.js'
import type { ReadonlySettings, SnapshotStore } from './snapshot_store.js'
import type {
  StatusLevel,
  UsageSnapshot,
  WidgetMetric,
} from './types.js'

export type MetricView = {
  metric: WidgetMetric
  label: string
  /** Clamped to [0, 100]. */
  percentage: number
  level: StatusLevel
  color: Color
  text: string
  resetText?: string
}

export type DerivedMetrics = {
  statusLevels: {
    session: StatusLevel
    weekly: StatusLevel
    perModel: Record<string, StatusLevel>
    extra?: StatusLevel
  }
  colors: {
    session: Color
    weekly: Color
    extra?: Color
  }
  formatted: {
    session: string
    weekly: string
    sessionReset?: string
    weeklyReset?: string
    sessionRemaining?: string
    weeklyRemaining?: string
    extra?: string
  }
  extraPercentage?: number
  tiles: {
    small: MetricView
    mediumLeft: MetricView
    mediumRight: MetricView
  }
}

/** `derived` is absent when no tier holds a snapshot: the "no data" state. */
export type RenderModel = {
  snapshot: UsageSnapshot | undefined
  settings: ReadonlySettings
  derived: DerivedMetrics | undefined
}

const METRIC_LABELS: Record<WidgetMetric, string> = {
  session: 'Session',
  weekly: 'Weekly',
  opus: 'Opus',
  sonnet: 'Sonnet',
  extra: 'Extra',
}

function metricSource(metric: WidgetMetric, snapshot: UsageSnapshot) {
  switch (metric) {
    case 'session':
      return {
        percentage: snapshot.sessionPercentage,
        resetAt: snapshot.sessionResetAt,
      }
    case 'weekly':
      return {
        percentage: snapshot.weeklyPercentage,
        resetAt: snapshot.weeklyResetAt,
      }
    case 'opus':
    case 'sonnet':
      // Per-model quotas share the weekly window.
      return {
        percentage: snapshot.perModelPercentage[metric] ?? 0,
        resetAt: snapshot.weeklyResetAt,
      }
    case 'extra':
      return {
        percentage: extraUsagePercentage(snapshot.extraUsage) ?? 0,
        resetAt: undefined,
      }
  }
}

export function metricView(
  metric: WidgetMetric,
  snapshot: UsageSnapshot,
  settings: ReadonlySettings,
  nowMs: number,
): MetricView {
  const source = metricSource(metric, snapshot)
  const percentage = clampPercentage(source.percentage)
  const text =
    metric === 'extra'
      ? formatExtraUsage(
          extraUsagePercentage(snapshot.extraUsage),
          snapshot.extraUsage?.amountUsed,
          snapshot.extraUsage?.currencyCode,
          settings.extraUsageFormat,
        )
      : formatPercentage(percentage)

  const view: MetricView = {
    metric,
    label: METRIC_LABELS[metric],
    percentage,
    level: statusLevel(percentage),
    color: resolveColor(percentage, settings.colorMode, settings.customColorHex),
    text,
  }
  if (source.resetAt !== undefined) {
    view.resetText = formatResetTime(source.resetAt, nowMs, {
      use24HourTime: settings.use24HourTime,
    })
  }
  return view
}

export function deriveMetrics(
  snapshot: UsageSnapshot,
  settings: ReadonlySettings,
  nowMs: number,
): DerivedMetrics {
  const session = clampPercentage(snapshot.sessionPercentage)
  const weekly = clampPercentage(snapshot.weeklyPercentage)
  const extra = extraUsagePercentage(snapshot.extraUsage)
  const color = (percentage: number) =>
    resolveColor(percentage, settings.colorMode, settings.customColorHex)
  const resetOptions = { use24HourTime: settings.use24HourTime }

  const perModel = Object.entries(snapshot.perModelPercentage).reduce<
    Record<string, StatusLevel>
  >((acc, [model, percentage]) => {
    acc[model] = statusLevel(clampPercentage(percentage))
    return acc
  }, {})

  const derived: DerivedMetrics = {
    statusLevels: {
      session: statusLevel(session),
      weekly: statusLevel(weekly),
      perModel,
    },
    colors: { session: color(session), weekly: color(weekly) },
    formatted: {
      session: formatPercentage(session),
      weekly: formatPercentage(weekly),
    },
    tiles: {
      small: metricView(settings.smallMetric, snapshot, settings, nowMs),
      mediumLeft: metricView(settings.mediumLeftMetric, snapshot, settings, nowMs),
      mediumRight: metricView(
        settings.mediumRightMetric,
        snapshot,
        settings,
        nowMs,
      ),
    },
  }

  if (snapshot.sessionResetAt !== undefined) {
    derived.formatted.sessionReset = formatResetTime(
      snapshot.sessionResetAt,
      nowMs,
      resetOptions,
    )
    derived.formatted.sessionRemaining = formatTimeRemaining(
      snapshot.sessionResetAt,
      nowMs,
    )
  }
  if (snapshot.weeklyResetAt !== undefined) {
    derived.formatted.weeklyReset = formatResetTime(
      snapshot.weeklyResetAt,
      nowMs,
      resetOptions,
    )
    derived.formatted.weeklyRemaining = formatTimeRemaining(
      snapshot.weeklyResetAt,
      nowMs,
    )
  }
  if (extra !== undefined && snapshot.extraUsage) {
    const clamped = clampPercentage(extra)
    derived.extraPercentage = extra
    derived.statusLevels.extra = statusLevel(clamped)
    derived.colors.extra = color(clamped)
    derived.formatted.extra = formatExtraUsage(
      extra,
      snapshot.extraUsage.amountUsed,
      snapshot.extraUsage.currencyCode,
      settings.extraUsageFormat,
    )
  }
  return derived
}

export function buildRenderModel(input: {
  snapshot: UsageSnapshot | undefined
  settings: ReadonlySettings
  nowMs: number
}): RenderModel {
  return {
    snapshot: input.snapshot,
    settings: input.settings,
    derived: input.snapshot
      ? deriveMetrics(input.snapshot, input.settings, input.nowMs)
      : undefined,
  }
}

/** Read-only: one snapshot read, one (cached) settings read. */
export async function renderModel(
  store: SnapshotStore,
  profileId?: string,
  nowMs = Date.now(),
): Promise<RenderModel> {
  const [snapshot, settings] = await Promise.all([
    store.loadSnapshot(profileId),
    store.loadSettings(profileId),
  ])
  return buildRenderModel({ snapshot, settings, nowMs })
}
