import { asBoolean, asNumber, asOneOf, clamp, isRecord } from './helpers.js'
import type {
  ColorMode,
  ExtraUsageFormat,
  Settings,
  StatuslineVisibility,
  WidgetMetric,
} from './types.js'

export const WIDGET_METRICS: readonly WidgetMetric[] = [
  'session',
  'weekly',
  'opus',
  'sonnet',
  'extra',
]

export const COLOR_MODES: readonly ColorMode[] = [
  'multiColor',
  'monochrome',
  'singleColor',
]

export const EXTRA_USAGE_FORMATS: readonly ExtraUsageFormat[] = [
  'percentage',
  'currency',
  'both',
]

export const DEFAULT_CUSTOM_COLOR = '#00BFFF'

const MIN_REFRESH_INTERVAL_SECONDS = 5
const MAX_REFRESH_INTERVAL_SECONDS = 24 * 60 * 60

export function defaultSettings(): Settings {
  return {
    refreshIntervalSeconds: 30,
    smallMetric: 'session',
    mediumLeftMetric: 'session',
    mediumRightMetric: 'weekly',
    colorMode: 'multiColor',
    customColorHex: DEFAULT_CUSTOM_COLOR,
    extraUsageFormat: 'percentage',
    notificationsEnabled: true,
    use24HourTime: false,
    statusline: {
      showDirectory: true,
      showBranch: true,
      showUsage: true,
      showProgressBar: true,
      showResetTime: true,
    },
  }
}

function parseRefreshInterval(value: unknown, fallback: number) {
  const seconds = asNumber(value)
  // Zero and negatives mean "unset".
  if (seconds === undefined || seconds <= 0) return fallback
  return clamp(
    seconds,
    MIN_REFRESH_INTERVAL_SECONDS,
    MAX_REFRESH_INTERVAL_SECONDS,
  )
}

function parseStatusline(value: unknown, fallback: StatuslineVisibility) {
  const raw = isRecord(value) ? value : {}
  return {
    showDirectory: asBoolean(raw.showDirectory, fallback.showDirectory),
    showBranch: asBoolean(raw.showBranch, fallback.showBranch),
    showUsage: asBoolean(raw.showUsage, fallback.showUsage),
    showProgressBar: asBoolean(raw.showProgressBar, fallback.showProgressBar),
    showResetTime: asBoolean(raw.showResetTime, fallback.showResetTime),
  }
}

/** Field-by-field parse: anything missing or invalid keeps its default. */
export function parseSettings(raw: Record<string, unknown>): Settings {
  const fallback = defaultSettings()
  return {
    refreshIntervalSeconds: parseRefreshInterval(
      raw.refreshIntervalSeconds,
      fallback.refreshIntervalSeconds,
    ),
    smallMetric: asOneOf(raw.smallMetric, WIDGET_METRICS, fallback.smallMetric),
    mediumLeftMetric: asOneOf(
      raw.mediumLeftMetric,
      WIDGET_METRICS,
      fallback.mediumLeftMetric,
    ),
    mediumRightMetric: asOneOf(
      raw.mediumRightMetric,
      WIDGET_METRICS,
      fallback.mediumRightMetric,
    ),
    colorMode: asOneOf(raw.colorMode, COLOR_MODES, fallback.colorMode),
    customColorHex:
      typeof raw.customColorHex === 'string'
        ? raw.customColorHex
        : fallback.customColorHex,
    extraUsageFormat: asOneOf(
      raw.extraUsageFormat,
      EXTRA_USAGE_FORMATS,
      fallback.extraUsageFormat,
    ),
    notificationsEnabled: asBoolean(
      raw.notificationsEnabled,
      fallback.notificationsEnabled,
    ),
    use24HourTime: asBoolean(raw.use24HourTime, fallback.use24HourTime),
    statusline: parseStatusline(raw.statusline, fallback.statusline),
  }
}

// ─── Legacy single-profile keys ──────────────────────────────────────────────

export const LEGACY_SETTING_FIELDS = [
  'smallMetric',
  'mediumLeftMetric',
  'mediumRightMetric',
  'colorMode',
  'customColorHex',
  'extraUsageFormat',
  'notificationsEnabled',
  'refreshIntervalSeconds',
  'use24HourTime',
  'showDirectory',
  'showBranch',
  'showUsage',
  'showProgressBar',
  'showResetTime',
] as const

export type LegacySettingField = (typeof LEGACY_SETTING_FIELDS)[number]

/** Key-value tier keys written one field at a time by single-profile producers. */
export const LEGACY_SETTING_KEYS: Record<LegacySettingField, string> = {
  smallMetric: 'smallWidgetMetric',
  mediumLeftMetric: 'mediumWidgetLeftMetric',
  mediumRightMetric: 'mediumWidgetRightMetric',
  colorMode: 'widgetColorMode',
  customColorHex: 'widgetSingleColorHex',
  extraUsageFormat: 'extraUsageDisplayFormat',
  notificationsEnabled: 'notificationsEnabled',
  refreshIntervalSeconds: 'refreshInterval',
  use24HourTime: 'statuslineUse24HourTime',
  showDirectory: 'statuslineShowDirectory',
  showBranch: 'statuslineShowBranch',
  showUsage: 'statuslineShowUsage',
  showProgressBar: 'statuslineShowProgressBar',
  showResetTime: 'statuslineShowResetTime',
}

/**
 * Assemble Settings from individually stored legacy fields.
 * Returns undefined when none of the fields is present.
 */
export function settingsFromLegacyFields(
  fields: Partial<Record<LegacySettingField, unknown>>,
): Settings | undefined {
  const present = Object.values(fields).some((value) => value !== undefined)
  if (!present) return undefined

  return parseSettings({
    refreshIntervalSeconds: fields.refreshIntervalSeconds,
    smallMetric: fields.smallMetric,
    mediumLeftMetric: fields.mediumLeftMetric,
    mediumRightMetric: fields.mediumRightMetric,
    colorMode: fields.colorMode,
    customColorHex: fields.customColorHex,
    extraUsageFormat: fields.extraUsageFormat,
    notificationsEnabled: fields.notificationsEnabled,
    use24HourTime: fields.use24HourTime,
    statusline: {
      showDirectory: fields.showDirectory,
      showBranch: fields.showBranch,
      showUsage: fields.showUsage,
      showProgressBar: fields.showProgressBar,
      showResetTime: fields.showResetTime,
    },
  })
}
