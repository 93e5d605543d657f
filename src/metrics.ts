import { DEFAULT_CUSTOM_COLOR } from './settings.js'
import type { ColorMode, ExtraUsage, StatusLevel } from './types.js'

/** Shared by every reader and writer; never duplicate these values. */
export const STATUS_THRESHOLDS = {
  moderate: 50,
  critical: 80,
} as const

export const STATUS_COLORS: Record<StatusLevel, string> = {
  safe: '#34C759',
  moderate: '#FF9500',
  critical: '#FF3B30',
}

export const NEUTRAL_COLOR = '#8E8E93'

export type Color =
  | { kind: 'status'; level: StatusLevel; hex: string }
  | { kind: 'neutral'; hex: string }
  | { kind: 'custom'; hex: string }

/** Display clamp; stored values are never bounds-checked. */
export function clampPercentage(percentage: number) {
  if (!Number.isFinite(percentage)) return 0
  return Math.max(0, Math.min(100, percentage))
}

export function statusLevel(percentage: number): StatusLevel {
  if (Number.isNaN(percentage)) return 'safe'
  if (percentage >= STATUS_THRESHOLDS.critical) return 'critical'
  if (percentage >= STATUS_THRESHOLDS.moderate) return 'moderate'
  return 'safe'
}

export function extraPercentage(used: number, limit: number) {
  if (!(limit > 0)) return undefined
  return (used / limit) * 100
}

export function extraUsagePercentage(extra: ExtraUsage | undefined) {
  if (!extra) return undefined
  return extraPercentage(extra.amountUsed, extra.amountLimit)
}

/** `#RRGGBB` or `#RRGGBBAA` (leading `#` optional); normalized to uppercase. */
export function parseHexColor(value: string) {
  const digits = value.trim().replace(/^#/, '')
  if (!/^([0-9A-Fa-f]{6}|[0-9A-Fa-f]{8})$/.test(digits)) return undefined
  return `#${digits.toUpperCase()}`
}

export function resolveColor(
  percentage: number,
  mode: ColorMode,
  customColor: string,
): Color {
  if (mode === 'monochrome') return { kind: 'neutral', hex: NEUTRAL_COLOR }
  if (mode === 'singleColor') {
    return {
      kind: 'custom',
      hex: parseHexColor(customColor) ?? DEFAULT_CUSTOM_COLOR,
    }
  }
  const level = statusLevel(percentage)
  return { kind: 'status', level, hex: STATUS_COLORS[level] }
}
