import { calendarDayDistance, roundToNearestMinute } from './dates.js'
import { clampPercentage } from './metrics.js'
import type { ExtraUsageFormat } from './types.js'

const MINUTE_MS = 60_000

const WEEKDAYS = [
  'Sunday',
  'Monday',
  'Tuesday',
  'Wednesday',
  'Thursday',
  'Friday',
  'Saturday',
]

/** Fallback for any extra-usage request whose data is unavailable. */
export const ZERO_CURRENCY = '$0.00'

function pad2(value: number) {
  return `${value}`.padStart(2, '0')
}

export function formatClock(timestampMs: number, use24HourTime = false) {
  const date = new Date(timestampMs)
  const hours = date.getHours()
  const minutes = pad2(date.getMinutes())
  if (use24HourTime) return `${pad2(hours)}:${minutes}`
  const suffix = hours < 12 ? 'AM' : 'PM'
  return `${hours % 12 || 12}:${minutes}${suffix}`
}

/**
 * "Today, 3:59PM", "Tomorrow, 9:00AM" or "Wednesday, 7:00PM". The time is
 * rounded to the nearest minute first so repeated reads do not flicker
 * across a minute boundary. `compact` drops the day.
 */
export function formatResetTime(
  timestampMs: number,
  nowMs: number,
  options: { use24HourTime?: boolean; compact?: boolean } = {},
) {
  const rounded = roundToNearestMinute(timestampMs)
  const clock = formatClock(rounded, options.use24HourTime)
  if (options.compact) return clock

  const distance = calendarDayDistance(nowMs, rounded)
  if (distance === 0) return `Today, ${clock}`
  if (distance === 1) return `Tomorrow, ${clock}`
  return `${WEEKDAYS[new Date(rounded).getDay()]}, ${clock}`
}

export function formatTimeRemaining(resetAtMs: number, nowMs: number) {
  const remaining = resetAtMs - nowMs
  if (remaining <= 0) return 'Reset now'

  const totalMinutes = Math.floor(remaining / MINUTE_MS)
  if (totalMinutes < 1) return '< 1m'
  if (totalMinutes < 60) return `${totalMinutes}m`

  const hours = Math.floor(totalMinutes / 60)
  if (hours < 24) {
    const minutes = totalMinutes % 60
    return minutes === 0 ? `${hours}h` : `${hours}h ${minutes}m`
  }

  const days = Math.floor(hours / 24)
  return days === 1 ? '1 day' : `${days} days`
}

export function formatPercentage(percentage: number) {
  return `${Math.round(clampPercentage(percentage))}%`
}

export function formatCurrency(
  amountMinor: number,
  currencyCode: string,
  locale = 'en-US',
) {
  const amount = amountMinor / 100
  try {
    return new Intl.NumberFormat(locale, {
      style: 'currency',
      currency: currencyCode,
    }).format(amount)
  } catch {
    // Unknown ISO code: keep the amount, print the code as given.
    return `${amount.toFixed(2)} ${currencyCode}`
  }
}

/**
 * Amounts are minor units. A request for data that is not there yields
 * "0%" or "$0.00" rather than an error.
 */
export function formatExtraUsage(
  percentage: number | undefined,
  usedMinor: number | undefined,
  currencyCode: string | undefined,
  format: ExtraUsageFormat,
  locale = 'en-US',
) {
  const percentText =
    percentage === undefined ? '0%' : formatPercentage(percentage)
  const currencyText =
    usedMinor === undefined || !currencyCode
      ? ZERO_CURRENCY
      : formatCurrency(usedMinor, currencyCode, locale)

  if (format === 'percentage') return percentText
  if (format === 'currency') return currencyText
  return `${percentText} • ${currencyText}`
}
