import { asNumber } from './helpers.js'

const MINUTE_MS = 60_000
const DAY_MS = 24 * 60 * 60 * 1000

/**
 * Parse a timestamp written by any producer: epoch ms, epoch seconds,
 * a numeric string, or an ISO-8601 string. Returns epoch ms.
 */
export function parseTimestamp(value: unknown): number | undefined {
  if (typeof value === 'string') {
    const trimmed = value.trim()
    if (!trimmed) return undefined
    if (/^\d+(\.\d+)?$/.test(trimmed)) return parseTimestamp(Number(trimmed))
    const parsed = Date.parse(trimmed)
    return Number.isNaN(parsed) ? undefined : parsed
  }
  const num = asNumber(value)
  if (num === undefined || num <= 0) return undefined
  // Seconds -> ms heuristic
  if (num < 1_000_000_000_000) return Math.round(num * 1000)
  return num
}

/** >= 30s rounds up, < 30s rounds down. */
export function roundToNearestMinute(timestampMs: number) {
  const floor = Math.floor(timestampMs / MINUTE_MS) * MINUTE_MS
  return timestampMs - floor >= 30_000 ? floor + MINUTE_MS : floor
}

export function startOfLocalDay(timestampMs: number) {
  const date = new Date(timestampMs)
  return new Date(
    date.getFullYear(),
    date.getMonth(),
    date.getDate(),
  ).getTime()
}

/** Whole local calendar days from `fromMs` to `toMs` (negative when earlier). */
export function calendarDayDistance(fromMs: number, toMs: number) {
  // Rounding absorbs 23h/25h days around DST switches.
  return Math.round((startOfLocalDay(toMs) - startOfLocalDay(fromMs)) / DAY_MS)
}
