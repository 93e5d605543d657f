import {
  buildSnapshot,
  malformed,
  parseExtraUsage,
  parseJsonRecord,
  parsePerModel,
  snapshotFromRecord,
  type DecodeResult,
} from './codec.js'
import { parseTimestamp } from './dates.js'
import { asNumber } from './helpers.js'
import type { UsageSnapshot } from './types.js'

/**
 * Flat snapshot shape written by single-profile producers into the
 * key-value tier. Token counters and timezone fields are ignored.
 */
export function snapshotFromCompatRecord(
  raw: Record<string, unknown>,
): DecodeResult<UsageSnapshot> {
  const sessionPercentage = asNumber(raw.sessionPercentage)
  const weeklyPercentage = asNumber(raw.weeklyPercentage)
  if (sessionPercentage === undefined || weeklyPercentage === undefined) {
    return malformed('compat payload lacks session or weekly percentage')
  }

  return {
    ok: true,
    value: buildSnapshot({
      sessionPercentage,
      weeklyPercentage,
      sessionResetAt: parseTimestamp(raw.sessionResetTime),
      weeklyResetAt: parseTimestamp(raw.weeklyResetTime),
      perModelPercentage: parsePerModel({
        opus: raw.opusWeeklyPercentage,
        sonnet: raw.sonnetWeeklyPercentage,
      }),
      // Missing cost fields mean "not configured", never zero.
      extraUsage: parseExtraUsage(raw.costUsed, raw.costLimit, raw.costCurrency),
      capturedAt: parseTimestamp(raw.lastUpdated),
    }),
  }
}

function looksCanonical(raw: Record<string, unknown>) {
  return (
    raw.kind !== undefined ||
    raw.capturedAt !== undefined ||
    raw.perModelPercentage !== undefined
  )
}

/**
 * Key-value tier snapshots may come from a mirroring writer (canonical
 * envelope) or an older producer (compat shape); decode either.
 */
export function decodeKeyValueSnapshot(
  bytes: Uint8Array,
): DecodeResult<UsageSnapshot> {
  const parsed = parseJsonRecord(bytes)
  if (!parsed.ok) return parsed
  if (looksCanonical(parsed.value)) return snapshotFromRecord(parsed.value)
  return snapshotFromCompatRecord(parsed.value)
}
