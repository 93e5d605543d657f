/** Shared type guards, utilities, and debug logging. */

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function asNumber(value: unknown, fallback: number): number
export function asNumber(value: unknown): number | undefined
export function asNumber(
  value: unknown,
  fallback?: number,
): number | undefined {
  if (typeof value !== 'number' || !Number.isFinite(value)) return fallback
  return value
}

export function asBoolean(value: unknown, fallback: boolean): boolean {
  if (typeof value !== 'boolean') return fallback
  return value
}

export function asString(value: unknown): string | undefined {
  if (typeof value !== 'string') return undefined
  return value
}

export function asOneOf<T extends string>(
  value: unknown,
  allowed: readonly T[],
  fallback: T,
): T {
  if (typeof value !== 'string') return fallback
  const match = allowed.find((item) => item === value)
  return match ?? fallback
}

export function clamp(value: number, min: number, max: number) {
  return Math.max(min, Math.min(max, value))
}

const DEBUG =
  typeof process !== 'undefined' && process.env.QUOTA_SYNC_DEBUG === '1'

export function debug(message: string, ...args: unknown[]) {
  if (!DEBUG) return
  console.error(`[quota-sync] ${message}`, ...args)
}

export function debugError(context: string, error: unknown) {
  if (!DEBUG) return
  const msg = error instanceof Error ? error.message : String(error)
  console.error(`[quota-sync] ${context}: ${msg}`)
}

/** Returns a `.catch()` handler that logs in debug mode and returns undefined. */
export function swallow(context: string) {
  return (error: unknown): undefined => {
    debugError(context, error)
    return undefined
  }
}

export function errorCode(error: unknown) {
  if (!isRecord(error)) return undefined
  return typeof error.code === 'string' ? error.code : undefined
}
