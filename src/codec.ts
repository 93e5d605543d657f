import { asNumber, asString, isRecord } from './helpers.js'
import { parseSettings } from './settings.js'
import type {
  ExtraUsage,
  Profile,
  ProfileCredentials,
  Settings,
  UsageSnapshot,
} from './types.js'

/** Bumped only for additive changes; readers never reject a newer version. */
export const CODEC_VERSION = 1

export type PayloadKind = 'usage-snapshot' | 'settings' | 'profiles'

export type DecodeError = {
  reason: 'malformed' | 'wrong-kind'
  message: string
}

export type DecodeResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: DecodeError }

/** Model families every snapshot reports, even when the producer omitted them. */
export const DEFAULT_MODELS = ['opus', 'sonnet'] as const

export function malformed(message: string): { ok: false; error: DecodeError } {
  return { ok: false, error: { reason: 'malformed', message } }
}

function encodeJson(value: unknown): Uint8Array {
  return Buffer.from(`${JSON.stringify(value, null, 2)}\n`, 'utf8')
}

/** Parse bytes into a JSON object; torn or partial writes land here as malformed. */
export function parseJsonRecord(
  bytes: Uint8Array,
): DecodeResult<Record<string, unknown>> {
  let parsed: unknown
  try {
    parsed = JSON.parse(Buffer.from(bytes).toString('utf8'))
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error)
    return malformed(`invalid JSON: ${detail}`)
  }
  if (!isRecord(parsed)) return malformed('payload is not an object')
  return { ok: true, value: parsed }
}

function checkKind(
  raw: Record<string, unknown>,
  kind: PayloadKind,
): DecodeError | undefined {
  if (raw.kind === undefined || raw.kind === kind) return undefined
  return {
    reason: 'wrong-kind',
    message: `expected ${kind}, got ${String(raw.kind)}`,
  }
}

// ─── Usage snapshot ──────────────────────────────────────────────────────────

export function parseExtraUsage(
  amountUsed: unknown,
  amountLimit: unknown,
  currencyCode: unknown,
): ExtraUsage | undefined {
  const used = asNumber(amountUsed)
  const limit = asNumber(amountLimit)
  const currency = asString(currencyCode)?.trim()
  // All three or nothing.
  if (used === undefined || limit === undefined || !currency) return undefined
  return { amountUsed: used, amountLimit: limit, currencyCode: currency }
}

export function parsePerModel(value: unknown) {
  const raw = isRecord(value) ? value : {}
  const perModel = Object.entries(raw).reduce<Record<string, number>>(
    (acc, [model, percentage]) => {
      const num = asNumber(percentage)
      if (num === undefined) return acc
      acc[model] = num
      return acc
    },
    {},
  )
  for (const model of DEFAULT_MODELS) {
    if (perModel[model] === undefined) perModel[model] = 0
  }
  return perModel
}

export function buildSnapshot(fields: {
  sessionPercentage: number
  weeklyPercentage: number
  sessionResetAt?: number
  weeklyResetAt?: number
  perModelPercentage: Record<string, number>
  extraUsage?: ExtraUsage
  capturedAt?: number
}): UsageSnapshot {
  const snapshot: UsageSnapshot = {
    sessionPercentage: fields.sessionPercentage,
    weeklyPercentage: fields.weeklyPercentage,
    perModelPercentage: fields.perModelPercentage,
    capturedAt: fields.capturedAt ?? 0,
  }
  if (fields.sessionResetAt !== undefined) {
    snapshot.sessionResetAt = fields.sessionResetAt
  }
  if (fields.weeklyResetAt !== undefined) {
    snapshot.weeklyResetAt = fields.weeklyResetAt
  }
  if (fields.extraUsage) snapshot.extraUsage = fields.extraUsage
  return snapshot
}

export function encodeSnapshot(snapshot: UsageSnapshot): Uint8Array {
  return encodeJson({
    kind: 'usage-snapshot',
    version: CODEC_VERSION,
    sessionPercentage: snapshot.sessionPercentage,
    sessionResetAt: snapshot.sessionResetAt,
    weeklyPercentage: snapshot.weeklyPercentage,
    weeklyResetAt: snapshot.weeklyResetAt,
    perModelPercentage: snapshot.perModelPercentage,
    extraUsage: snapshot.extraUsage,
    capturedAt: snapshot.capturedAt,
  })
}

export function snapshotFromRecord(
  raw: Record<string, unknown>,
): DecodeResult<UsageSnapshot> {
  const kindError = checkKind(raw, 'usage-snapshot')
  if (kindError) return { ok: false, error: kindError }

  const sessionPercentage = asNumber(raw.sessionPercentage)
  const weeklyPercentage = asNumber(raw.weeklyPercentage)
  if (sessionPercentage === undefined || weeklyPercentage === undefined) {
    return malformed('missing sessionPercentage or weeklyPercentage')
  }

  const extra = isRecord(raw.extraUsage) ? raw.extraUsage : {}
  return {
    ok: true,
    value: buildSnapshot({
      sessionPercentage,
      weeklyPercentage,
      sessionResetAt: asNumber(raw.sessionResetAt),
      weeklyResetAt: asNumber(raw.weeklyResetAt),
      perModelPercentage: parsePerModel(raw.perModelPercentage),
      extraUsage: parseExtraUsage(
        extra.amountUsed,
        extra.amountLimit,
        extra.currencyCode,
      ),
      capturedAt: asNumber(raw.capturedAt),
    }),
  }
}

export function decodeSnapshot(bytes: Uint8Array): DecodeResult<UsageSnapshot> {
  const parsed = parseJsonRecord(bytes)
  if (!parsed.ok) return parsed
  return snapshotFromRecord(parsed.value)
}

// ─── Settings ────────────────────────────────────────────────────────────────

export function encodeSettings(settings: Settings): Uint8Array {
  return encodeJson({ kind: 'settings', version: CODEC_VERSION, ...settings })
}

export function decodeSettings(bytes: Uint8Array): DecodeResult<Settings> {
  const parsed = parseJsonRecord(bytes)
  if (!parsed.ok) return parsed
  const kindError = checkKind(parsed.value, 'settings')
  if (kindError) return { ok: false, error: kindError }
  return { ok: true, value: parseSettings(parsed.value) }
}

// ─── Profiles ────────────────────────────────────────────────────────────────

function parseCredentials(value: unknown): ProfileCredentials {
  const raw = isRecord(value) ? value : {}
  const credentials: ProfileCredentials = {}
  const sessionToken = asString(raw.sessionToken)
  const organizationId = asString(raw.organizationId)
  const apiToken = asString(raw.apiToken)
  const apiOrganizationId = asString(raw.apiOrganizationId)
  if (sessionToken !== undefined) credentials.sessionToken = sessionToken
  if (organizationId !== undefined) credentials.organizationId = organizationId
  if (apiToken !== undefined) credentials.apiToken = apiToken
  if (apiOrganizationId !== undefined) {
    credentials.apiOrganizationId = apiOrganizationId
  }
  return credentials
}

function parseProfile(value: unknown): Profile | undefined {
  if (!isRecord(value)) return undefined
  const id = asString(value.id)
  const name = asString(value.name)
  if (!id || name === undefined) return undefined
  return {
    id,
    name,
    credentials: parseCredentials(value.credentials),
    createdAt: asNumber(value.createdAt, 0),
    lastUsedAt: asNumber(value.lastUsedAt, 0),
  }
}

export function encodeProfiles(profiles: Profile[]): Uint8Array {
  return encodeJson({ kind: 'profiles', version: CODEC_VERSION, profiles })
}

/** Any unreadable entry fails the whole collection so a later save cannot drop it. */
export function decodeProfiles(bytes: Uint8Array): DecodeResult<Profile[]> {
  const parsed = parseJsonRecord(bytes)
  if (!parsed.ok) return parsed
  const kindError = checkKind(parsed.value, 'profiles')
  if (kindError) return { ok: false, error: kindError }
  if (!Array.isArray(parsed.value.profiles)) {
    return malformed('profiles is not an array')
  }

  const profiles: Profile[] = []
  for (const [index, item] of parsed.value.profiles.entries()) {
    const profile = parseProfile(item)
    if (!profile) return malformed(`profile at index ${index} is invalid`)
    profiles.push(profile)
  }
  return { ok: true, value: profiles }
}
