export type StatusLevel = 'safe' | 'moderate' | 'critical'

export type ColorMode = 'multiColor' | 'monochrome' | 'singleColor'

export type ExtraUsageFormat = 'percentage' | 'currency' | 'both'

export type WidgetMetric = 'session' | 'weekly' | 'opus' | 'sonnet' | 'extra'

export type WidgetFamily = 'small' | 'medium' | 'large'

export type ExtraUsage = {
  /** Minor currency units (cents). */
  amountUsed: number
  /** Minor currency units (cents). */
  amountLimit: number
  currencyCode: string
}

export type UsageSnapshot = {
  sessionPercentage: number
  /** Epoch ms; absent when the producer did not report one. */
  sessionResetAt?: number
  weeklyPercentage: number
  weeklyResetAt?: number
  /** Weekly percentage per model family, e.g. `opus`, `sonnet`. */
  perModelPercentage: Record<string, number>
  extraUsage?: ExtraUsage
  capturedAt: number
}

export type StatuslineVisibility = {
  showDirectory: boolean
  showBranch: boolean
  showUsage: boolean
  showProgressBar: boolean
  showResetTime: boolean
}

export type Settings = {
  /** Background poll interval in seconds. */
  refreshIntervalSeconds: number
  smallMetric: WidgetMetric
  mediumLeftMetric: WidgetMetric
  mediumRightMetric: WidgetMetric
  colorMode: ColorMode
  customColorHex: string
  extraUsageFormat: ExtraUsageFormat
  notificationsEnabled: boolean
  use24HourTime: boolean
  statusline: StatuslineVisibility
}

export type ProfileCredentials = {
  sessionToken?: string
  organizationId?: string
  apiToken?: string
  apiOrganizationId?: string
}

export type Profile = {
  id: string
  name: string
  credentials: ProfileCredentials
  createdAt: number
  lastUsedAt: number
}

export type QuotaSyncConfig = {
  /** Directory every cooperating process can reach. */
  sharedDir?: string
  /** Key-value register directory (one file per key). */
  registerDir?: string
  settingsCacheTtlMs: number
  /** Also write snapshots to the key-value tier. */
  mirrorSnapshotToKeyValue: boolean
  refresh: {
    smallMinutes: number
    mediumMinutes: number
    largeMinutes: number
  }
  poll: {
    intervalMs: number
  }
}
