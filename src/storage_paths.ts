import os from 'node:os'
import path from 'node:path'

/**
 * Directory every cooperating process reads snapshots from.
 *
 *   QUOTA_SYNC_SHARED_DIR overrides the full path; otherwise
 *   $XDG_DATA_HOME/quota-sync, falling back to ~/.local/share/quota-sync.
 */
export function resolveSharedDir() {
  const override = process.env.QUOTA_SYNC_SHARED_DIR?.trim()
  if (override) return path.resolve(override)

  const xdg = process.env.XDG_DATA_HOME?.trim()
  if (xdg) return path.join(path.resolve(xdg), 'quota-sync')

  return path.join(os.homedir(), '.local', 'share', 'quota-sync')
}

/** Same rules with QUOTA_SYNC_REGISTER_DIR, $XDG_CONFIG_HOME and ~/.config. */
export function resolveRegisterDir() {
  const override = process.env.QUOTA_SYNC_REGISTER_DIR?.trim()
  if (override) return path.resolve(override)

  const xdg = process.env.XDG_CONFIG_HOME?.trim()
  if (xdg) return path.join(path.resolve(xdg), 'quota-sync')

  return path.join(os.homedir(), '.config', 'quota-sync')
}

/** Directory of per-key value files inside the register directory. */
export function keyValueDir(registerDir: string) {
  return path.join(registerDir, 'register')
}

export function configFilePaths(cwd = process.cwd()) {
  return [
    path.join(cwd, 'quota-sync.config.json'),
    path.join(resolveRegisterDir(), 'config.json'),
  ]
}
