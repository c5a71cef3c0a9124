import * as path from 'path'
import type { PackageTarget, UninstallTargets } from './types.js'

export const APP_ID = 'ubuntu-nordvpn-indicator'
export const INSTALL_DIR = `/opt/${APP_ID}`

export const PACKAGE_TARGETS: readonly PackageTarget[] = [
  {
    id: 'appindicator',
    name: 'gir1.2-appindicator',
    title: 'AppIndicator',
    question: 'Do you want to uninstall AppIndicator?',
    announce: 'Uninstalling AppIndicator'
  },
  {
    id: 'python-gi',
    name: 'python3-gi',
    title: 'Python-GI',
    question: 'Do you want to uninstall Python-GI?',
    announce: 'Uninstalling Python3-GI'
  },
  {
    id: 'nordvpn',
    name: 'nordvpn',
    title: 'NordVPN',
    question: 'Do you want to uninstall NordVPN?',
    announce: 'Uninstalling NordVPN',
    before: { announce: 'Disconnecting NordVPN', argv: ['nordvpn', 'disconnect'] }
  }
]

// A relative XDG_CONFIG_HOME is ignored.
export function resolveConfigHome(homeDir: string, env: NodeJS.ProcessEnv = process.env): string {
  const xdg = env.XDG_CONFIG_HOME
  if (xdg && path.isAbsolute(xdg)) return xdg
  return path.join(homeDir, '.config')
}

export function resolveTargets(homeDir: string, env: NodeJS.ProcessEnv = process.env): UninstallTargets {
  return {
    autostartFile: path.join(resolveConfigHome(homeDir, env), 'autostart', `${APP_ID}.desktop`),
    installDir: INSTALL_DIR,
    packages: PACKAGE_TARGETS.map((target) => ({ ...target }))
  }
}
