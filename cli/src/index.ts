import { defineCommand } from 'citty'
import { uninstallCommand } from './commands/uninstall.js'

export const root = defineCommand({
  meta: {
    name: 'nordvpn-indicator',
    version: '1.0.0',
    description: 'Remove the Ubuntu NordVPN indicator and its supporting packages'
  },
  subCommands: {
    uninstall: uninstallCommand
  }
})
