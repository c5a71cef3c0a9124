import { defineCommand } from 'citty'
import * as p from '@clack/prompts'
import { createUninstallContext } from '../actions/context.js'
import { runUninstaller } from '../uninstallers/main.js'
import { UninstallCancelledError } from '../uninstallers/confirm.js'

export const uninstallCommand = defineCommand({
  meta: {
    name: 'uninstall',
    description: 'Remove the indicator, then optionally AppIndicator, Python-GI and NordVPN'
  },
  args: {
    yes: { type: 'boolean', description: 'Answer yes to every package prompt' },
    'keep-packages': { type: 'boolean', description: 'Answer no to every package prompt' },
    'dry-run': { type: 'boolean', description: 'Print actions without making changes' }
  },
  async run({ args }) {
    if (args.yes && args['keep-packages']) {
      throw new Error('--yes and --keep-packages cannot be combined')
    }
    const ctx = await createUninstallContext({
      assumeYes: Boolean(args.yes),
      keepPackages: Boolean(args['keep-packages']),
      dryRun: Boolean(args['dry-run'])
    })
    try {
      const report = await runUninstaller(ctx)
      if (report.failed > 0) process.exitCode = 1
      return report
    } catch (error) {
      if (error instanceof UninstallCancelledError) {
        p.cancel('Uninstall aborted')
        process.exitCode = 1
        return undefined
      }
      throw error
    }
  }
})
