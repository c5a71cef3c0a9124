import type { StepResult, UninstallerContext } from './types.js'
import { formatCommand, privilegedArgv } from './utils.js'

const TITLE = 'Installation directory'

export async function removeInstallDir(ctx: UninstallerContext): Promise<StepResult> {
  const dir = ctx.targets.installDir
  const argv = privilegedArgv('rm', ['-rf', dir])
  const { exitCode } = await ctx.runner.run(argv)
  if (exitCode === 0) {
    return { id: 'install-dir', title: TITLE, status: 'success', detail: dir, exitCode }
  }
  // Not fatal: the package steps still run.
  ctx.logger.warn(`Could not remove ${dir} (exit ${exitCode}); remove it manually with "${formatCommand(argv)}".`)
  return { id: 'install-dir', title: TITLE, status: 'failed', detail: `exit ${exitCode}`, exitCode }
}
