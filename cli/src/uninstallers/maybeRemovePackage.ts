import type { PackageTarget, StepResult, UninstallerContext } from './types.js'
import { formatCommand, privilegedArgv } from './utils.js'

export async function maybeRemovePackage(ctx: UninstallerContext, target: PackageTarget): Promise<StepResult> {
  const confirmed = await ctx.confirm.ask(target.question)
  if (!confirmed) {
    return { id: target.id, title: target.title, status: 'skipped', detail: 'declined' }
  }

  if (target.before) {
    ctx.logger.info(target.before.announce)
    const pre = await ctx.runner.run(target.before.argv)
    if (pre.exitCode !== 0) {
      ctx.logger.warn(`"${formatCommand(target.before.argv)}" exited with ${pre.exitCode}; continuing with removal`)
    }
  }

  ctx.logger.info(target.announce)
  const argv = privilegedArgv('apt-get', ['remove', '-y', target.name])
  const { exitCode } = await ctx.runner.run(argv)
  if (exitCode === 0) {
    return { id: target.id, title: target.title, status: 'success', detail: target.name, exitCode }
  }
  ctx.logger.warn(`apt-get remove failed for ${target.name}; you can remove it manually with "sudo apt-get remove ${target.name}".`)
  return { id: target.id, title: target.title, status: 'failed', detail: `exit ${exitCode}`, exitCode }
}
