import type { Logger, StepResult, UninstallReport, UninstallerContext } from './types.js'
import { removeAutostartEntry } from './removeAutostartEntry.js'
import { removeInstallDir } from './removeInstallDir.js'
import { maybeRemovePackage } from './maybeRemovePackage.js'
import { needCmd } from './utils.js'

const PROJECT = 'nordvpn-indicator'

export async function runUninstaller(ctx: UninstallerContext): Promise<UninstallReport> {
  const { logger } = ctx
  logger.info(`==> ${PROJECT} uninstaller`)
  logger.info(`Log: ${ctx.logFile}`)

  const steps: StepResult[] = []
  try {
    logger.info('Removing Ubuntu NordVPN Indicator')
    steps.push(await removeAutostartEntry(ctx))
    steps.push(await removeInstallDir(ctx))

    if (!ctx.options.dryRun && !(await needCmd('apt-get'))) {
      logger.warn('apt-get not found; confirmed package removals will fail')
    }
    for (const target of ctx.targets.packages) {
      steps.push(await maybeRemovePackage(ctx, target))
    }

    const report = summarize(steps)
    logReport(logger, report)
    return report
  } catch (error) {
    logger.err(`Uninstall stopped: ${error instanceof Error ? error.message : String(error)}`)
    throw error
  } finally {
    ctx.confirm.close?.()
    await logger.close()
  }
}

export function summarize(steps: StepResult[]): UninstallReport {
  const count = (status: StepResult['status']) => steps.filter((s) => s.status === status).length
  return {
    steps,
    succeeded: count('success'),
    skipped: count('skipped'),
    failed: count('failed')
  }
}

function logReport(logger: Logger, report: UninstallReport): void {
  for (const step of report.steps) {
    const suffix = step.detail ? ` (${step.detail})` : ''
    if (step.status === 'success') logger.ok(`${step.title}: removed${suffix}`)
    else if (step.status === 'skipped') logger.info(`${step.title}: skipped${suffix}`)
    else logger.err(`${step.title}: failed${suffix}`)
  }
  const summary = `${report.succeeded} removed, ${report.skipped} skipped, ${report.failed} failed`
  if (report.failed > 0) logger.warn(`Done with errors: ${summary}`)
  else logger.ok(`Done: ${summary}`)
}
