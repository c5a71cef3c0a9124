import fs from 'fs-extra'
import type { StepResult, UninstallerContext } from './types.js'

const TITLE = 'Autostart entry'

// lstat, not pathExists: a dangling symlink still has to go.
async function entryExists(file: string): Promise<boolean> {
  try {
    await fs.lstat(file)
    return true
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return false
    throw error
  }
}

export async function removeAutostartEntry(ctx: UninstallerContext): Promise<StepResult> {
  const file = ctx.targets.autostartFile
  try {
    if (!(await entryExists(file))) {
      ctx.logger.info(`No autostart entry at ${file}`)
      return { id: 'autostart', title: TITLE, status: 'skipped', detail: 'not present' }
    }

    if (ctx.options.dryRun) {
      ctx.logger.log(`[dry-run] rm ${file}`)
      return { id: 'autostart', title: TITLE, status: 'success', detail: 'dry-run' }
    }

    await fs.remove(file)
    return { id: 'autostart', title: TITLE, status: 'success', detail: file }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    ctx.logger.warn(`Could not remove ${file}: ${message}`)
    return { id: 'autostart', title: TITLE, status: 'failed', detail: message }
  }
}
