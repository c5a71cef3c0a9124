import os from 'os'
import type { ConfirmationProvider, Logger, UninstallerContext, UninstallerOptions } from '../uninstallers/types.js'
import { createLogFilePath, createLogger } from '../uninstallers/logger.js'
import { resolveTargets } from '../uninstallers/targets.js'
import { createCommandRunner, createDryRunRunner } from '../uninstallers/utils.js'
import { createClackConfirm, createFixedConfirm, createKeystrokeConfirm } from '../uninstallers/confirm.js'

export interface ContextIO {
  stdin: NodeJS.ReadableStream & { isTTY?: boolean }
  stdout: NodeJS.WritableStream
}

export function createBaseOptions(): UninstallerOptions {
  return {
    assumeYes: false,
    keepPackages: false,
    dryRun: false
  }
}

export function selectConfirm(options: UninstallerOptions, logger: Logger, io: ContextIO): ConfirmationProvider {
  if (options.assumeYes) return createFixedConfirm(true, logger, '--yes')
  if (options.keepPackages) return createFixedConfirm(false, logger, '--keep-packages')
  if (io.stdin.isTTY) return createClackConfirm()
  return createKeystrokeConfirm(io.stdin, io.stdout)
}

export async function createUninstallContext(
  options: Partial<UninstallerOptions> = {},
  io: ContextIO = { stdin: process.stdin, stdout: process.stdout }
): Promise<UninstallerContext> {
  const logFile = createLogFilePath()
  const logger = createLogger(logFile)
  const merged: UninstallerOptions = { ...createBaseOptions(), ...options }
  return {
    logFile,
    targets: resolveTargets(os.homedir()),
    options: merged,
    logger,
    runner: merged.dryRun ? createDryRunRunner(logger) : createCommandRunner(logger),
    confirm: selectConfirm(merged, logger, io)
  }
}
