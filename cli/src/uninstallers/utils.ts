import { which } from 'zx'
import { execa } from 'execa'
import { createInterface } from 'node:readline'
import type { CommandRunner, Logger } from './types.js'

// Shell convention for "command not found"; used when a command cannot be spawned at all.
export const COMMAND_NOT_FOUND = 127

export async function needCmd(cmd: string): Promise<boolean> {
  try {
    await which(cmd)
    return true
  } catch {
    return false
  }
}

export function isRootUser(): boolean {
  return typeof process.getuid === 'function' && process.getuid() === 0
}

// Root runs the binary directly (e.g. "apt-get"); everyone else goes through "sudo apt-get".
export function createPrivilegedCmd(cmd: string): { cmd: string; argsPrefix: string[] } {
  if (isRootUser()) return { cmd, argsPrefix: [] }
  return { cmd: 'sudo', argsPrefix: [cmd] }
}

export function privilegedArgv(cmd: string, args: string[]): string[] {
  const { cmd: bin, argsPrefix } = createPrivilegedCmd(cmd)
  return [bin, ...argsPrefix, ...args]
}

export function formatCommand(argv: string[]): string {
  return argv.map((a) => (a.includes(' ') ? `"${a}"` : a)).join(' ')
}

export function createCommandRunner(logger: Logger): CommandRunner {
  return {
    async run(argv) {
      const [cmd, ...args] = argv
      if (!cmd) throw new Error('Cannot run an empty command')
      // stdin stays attached so sudo can ask for a password.
      const subprocess = execa(cmd, args, { stdin: 'inherit', all: true, reject: false })
      const echoed = subprocess.all ? echoLines(subprocess.all, logger) : Promise.resolve()
      const result = await subprocess
      await echoed
      const exitCode = typeof result.exitCode === 'number' ? result.exitCode : COMMAND_NOT_FOUND
      const output = result.all ?? ''
      if (exitCode === COMMAND_NOT_FOUND && !output) {
        logger.warn(`${cmd}: command could not be started`)
      }
      return { exitCode, output }
    }
  }
}

// Long apt-get runs print progress as it happens instead of after exit.
async function echoLines(stream: NodeJS.ReadableStream, logger: Logger): Promise<void> {
  const rl = createInterface({ input: stream, crlfDelay: Infinity })
  try {
    for await (const line of rl) {
      if (line.trim()) logger.log(`  ${line}`)
    }
  } catch (error) {
    logger.warn(`Lost command output: ${error instanceof Error ? error.message : String(error)}`)
  }
}

export function createDryRunRunner(logger: Logger): CommandRunner {
  return {
    async run(argv) {
      logger.log(`[dry-run] ${formatCommand(argv)}`)
      return { exitCode: 0, output: '' }
    }
  }
}
