import type { Logger } from './types.js'
import { createWriteStream } from 'fs'
import * as os from 'os'
import * as path from 'path'

const LOG_PREFIX = 'nordvpn-indicator-uninstall'

// The uninstall removes the app's own directories, so the log lives in the OS temp dir.
export function createLogFilePath(now: Date = new Date(), dir: string = os.tmpdir()): string {
  const timestamp = now.toISOString().replace(/[:.]/g, '-').slice(0, -5)
  return path.join(dir, `${LOG_PREFIX}-${timestamp}.log`)
}

/**
 * Prints to stdout and appends the same line, prefixed with an ISO timestamp,
 * to `logFile`. If the file cannot be opened the logger keeps printing.
 */
export function createLogger(logFile: string, clock: () => Date = () => new Date()): Logger {
  let logStream: ReturnType<typeof createWriteStream> | null = createWriteStream(logFile, { flags: 'a', mode: 0o600 })
  // Open failures arrive as an "error" event, not a throw.
  logStream.on('error', () => {
    logStream = null
  })

  const write = (prefix: string, msg: string) => {
    const line = prefix ? `${prefix} ${msg}` : msg
    process.stdout.write(`${line}\n`)
    logStream?.write(`[${clock().toISOString()}] ${line}\n`)
  }

  return {
    log: (msg: string) => write('', msg),
    info: (msg: string) => write('', msg),
    ok: (msg: string) => write('✔', msg),
    warn: (msg: string) => write('⚠', msg),
    err: (msg: string) => write('✖', msg),
    close: () =>
      new Promise<void>((resolve) => {
        const stream = logStream
        logStream = null
        if (!stream) return resolve()
        stream.end(() => resolve())
      })
  }
}
