export type StepId = 'autostart' | 'install-dir' | 'appindicator' | 'python-gi' | 'nordvpn'
export type StepStatus = 'success' | 'failed' | 'skipped'

export interface StepResult {
  id: StepId
  title: string
  status: StepStatus
  detail?: string | undefined
  exitCode?: number | undefined
}

export interface UninstallReport {
  steps: StepResult[]
  succeeded: number
  skipped: number
  failed: number
}

export interface PackageTarget {
  id: StepId
  name: string
  title: string
  question: string
  announce: string
  // Runs before removal once the user confirms, whatever its exit status.
  before?: { announce: string; argv: string[] } | undefined
}

export interface UninstallTargets {
  autostartFile: string
  installDir: string
  packages: PackageTarget[]
}

export interface UninstallerOptions {
  assumeYes: boolean
  keepPackages: boolean
  dryRun: boolean
}

export interface CommandResult {
  exitCode: number
  output: string
}

export interface CommandRunner {
  run: (argv: string[]) => Promise<CommandResult>
}

export interface ConfirmationProvider {
  ask: (question: string) => Promise<boolean>
  close?: () => void
}

export interface UninstallerContext {
  logFile: string
  targets: UninstallTargets
  options: UninstallerOptions
  logger: Logger
  runner: CommandRunner
  confirm: ConfirmationProvider
}

export interface Logger {
  log: (msg: string) => void
  info: (msg: string) => void
  ok: (msg: string) => void
  warn: (msg: string) => void
  err: (msg: string) => void
  // Flushes the log file; later lines go to stdout only.
  close: () => Promise<void>
}
