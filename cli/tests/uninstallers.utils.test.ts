import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { Readable } from 'node:stream'
import { createFakeLogger } from './test-utils.js'

vi.mock('execa', () => ({ execa: vi.fn() }))
vi.mock('zx', () => ({ which: vi.fn() }))

import { execa } from 'execa'
import { which } from 'zx'
import {
  COMMAND_NOT_FOUND,
  createCommandRunner,
  createDryRunRunner,
  createPrivilegedCmd,
  formatCommand,
  needCmd,
  privilegedArgv
} from '../src/uninstallers/utils.js'

// A subprocess stand-in: awaitable for the result, with an "all" stream that
// replays the given chunks. Only the fields the runner reads are present.
function fakeSubprocess(fields: { exitCode?: number; all?: string }, chunks: string[] = []) {
  const subprocess = Object.assign(Promise.resolve(fields), { all: Readable.from(chunks) })
  return subprocess as unknown as ReturnType<typeof execa>
}

describe('uninstallers/utils', () => {
  beforeEach(() => {
    vi.mocked(execa).mockReset()
    vi.mocked(which).mockReset()
  })
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('prefixes privileged commands with sudo for regular users', () => {
    vi.spyOn(process, 'getuid').mockReturnValue(1000)
    expect(createPrivilegedCmd('apt-get')).toEqual({ cmd: 'sudo', argsPrefix: ['apt-get'] })
    expect(privilegedArgv('rm', ['-rf', '/opt/x'])).toEqual(['sudo', 'rm', '-rf', '/opt/x'])
  })

  it('runs privileged commands directly as root', () => {
    vi.spyOn(process, 'getuid').mockReturnValue(0)
    expect(createPrivilegedCmd('apt-get')).toEqual({ cmd: 'apt-get', argsPrefix: [] })
    expect(privilegedArgv('apt-get', ['remove', '-y', 'nordvpn'])).toEqual(['apt-get', 'remove', '-y', 'nordvpn'])
  })

  it('quotes arguments containing spaces', () => {
    expect(formatCommand(['rm', '-rf', '/opt/my app'])).toBe('rm -rf "/opt/my app"')
  })

  it('needCmd reports whether which resolves', async () => {
    vi.mocked(which).mockResolvedValueOnce('/usr/bin/apt-get')
    await expect(needCmd('apt-get')).resolves.toBe(true)
    vi.mocked(which).mockRejectedValueOnce(new Error('not found: nordvpn'))
    await expect(needCmd('nordvpn')).resolves.toBe(false)
  })

  it('returns exit code and output without throwing on failure', async () => {
    const all = 'E: Unable to locate package nordvpn\n'
    vi.mocked(execa).mockReturnValueOnce(fakeSubprocess({ exitCode: 100, all }, [all]))
    const logger = createFakeLogger()
    const result = await createCommandRunner(logger).run(['sudo', 'apt-get', 'remove', '-y', 'nordvpn'])

    expect(result).toEqual({ exitCode: 100, output: 'E: Unable to locate package nordvpn\n' })
    expect(execa).toHaveBeenCalledWith('sudo', ['apt-get', 'remove', '-y', 'nordvpn'], { stdin: 'inherit', all: true, reject: false })
    expect(logger.log).toHaveBeenCalledWith('  E: Unable to locate package nordvpn')
    expect(logger.log).toHaveBeenCalledTimes(1)
  })

  it('maps a command that cannot be spawned to 127', async () => {
    vi.mocked(execa).mockReturnValueOnce(fakeSubprocess({}))
    const logger = createFakeLogger()
    const result = await createCommandRunner(logger).run(['nordvpn', 'disconnect'])

    expect(result).toEqual({ exitCode: COMMAND_NOT_FOUND, output: '' })
    expect(logger.warn).toHaveBeenCalledWith('nordvpn: command could not be started')
  })

  it('echoes output lines as the command produces them', async () => {
    const all = 'Reading package lists...\n\nRemoving python3-gi (3.42.1-0ubuntu1) ...\n'
    vi.mocked(execa).mockReturnValueOnce(
      fakeSubprocess({ exitCode: 0, all }, ['Reading package lists...\n\nRemov', 'ing python3-gi (3.42.1-0ubuntu1) ...\n'])
    )
    const logger = createFakeLogger()
    const result = await createCommandRunner(logger).run(['apt-get', 'remove', '-y', 'python3-gi'])

    expect(result.exitCode).toBe(0)
    expect(logger.log.mock.calls).toEqual([
      ['  Reading package lists...'],
      ['  Removing python3-gi (3.42.1-0ubuntu1) ...']
    ])
  })

  it('rejects an empty argv', async () => {
    await expect(createCommandRunner(createFakeLogger()).run([])).rejects.toThrow('Cannot run an empty command')
    expect(execa).not.toHaveBeenCalled()
  })

  it('dry-run runner logs instead of executing', async () => {
    const logger = createFakeLogger()
    const result = await createDryRunRunner(logger).run(['sudo', 'rm', '-rf', '/opt/ubuntu-nordvpn-indicator'])

    expect(result).toEqual({ exitCode: 0, output: '' })
    expect(logger.log).toHaveBeenCalledWith('[dry-run] sudo rm -rf /opt/ubuntu-nordvpn-indicator')
    expect(execa).not.toHaveBeenCalled()
  })
})
