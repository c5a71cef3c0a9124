import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, mkdir, writeFile, rm, access, chmod, lstat, symlink } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { createFakeLogger, createTestContext } from './test-utils.js'
import { removeAutostartEntry } from '../src/uninstallers/removeAutostartEntry.js'
import { isRootUser } from '../src/uninstallers/utils.js'

describe('uninstallers/removeAutostartEntry', () => {
  let home: string
  let dir: string
  let file: string

  beforeEach(async () => {
    home = await mkdtemp(join(tmpdir(), 'nordvpn-indicator-autostart-'))
    dir = join(home, '.config', 'autostart')
    file = join(dir, 'ubuntu-nordvpn-indicator.desktop')
  })
  afterEach(async () => {
    await chmod(dir, 0o755).catch(() => undefined)
    await rm(home, { recursive: true, force: true })
  })

  it('deletes the desktop entry', async () => {
    await mkdir(dir, { recursive: true })
    await writeFile(file, '[Desktop Entry]\n')
    const result = await removeAutostartEntry(createTestContext(home))
    expect(result).toEqual({ id: 'autostart', title: 'Autostart entry', status: 'success', detail: file })
    await expect(access(file)).rejects.toThrow()
  })

  it('skips quietly when the entry is already gone', async () => {
    const logger = createFakeLogger()
    const result = await removeAutostartEntry(createTestContext(home, { logger }))
    expect(result.status).toBe('skipped')
    expect(logger.info).toHaveBeenCalledWith(`No autostart entry at ${file}`)
    expect(logger.warn).not.toHaveBeenCalled()
  })

  it('removes an autostart symlink whose target is gone', async () => {
    await mkdir(dir, { recursive: true })
    await symlink(join(home, 'missing.desktop'), file)
    const result = await removeAutostartEntry(createTestContext(home))
    expect(result.status).toBe('success')
    await expect(lstat(file)).rejects.toThrow()
  })

  it.skipIf(isRootUser())('reports a failure when the entry cannot be removed', async () => {
    await mkdir(dir, { recursive: true })
    await writeFile(file, '[Desktop Entry]\n')
    await chmod(dir, 0o500)
    const logger = createFakeLogger()
    const result = await removeAutostartEntry(createTestContext(home, { logger }))
    expect(result.status).toBe('failed')
    expect(logger.warn).toHaveBeenCalledTimes(1)
  })
})
