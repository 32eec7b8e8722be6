/**
 * ModifyWatcher on the local disk
 *
 * @module test/utilities/watcher-integration
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { promises as fs } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { ModifyWatcher } from '../../core/watch/modify-watcher.js'
import { FileWriteError } from '../../core/errors.js'

describe('ModifyWatcher on disk', () => {
  let root: string
  let site: string
  let markers: string

  const watcher = (): ModifyWatcher => new ModifyWatcher().setTempDir(markers).watch(site)

  beforeEach(async () => {
    root = await fs.realpath(await fs.mkdtemp(join(tmpdir(), 'fskit-watch-')))
    site = join(root, 'site')
    markers = join(root, 'markers')
    await fs.mkdir(join(site, 'lib'), { recursive: true })
    await fs.mkdir(markers)
    await fs.writeFile(join(site, 'index.ts'), 'one')
    await fs.writeFile(join(site, 'lib', 'util.ts'), 'two')
    await fs.writeFile(join(site, 'x.tmp'), 'scratch')
  })

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true })
  })

  it('should store a baseline, then detect an edit once', async () => {
    expect(await watcher().isChanged()).toBe(false)
    expect(await fs.readFile(watcher().getMarkerFile(), 'utf8')).toMatch(/^[0-9a-f]{32}$/)

    await fs.writeFile(join(site, 'lib', 'util.ts'), 'three')
    expect(await watcher().isChanged()).toBe(true)
    expect(await watcher().isChanged()).toBe(false)
  })

  it('should ignore edits to excluded names', async () => {
    const excluding = (): ModifyWatcher => watcher().notName('\\.tmp$')

    expect(await excluding().isChanged()).toBe(false)
    await fs.writeFile(join(site, 'x.tmp'), 'changed')
    expect(await excluding().isChanged()).toBe(false)
  })

  it('should raise FileWriteError when the marker directory is missing', async () => {
    const marker = join(root, 'missing', 'site.id')
    const error = await watcher().setMarkerFile(marker).isChanged().catch((e: unknown) => e)

    expect(error).toBeInstanceOf(FileWriteError)
    expect(error).toMatchObject({ path: marker, code: 'ENOENT' })
  })
})
