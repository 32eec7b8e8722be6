/**
 * FileTreeBuilder and directory helpers on the local disk
 *
 * @module test/utilities/tree-integration
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { promises as fs } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { FileTreeBuilder } from '../../core/tree/builder.js'
import { copyDir, removeDir } from '../../core/fs/dir.js'

describe('file tree on disk', () => {
  let root: string

  beforeEach(async () => {
    root = await fs.realpath(await fs.mkdtemp(join(tmpdir(), 'fskit-tree-')))
    await fs.mkdir(join(root, 'templates'))
    await fs.writeFile(join(root, 'templates', 'main.ts.tpl'), "export const name = '{{ name }}'\n")
  })

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true })
  })

  it('should build a project skeleton', async () => {
    const app = join(root, 'app')
    const report = await new FileTreeBuilder({ workdir: app, tplDir: join(root, 'templates') })
      .setTplVars({ name: 'demo' })
      .file('README.md', '# demo\n')
      .dir('src', (src) => {
        src.tplFile('main.ts.tpl', 'main.ts')
      })
      .build()

    expect(report.files).toEqual([join(app, 'README.md'), join(app, 'src', 'main.ts')])
    expect(await fs.readFile(join(app, 'src', 'main.ts'), 'utf8')).toBe("export const name = 'demo'\n")
  })

  it('should copy and remove directory trees', async () => {
    const copy = join(root, 'copy')

    expect(await copyDir(join(root, 'templates'), copy)).toBe(1)
    expect(await fs.readdir(copy)).toEqual(['main.ts.tpl'])

    await removeDir(copy, { keepSelf: true })
    expect(await fs.readdir(copy)).toEqual([])
    await removeDir(copy)
    await expect(fs.stat(copy)).rejects.toMatchObject({ code: 'ENOENT' })
  })
})
