import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { MemoryBackend } from '../backend.js'
import { EINVAL } from '../errors.js'
import { FileTreeBuilder } from './builder.js'

describe('FileTreeBuilder', () => {
  let backend: MemoryBackend
  const text = async (path: string): Promise<string> => new TextDecoder().decode(await backend.readFile(path))

  beforeEach(async () => {
    backend = await new MemoryBackend().seed({
      '/tpl/readme.md.tpl': '# {{ name }} v{{ app.version }}',
      '/tpl/license.tpl': '(c) {{ name }}',
      '/assets/logo.txt': 'logo',
      '/skeleton/a.txt': 'a',
      '/skeleton/b.md': 'b',
      '/skeleton/sub/c.txt': 'c',
    })
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  const builder = (): FileTreeBuilder => new FileTreeBuilder({ workdir: '/app', backend })

  // ===========================================================================
  // Planning
  // ===========================================================================

  describe('planning', () => {
    it('should record steps without touching the filesystem', async () => {
      const tree = builder()
        .file('README.md', '# demo')
        .dir('src', (src) => {
          src.file('index.ts', 'export {}')
        })
        .dirFiles('utils', 'a.ts', 'b.ts')

      expect(tree.getPlan()).toEqual([
        { kind: 'file', path: '/app/README.md', contents: '# demo' },
        { kind: 'dir', path: '/app/src' },
        { kind: 'file', path: '/app/src/index.ts', contents: 'export {}' },
        { kind: 'dir', path: '/app/utils' },
        { kind: 'file', path: '/app/utils/a.ts', contents: '' },
        { kind: 'file', path: '/app/utils/b.ts', contents: '' },
      ])
      expect(await backend.exists('/app')).toBe(false)
    })

    it('should keep absolute paths and join relative ones to the workdir', () => {
      const tree = builder()
      expect(tree.getRealpath('/etc/app.conf')).toBe('/etc/app.conf')
      expect(tree.getRealpath('./config/app.conf')).toBe('/app/config/app.conf')
    })

    it('should give child builders their own workdir', () => {
      const tree = builder()
      let inner = ''
      tree.into('lib', (lib) => {
        inner = lib.getWorkdir()
      })

      expect(inner).toBe('/app/lib')
      expect(tree.getWorkdir()).toBe('/app')
      expect(tree.getPlan()).toEqual([])
    })

    it('should reject blank names', () => {
      expect(() => builder().file('  ')).toThrow(EINVAL)
      expect(() => builder().dir('')).toThrow('FileTreeBuilder')
    })
  })

  // ===========================================================================
  // Build
  // ===========================================================================

  describe('build', () => {
    it('should create directories and files in plan order', async () => {
      const report = await builder()
        .dirs('logs', 'cache')
        .dir('src', (src) => {
          src.files(['a.ts', 'b.ts'], '// empty')
        })
        .build()

      expect(report).toEqual({
        dirs: ['/app/logs', '/app/cache', '/app/src'],
        files: ['/app/src/a.ts', '/app/src/b.ts'],
        copied: 0,
      })
      expect((await backend.readdir('/app')).map((entry) => entry.name)).toEqual(['logs', 'cache', 'src'])
      expect(await text('/app/src/b.ts')).toBe('// empty')
    })

    it('should render templates with merged variables', async () => {
      await builder()
        .setTplDir('/tpl')
        .setTplVars({ name: 'demo', app: { version: 1 } })
        .tplFile('readme.md.tpl', 'README.md', { app: { version: 2 } })
        .tplFiles({ 'license.tpl': 'LICENSE' })
        .build()

      expect(await text('/app/README.md')).toBe('# demo v2')
      expect(await text('/app/LICENSE')).toBe('(c) demo')
    })

    it('should render template lists to the same relative path', async () => {
      const report = await builder().setTplDir('/tpl').setTplVars({ name: 'x' }).tplFiles(['license.tpl']).build()

      expect(report.files).toEqual(['/app/license.tpl'])
      expect(await text('/app/license.tpl')).toBe('(c) x')
    })

    it('should copy single files and call the after hook', async () => {
      const after = vi.fn()
      await builder().copy('/assets/logo.txt', 'public/logo.txt', after).build()

      expect(await text('/app/public/logo.txt')).toBe('logo')
      expect(after).toHaveBeenCalledWith('/app/public/logo.txt')
    })

    it('should copy directories filtered by include patterns', async () => {
      const report = await builder().copyDir('/skeleton', 'base', { include: ['*.txt'] }).build()

      expect(report.copied).toBe(2)
      expect(report.dirs).toEqual(['/app/base'])
      expect(await backend.exists('/app/base/sub/c.txt')).toBe(true)
      expect(await backend.exists('/app/base/b.md')).toBe(false)
    })

    it('should copy directories filtered by exclude patterns', async () => {
      const report = await builder().copyDir('/skeleton', 'base', { exclude: ['*.md'] }).build()

      expect(report.copied).toBe(2)
      expect(await backend.exists('/app/base/a.txt')).toBe(true)
      expect(await backend.exists('/app/base/b.md')).toBe(false)
    })

    it('should only report in dry-run mode', async () => {
      const report = await builder()
        .setDryRun()
        .dir('src')
        .file('src/main.ts')
        .copyDir('/skeleton', 'base')
        .build()

      expect(report).toEqual({ dirs: ['/app/src', '/app/base'], files: ['/app/src/main.ts'], copied: 0 })
      expect(await backend.exists('/app')).toBe(false)
    })

    it('should log steps when messages are on', async () => {
      const info = vi.spyOn(console, 'info').mockImplementation(() => undefined)
      await builder().setShowMsg().setDryRun().dir('src').build()

      expect(info).toHaveBeenCalledWith('[fskit:tree]', '[DRY-RUN] make dir: /app/src')
    })

    it('should log a planned directory copy', async () => {
      const info = vi.spyOn(console, 'info').mockImplementation(() => undefined)
      const report = await builder().setShowMsg().setDryRun().copyDir('/skeleton', 'base').build()

      expect(report.dirs).toEqual(['/app/base'])
      expect(info).toHaveBeenCalledWith('[fskit:tree]', '[DRY-RUN] copy dir /skeleton to /app/base')
    })

    it('should stay quiet by default', async () => {
      const info = vi.spyOn(console, 'info').mockImplementation(() => undefined)
      await builder().dir('src').build()

      expect(info).not.toHaveBeenCalled()
    })
  })
})
