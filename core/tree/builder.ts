/**
 * FileTreeBuilder - declarative generation of files and directories
 *
 * Calls on the builder only record steps; `build()` runs them in order.
 * `dir()` and `into()` hand a child builder to a callback. The child starts
 * from a snapshot of the parent's settings with its workdir moved into the
 * directory, and records into the same plan.
 *
 * @example
 * ```typescript
 * const report = await new FileTreeBuilder({ workdir: '/srv/new-app' })
 *   .setTplDir('./templates')
 *   .setTplVars({ name: 'demo' })
 *   .file('README.md', '# demo')
 *   .dir('src', (src) => {
 *     src.tplFile('index.ts.tpl', 'index.ts')
 *     src.dirFiles('utils', 'a.ts', 'b.ts')
 *   })
 *   .build()
 * ```
 *
 * @module tree/builder
 */

import type { FsBackend } from '../backend.js'
import { nodeBackend } from '../node-backend.js'
import { EINVAL } from '../errors.js'
import { copyDir } from '../fs/dir.js'
import { copyFile, mkdirSave, readAll } from '../fs/file.js'
import { isExclude, isInclude } from '../glob/match.js'
import { isAbsPath, joinPath } from '../path.js'
import { renderTemplate, type TemplateVars } from './template.js'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('[fskit:tree]')

// =============================================================================
// Types
// =============================================================================

export interface FileTreeBuilderOptions {
  /** Base directory for relative paths (default: process.cwd()) */
  workdir?: string
  /** Base directory for relative template paths */
  tplDir?: string
  /** Variables shared by every template */
  tplVars?: TemplateVars
  /** Log steps instead of touching the filesystem */
  dryRun?: boolean
  /** Log every step through the tree logger */
  showMsg?: boolean
  backend?: FsBackend
}

export interface CopyDirPatterns {
  /** Only copy source files matching one of these patterns */
  include?: readonly string[]
  /** Skip source files matching one of these patterns (ignored with include) */
  exclude?: readonly string[]
  after?: (dest: string) => void | Promise<void>
}

/**
 * Paths touched (or, in dry-run mode, planned) by a build.
 */
export interface BuildReport {
  readonly dirs: string[]
  readonly files: string[]
  /** Files written by copyDir steps */
  readonly copied: number
}

/**
 * One recorded builder step.
 */
export type TreeStep =
  | { kind: 'dir'; path: string }
  | { kind: 'file'; path: string; contents: string }
  | { kind: 'copy'; src: string; dest: string; after?: (dest: string) => void | Promise<void> }
  | { kind: 'copyDir'; src: string; dest: string; patterns: CopyDirPatterns }
  | { kind: 'template'; src: string; dest: string; vars: TemplateVars }

interface BuilderSettings {
  readonly workdir: string
  readonly tplDir: string
  readonly tplVars: TemplateVars
  readonly dryRun: boolean
  readonly showMsg: boolean
}

function isTemplateList(value: Readonly<Record<string, string>> | readonly string[]): value is readonly string[] {
  return Array.isArray(value)
}

function requireName(value: string, what: string): string {
  if (value.trim() === '') {
    throw new EINVAL('FileTreeBuilder', `${what} must not be blank`)
  }
  return value
}

// =============================================================================
// FileTreeBuilder
// =============================================================================

export class FileTreeBuilder {
  private settings: BuilderSettings
  private readonly backend: FsBackend
  private readonly plan: TreeStep[]

  constructor(options: FileTreeBuilderOptions = {}, plan: TreeStep[] = []) {
    this.backend = options.backend ?? nodeBackend
    this.plan = plan
    this.settings = Object.freeze({
      workdir: options.workdir ?? process.cwd(),
      tplDir: options.tplDir ?? '',
      tplVars: { ...options.tplVars },
      dryRun: options.dryRun ?? false,
      showMsg: options.showMsg ?? false,
    })
  }

  // ===========================================================================
  // Settings
  // ===========================================================================

  workdir(dir: string): this {
    this.settings = Object.freeze({ ...this.settings, workdir: dir })
    return this
  }

  getWorkdir(): string {
    return this.settings.workdir
  }

  setTplDir(dir: string): this {
    this.settings = Object.freeze({ ...this.settings, tplDir: dir })
    return this
  }

  setTplVars(vars: TemplateVars): this {
    this.settings = Object.freeze({ ...this.settings, tplVars: { ...vars } })
    return this
  }

  setDryRun(dryRun = true): this {
    this.settings = Object.freeze({ ...this.settings, dryRun })
    return this
  }

  setShowMsg(showMsg = true): this {
    this.settings = Object.freeze({ ...this.settings, showMsg })
    return this
  }

  /**
   * Absolute paths are kept; relative ones are joined to the workdir.
   */
  getRealpath(path: string): string {
    if (path && !isAbsPath(path)) {
      return joinPath(this.settings.workdir, path)
    }
    return path
  }

  /** Planned steps, in execution order. */
  getPlan(): readonly TreeStep[] {
    return [...this.plan]
  }

  // ===========================================================================
  // Planning
  // ===========================================================================

  /** Create a file (parents included). */
  file(name: string, contents = ''): this {
    this.plan.push({ kind: 'file', path: this.getRealpath(requireName(name, 'file name')), contents })
    return this
  }

  /** Create several files with the same contents. */
  files(names: readonly string[], contents = ''): this {
    for (const name of names) {
      this.file(name, contents)
    }
    return this
  }

  /**
   * Create a directory. With a callback, the callback gets a child builder
   * rooted in the new directory.
   */
  dir(dir: string, intoFn?: (builder: FileTreeBuilder) => void): this {
    const path = this.getRealpath(requireName(dir, 'directory'))
    this.plan.push({ kind: 'dir', path })
    if (intoFn) {
      intoFn(this.child(path))
    }
    return this
  }

  dirs(...dirs: string[]): this {
    for (const dir of dirs) {
      this.dir(dir)
    }
    return this
  }

  /** Work inside an existing directory without creating it. */
  into(dir: string, intoFn: (builder: FileTreeBuilder) => void): this {
    intoFn(this.child(this.getRealpath(requireName(dir, 'directory'))))
    return this
  }

  /** Create a directory holding empty files. */
  dirFiles(name: string, ...files: string[]): this {
    return this.dir(name, (builder) => {
      builder.files(files)
    })
  }

  copy(src: string, dest: string, after?: (dest: string) => void | Promise<void>): this {
    this.plan.push({ kind: 'copy', src, dest: this.getRealpath(dest), after })
    return this
  }

  copyDir(src: string, dest: string, patterns: CopyDirPatterns = {}): this {
    this.plan.push({ kind: 'copyDir', src, dest: this.getRealpath(dest), patterns })
    return this
  }

  /**
   * Render a template into a file. Relative template paths are resolved
   * against the template directory; the destination defaults to the
   * template path.
   */
  tplFile(tplFile: string, dest = '', vars: TemplateVars = {}): this {
    requireName(tplFile, 'template file')
    const src = isAbsPath(tplFile) ? tplFile : joinPath(this.settings.tplDir, tplFile)
    this.plan.push({
      kind: 'template',
      src,
      dest: this.getRealpath(dest || tplFile),
      vars: { ...this.settings.tplVars, ...vars },
    })
    return this
  }

  /**
   * Render several templates. Keys are template paths, values destinations;
   * an array renders each template to the same relative path.
   */
  tplFiles(templates: Readonly<Record<string, string>> | readonly string[], vars: TemplateVars = {}): this {
    const pairs: Array<[string, string]> = isTemplateList(templates)
      ? templates.map((tpl): [string, string] => [tpl, tpl])
      : Object.entries(templates)
    for (const [tpl, dest] of pairs) {
      this.tplFile(tpl, dest, vars)
    }
    return this
  }

  private child(workdir: string): FileTreeBuilder {
    return new FileTreeBuilder(
      { ...this.settings, workdir, backend: this.backend },
      this.plan
    )
  }

  // ===========================================================================
  // Build
  // ===========================================================================

  private message(text: string): void {
    if (this.settings.showMsg) {
      logger.info(this.settings.dryRun ? `[DRY-RUN] ${text}` : text)
    }
  }

  /**
   * Run every planned step in order. In dry-run mode nothing is written and
   * the report lists what would have been.
   */
  async build(): Promise<BuildReport> {
    const dirs: string[] = []
    const files: string[] = []
    let copied = 0
    const { dryRun } = this.settings
    const backend = this.backend

    for (const step of this.plan) {
      switch (step.kind) {
        case 'dir':
          this.message(`make dir: ${step.path}`)
          if (!dryRun) await backend.mkdir(step.path, { recursive: true })
          dirs.push(step.path)
          break

        case 'file':
          this.message(`create file: ${step.path}`)
          if (!dryRun) await mkdirSave(step.path, step.contents, backend)
          files.push(step.path)
          break

        case 'copy':
          this.message(`copy file ${step.src} to ${step.dest}`)
          if (!dryRun) {
            await copyFile(step.src, step.dest, backend)
            if (step.after) await step.after(step.dest)
          }
          files.push(step.dest)
          break

        case 'copyDir': {
          this.message(`copy dir ${step.src} to ${step.dest}`)
          if (dryRun) {
            dirs.push(step.dest)
            break
          }
          const { include = [], exclude = [], after } = step.patterns
          copied += await copyDir(
            step.src,
            step.dest,
            {
              filter: (src) => (include.length > 0 ? isInclude(src, include) : !isExclude(src, exclude)),
              after,
            },
            backend
          )
          dirs.push(step.dest)
          break
        }

        case 'template': {
          this.message(`render file: ${step.src}`)
          if (!dryRun) {
            const content = renderTemplate(await readAll(step.src, backend), step.vars)
            await mkdirSave(step.dest, content, backend)
          }
          files.push(step.dest)
          break
        }
      }
    }

    return { dirs, files, copied }
  }
}
