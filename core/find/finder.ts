/**
 * FileFinder - fluent, lazy file discovery
 *
 * Configure roots and filters with chained setters, then consume the
 * finder as an `AsyncIterable<FileEntry>`. Nothing touches the filesystem
 * until iteration starts, and every iteration is a fresh walk over a
 * snapshot of the configuration taken when it starts.
 *
 * @example
 * ```typescript
 * const finder = FileFinder.create()
 *   .files()
 *   .name('*.ts, *.tsx')
 *   .notPath('fixtures')
 *   .exclude('node_modules')
 *   .in('./src')
 *
 * for await (const entry of finder) {
 *   console.log(entry.relativePath)
 * }
 *
 * const total = await finder.count()
 * ```
 *
 * @module find/finder
 */

import type { FsBackend } from '../backend.js'
import { nodeBackend } from '../node-backend.js'
import type { FinderConfig, FinderOptions } from '../config.js'
import { createFinderConfig, defaultFinderConfig } from '../config.js'
import { DOT_PATTERN, MODE_DESC, VCS_PATTERNS } from '../constants.js'
import { ConfigurationError, ENOTDIR } from '../errors.js'
import { splitPatterns } from '../glob/match.js'
import { resolvePath } from '../path.js'
import { getBasename, linkTargetIsDirectory, walk } from '../traversal.js'
import type { EntryFilter, FileEntry, FinderMode } from '../types.js'
import { buildPipeline, concat, customStage, modeStage, nameStage, pathStage } from './stages.js'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('[fskit:find]')

// =============================================================================
// Types
// =============================================================================

/**
 * Something that can be appended to a finder's output: a path, an entry,
 * or a (sync or async) sequence of them. Another FileFinder qualifies.
 */
export type AppendItem = string | FileEntry
export type AppendSource = AppendItem | Iterable<AppendItem> | AsyncIterable<AppendItem>

/**
 * Finder construction options.
 */
export interface FileFinderOptions {
  /** Backend for all filesystem access (default: the local disk) */
  backend?: FsBackend
  /** Base for relative roots and appended paths (default: process.cwd()) */
  cwd?: string
}

/**
 * Effective configuration, as reported by {@link FileFinder.getInfo}.
 */
export interface FinderInfo extends Omit<FinderConfig, 'mode'> {
  readonly mode: (typeof MODE_DESC)[FinderMode]
  /** Number of registered filter callbacks */
  readonly filters: number
  /** Number of appended sources */
  readonly iterators: number
}

/**
 * Immutable state of one iteration session.
 */
interface Snapshot {
  readonly config: FinderConfig
  readonly filters: readonly EntryFilter[]
  readonly iterators: readonly AppendSource[]
}

function isAsyncIterable(value: object): value is AsyncIterable<AppendItem> {
  return Symbol.asyncIterator in value
}

function isIterable(value: object): value is Iterable<AppendItem> {
  return Symbol.iterator in value
}

// =============================================================================
// FileFinder
// =============================================================================

/**
 * Fluent file finder.
 *
 * Defaults: every entry kind, VCS directories pruned, dot files hidden,
 * dot directories walked, recursive, symlinks not followed, unreadable
 * subdirectories skipped.
 */
export class FileFinder implements AsyncIterable<FileEntry> {
  private readonly backend: FsBackend
  private readonly cwd: string

  private mode: FinderMode = defaultFinderConfig.mode
  private roots: string[] = []
  private names: string[] = []
  private notNamesList: string[] = []
  private paths: string[] = []
  private notPathsList: string[] = []
  private excludes: string[] = []
  private ignoreVcsFlag = defaultFinderConfig.ignoreVcs
  private ignoreDotFilesFlag = defaultFinderConfig.ignoreDotFiles
  private ignoreDotDirsFlag = defaultFinderConfig.ignoreDotDirs
  private recursive = defaultFinderConfig.recursive
  private followSymlinks = defaultFinderConfig.followSymlinks
  private skipUnreadable = defaultFinderConfig.skipUnreadableDirs
  private filters: EntryFilter[] = []
  private iterators: AppendSource[] = []

  constructor(options: FileFinderOptions = {}) {
    this.backend = options.backend ?? nodeBackend
    this.cwd = options.cwd ?? process.cwd()
  }

  static create(options: FileFinderOptions = {}): FileFinder {
    return new FileFinder(options)
  }

  /**
   * Build a finder from a plain configuration object.
   *
   * @throws {EINVAL} If the configuration is invalid
   *
   * @example
   * ```typescript
   * const config = JSON.parse(await readFile('finder.json', 'utf8'))
   * const finder = FileFinder.fromConfig(config)
   * ```
   */
  static fromConfig(options: FinderOptions, finderOptions: FileFinderOptions = {}): FileFinder {
    const config = createFinderConfig(options)
    const finder = new FileFinder(finderOptions)
    finder.mode = config.mode
    finder.roots = [...config.roots]
    finder.names = [...config.names]
    finder.notNamesList = [...config.notNames]
    finder.paths = [...config.paths]
    finder.notPathsList = [...config.notPaths]
    finder.excludes = [...config.excludes]
    finder.ignoreVcsFlag = config.ignoreVcs
    finder.ignoreDotFilesFlag = config.ignoreDotFiles
    finder.ignoreDotDirsFlag = config.ignoreDotDirs
    finder.recursive = config.recursive
    finder.followSymlinks = config.followSymlinks
    finder.skipUnreadable = config.skipUnreadableDirs
    return finder
  }

  // ===========================================================================
  // Mode
  // ===========================================================================

  /** Yield files (and symlinks to files) only. */
  files(): this {
    this.mode = 'files'
    return this
  }

  onlyFiles(): this {
    return this.files()
  }

  /** Yield directories (and symlinks to directories) only. */
  dirs(): this {
    this.mode = 'dirs'
    return this
  }

  directories(): this {
    return this.dirs()
  }

  onlyDirs(): this {
    return this.dirs()
  }

  /** Yield files and directories. */
  allTypes(): this {
    this.mode = 'all'
    return this
  }

  // ===========================================================================
  // Patterns
  // ===========================================================================

  /**
   * Require the base name to match one of the patterns.
   *
   * @example
   * ```typescript
   * finder.name('*.ts')
   * finder.name('*.ts, *.tsx')  // comma separated
   * ```
   */
  name(patterns: string | readonly string[]): this {
    this.names.push(...splitPatterns(patterns))
    return this
  }

  addNames(patterns: string | readonly string[]): this {
    return this.name(patterns)
  }

  /** Reject entries whose base name matches. */
  notName(patterns: string | readonly string[]): this {
    this.notNamesList.push(...splitPatterns(patterns))
    return this
  }

  notNames(patterns: string | readonly string[]): this {
    return this.notName(patterns)
  }

  addNotNames(patterns: string | readonly string[]): this {
    return this.notName(patterns)
  }

  /**
   * Require the path relative to its root to match. Patterns containing
   * `*`, `?`, `[` or `.` are globs over the whole relative path; anything
   * else is a substring test.
   */
  path(patterns: string | readonly string[]): this {
    this.paths.push(...splitPatterns(patterns))
    return this
  }

  addPaths(patterns: string | readonly string[]): this {
    return this.path(patterns)
  }

  /** Reject entries whose relative path matches. */
  notPath(patterns: string | readonly string[]): this {
    this.notPathsList.push(...splitPatterns(patterns))
    return this
  }

  notPaths(patterns: string | readonly string[]): this {
    return this.notPath(patterns)
  }

  addNotPaths(patterns: string | readonly string[]): this {
    return this.notPath(patterns)
  }

  /** Do not descend into directories whose name matches. */
  exclude(dirNames: string | readonly string[]): this {
    this.excludes.push(...splitPatterns(dirNames))
    return this
  }

  // ===========================================================================
  // Flags
  // ===========================================================================

  ignoreVCS(ignore = true): this {
    this.ignoreVcsFlag = ignore
    return this
  }

  ignoreDotFiles(ignore = true): this {
    this.ignoreDotFilesFlag = ignore
    return this
  }

  ignoreDotDirs(ignore = true): this {
    this.ignoreDotDirsFlag = ignore
    return this
  }

  skipUnreadableDirs(skip = true): this {
    this.skipUnreadable = skip
    return this
  }

  ignoreUnreadableDirs(skip = true): this {
    return this.skipUnreadableDirs(skip)
  }

  followLinks(follow = true): this {
    this.followSymlinks = follow
    return this
  }

  notFollowLinks(): this {
    return this.followLinks(false)
  }

  isFollowLinks(): boolean {
    return this.followSymlinks
  }

  recursiveDir(recursive = true): this {
    this.recursive = recursive
    return this
  }

  notRecursive(): this {
    return this.recursiveDir(false)
  }

  /**
   * Add a predicate. Filters run in registration order after the mode and
   * name checks; all must pass.
   *
   * @example
   * ```typescript
   * finder.filter(async (entry) => (await stat(entry.path)).size > 0)
   * ```
   */
  filter(fn: EntryFilter): this {
    this.filters.push(fn)
    return this
  }

  // ===========================================================================
  // Sources
  // ===========================================================================

  /**
   * Add root directories, scanned in the order given. Relative paths are
   * resolved against the finder's cwd when iteration starts.
   */
  in(dirs: string | readonly string[]): this {
    if (typeof dirs === 'string') {
      this.roots.push(dirs)
    } else {
      this.roots.push(...dirs)
    }
    return this
  }

  inDir(dirs: string | readonly string[]): this {
    return this.in(dirs)
  }

  /**
   * Append extra entries after the root walks. Appended entries bypass the
   * filters. Paths are turned into entries with lstat when reached.
   *
   * @example
   * ```typescript
   * finder.in('src').append(['README.md', 'package.json'])
   * finder.append(FileFinder.create().files().in('docs'))
   * ```
   */
  append(source: AppendSource): this {
    this.iterators.push(source)
    return this
  }

  // ===========================================================================
  // Session
  // ===========================================================================

  /**
   * Freeze the current configuration with the implicit excludes applied.
   *
   * @throws {ConfigurationError} If neither roots nor appended sources exist
   */
  private snapshot(): Snapshot {
    if (this.roots.length === 0 && this.iterators.length === 0) {
      throw new ConfigurationError('FileFinder', 'call in() or append() before iterating')
    }

    const excludes = [...this.excludes]
    const notNames = [...this.notNamesList]
    if (this.ignoreVcsFlag) {
      excludes.push(...VCS_PATTERNS.filter((pattern) => !excludes.includes(pattern)))
    }
    if (this.ignoreDotDirsFlag) {
      excludes.push(DOT_PATTERN)
    }
    if (this.ignoreDotFilesFlag) {
      notNames.push(DOT_PATTERN)
    }

    const config = createFinderConfig({
      mode: this.mode,
      roots: this.roots.map((root) => resolvePath(root, this.cwd)),
      names: this.names,
      notNames,
      paths: this.paths,
      notPaths: this.notPathsList,
      excludes,
      ignoreVcs: this.ignoreVcsFlag,
      ignoreDotFiles: this.ignoreDotFilesFlag,
      ignoreDotDirs: this.ignoreDotDirsFlag,
      recursive: this.recursive,
      followSymlinks: this.followSymlinks,
      skipUnreadableDirs: this.skipUnreadable,
    })

    return Object.freeze({
      config,
      filters: Object.freeze([...this.filters]),
      iterators: Object.freeze([...this.iterators]),
    })
  }

  /**
   * Effective configuration, including the implicit VCS and dot patterns.
   *
   * @throws {ConfigurationError} If neither roots nor appended sources exist
   */
  getInfo(): FinderInfo {
    const { config, filters, iterators } = this.snapshot()
    return Object.freeze({
      ...config,
      mode: MODE_DESC[config.mode],
      filters: filters.length,
      iterators: iterators.length,
    })
  }

  /**
   * Start a new traversal. The configuration is captured now; later
   * setter calls do not affect the returned sequence.
   *
   * @throws {ConfigurationError} If neither roots nor appended sources exist
   */
  all(): AsyncGenerator<FileEntry, void, undefined> {
    return this.run(this.snapshot())
  }

  [Symbol.asyncIterator](): AsyncGenerator<FileEntry, void, undefined> {
    return this.all()
  }

  private async *run(snapshot: Snapshot): AsyncGenerator<FileEntry, void, undefined> {
    const { config, filters, iterators } = snapshot

    for (const root of config.roots) {
      const stats = await this.backend.stat(root)
      if (!stats.isDirectory()) {
        throw new ENOTDIR('scandir', root)
      }
    }
    logger.debug('scanning', config.roots, 'mode', MODE_DESC[config.mode])

    const pipeline = buildPipeline([
      modeStage(config.mode),
      nameStage(config.names, config.notNames),
      customStage(filters),
      pathStage(config.paths, config.notPaths),
    ])

    const walks = config.roots.map((root) =>
      pipeline(
        walk({
          backend: this.backend,
          root,
          recursive: config.recursive,
          followSymlinks: config.followSymlinks,
          skipUnreadableDirs: config.skipUnreadableDirs,
          excludes: config.excludes,
        })
      )
    )
    const appended = iterators.map((source) => this.appendedEntries(source))

    yield* concat(...walks, ...appended)
  }

  private async *appendedEntries(source: AppendSource): AsyncGenerator<FileEntry, void, undefined> {
    if (typeof source === 'string') {
      yield await this.toEntry(source)
    } else if (isAsyncIterable(source)) {
      for await (const item of source) {
        yield await this.toEntry(item)
      }
    } else if (isIterable(source)) {
      for (const item of source) {
        yield await this.toEntry(item)
      }
    } else {
      yield source
    }
  }

  private async toEntry(item: AppendItem): Promise<FileEntry> {
    if (typeof item !== 'string') {
      return item
    }
    const path = resolvePath(item, this.cwd)
    const stats = await this.backend.lstat(path)
    const isSymbolicLink = stats.isSymbolicLink()
    const isDirectory = isSymbolicLink
      ? await linkTargetIsDirectory(this.backend, path)
      : stats.isDirectory()
    const name = getBasename(path)
    return {
      path,
      name,
      relativePath: name,
      root: '',
      type: isSymbolicLink ? 'symlink' : isDirectory ? 'directory' : 'file',
      isDirectory,
      isSymbolicLink,
      depth: 0,
    }
  }

  // ===========================================================================
  // Consumers
  // ===========================================================================

  /** Number of entries a fresh traversal yields. */
  async count(): Promise<number> {
    let total = 0
    for await (const _entry of this.all()) {
      total++
    }
    return total
  }

  /**
   * Call `fn` for every entry, awaiting it before the next one. The first
   * error from `fn` or from the traversal stops the walk and rejects.
   */
  async each(fn: (entry: FileEntry) => void | Promise<void>): Promise<void> {
    for await (const entry of this.all()) {
      await fn(entry)
    }
  }

  forEach(fn: (entry: FileEntry) => void | Promise<void>): Promise<void> {
    return this.each(fn)
  }

  /** Collect a fresh traversal into an array. */
  async toArray(): Promise<FileEntry[]> {
    const entries: FileEntry[] = []
    for await (const entry of this.all()) {
      entries.push(entry)
    }
    return entries
  }
}
