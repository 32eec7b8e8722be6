/**
 * ModifyWatcher - detect content changes in directory trees between runs
 *
 * The watcher hashes every selected file under its watch directories,
 * folds the per-file digests into one fingerprint and stores it in a marker
 * file. The next run compares the new fingerprint with the stored one.
 *
 * There is no event loop and no file system notification here: a check is
 * a full walk, meant for "rebuild if anything changed" guards in scripts
 * and dev servers.
 *
 * @example
 * ```typescript
 * const watcher = new ModifyWatcher()
 *   .watch(['./src', './config'])
 *   .ext('ts, json')
 *   .exclude('node_modules')
 *
 * if (await watcher.isChanged()) {
 *   await rebuild()
 * }
 * ```
 *
 * @module watch/modify-watcher
 */

import type { FsBackend } from '../backend.js'
import { nodeBackend } from '../node-backend.js'
import type { WatcherOptions } from '../config.js'
import { createWatcherConfig, toNameRegExp } from '../config.js'
import { MARKER_SUFFIX } from '../constants.js'
import {
  ConfigurationError,
  ENOTDIR,
  FileWriteError,
  TraversalError,
  getErrorCode,
  isEnoent,
  isFSError,
} from '../errors.js'
import { splitPatterns } from '../glob/match.js'
import { joinPath, resolvePath } from '../path.js'
import { childPath, isDotEntry } from '../traversal.js'
import type { DirEntry, EntryStats, HashAlgorithm } from '../types.js'
import { digest, hashFile } from './hash.js'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('[fskit:watch]')

const decoder = new TextDecoder()

/**
 * Watcher options plus the I/O context.
 */
export interface ModifyWatcherOptions extends WatcherOptions {
  /** Backend for all filesystem access (default: the local disk) */
  backend?: FsBackend
  /** Base for relative watch directories (default: process.cwd()) */
  cwd?: string
}

function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&')
}

function compareNames(a: DirEntry, b: DirEntry): number {
  if (a.name === b.name) return 0
  return a.name < b.name ? -1 : 1
}

/**
 * Content fingerprint of one or more directory trees.
 *
 * Selection rules, applied per file:
 * 1. dot directories are skipped when `ignoreDotDirs` (default on)
 * 2. directories named in `excludes` are skipped (exact name)
 * 3. dot files are skipped when `ignoreDotFiles` (default on)
 * 4. files whose name matches a `notName` expression are skipped
 * 5. when `name` expressions exist, only matching files are hashed
 *
 * Symlinks are followed under the same rules. Each real directory is
 * hashed at most once per watched root, and dangling links are ignored.
 */
export class ModifyWatcher {
  private readonly backend: FsBackend
  private readonly cwd: string

  private watchDirs: string[]
  private markerFile: string | undefined
  private names: RegExp[]
  private notNames: RegExp[]
  private excludes: string[]
  private ignoreDotDirsFlag: boolean
  private ignoreDotFilesFlag: boolean
  private algorithm: HashAlgorithm
  private tempDir: string
  private sorted: boolean

  private fingerprint = ''
  private fileCount = 0

  /**
   * @throws {EINVAL} If an option is invalid
   */
  constructor(options: ModifyWatcherOptions = {}) {
    const config = createWatcherConfig(options)
    this.backend = options.backend ?? nodeBackend
    this.cwd = options.cwd ?? process.cwd()
    this.watchDirs = [...config.watchDirs]
    this.markerFile = config.markerFile
    this.names = [...config.names]
    this.notNames = [...config.notNames]
    this.excludes = [...config.excludes]
    this.ignoreDotDirsFlag = config.ignoreDotDirs
    this.ignoreDotFilesFlag = config.ignoreDotFiles
    this.algorithm = config.algorithm
    this.tempDir = config.tempDir
    this.sorted = config.sortEntries
  }

  // ===========================================================================
  // Configuration
  // ===========================================================================

  /** Add directories to watch. */
  watch(dirs: string | readonly string[]): this {
    if (typeof dirs === 'string') {
      this.watchDirs.push(dirs)
    } else {
      this.watchDirs.push(...dirs)
    }
    return this
  }

  watchDir(dirs: string | readonly string[]): this {
    return this.watch(dirs)
  }

  /** Use an explicit marker file instead of the derived one. */
  setMarkerFile(path: string): this {
    this.markerFile = path
    return this
  }

  /** Directory for derived marker files (default: the OS temp dir). */
  setTempDir(dir: string): this {
    this.tempDir = dir
    return this
  }

  /**
   * Only hash files whose name matches one of the expressions. Strings are
   * unanchored regular expressions.
   *
   * @example
   * ```typescript
   * watcher.name(/\.tsx?$/)
   * watcher.name(['^index\\.', 'config'])
   * ```
   */
  name(patterns: string | RegExp | ReadonlyArray<string | RegExp>): this {
    const list = typeof patterns === 'string' || patterns instanceof RegExp ? [patterns] : patterns
    this.names.push(...list.map(toNameRegExp))
    return this
  }

  /** Skip files whose name matches one of the expressions. */
  notName(patterns: string | RegExp | ReadonlyArray<string | RegExp>): this {
    const list = typeof patterns === 'string' || patterns instanceof RegExp ? [patterns] : patterns
    this.notNames.push(...list.map(toNameRegExp))
    return this
  }

  /**
   * Only hash files with one of the extensions.
   *
   * @example
   * ```typescript
   * watcher.ext('ts')          // /\.ts$/
   * watcher.ext('.ts, .json')   // /\.ts$/, /\.json$/
   * ```
   */
  ext(extensions: string | readonly string[]): this {
    for (const extension of splitPatterns(extensions)) {
      const bare = extension.startsWith('.') ? extension.slice(1) : extension
      this.names.push(new RegExp(`\\.${escapeRegex(bare)}$`))
    }
    return this
  }

  /** Skip directories with exactly these names. */
  exclude(dirNames: string | readonly string[]): this {
    if (typeof dirNames === 'string') {
      this.excludes.push(dirNames)
    } else {
      this.excludes.push(...dirNames)
    }
    return this
  }

  ignoreDotDirs(ignore = true): this {
    this.ignoreDotDirsFlag = ignore
    return this
  }

  ignoreDotFiles(ignore = true): this {
    this.ignoreDotFilesFlag = ignore
    return this
  }

  /** Digest algorithm for file hashes, the fingerprint and the marker name. */
  hashWith(algorithm: HashAlgorithm): this {
    this.algorithm = createWatcherConfig({ algorithm }).algorithm
    return this
  }

  /** Visit directory entries in name order instead of listing order. */
  sortEntries(sort = true): this {
    this.sorted = sort
    return this
  }

  // ===========================================================================
  // Checks
  // ===========================================================================

  /**
   * Recompute the fingerprint, persist it and report whether it differs
   * from the stored one. The first run (no stored fingerprint) is never a
   * change.
   *
   * @throws {ConfigurationError} If no directory is watched
   * @throws {ENOENT} If a watch directory does not exist
   * @throws {TraversalError} If a directory cannot be read
   * @throws {FileReadError} If a file cannot be read
   * @throws {FileWriteError} If the marker cannot be written
   */
  async isChanged(): Promise<boolean> {
    const previous = await this.readMarker()
    const current = await this.computeFingerprint()

    if (previous === undefined) {
      logger.debug('no previous fingerprint, baseline', current)
      return false
    }
    return previous !== current
  }

  isModified(): Promise<boolean> {
    return this.isChanged()
  }

  /**
   * Stored fingerprint, or undefined when the marker is missing, empty or
   * unreadable.
   */
  async readMarker(): Promise<string | undefined> {
    const file = this.getMarkerFile()
    let content: Uint8Array
    try {
      content = await this.backend.readFile(file)
    } catch (error) {
      logger.debug('no fingerprint marker', file, getErrorCode(error))
      return undefined
    }
    const stored = decoder.decode(content).trim()
    return stored === '' ? undefined : stored
  }

  /**
   * Hash the watched trees and overwrite the marker file.
   *
   * @returns The new fingerprint
   */
  async computeFingerprint(): Promise<string> {
    if (this.watchDirs.length === 0) {
      throw new ConfigurationError('ModifyWatcher', 'call watch() before computing a fingerprint')
    }

    const hashes: string[] = []
    for (const dir of this.watchDirs) {
      const root = resolvePath(dir, this.cwd)
      const stats = await this.backend.stat(root)
      if (!stats.isDirectory()) {
        throw new ENOTDIR('scandir', root)
      }
      const visited = new Set([await this.realDirectory(root)])
      await this.collect(root, hashes, visited)
    }

    this.fingerprint = digest(hashes.join(''), this.algorithm)
    this.fileCount = hashes.length
    logger.debug('fingerprint', this.fingerprint, 'files', this.fileCount)

    await this.writeMarker(this.fingerprint)
    return this.fingerprint
  }

  private async collect(dir: string, hashes: string[], visited: Set<string>): Promise<void> {
    let entries: DirEntry[]
    try {
      entries = await this.backend.readdir(dir)
    } catch (error) {
      throw new TraversalError(`Failed to read directory: ${dir}`, dir, getErrorCode(error), error)
    }
    if (this.sorted) {
      entries = [...entries].sort(compareNames)
    }

    for (const entry of entries) {
      const path = childPath(dir, entry.name)

      let isDirectory = entry.isDirectory()
      let isFile = entry.isFile()
      if (entry.isSymbolicLink()) {
        const target = await this.statLinkTarget(path)
        if (!target) continue
        isDirectory = target.isDirectory()
        isFile = target.isFile()
      }

      if (isDirectory) {
        if (this.ignoreDotDirsFlag && isDotEntry(entry.name)) continue
        if (this.excludes.includes(entry.name)) continue
        const real = await this.realDirectory(path)
        if (visited.has(real)) {
          logger.debug('directory already visited', path, '->', real)
          continue
        }
        visited.add(real)
        await this.collect(path, hashes, visited)
        continue
      }

      if (!isFile || !this.accepts(entry.name)) continue
      hashes.push(await hashFile(this.backend, path, this.algorithm))
    }
  }

  private accepts(name: string): boolean {
    if (this.ignoreDotFilesFlag && isDotEntry(name)) return false
    if (this.notNames.some((pattern) => pattern.test(name))) return false
    if (this.names.length > 0 && !this.names.some((pattern) => pattern.test(name))) return false
    return true
  }

  private async statLinkTarget(path: string): Promise<EntryStats | undefined> {
    try {
      return await this.backend.stat(path)
    } catch (error) {
      if (isEnoent(error) || (isFSError(error) && error.code === 'ELOOP')) {
        logger.debug('dangling symlink', path)
        return undefined
      }
      throw new TraversalError(`Failed to resolve symlink: ${path}`, path, getErrorCode(error), error)
    }
  }

  private async realDirectory(path: string): Promise<string> {
    try {
      return await this.backend.realpath(path)
    } catch (error) {
      throw new TraversalError(`Failed to resolve directory: ${path}`, path, getErrorCode(error), error)
    }
  }

  private async writeMarker(fingerprint: string): Promise<void> {
    const file = this.getMarkerFile()
    try {
      await this.backend.writeFile(file, fingerprint)
    } catch (error) {
      throw new FileWriteError(`Failed to write fingerprint marker: ${file}`, file, getErrorCode(error), error)
    }
  }

  // ===========================================================================
  // Accessors
  // ===========================================================================

  /**
   * Marker location: the explicit one, or
   * `<tempDir>/<digest of the JSON watch dir list>.id`.
   */
  getMarkerFile(): string {
    if (this.markerFile !== undefined) {
      return this.markerFile
    }
    return joinPath(this.tempDir, digest(JSON.stringify(this.watchDirs), this.algorithm) + MARKER_SUFFIX)
  }

  /** Fingerprint of the last computation ('' before the first). */
  getFingerprint(): string {
    return this.fingerprint
  }

  /** Number of files hashed by the last computation. */
  getFileCount(): number {
    return this.fileCount
  }

  getWatchDirs(): readonly string[] {
    return [...this.watchDirs]
  }
}
