/**
 * Directory traversal for fskit
 *
 * A lazy, depth-first walk over one root directory. Entries are yielded
 * self-first: a directory is produced before anything beneath it. Listings
 * are read whole, so no directory handle stays open while the consumer
 * works on an entry.
 *
 * The walk itself only prunes (excluded directory names, symlinks that are
 * not followed, cycles). Everything else, such as mode, name and path
 * patterns, is applied downstream by the finder's filter stages.
 *
 * @module traversal
 */

import type { FsBackend } from './backend.js'
import type { DirEntry, FileEntry } from './types.js'
import { TraversalError, getErrorCode, isEnoent, isFSError } from './errors.js'
import { isExclude } from './glob/match.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('[fskit:find]')

// =============================================================================
// Types
// =============================================================================

/**
 * Options for {@link walk}.
 */
export interface WalkOptions {
  /** Backend used for every filesystem call */
  backend: FsBackend

  /** Absolute path of the directory to walk */
  root: string

  /**
   * Descend into subdirectories.
   * @default true
   */
  recursive?: boolean

  /**
   * Descend into symbolic links that point at directories. Each real
   * directory is walked at most once, which cuts symlink cycles.
   * @default false
   */
  followSymlinks?: boolean

  /**
   * Treat an unreadable subdirectory as empty, and a symlink whose target
   * cannot be resolved as a leaf, instead of throwing {@link TraversalError}.
   * Never applies to the root.
   * @default true
   */
  skipUnreadableDirs?: boolean

  /**
   * Directory name patterns whose subtrees are not descended. The directory
   * entry itself is still yielded.
   *
   * @example
   * ```typescript
   * excludes: ['node_modules', '.git', '*.cache']
   * ```
   */
  excludes?: readonly string[]
}

// =============================================================================
// Path helpers
// =============================================================================

/**
 * Collapse duplicate slashes and strip a trailing slash (except for root).
 *
 * @example
 * ```typescript
 * normalizePath('/foo//bar/') // '/foo/bar'
 * normalizePath('') // '/'
 * ```
 */
export function normalizePath(path: string): string {
  if (path === '' || path === '/') return '/'
  let p = path.replace(/\/+/g, '/')
  if (p.endsWith('/') && p !== '/') {
    p = p.slice(0, -1)
  }
  return p
}

/**
 * Append one name to a directory path.
 *
 * @example
 * ```typescript
 * childPath('/', 'foo') // '/foo'
 * childPath('/bar', 'baz') // '/bar/baz'
 * ```
 */
export function childPath(dir: string, name: string): string {
  if (dir === '/') return '/' + name
  return dir + '/' + name
}

/**
 * Final component of a path.
 */
export function getBasename(path: string): string {
  if (path === '/') return ''
  const lastSlash = path.lastIndexOf('/')
  return lastSlash >= 0 ? path.slice(lastSlash + 1) : path
}

/**
 * Check if a name is a dotfile/dotdir (starts with .)
 */
export function isDotEntry(name: string): boolean {
  return name.startsWith('.')
}

// =============================================================================
// Walk
// =============================================================================

/**
 * Whether a symlink points at a directory. Dangling links and link loops
 * are leaves.
 */
export async function linkTargetIsDirectory(backend: FsBackend, path: string): Promise<boolean> {
  try {
    return (await backend.stat(path)).isDirectory()
  } catch (error) {
    if (isEnoent(error) || (isFSError(error) && error.code === 'ELOOP')) {
      logger.debug('dangling symlink', path)
      return false
    }
    throw error
  }
}

/**
 * Walk a directory tree lazily.
 *
 * Breaking out of a `for await` loop over the generator stops the walk;
 * no further directory is read.
 *
 * @throws {FSError} when the root itself cannot be read
 * @throws {TraversalError} when a subdirectory or a symlink target cannot
 *   be read and `skipUnreadableDirs` is off
 *
 * @example
 * ```typescript
 * for await (const entry of walk({ backend, root: '/project', excludes: ['.git'] })) {
 *   console.log(entry.relativePath)
 * }
 * ```
 */
export async function* walk(options: WalkOptions): AsyncGenerator<FileEntry, void, undefined> {
  const {
    backend,
    recursive = true,
    followSymlinks = false,
    skipUnreadableDirs = true,
    excludes = [],
  } = options
  const root = normalizePath(options.root)
  const visited = new Set<string>()

  if (followSymlinks) {
    visited.add(await backend.realpath(root))
  }

  // An unreadable link target is a leaf under the skip policy
  async function targetIsDirectory(path: string): Promise<boolean> {
    try {
      return await linkTargetIsDirectory(backend, path)
    } catch (error) {
      if (skipUnreadableDirs) {
        logger.debug('skipping unreadable symlink target', path, getErrorCode(error))
        return false
      }
      throw new TraversalError(`Failed to resolve symlink: ${path}`, path, getErrorCode(error), error)
    }
  }

  async function realDirectory(path: string): Promise<string | undefined> {
    try {
      return await backend.realpath(path)
    } catch (error) {
      if (skipUnreadableDirs) {
        logger.debug('skipping unresolvable directory', path, getErrorCode(error))
        return undefined
      }
      throw new TraversalError(`Failed to resolve directory: ${path}`, path, getErrorCode(error), error)
    }
  }

  async function* walkDir(dir: string, depth: number, relativeDir: string): AsyncGenerator<FileEntry, void, undefined> {
    let dirents: DirEntry[]
    try {
      dirents = await backend.readdir(dir)
    } catch (error) {
      if (depth === 0) {
        throw error
      }
      if (skipUnreadableDirs) {
        logger.debug('skipping unreadable directory', dir, getErrorCode(error))
        return
      }
      throw new TraversalError(`Failed to read directory: ${dir}`, dir, getErrorCode(error), error)
    }

    for (const dirent of dirents) {
      const name = dirent.name
      const path = childPath(dir, name)
      const relativePath = relativeDir ? relativeDir + '/' + name : name
      const isSymbolicLink = dirent.isSymbolicLink()
      const isDirectory = isSymbolicLink ? await targetIsDirectory(path) : dirent.isDirectory()

      yield {
        path,
        name,
        relativePath,
        root,
        type: isSymbolicLink ? 'symlink' : isDirectory ? 'directory' : 'file',
        isDirectory,
        isSymbolicLink,
        depth,
      }

      if (!isDirectory || !recursive) continue
      if (isExclude(name, excludes)) continue
      if (isSymbolicLink && !followSymlinks) continue

      if (followSymlinks) {
        const real = await realDirectory(path)
        if (real === undefined) continue
        if (visited.has(real)) {
          logger.debug('directory already visited', path, '->', real)
          continue
        }
        visited.add(real)
      }

      yield* walkDir(path, depth + 1, relativePath)
    }
  }

  yield* walkDir(root, 0, '')
}
