/**
 * Core types for fskit
 *
 * The directory-entry and stats shapes are structural subsets of Node's
 * `fs.Dirent` and `fs.Stats`, so Node objects satisfy them directly and the
 * in-memory backend only has to implement what the library reads.
 *
 * @module types
 */

import type { HASH_ALGORITHMS } from './constants.js'

// =============================================================================
// Filesystem shapes
// =============================================================================

/**
 * Kind of a filesystem entry as seen by a walk.
 */
export type EntryType = 'file' | 'directory' | 'symlink'

/**
 * One name returned by a directory listing.
 */
export interface DirEntry {
  readonly name: string
  isFile(): boolean
  isDirectory(): boolean
  isSymbolicLink(): boolean
}

/**
 * File metadata used by the library.
 */
export interface EntryStats {
  readonly size: number
  readonly mtimeMs: number
  isFile(): boolean
  isDirectory(): boolean
  isSymbolicLink(): boolean
}

/**
 * Supported digest algorithm names.
 */
export type HashAlgorithm = (typeof HASH_ALGORITHMS)[number]

// =============================================================================
// Finder values
// =============================================================================

/**
 * An entry produced by the file finder.
 *
 * Entries are plain values: a consumer may keep them, but nothing in the
 * finder holds on to them after they are yielded.
 */
export interface FileEntry {
  /** Absolute path of the entry */
  readonly path: string
  /** Base name */
  readonly name: string
  /** Path relative to the root the entry was found under ('a/b.txt') */
  readonly relativePath: string
  /** Root directory the entry was found under ('' for appended entries) */
  readonly root: string
  /** Entry kind; symlinks keep the 'symlink' type whether followed or not */
  readonly type: EntryType
  /** True for directories and for symlinks that point at a directory */
  readonly isDirectory: boolean
  /** True when the entry itself is a symbolic link */
  readonly isSymbolicLink: boolean
  /** 0 for immediate children of a root */
  readonly depth: number
}

/**
 * Which entry kinds a finder yields.
 * - 'all': files and directories
 * - 'files': files only
 * - 'dirs': directories only
 */
export type FinderMode = 'all' | 'files' | 'dirs'

/**
 * User-supplied predicate; return false to drop the entry.
 */
export type EntryFilter = (entry: FileEntry) => boolean | Promise<boolean>
