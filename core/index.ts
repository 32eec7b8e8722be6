/**
 * fskit core - filesystem utilities
 *
 * File discovery, directory fingerprinting, file tree generation and the
 * path and file helpers they are built on. All I/O goes through an
 * {@link FsBackend}; the local disk is the default.
 *
 * @example
 * ```typescript
 * import { FileFinder, MemoryBackend } from 'fskit'
 *
 * const backend = new MemoryBackend()
 * await backend.seed({ '/proj/a.ts': 'export {}' })
 *
 * const names = (await FileFinder.create({ backend }).files().in('/proj').toArray())
 *   .map((entry) => entry.name)
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// Types & constants
// =============================================================================

export type {
  DirEntry,
  EntryFilter,
  EntryStats,
  EntryType,
  FileEntry,
  FinderMode,
  HashAlgorithm,
} from './types.js'

export {
  VCS_PATTERNS,
  DOT_PATTERN,
  MATCH_ALL_PATTERNS,
  MARKER_SUFFIX,
  HASH_ALGORITHMS,
  DEFAULT_HASH_ALGORITHM,
  MODE_DESC,
} from './constants.js'

// =============================================================================
// Errors
// =============================================================================

export {
  FSError,
  ENOENT,
  EEXIST,
  EISDIR,
  ENOTDIR,
  EACCES,
  EPERM,
  ENOTEMPTY,
  EINVAL,
  ELOOP,
  EBUSY,
  EMFILE,
  ConfigurationError,
  IOError,
  TraversalError,
  FileReadError,
  FileWriteError,
  isFSError,
  isEnoent,
  isEexist,
  isEnotdir,
  isEacces,
  isIOError,
  isConfigurationError,
  isErrorCode,
  getErrorCode,
  createError,
  toFSError,
  ALL_ERROR_CODES,
  type ErrorCode,
} from './errors.js'

// =============================================================================
// Configuration
// =============================================================================

export {
  createFinderConfig,
  createWatcherConfig,
  defaultFinderConfig,
  defaultWatcherConfig,
  toNameRegExp,
  type FinderConfig,
  type FinderOptions,
  type WatcherConfig,
  type WatcherOptions,
} from './config.js'

// =============================================================================
// Backends
// =============================================================================

export { MemoryBackend, type FsBackend, type DirOptions } from './backend.js'
export { NodeBackend, nodeBackend } from './node-backend.js'

// =============================================================================
// Paths & patterns
// =============================================================================

export {
  isAbsPath,
  isRelative,
  pathFormat,
  joinPath,
  expandPath,
  resolvePath,
  relativeTo,
  baseName,
  extName,
  suffix,
  dirName,
  toSlashes,
} from './path.js'

export * from './glob/index.js'

export { walk, type WalkOptions } from './traversal.js'

// =============================================================================
// Components
// =============================================================================

export * from './find/index.js'
export * from './watch/index.js'
export * from './fs/index.js'
export * from './tree/index.js'
