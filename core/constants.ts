/**
 * Shared constants for fskit
 *
 * @module constants
 */

/**
 * Directory names used by version control systems.
 *
 * Merged into a finder's excluded directory names when `ignoreVCS` is on.
 */
export const VCS_PATTERNS: readonly string[] = Object.freeze([
  '.svn',
  '_svn',
  'CVS',
  '_darcs',
  '.arch-params',
  '.monotone',
  '.bzr',
  '.git',
  '.hg',
])

/**
 * Pattern matching every dotfile / dot directory name.
 */
export const DOT_PATTERN = '.*'

/**
 * Patterns that match any candidate without compiling a glob.
 */
export const MATCH_ALL_PATTERNS: readonly string[] = Object.freeze(['*', '**/*'])

/**
 * Suffix of fingerprint marker files derived from the watched directories.
 */
export const MARKER_SUFFIX = '.id'

/**
 * Digest algorithms accepted for file and aggregate fingerprints.
 */
export const HASH_ALGORITHMS = ['md5', 'sha1', 'sha256'] as const

/**
 * Default digest algorithm for fingerprints.
 */
export const DEFAULT_HASH_ALGORITHM = 'md5'

/**
 * Maximum number of compiled glob patterns kept in the matcher cache.
 */
export const PATTERN_CACHE_SIZE = 1000

/**
 * Human readable names of finder modes, as reported by `getInfo()`.
 */
export const MODE_DESC = Object.freeze({
  all: 'ALL',
  files: 'FILE',
  dirs: 'DIR',
} as const)
