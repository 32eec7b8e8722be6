/**
 * fskit Configuration Module
 *
 * Validated, frozen option objects for the file finder and the modify
 * watcher. Both factories accept plain objects (for example parsed from a
 * JSON file), apply defaults and normalize pattern lists. Any invalid value
 * throws EINVAL.
 *
 * @module core/config
 */

import { tmpdir } from 'node:os'
import { DEFAULT_HASH_ALGORITHM, HASH_ALGORITHMS } from './constants.js'
import { EINVAL } from './errors.js'
import { splitPatterns } from './glob/match.js'
import type { FinderMode, HashAlgorithm } from './types.js'

const FINDER_MODES: readonly FinderMode[] = ['all', 'files', 'dirs']

// =============================================================================
// Finder configuration
// =============================================================================

/**
 * Finder configuration (validated and frozen).
 */
export interface FinderConfig {
  readonly mode: FinderMode
  /** Root directories, scanned in this order */
  readonly roots: readonly string[]
  /** Base name patterns an entry must match (any) */
  readonly names: readonly string[]
  /** Base name patterns that reject an entry */
  readonly notNames: readonly string[]
  /** Relative path patterns an entry must match (any) */
  readonly paths: readonly string[]
  /** Relative path patterns that reject an entry */
  readonly notPaths: readonly string[]
  /** Directory name patterns whose subtrees are pruned */
  readonly excludes: readonly string[]
  readonly ignoreVcs: boolean
  readonly ignoreDotFiles: boolean
  readonly ignoreDotDirs: boolean
  readonly recursive: boolean
  readonly followSymlinks: boolean
  readonly skipUnreadableDirs: boolean
}

/**
 * Finder options (partial, for user input). Pattern lists accept a
 * comma-separated string or an array.
 */
export interface FinderOptions {
  mode?: FinderMode
  roots?: string | readonly string[]
  names?: string | readonly string[]
  notNames?: string | readonly string[]
  paths?: string | readonly string[]
  notPaths?: string | readonly string[]
  excludes?: string | readonly string[]
  ignoreVcs?: boolean
  ignoreDotFiles?: boolean
  ignoreDotDirs?: boolean
  recursive?: boolean
  followSymlinks?: boolean
  skipUnreadableDirs?: boolean
}

/**
 * Default finder configuration
 */
export const defaultFinderConfig: FinderConfig = Object.freeze<FinderConfig>({
  mode: 'all',
  roots: Object.freeze([]),
  names: Object.freeze([]),
  notNames: Object.freeze([]),
  paths: Object.freeze([]),
  notPaths: Object.freeze([]),
  excludes: Object.freeze([]),
  ignoreVcs: true,
  ignoreDotFiles: true,
  ignoreDotDirs: false,
  recursive: true,
  followSymlinks: false,
  skipUnreadableDirs: true,
})

// =============================================================================
// Watcher configuration
// =============================================================================

/**
 * Modify watcher configuration (validated and frozen).
 */
export interface WatcherConfig {
  readonly watchDirs: readonly string[]
  /** Explicit marker location; derived from the watch dirs when undefined */
  readonly markerFile: string | undefined
  /** File name expressions a file must match (any) to be hashed */
  readonly names: readonly RegExp[]
  /** File name expressions that exclude a file */
  readonly notNames: readonly RegExp[]
  /** Directory names skipped by exact match */
  readonly excludes: readonly string[]
  readonly ignoreDotDirs: boolean
  readonly ignoreDotFiles: boolean
  readonly algorithm: HashAlgorithm
  /** Directory holding derived marker files */
  readonly tempDir: string
  /** Hash entries in name order instead of listing order */
  readonly sortEntries: boolean
}

/**
 * Watcher options (partial, for user input). Name expressions may be
 * RegExp objects or strings, which are compiled unanchored.
 */
export interface WatcherOptions {
  watchDirs?: string | readonly string[]
  markerFile?: string
  names?: string | RegExp | ReadonlyArray<string | RegExp>
  notNames?: string | RegExp | ReadonlyArray<string | RegExp>
  excludes?: string | readonly string[]
  ignoreDotDirs?: boolean
  ignoreDotFiles?: boolean
  algorithm?: HashAlgorithm
  tempDir?: string
  sortEntries?: boolean
}

/**
 * Default watcher configuration
 */
export const defaultWatcherConfig: WatcherConfig = Object.freeze<WatcherConfig>({
  watchDirs: Object.freeze([]),
  markerFile: undefined,
  names: Object.freeze([]),
  notNames: Object.freeze([]),
  excludes: Object.freeze([]),
  ignoreDotDirs: true,
  ignoreDotFiles: true,
  algorithm: DEFAULT_HASH_ALGORITHM,
  tempDir: tmpdir(),
  sortEntries: false,
})

// =============================================================================
// Validation
// =============================================================================

function validateBoolean(value: unknown, name: string, syscall: string): boolean {
  if (typeof value !== 'boolean') {
    throw new EINVAL(syscall, `${name} must be a boolean`)
  }
  return value
}

function validateMode(mode: unknown): FinderMode {
  const found = FINDER_MODES.find((candidate) => candidate === mode)
  if (found === undefined) {
    throw new EINVAL('createFinderConfig', `mode must be one of ${FINDER_MODES.join(', ')}`)
  }
  return found
}

function validateAlgorithm(algorithm: unknown): HashAlgorithm {
  const found = HASH_ALGORITHMS.find((candidate) => candidate === algorithm)
  if (found === undefined) {
    throw new EINVAL('createWatcherConfig', `algorithm must be one of ${HASH_ALGORITHMS.join(', ')}`)
  }
  return found
}

function validateString(value: unknown, name: string, syscall: string): string {
  if (typeof value !== 'string' || value === '') {
    throw new EINVAL(syscall, `${name} must be a non-empty string`)
  }
  return value
}

/**
 * Validate a pattern list: a string (comma separated) or an array of
 * strings.
 */
function validatePatterns(value: unknown, name: string, syscall: string): readonly string[] {
  if (typeof value === 'string') {
    return Object.freeze(splitPatterns(value))
  }
  if (Array.isArray(value)) {
    const strings: string[] = []
    for (const item of value) {
      if (typeof item !== 'string') {
        throw new EINVAL(syscall, `${name} must only contain strings`)
      }
      strings.push(item)
    }
    return Object.freeze(splitPatterns(strings))
  }
  throw new EINVAL(syscall, `${name} must be a string or an array of strings`)
}

/**
 * Validate a directory list. Entries are kept verbatim (paths may contain
 * commas).
 */
function validateDirs(value: unknown, name: string, syscall: string): readonly string[] {
  const list: unknown[] = Array.isArray(value) ? value : [value]
  return Object.freeze(list.map((item) => validateString(item, name, syscall)))
}

/**
 * Compile a name expression. Strings become unanchored regular expressions.
 */
export function toNameRegExp(value: string | RegExp): RegExp {
  if (value instanceof RegExp) {
    // Stateful flags would make test() depend on the previous call
    return value.global || value.sticky ? new RegExp(value.source, value.flags.replace(/[gy]/g, '')) : value
  }
  try {
    return new RegExp(value)
  } catch (error) {
    throw new EINVAL('regexp', `invalid name expression '${value}': ${error instanceof Error ? error.message : String(error)}`)
  }
}

function validateExpressions(value: unknown, name: string): readonly RegExp[] {
  const list: unknown[] = Array.isArray(value) ? value : [value]
  return Object.freeze(
    list.map((item) => {
      if (typeof item === 'string' || item instanceof RegExp) {
        return toNameRegExp(item)
      }
      throw new EINVAL('createWatcherConfig', `${name} must contain strings or regular expressions`)
    })
  )
}

// =============================================================================
// Factories
// =============================================================================

/**
 * Create a finder configuration.
 *
 * @throws {EINVAL} If any option is invalid
 *
 * @example
 * ```typescript
 * const config = createFinderConfig({
 *   mode: 'files',
 *   roots: ['./src'],
 *   names: '*.ts, *.tsx',
 *   excludes: ['node_modules'],
 * })
 * const finder = FileFinder.fromConfig(config)
 * ```
 */
export function createFinderConfig(options: FinderOptions = {}): FinderConfig {
  const syscall = 'createFinderConfig'
  const defaults = defaultFinderConfig
  const pick = (key: 'names' | 'notNames' | 'paths' | 'notPaths' | 'excludes'): readonly string[] =>
    options[key] !== undefined ? validatePatterns(options[key], key, syscall) : defaults[key]
  const flag = (
    key: 'ignoreVcs' | 'ignoreDotFiles' | 'ignoreDotDirs' | 'recursive' | 'followSymlinks' | 'skipUnreadableDirs'
  ): boolean => (options[key] !== undefined ? validateBoolean(options[key], key, syscall) : defaults[key])

  const config: FinderConfig = {
    mode: options.mode !== undefined ? validateMode(options.mode) : defaults.mode,
    roots: options.roots !== undefined ? validateDirs(options.roots, 'roots', syscall) : defaults.roots,
    names: pick('names'),
    notNames: pick('notNames'),
    paths: pick('paths'),
    notPaths: pick('notPaths'),
    excludes: pick('excludes'),
    ignoreVcs: flag('ignoreVcs'),
    ignoreDotFiles: flag('ignoreDotFiles'),
    ignoreDotDirs: flag('ignoreDotDirs'),
    recursive: flag('recursive'),
    followSymlinks: flag('followSymlinks'),
    skipUnreadableDirs: flag('skipUnreadableDirs'),
  }

  return Object.freeze(config)
}

/**
 * Create a modify watcher configuration.
 *
 * @throws {EINVAL} If any option is invalid
 *
 * @example
 * ```typescript
 * const config = createWatcherConfig({
 *   watchDirs: ['./src'],
 *   names: ['\\.ts$'],
 *   excludes: ['node_modules'],
 *   algorithm: 'sha256',
 * })
 * const watcher = new ModifyWatcher(config)
 * ```
 */
export function createWatcherConfig(options: WatcherOptions = {}): WatcherConfig {
  const syscall = 'createWatcherConfig'
  const defaults = defaultWatcherConfig
  const flag = (key: 'ignoreDotDirs' | 'ignoreDotFiles' | 'sortEntries'): boolean =>
    options[key] !== undefined ? validateBoolean(options[key], key, syscall) : defaults[key]

  const config: WatcherConfig = {
    watchDirs:
      options.watchDirs !== undefined ? validateDirs(options.watchDirs, 'watchDirs', syscall) : defaults.watchDirs,
    markerFile:
      options.markerFile !== undefined ? validateString(options.markerFile, 'markerFile', syscall) : defaults.markerFile,
    names: options.names !== undefined ? validateExpressions(options.names, 'names') : defaults.names,
    notNames: options.notNames !== undefined ? validateExpressions(options.notNames, 'notNames') : defaults.notNames,
    excludes:
      options.excludes !== undefined ? validateDirs(options.excludes, 'excludes', syscall) : defaults.excludes,
    ignoreDotDirs: flag('ignoreDotDirs'),
    ignoreDotFiles: flag('ignoreDotFiles'),
    algorithm: options.algorithm !== undefined ? validateAlgorithm(options.algorithm) : defaults.algorithm,
    tempDir: options.tempDir !== undefined ? validateString(options.tempDir, 'tempDir', syscall) : defaults.tempDir,
    sortEntries: flag('sortEntries'),
  }

  return Object.freeze(config)
}
