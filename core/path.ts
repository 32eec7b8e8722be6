/**
 * Path utilities for fskit
 *
 * String-level helpers on top of `node:path`. Nothing here touches the
 * filesystem; separators are normalized to forward slashes so the same
 * patterns work on every platform.
 *
 * @module path
 * @example
 * ```typescript
 * import { joinPath, pathFormat, isAbsPath } from './path.js'
 *
 * joinPath('/var/www/', './app', 'src/')  // '/var/www/app/src'
 * pathFormat('C:\\work\\repo')            // 'C:/work/repo/'
 * isAbsPath('D:/data/file.txt')           // true
 * ```
 */

import { homedir } from 'node:os'
import nodePath from 'node:path'

// =============================================================================
// PREDICATES
// =============================================================================

/**
 * Whether a path is absolute, on POSIX (`/etc`) or as a Windows drive path
 * (`C:/x`, `c:\x`).
 *
 * @example
 * ```typescript
 * isAbsPath('/etc/hosts')   // true
 * isAbsPath('C:\\Windows')  // true
 * isAbsPath('src/index.ts') // false
 * isAbsPath('')             // false
 * ```
 */
export function isAbsPath(path: string): boolean {
  if (!path) {
    return false
  }
  return path.startsWith('/') || /^[a-z]:[/|\\].+/i.test(path)
}

export function isRelative(path: string): boolean {
  return !isAbsPath(path)
}

// =============================================================================
// FORMATTING
// =============================================================================

/**
 * Trim, turn backslashes into forward slashes and ensure a trailing slash.
 *
 * @example
 * ```typescript
 * pathFormat(' a\\b ')  // 'a/b/'
 * pathFormat('/tmp/')   // '/tmp/'
 * ```
 */
export function pathFormat(dirName: string): string {
  const formatted = dirName.trim().replace(/\\/g, '/')
  return formatted.endsWith('/') ? formatted : formatted + '/'
}

/**
 * Join a base path with sub paths.
 *
 * Unlike `path.join`, `..` is kept verbatim. A trailing slash is removed
 * from the base; each sub path loses a leading `./` and surrounding
 * slashes, backslashes and spaces; `.` and empty segments are dropped.
 *
 * @example
 * ```typescript
 * joinPath('/base/', './a/', '/b', '.', '')  // '/base/a/b'
 * joinPath('', 'a', 'b')                     // 'a/b'
 * joinPath('/base')                          // '/base'
 * ```
 */
export function joinPath(basePath: string, ...subPaths: string[]): string {
  const base = basePath.endsWith('/') ? basePath.slice(0, -1) : basePath

  const segments = subPaths
    .map((segment) => {
      if (segment === '.' || segment === './') {
        return ''
      }
      const stripped = segment.startsWith('./') ? segment.slice(2) : segment
      return stripped.replace(/^[/\\ ]+|[/\\ ]+$/g, '')
    })
    .filter((segment) => segment.length > 0)

  if (segments.length === 0) {
    return base
  }
  if (!base) {
    return segments.join('/')
  }
  return base + '/' + segments.join('/')
}

/**
 * Expand a leading `~` to the current user's home directory.
 */
export function expandPath(path: string): string {
  if (path === '~') {
    return homedir()
  }
  if (path.startsWith('~/')) {
    return homedir() + path.slice(1)
  }
  return path
}

/**
 * Absolute, normalized form of a path, resolved against `cwd`
 * (default `process.cwd()`). `~` is expanded first.
 */
export function resolvePath(path: string, cwd: string = process.cwd()): string {
  return toSlashes(nodePath.resolve(cwd, expandPath(path)))
}

/**
 * `target` relative to `from`, with forward slashes. Returns `''` when both
 * point at the same location.
 */
export function relativeTo(from: string, target: string): string {
  return toSlashes(nodePath.relative(from, target))
}

// =============================================================================
// COMPONENTS
// =============================================================================

/**
 * Last path segment, optionally without the given extension.
 *
 * @example
 * ```typescript
 * baseName('/a/b/c.txt')          // 'c.txt'
 * baseName('/a/b/c.txt', '.txt')  // 'c'
 * ```
 */
export function baseName(path: string, ext?: string): string {
  return nodePath.posix.basename(toSlashes(path), ext)
}

/**
 * Extension with or without the leading dot. Dot files have none.
 *
 * @example
 * ```typescript
 * extName('a/b.tar.gz')         // '.gz'
 * extName('a/b.tar.gz', false)  // 'gz'
 * extName('.bashrc')            // ''
 * ```
 */
export function extName(path: string, withDot = true): string {
  const ext = nodePath.posix.extname(toSlashes(path))
  return withDot ? ext : ext.slice(1)
}

/** Lower-cased extension without the dot. */
export function suffix(path: string): string {
  return extName(path, false).toLowerCase()
}

export function dirName(path: string): string {
  return nodePath.posix.dirname(toSlashes(path))
}

/** Replace every backslash by a forward slash. */
export function toSlashes(path: string): string {
  return path.replace(/\\/g, '/')
}
