/**
 * @fileoverview Directory helpers for fskit
 *
 * @module core/fs/dir
 *
 * @example
 * ```typescript
 * import { copyDir } from 'fskit/fs'
 *
 * const copied = await copyDir('./template', './out', {
 *   skipExist: false,
 *   filter: (src) => !src.endsWith('.bak'),
 * })
 * ```
 */

import type { FsBackend } from '../backend.js'
import { nodeBackend } from '../node-backend.js'
import { ENOTDIR } from '../errors.js'
import { joinPath } from '../path.js'
import { childPath, linkTargetIsDirectory } from '../traversal.js'

/**
 * Options for {@link copyDir}.
 */
export interface CopyDirOptions {
  /**
   * Leave files that already exist at the destination untouched.
   * @default true
   */
  skipExist?: boolean
  /** Return false to skip a source file */
  filter?: (src: string) => boolean | Promise<boolean>
  /** Called before each copy; return false to skip it */
  before?: (src: string, dest: string) => boolean | Promise<boolean>
  /** Called after each copied file */
  after?: (dest: string) => void | Promise<void>
}

/**
 * Options for {@link removeDir}.
 */
export interface RemoveDirOptions {
  /** Empty the directory but keep it */
  keepSelf?: boolean
}

/**
 * Create a directory and any missing parents. Existing directories are
 * fine.
 */
export async function mkdirp(path: string, backend: FsBackend = nodeBackend): Promise<void> {
  await backend.mkdir(path, { recursive: true })
}

/**
 * Create `parentDir` and each of `subDirs` beneath it.
 *
 * @example
 * ```typescript
 * await mkSubDirs('/srv/app', ['logs', 'cache/views', 'tmp'])
 * ```
 */
export async function mkSubDirs(parentDir: string, subDirs: readonly string[], backend: FsBackend = nodeBackend): Promise<void> {
  await mkdirp(parentDir, backend)
  for (const subDir of subDirs) {
    await mkdirp(joinPath(parentDir, subDir), backend)
  }
}

/**
 * Names in a directory, in listing order.
 */
export async function listDir(path: string, backend: FsBackend = nodeBackend): Promise<string[]> {
  const entries = await backend.readdir(path)
  return entries.map((entry) => entry.name)
}

export async function isEmptyDir(path: string, backend: FsBackend = nodeBackend): Promise<boolean> {
  return (await backend.readdir(path)).length === 0
}

/**
 * Recursively copy a directory, hidden files included. Directories are
 * always created; `filter`, `before` and `skipExist` apply to files only.
 *
 * @returns Number of files copied
 * @throws {ENOENT} If the source does not exist
 * @throws {ENOTDIR} If the source is not a directory
 */
export async function copyDir(
  src: string,
  dest: string,
  options: CopyDirOptions = {},
  backend: FsBackend = nodeBackend
): Promise<number> {
  const stats = await backend.stat(src)
  if (!stats.isDirectory()) {
    throw new ENOTDIR('scandir', src)
  }
  const skipExist = options.skipExist ?? true

  async function copyTree(from: string, to: string): Promise<number> {
    await backend.mkdir(to, { recursive: true })
    let copied = 0

    for (const entry of await backend.readdir(from)) {
      const source = childPath(from, entry.name)
      const target = childPath(to, entry.name)

      const isDirectory = entry.isSymbolicLink()
        ? await linkTargetIsDirectory(backend, source)
        : entry.isDirectory()
      if (isDirectory) {
        copied += await copyTree(source, target)
        continue
      }

      if (options.filter && !(await options.filter(source))) continue
      if (options.before && !(await options.before(source, target))) continue
      if (skipExist && (await backend.exists(target))) continue

      await backend.copyFile(source, target)
      copied++
      if (options.after) {
        await options.after(target)
      }
    }
    return copied
  }

  return copyTree(src, dest)
}

/**
 * Delete a directory tree. A file path is simply unlinked.
 *
 * Symlinks inside the tree are removed, never followed.
 */
export async function removeDir(path: string, options: RemoveDirOptions = {}, backend: FsBackend = nodeBackend): Promise<void> {
  const stats = await backend.lstat(path)
  if (!stats.isDirectory()) {
    await backend.unlink(path)
    return
  }

  if (!options.keepSelf) {
    await backend.rmdir(path, { recursive: true })
    return
  }

  for (const entry of await backend.readdir(path)) {
    const child = childPath(path, entry.name)
    if (entry.isDirectory()) {
      await backend.rmdir(child, { recursive: true })
    } else {
      await backend.unlink(child)
    }
  }
}
