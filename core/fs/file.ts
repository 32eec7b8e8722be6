/**
 * @fileoverview File helpers for fskit
 *
 * Small promise-based wrappers around an {@link FsBackend}. Every helper
 * takes the backend as its last argument and defaults to the local disk.
 *
 * @module core/fs/file
 *
 * @example
 * ```typescript
 * import { mkdirSave, readAll } from 'fskit/fs'
 *
 * await mkdirSave('/tmp/app/cache/state.json', JSON.stringify(state))
 * const text = await readAll('/tmp/app/cache/state.json')
 * ```
 */

import type { FsBackend } from '../backend.js'
import { nodeBackend } from '../node-backend.js'
import { EISDIR, ENOTDIR, FileReadError, FileWriteError, getErrorCode, isEnoent } from '../errors.js'
import { dirName } from '../path.js'

const decoder = new TextDecoder()

/**
 * Kind filter for {@link exists}.
 */
export type PathKind = 'file' | 'dir'

/**
 * Read a whole file as UTF-8 text.
 *
 * @throws {FileReadError} If the file cannot be read
 */
export async function readAll(path: string, backend: FsBackend = nodeBackend): Promise<string> {
  try {
    return decoder.decode(await backend.readFile(path))
  } catch (error) {
    throw new FileReadError(`Failed to read file: ${path}`, path, getErrorCode(error), error)
  }
}

/**
 * Create or replace a file. The parent directory must exist.
 *
 * @throws {FileWriteError} If the file cannot be written
 */
export async function writeAll(path: string, data: string | Uint8Array, backend: FsBackend = nodeBackend): Promise<void> {
  try {
    await backend.writeFile(path, data)
  } catch (error) {
    throw new FileWriteError(`Failed to write file: ${path}`, path, getErrorCode(error), error)
  }
}

/**
 * Create missing parent directories, then write the file.
 *
 * @throws {FileWriteError} If the directory or the file cannot be written
 */
export async function mkdirSave(path: string, data: string | Uint8Array, backend: FsBackend = nodeBackend): Promise<void> {
  const parent = dirName(path)
  try {
    await backend.mkdir(parent, { recursive: true })
  } catch (error) {
    throw new FileWriteError(`Failed to create directory: ${parent}`, parent, getErrorCode(error), error)
  }
  await writeAll(path, data, backend)
}

/**
 * Whether a path exists, optionally of the given kind. Never throws.
 *
 * @example
 * ```typescript
 * await exists('/etc/hosts')          // true
 * await exists('/etc/hosts', 'dir')   // false
 * ```
 */
export async function exists(path: string, kind?: PathKind, backend: FsBackend = nodeBackend): Promise<boolean> {
  if (kind === undefined) {
    return backend.exists(path)
  }
  if (!(await backend.exists(path))) {
    return false
  }
  const stats = await backend.stat(path)
  return kind === 'file' ? stats.isFile() : stats.isDirectory()
}

/**
 * @throws {ENOENT} If nothing exists at the path
 * @throws {EISDIR} If the path is a directory
 */
export async function assertIsFile(path: string, backend: FsBackend = nodeBackend): Promise<void> {
  const stats = await backend.stat(path)
  if (!stats.isFile()) {
    throw new EISDIR('open', path)
  }
}

/**
 * @throws {ENOENT} If nothing exists at the path
 * @throws {ENOTDIR} If the path is not a directory
 */
export async function assertIsDir(path: string, backend: FsBackend = nodeBackend): Promise<void> {
  const stats = await backend.stat(path)
  if (!stats.isDirectory()) {
    throw new ENOTDIR('scandir', path)
  }
}

/**
 * Copy one file, creating the destination directory when missing.
 */
export async function copyFile(src: string, dest: string, backend: FsBackend = nodeBackend): Promise<void> {
  await backend.mkdir(dirName(dest), { recursive: true })
  await backend.copyFile(src, dest)
}

/**
 * Delete a file.
 *
 * @returns false when there was nothing to delete
 */
export async function removeFile(path: string, backend: FsBackend = nodeBackend): Promise<boolean> {
  try {
    await backend.unlink(path)
    return true
  } catch (error) {
    if (isEnoent(error)) {
      return false
    }
    throw error
  }
}
