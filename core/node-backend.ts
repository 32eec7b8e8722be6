/**
 * Node.js filesystem backend.
 *
 * Thin adapter from `node:fs/promises` to {@link FsBackend}. Every platform
 * error is re-thrown as the matching {@link FSError} subclass.
 *
 * @module node-backend
 */

import { promises as fs } from 'node:fs'
import type { DirOptions, FsBackend } from './backend.js'
import type { DirEntry, EntryStats } from './types.js'
import { toFSError } from './errors.js'

/**
 * Backend that reads and writes the local disk.
 *
 * @example
 * ```typescript
 * const backend = new NodeBackend()
 * const entries = await backend.readdir('/var/log')
 * ```
 */
export class NodeBackend implements FsBackend {
  async readdir(path: string): Promise<DirEntry[]> {
    try {
      return await fs.readdir(path, { withFileTypes: true })
    } catch (error) {
      throw toFSError(error, 'scandir', path)
    }
  }

  async stat(path: string): Promise<EntryStats> {
    try {
      return await fs.stat(path)
    } catch (error) {
      throw toFSError(error, 'stat', path)
    }
  }

  async lstat(path: string): Promise<EntryStats> {
    try {
      return await fs.lstat(path)
    } catch (error) {
      throw toFSError(error, 'lstat', path)
    }
  }

  async realpath(path: string): Promise<string> {
    try {
      return await fs.realpath(path)
    } catch (error) {
      throw toFSError(error, 'realpath', path)
    }
  }

  async exists(path: string): Promise<boolean> {
    try {
      await fs.access(path)
      return true
    } catch {
      return false
    }
  }

  async readFile(path: string): Promise<Uint8Array> {
    try {
      return await fs.readFile(path)
    } catch (error) {
      throw toFSError(error, 'open', path)
    }
  }

  async writeFile(path: string, data: Uint8Array | string): Promise<void> {
    try {
      await fs.writeFile(path, data)
    } catch (error) {
      throw toFSError(error, 'open', path)
    }
  }

  async mkdir(path: string, options?: DirOptions): Promise<void> {
    try {
      await fs.mkdir(path, { recursive: options?.recursive ?? false })
    } catch (error) {
      throw toFSError(error, 'mkdir', path)
    }
  }

  async copyFile(src: string, dest: string): Promise<void> {
    try {
      await fs.copyFile(src, dest)
    } catch (error) {
      throw toFSError(error, 'copyfile', src, dest)
    }
  }

  async unlink(path: string): Promise<void> {
    try {
      await fs.unlink(path)
    } catch (error) {
      throw toFSError(error, 'unlink', path)
    }
  }

  async rmdir(path: string, options?: DirOptions): Promise<void> {
    try {
      if (options?.recursive) {
        await fs.rm(path, { recursive: true })
      } else {
        await fs.rmdir(path)
      }
    } catch (error) {
      throw toFSError(error, 'rmdir', path)
    }
  }

  async symlink(target: string, path: string): Promise<void> {
    try {
      await fs.symlink(target, path)
    } catch (error) {
      throw toFSError(error, 'symlink', path)
    }
  }
}

/** Shared instance used when no backend is configured. */
export const nodeBackend: FsBackend = new NodeBackend()
