/**
 * FsBackend Interface
 *
 * The pluggable I/O seam of fskit. The finder, the modify watcher and the
 * file helpers only ever touch the filesystem through this interface, so
 * they run unchanged against the real disk ({@link NodeBackend}) or an
 * in-memory tree ({@link MemoryBackend}).
 *
 * Backends report failures as {@link FSError} subclasses (`ENOENT`,
 * `EACCES`, ...), never as raw platform errors.
 *
 * @module backend
 */

import type { DirEntry, EntryStats } from './types.js'
import {
  EACCES,
  EEXIST,
  EISDIR,
  ELOOP,
  ENOENT,
  ENOTDIR,
  ENOTEMPTY,
  EPERM,
} from './errors.js'

// =============================================================================
// FsBackend Interface
// =============================================================================

/**
 * Options for mkdir / rmdir.
 */
export interface DirOptions {
  recursive?: boolean
}

/**
 * Filesystem operations required by fskit.
 *
 * @example
 * ```typescript
 * class MyBackend implements FsBackend {
 *   async readdir(path: string): Promise<DirEntry[]> {
 *     // ...
 *   }
 *   // ... other methods
 * }
 *
 * const finder = FileFinder.create({ backend: new MyBackend() })
 * ```
 */
export interface FsBackend {
  /**
   * List a directory. Order is whatever the backend enumerates; `.` and `..`
   * are never included. Symlinks are reported as symlinks.
   *
   * @throws ENOENT if the directory does not exist
   * @throws ENOTDIR if the path is not a directory
   * @throws EACCES if the directory cannot be read
   */
  readdir(path: string): Promise<DirEntry[]>

  /** Stats following symbolic links. */
  stat(path: string): Promise<EntryStats>

  /** Stats of the link itself. */
  lstat(path: string): Promise<EntryStats>

  /** Resolve every symbolic link in the path. */
  realpath(path: string): Promise<string>

  /** Never throws. */
  exists(path: string): Promise<boolean>

  readFile(path: string): Promise<Uint8Array>

  /** Create or replace a file. The parent directory must exist. */
  writeFile(path: string, data: Uint8Array | string): Promise<void>

  mkdir(path: string, options?: DirOptions): Promise<void>

  copyFile(src: string, dest: string): Promise<void>

  unlink(path: string): Promise<void>

  rmdir(path: string, options?: DirOptions): Promise<void>

  symlink(target: string, path: string): Promise<void>
}

// =============================================================================
// Memory Backend
// =============================================================================

type MemoryNode =
  | { type: 'file'; data: Uint8Array; mtimeMs: number }
  | { type: 'directory'; children: string[]; mtimeMs: number }
  | { type: 'symlink'; target: string; mtimeMs: number }

interface Resolved {
  path: string
  node: MemoryNode
}

const MAX_SYMLINK_HOPS = 40

const encoder = new TextEncoder()

class MemoryDirent implements DirEntry {
  constructor(
    readonly name: string,
    private readonly kind: MemoryNode['type']
  ) {}

  isFile(): boolean {
    return this.kind === 'file'
  }

  isDirectory(): boolean {
    return this.kind === 'directory'
  }

  isSymbolicLink(): boolean {
    return this.kind === 'symlink'
  }
}

class MemoryStats implements EntryStats {
  readonly size: number
  readonly mtimeMs: number
  private readonly kind: MemoryNode['type']

  constructor(node: MemoryNode) {
    this.kind = node.type
    this.mtimeMs = node.mtimeMs
    if (node.type === 'file') {
      this.size = node.data.length
    } else if (node.type === 'symlink') {
      this.size = node.target.length
    } else {
      this.size = 4096
    }
  }

  isFile(): boolean {
    return this.kind === 'file'
  }

  isDirectory(): boolean {
    return this.kind === 'directory'
  }

  isSymbolicLink(): boolean {
    return this.kind === 'symlink'
  }
}

/**
 * In-memory filesystem backend.
 *
 * Directory listings preserve insertion order. Symbolic links are supported,
 * and directories or files can be marked unreadable / unwritable to exercise
 * error paths that cannot be reproduced on a real disk when running as root.
 *
 * @example
 * ```typescript
 * const backend = new MemoryBackend()
 * await backend.seed({
 *   '/proj/a.ts': 'export {}',
 *   '/proj/sub/c.ts': 'export {}',
 *   '/proj/empty': null,   // directory
 * })
 * backend.denyRead('/proj/sub')
 * ```
 */
export class MemoryBackend implements FsBackend {
  private nodes = new Map<string, MemoryNode>([
    ['/', { type: 'directory', children: [], mtimeMs: Date.now() }],
  ])
  private unreadable = new Set<string>()
  private unwritable = new Set<string>()

  /**
   * Populate the tree. Keys are absolute paths; a string value creates a
   * file (parents included), `null` creates a directory.
   */
  async seed(tree: Record<string, string | null>): Promise<this> {
    for (const [path, content] of Object.entries(tree)) {
      if (content === null) {
        await this.mkdir(path, { recursive: true })
      } else {
        await this.mkdir(this.parentOf(this.normalizePath(path)), { recursive: true })
        await this.writeFile(path, content)
      }
    }
    return this
  }

  /**
   * Make readdir / readFile on this path fail with EACCES. For a directory,
   * every lookup beneath it fails too, like a directory with mode 000.
   */
  denyRead(path: string): void {
    this.unreadable.add(this.normalizePath(path))
  }

  /** Make writes to this path (or into this directory) fail with EACCES. */
  denyWrite(path: string): void {
    this.unwritable.add(this.normalizePath(path))
  }

  /**
   * Normalize a path by resolving . and .., removing duplicate slashes,
   * and stripping trailing slashes (except for root).
   */
  private normalizePath(path: string): string {
    if (!path) {
      throw new ENOENT('open', path)
    }

    const resolved: string[] = []
    for (const part of path.replace(/\/+/g, '/').split('/')) {
      if (part === '..') {
        resolved.pop()
      } else if (part !== '.' && part !== '') {
        resolved.push(part)
      }
    }

    return '/' + resolved.join('/')
  }

  private parentOf(path: string): string {
    if (path === '/') return '/'
    const lastSlash = path.lastIndexOf('/')
    return lastSlash === 0 ? '/' : path.slice(0, lastSlash)
  }

  private nameOf(path: string): string {
    return path.slice(path.lastIndexOf('/') + 1)
  }

  private childPath(dir: string, name: string): string {
    return dir === '/' ? '/' + name : dir + '/' + name
  }

  /**
   * Walk the path component by component, following symlinks in every
   * intermediate component and, when `followLast` is set, in the last one.
   */
  private resolveNode(path: string, followLast: boolean, syscall: string, hops = 0): Resolved | undefined {
    const parts = this.normalizePath(path).split('/').filter(Boolean)
    let currentPath = '/'
    let currentNode = this.nodes.get('/')
    if (!currentNode) return undefined

    for (let i = 0; i < parts.length; i++) {
      if (currentNode.type !== 'directory') return undefined
      if (this.unreadable.has(currentPath)) {
        throw new EACCES(syscall, path)
      }
      const candidate = this.childPath(currentPath, parts[i] ?? '')
      const node = this.nodes.get(candidate)
      if (!node) return undefined

      const isLast = i === parts.length - 1
      if (node.type === 'symlink' && (!isLast || followLast)) {
        if (hops >= MAX_SYMLINK_HOPS) {
          throw new ELOOP(syscall, path)
        }
        const target = node.target.startsWith('/')
          ? node.target
          : this.childPath(currentPath, node.target)
        const resolved = this.resolveNode(target, true, syscall, hops + 1)
        if (!resolved) return undefined
        currentPath = resolved.path
        currentNode = resolved.node
        continue
      }

      currentPath = candidate
      currentNode = node
    }

    return { path: currentPath, node: currentNode }
  }

  private require(path: string, followLast: boolean, syscall: string): Resolved {
    const resolved = this.resolveNode(path, followLast, syscall)
    if (!resolved) {
      throw new ENOENT(syscall, path)
    }
    return resolved
  }

  private requireDir(path: string, syscall: string): Resolved & { node: { type: 'directory'; children: string[] } } {
    const resolved = this.require(path, true, syscall)
    const { node } = resolved
    if (node.type !== 'directory') {
      throw new ENOTDIR(syscall, path)
    }
    return { path: resolved.path, node }
  }

  private assertWritable(path: string, syscall: string, original: string): void {
    if (this.unwritable.has(path) || this.unwritable.has(this.parentOf(path))) {
      throw new EACCES(syscall, original)
    }
  }

  /** Insert a node under an existing parent directory. */
  private attach(path: string, node: MemoryNode, syscall: string, original: string): void {
    const parent = this.requireDir(this.parentOf(path), syscall)
    const name = this.nameOf(path)
    const target = this.childPath(parent.path, name)
    this.assertWritable(target, syscall, original)
    if (!parent.node.children.includes(name)) {
      parent.node.children.push(name)
    }
    this.nodes.set(target, node)
  }

  private detach(path: string): void {
    const parent = this.nodes.get(this.parentOf(path))
    if (parent?.type === 'directory') {
      parent.children = parent.children.filter((child) => child !== this.nameOf(path))
    }
    this.nodes.delete(path)
  }

  async readdir(path: string): Promise<DirEntry[]> {
    const dir = this.requireDir(path, 'scandir')
    if (this.unreadable.has(dir.path)) {
      throw new EACCES('scandir', path)
    }

    const entries: DirEntry[] = []
    for (const name of dir.node.children) {
      const child = this.nodes.get(this.childPath(dir.path, name))
      if (child) {
        entries.push(new MemoryDirent(name, child.type))
      }
    }
    return entries
  }

  async stat(path: string): Promise<EntryStats> {
    return new MemoryStats(this.require(path, true, 'stat').node)
  }

  async lstat(path: string): Promise<EntryStats> {
    return new MemoryStats(this.require(path, false, 'lstat').node)
  }

  async realpath(path: string): Promise<string> {
    return this.require(path, true, 'realpath').path
  }

  async exists(path: string): Promise<boolean> {
    try {
      return this.resolveNode(path, true, 'access') !== undefined
    } catch {
      return false
    }
  }

  async readFile(path: string): Promise<Uint8Array> {
    const { path: resolvedPath, node } = this.require(path, true, 'open')
    if (node.type === 'directory') {
      throw new EISDIR('read', path)
    }
    if (node.type !== 'file' || this.unreadable.has(resolvedPath)) {
      throw new EACCES('open', path)
    }
    return node.data
  }

  async writeFile(path: string, data: Uint8Array | string): Promise<void> {
    const bytes = typeof data === 'string' ? encoder.encode(data) : new Uint8Array(data)
    const existing = this.resolveNode(path, true, 'open')

    if (existing) {
      if (existing.node.type === 'directory') {
        throw new EISDIR('open', path)
      }
      this.assertWritable(existing.path, 'open', path)
      this.nodes.set(existing.path, { type: 'file', data: bytes, mtimeMs: Date.now() })
      return
    }

    this.attach(this.normalizePath(path), { type: 'file', data: bytes, mtimeMs: Date.now() }, 'open', path)
  }

  async mkdir(path: string, options?: { recursive?: boolean }): Promise<void> {
    const normalized = this.normalizePath(path)
    const existing = this.resolveNode(normalized, true, 'mkdir')

    if (existing) {
      if (options?.recursive && existing.node.type === 'directory') return
      throw new EEXIST('mkdir', path)
    }

    if (options?.recursive) {
      const parent = this.parentOf(normalized)
      if (parent !== normalized) {
        await this.mkdir(parent, { recursive: true })
      }
    }

    this.attach(normalized, { type: 'directory', children: [], mtimeMs: Date.now() }, 'mkdir', path)
  }

  async copyFile(src: string, dest: string): Promise<void> {
    const data = await this.readFile(src)
    await this.writeFile(dest, new Uint8Array(data))
  }

  async unlink(path: string): Promise<void> {
    const normalized = this.normalizePath(path)
    const { node } = this.require(normalized, false, 'unlink')
    if (node.type === 'directory') {
      throw new EISDIR('unlink', path)
    }
    this.assertWritable(normalized, 'unlink', path)
    this.detach(normalized)
  }

  async rmdir(path: string, options?: { recursive?: boolean }): Promise<void> {
    const normalized = this.normalizePath(path)
    if (normalized === '/') {
      throw new EPERM('rmdir', path)
    }

    const { node } = this.require(normalized, false, 'rmdir')
    if (node.type !== 'directory') {
      throw new ENOTDIR('rmdir', path)
    }
    if (node.children.length > 0 && !options?.recursive) {
      throw new ENOTEMPTY('rmdir', path)
    }

    const prefix = normalized + '/'
    for (const key of [...this.nodes.keys()]) {
      if (key.startsWith(prefix)) {
        this.nodes.delete(key)
      }
    }
    this.detach(normalized)
  }

  async symlink(target: string, path: string): Promise<void> {
    const normalized = this.normalizePath(path)
    if (this.nodes.has(normalized)) {
      throw new EEXIST('symlink', path)
    }
    this.attach(normalized, { type: 'symlink', target, mtimeMs: Date.now() }, 'symlink', path)
  }
}
