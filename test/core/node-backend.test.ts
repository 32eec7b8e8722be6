/**
 * NodeBackend against a real temporary directory
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { promises as fs } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { NodeBackend } from '../../core/node-backend.js'
import { EEXIST, ENOENT, ENOTDIR, ENOTEMPTY } from '../../core/errors.js'

describe('NodeBackend', () => {
  const backend = new NodeBackend()
  let root: string

  beforeEach(async () => {
    root = await fs.realpath(await fs.mkdtemp(join(tmpdir(), 'fskit-backend-')))
  })

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true })
  })

  it('should write, read and list files', async () => {
    await backend.mkdir(join(root, 'a', 'b'), { recursive: true })
    await backend.writeFile(join(root, 'a', 'f.txt'), 'hello')

    expect(new TextDecoder().decode(await backend.readFile(join(root, 'a', 'f.txt')))).toBe('hello')
    const entries = await backend.readdir(join(root, 'a'))
    expect(entries.map((entry) => [entry.name, entry.isDirectory()]).sort()).toEqual([
      ['b', true],
      ['f.txt', false],
    ])
  })

  it('should map platform errors onto error classes', async () => {
    const missing = join(root, 'missing')
    const error = await backend.readdir(missing).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(ENOENT)
    expect(error).toMatchObject({ syscall: 'scandir', path: missing })
    await backend.writeFile(join(root, 'f'), '')
    await expect(backend.readdir(join(root, 'f'))).rejects.toThrow(ENOTDIR)
    await expect(backend.mkdir(join(root, 'f'))).rejects.toThrow(EEXIST)
  })

  it('should remove directories only when empty unless recursive', async () => {
    await backend.mkdir(join(root, 'd', 'e'), { recursive: true })

    await expect(backend.rmdir(join(root, 'd'))).rejects.toThrow(ENOTEMPTY)
    await backend.rmdir(join(root, 'd'), { recursive: true })
    expect(await backend.exists(join(root, 'd'))).toBe(false)
  })

  it('should distinguish stat and lstat on symlinks', async () => {
    await backend.mkdir(join(root, 'target'))
    await backend.symlink(join(root, 'target'), join(root, 'link'))

    expect((await backend.stat(join(root, 'link'))).isDirectory()).toBe(true)
    expect((await backend.lstat(join(root, 'link'))).isSymbolicLink()).toBe(true)
    expect(await backend.realpath(join(root, 'link'))).toBe(join(root, 'target'))
  })
})
