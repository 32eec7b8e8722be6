/**
 * Tests for MemoryBackend
 *
 * The in-memory backend stands in for the disk in every unit test, so its
 * listing order, symlink handling and error codes are pinned down here.
 */

import { describe, it, expect, beforeEach } from 'vitest'
import { MemoryBackend } from './backend.js'
import { EACCES, EEXIST, EISDIR, ELOOP, ENOENT, ENOTDIR, ENOTEMPTY } from './errors.js'

const text = (data: Uint8Array): string => new TextDecoder().decode(data)

describe('MemoryBackend', () => {
  let backend: MemoryBackend

  beforeEach(() => {
    backend = new MemoryBackend()
  })

  // ===========================================================================
  // Files
  // ===========================================================================

  describe('readFile / writeFile', () => {
    it('should read a file that was written', async () => {
      await backend.writeFile('/test.txt', 'Hello, World!')
      expect(text(await backend.readFile('/test.txt'))).toBe('Hello, World!')
    })

    it('should keep binary data', async () => {
      const data = new Uint8Array([0x00, 0x01, 0xff, 0xfe])
      await backend.writeFile('/binary.bin', data)
      expect(await backend.readFile('/binary.bin')).toEqual(data)
    })

    it('should overwrite existing files', async () => {
      await backend.writeFile('/a.txt', 'one')
      await backend.writeFile('/a.txt', 'two')
      expect(text(await backend.readFile('/a.txt'))).toBe('two')
      expect(await backend.readdir('/')).toHaveLength(1)
    })

    it('should throw ENOENT for missing files and parents', async () => {
      await expect(backend.readFile('/missing.txt')).rejects.toThrow(ENOENT)
      await expect(backend.writeFile('/no/such/dir.txt', 'x')).rejects.toThrow(ENOENT)
    })

    it('should throw EISDIR when reading or writing a directory', async () => {
      await backend.mkdir('/dir')
      await expect(backend.readFile('/dir')).rejects.toThrow(EISDIR)
      await expect(backend.writeFile('/dir', 'x')).rejects.toThrow(EISDIR)
    })

    it('should throw EACCES for denied paths', async () => {
      await backend.seed({ '/locked/file.txt': 'secret', '/ro': null })
      backend.denyRead('/locked/file.txt')
      backend.denyWrite('/ro')

      await expect(backend.readFile('/locked/file.txt')).rejects.toThrow(EACCES)
      await expect(backend.writeFile('/ro/new.txt', 'x')).rejects.toThrow(EACCES)
      expect(await backend.readdir('/ro')).toEqual([])
    })
  })

  // ===========================================================================
  // Directories
  // ===========================================================================

  describe('readdir', () => {
    it('should list entries in insertion order with their kinds', async () => {
      await backend.seed({ '/p/b.txt': 'b', '/p/a': null, '/p/c.txt': 'c' })
      await backend.symlink('/p/a', '/p/link')

      const entries = await backend.readdir('/p')
      expect(entries.map((entry) => entry.name)).toEqual(['b.txt', 'a', 'c.txt', 'link'])
      expect(entries.map((entry) => [entry.isFile(), entry.isDirectory(), entry.isSymbolicLink()])).toEqual([
        [true, false, false],
        [false, true, false],
        [true, false, false],
        [false, false, true],
      ])
    })

    it('should throw ENOTDIR for files and EACCES for denied directories', async () => {
      await backend.seed({ '/f.txt': 'x', '/secret': null })
      backend.denyRead('/secret')

      await expect(backend.readdir('/f.txt')).rejects.toThrow(ENOTDIR)
      await expect(backend.readdir('/secret')).rejects.toThrow(EACCES)
    })

    it('should deny lookups beneath a denied directory but not the directory itself', async () => {
      await backend.seed({ '/vault/inner/t.txt': 't' })
      await backend.symlink('/vault/inner', '/door')
      backend.denyRead('/vault')

      expect((await backend.stat('/vault')).isDirectory()).toBe(true)
      await expect(backend.stat('/vault/inner')).rejects.toThrow(EACCES)
      await expect(backend.stat('/door')).rejects.toThrow(EACCES)
      expect((await backend.lstat('/door')).isSymbolicLink()).toBe(true)
      expect(await backend.exists('/vault/inner/t.txt')).toBe(false)
    })

    it('should list through a symlinked directory', async () => {
      await backend.seed({ '/real/x.txt': 'x' })
      await backend.symlink('/real', '/alias')
      expect((await backend.readdir('/alias')).map((entry) => entry.name)).toEqual(['x.txt'])
    })
  })

  describe('mkdir / rmdir', () => {
    it('should create parents with recursive', async () => {
      await backend.mkdir('/a/b/c', { recursive: true })
      expect((await backend.stat('/a/b/c')).isDirectory()).toBe(true)
      await backend.mkdir('/a/b/c', { recursive: true })
    })

    it('should reject existing paths without recursive', async () => {
      await backend.mkdir('/a')
      await expect(backend.mkdir('/a')).rejects.toThrow(EEXIST)
      await expect(backend.mkdir('/x/y')).rejects.toThrow(ENOENT)
    })

    it('should refuse to remove non-empty directories unless recursive', async () => {
      await backend.seed({ '/d/e/f.txt': 'f' })
      await expect(backend.rmdir('/d')).rejects.toThrow(ENOTEMPTY)

      await backend.rmdir('/d', { recursive: true })
      expect(await backend.exists('/d')).toBe(false)
      expect(await backend.exists('/d/e/f.txt')).toBe(false)
      expect(await backend.readdir('/')).toEqual([])
    })
  })

  // ===========================================================================
  // Stats & links
  // ===========================================================================

  describe('stat / lstat / realpath', () => {
    it('should report file sizes', async () => {
      await backend.writeFile('/five.txt', '12345')
      const stats = await backend.stat('/five.txt')
      expect(stats.size).toBe(5)
      expect(stats.isFile()).toBe(true)
    })

    it('should follow links with stat but not lstat', async () => {
      await backend.seed({ '/target': null })
      await backend.symlink('/target', '/link')

      expect((await backend.stat('/link')).isDirectory()).toBe(true)
      expect((await backend.lstat('/link')).isSymbolicLink()).toBe(true)
      expect(await backend.realpath('/link')).toBe('/target')
    })

    it('should resolve relative link targets from the link directory', async () => {
      await backend.seed({ '/dir/data.txt': 'data' })
      await backend.symlink('data.txt', '/dir/alias.txt')
      expect(text(await backend.readFile('/dir/alias.txt'))).toBe('data')
      expect(await backend.realpath('/dir/alias.txt')).toBe('/dir/data.txt')
    })

    it('should report dangling links as missing', async () => {
      await backend.symlink('/nowhere', '/dangling')
      await expect(backend.stat('/dangling')).rejects.toThrow(ENOENT)
      expect((await backend.lstat('/dangling')).isSymbolicLink()).toBe(true)
      expect(await backend.exists('/dangling')).toBe(false)
    })

    it('should detect link loops', async () => {
      await backend.symlink('/loop-b', '/loop-a')
      await backend.symlink('/loop-a', '/loop-b')
      await expect(backend.stat('/loop-a')).rejects.toThrow(ELOOP)
      expect(await backend.exists('/loop-a')).toBe(false)
    })

    it('should remove links without touching the target', async () => {
      await backend.seed({ '/t.txt': 't' })
      await backend.symlink('/t.txt', '/l.txt')
      await backend.unlink('/l.txt')
      expect(await backend.exists('/t.txt')).toBe(true)
      expect(await backend.exists('/l.txt')).toBe(false)
    })
  })

  describe('copyFile', () => {
    it('should copy content', async () => {
      await backend.writeFile('/src.txt', 'copy me')
      await backend.copyFile('/src.txt', '/dest.txt')
      expect(text(await backend.readFile('/dest.txt'))).toBe('copy me')
    })
  })
})
