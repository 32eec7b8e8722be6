import { describe, it, expect, beforeEach, vi } from 'vitest'
import { MemoryBackend } from '../backend.js'
import { ENOENT, ENOTDIR } from '../errors.js'
import { copyDir, isEmptyDir, listDir, mkSubDirs, removeDir } from './dir.js'

describe('directory helpers', () => {
  let backend: MemoryBackend
  const text = async (path: string): Promise<string> => new TextDecoder().decode(await backend.readFile(path))

  beforeEach(async () => {
    backend = await new MemoryBackend().seed({
      '/src/a.txt': 'a',
      '/src/.env': 'placeholder',
      '/src/nested/b.txt': 'b',
      '/src/nested/c.bak': 'c',
    })
  })

  describe('mkSubDirs / listDir / isEmptyDir', () => {
    it('should create the parent and every sub directory', async () => {
      await mkSubDirs('/srv/app', ['logs', 'cache/views'], backend)

      expect(await listDir('/srv/app', backend)).toEqual(['logs', 'cache'])
      expect(await isEmptyDir('/srv/app/cache/views', backend)).toBe(true)
      expect(await isEmptyDir('/srv/app', backend)).toBe(false)
    })
  })

  describe('copyDir', () => {
    it('should copy every file including hidden ones', async () => {
      expect(await copyDir('/src', '/dst', {}, backend)).toBe(4)
      expect(await listDir('/dst', backend)).toEqual(['a.txt', '.env', 'nested'])
      expect(await text('/dst/nested/b.txt')).toBe('b')
    })

    it('should leave existing files alone by default', async () => {
      await backend.seed({ '/dst/a.txt': 'kept' })

      expect(await copyDir('/src', '/dst', {}, backend)).toBe(3)
      expect(await text('/dst/a.txt')).toBe('kept')
    })

    it('should overwrite when skipExist is off', async () => {
      await backend.seed({ '/dst/a.txt': 'old' })

      await copyDir('/src', '/dst', { skipExist: false }, backend)
      expect(await text('/dst/a.txt')).toBe('a')
    })

    it('should apply filter, before and after to files', async () => {
      const after = vi.fn()
      const copied = await copyDir(
        '/src',
        '/dst',
        {
          filter: (src) => !src.endsWith('.bak'),
          before: (src) => src !== '/src/.env',
          after,
        },
        backend
      )

      expect(copied).toBe(2)
      expect(after.mock.calls).toEqual([['/dst/a.txt'], ['/dst/nested/b.txt']])
      expect(await listDir('/dst/nested', backend)).toEqual(['b.txt'])
    })

    it('should copy the contents of symlinked directories', async () => {
      await backend.seed({ '/shared/s.txt': 's' })
      await backend.symlink('/shared', '/src/link')

      expect(await copyDir('/src', '/dst', {}, backend)).toBe(5)
      expect(await text('/dst/link/s.txt')).toBe('s')
    })

    it('should reject a missing or non-directory source', async () => {
      await expect(copyDir('/nothing', '/dst', {}, backend)).rejects.toThrow(ENOENT)
      await expect(copyDir('/src/a.txt', '/dst', {}, backend)).rejects.toThrow(ENOTDIR)
    })
  })

  describe('removeDir', () => {
    it('should delete the whole tree', async () => {
      await removeDir('/src', {}, backend)
      expect(await backend.exists('/src')).toBe(false)
    })

    it('should empty the directory with keepSelf', async () => {
      await removeDir('/src', { keepSelf: true }, backend)
      expect(await isEmptyDir('/src', backend)).toBe(true)
    })

    it('should unlink a file path', async () => {
      await removeDir('/src/a.txt', {}, backend)
      expect(await listDir('/src', backend)).toEqual(['.env', 'nested'])
    })
  })
})
