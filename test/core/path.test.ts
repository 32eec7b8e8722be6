/**
 * Tests for path utilities
 *
 * Functions under test:
 * - isAbsPath / isRelative
 * - pathFormat, joinPath, toSlashes
 * - expandPath, resolvePath, relativeTo
 * - baseName, extName, suffix, dirName
 */

import { describe, it, expect } from 'vitest'
import { homedir } from 'node:os'
import {
  baseName,
  dirName,
  expandPath,
  extName,
  isAbsPath,
  isRelative,
  joinPath,
  pathFormat,
  relativeTo,
  resolvePath,
  suffix,
  toSlashes,
} from '../../core/path.js'

// ============================================================================
// PREDICATES
// ============================================================================

describe('isAbsPath', () => {
  it('recognizes POSIX absolute paths', () => {
    expect(isAbsPath('/etc/hosts')).toBe(true)
    expect(isAbsPath('/')).toBe(true)
  })

  it('recognizes Windows drive paths with either separator', () => {
    expect(isAbsPath('C:\\Windows')).toBe(true)
    expect(isAbsPath('d:/data/file.txt')).toBe(true)
  })

  it('rejects relative, empty and bare drive paths', () => {
    expect(isAbsPath('src/index.ts')).toBe(false)
    expect(isAbsPath('')).toBe(false)
    expect(isAbsPath('C:')).toBe(false)
    expect(isRelative('./a')).toBe(true)
  })
})

// ============================================================================
// FORMATTING
// ============================================================================

describe('pathFormat', () => {
  it('trims, converts backslashes and adds a trailing slash', () => {
    expect(pathFormat(' a\\b ')).toBe('a/b/')
    expect(pathFormat('/tmp/')).toBe('/tmp/')
  })
})

describe('joinPath', () => {
  it('strips separators, leading ./ and dot segments', () => {
    expect(joinPath('/base/', './a/', '/b', '.', '')).toBe('/base/a/b')
  })

  it('joins onto an empty base without a leading slash', () => {
    expect(joinPath('', 'a', 'b')).toBe('a/b')
  })

  it('returns the base alone when there is nothing to add', () => {
    expect(joinPath('/base')).toBe('/base')
    expect(joinPath('/base/', '.')).toBe('/base')
  })

  it('keeps parent segments verbatim', () => {
    expect(joinPath('/base', '../x')).toBe('/base/../x')
  })
})

describe('toSlashes', () => {
  it('replaces every backslash', () => {
    expect(toSlashes('C:\\a\\b')).toBe('C:/a/b')
  })
})

// ============================================================================
// RESOLUTION
// ============================================================================

describe('expandPath', () => {
  it('expands a leading tilde only', () => {
    expect(expandPath('~')).toBe(homedir())
    expect(expandPath('~/notes')).toBe(homedir() + '/notes')
    expect(expandPath('a~/b')).toBe('a~/b')
  })
})

describe('resolvePath', () => {
  it('resolves against the given cwd', () => {
    expect(resolvePath('b', '/a')).toBe('/a/b')
    expect(resolvePath('./b/../c', '/a')).toBe('/a/c')
  })

  it('keeps absolute paths and normalizes them', () => {
    expect(resolvePath('/x/../y/', '/a')).toBe('/y')
  })
})

describe('relativeTo', () => {
  it('walks up and down', () => {
    expect(relativeTo('/a/b', '/a/c/d')).toBe('../c/d')
  })

  it('returns an empty string for the same location', () => {
    expect(relativeTo('/a/b', '/a/b/')).toBe('')
  })
})

// ============================================================================
// COMPONENTS
// ============================================================================

describe('baseName', () => {
  it('returns the last segment', () => {
    expect(baseName('/a/b/c.txt')).toBe('c.txt')
    expect(baseName('C:\\dir\\f.md')).toBe('f.md')
  })

  it('drops a matching extension', () => {
    expect(baseName('/a/b/c.txt', '.txt')).toBe('c')
  })
})

describe('extName / suffix', () => {
  it('returns the last extension', () => {
    expect(extName('a/b.tar.gz')).toBe('.gz')
    expect(extName('a/b.tar.gz', false)).toBe('gz')
  })

  it('treats dot files as extensionless', () => {
    expect(extName('.bashrc')).toBe('')
  })

  it('lower-cases the suffix', () => {
    expect(suffix('IMG.JPG')).toBe('jpg')
    expect(suffix('Makefile')).toBe('')
  })
})

describe('dirName', () => {
  it('returns the parent path', () => {
    expect(dirName('/a/b/c.txt')).toBe('/a/b')
    expect(dirName('file')).toBe('.')
    expect(dirName('C:\\a\\b.txt')).toBe('C:/a')
  })
})
