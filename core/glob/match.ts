/**
 * Shell-style pattern matching for fskit
 *
 * Patterns follow `fnmatch(3)` without flags: `*` and `?` match any
 * character including `/` and a leading dot, `[abc]`, `[a-z]`, `[!x]` /
 * `[^x]` match character classes and a backslash escapes the next
 * character. Compiled patterns are kept in a bounded LRU cache.
 *
 * Two matching flavours are exposed:
 *
 * - {@link matchName} for base names: equality or glob.
 * - {@link matchPath} for paths: glob when the pattern looks like one
 *   (contains `*`, `?`, `[` or `.`), plain substring containment otherwise.
 *
 * @example
 * ```typescript
 * match('*.ts', 'a.ts')           // true
 * match('*.ts', 'sub/c.ts')       // true, '*' crosses '/'
 * matchPath('src/sub/a.ts', 'sub')  // true, substring
 * matchPath('src/sub/a.ts', 'sub/*.ts') // false, glob against the whole path
 * ```
 *
 * @module glob/match
 */

import { MATCH_ALL_PATTERNS, PATTERN_CACHE_SIZE } from '../constants.js'

// =============================================================================
// Types
// =============================================================================

export interface MatchOptions {
  /** Case-insensitive matching (default: false) */
  nocase?: boolean
}

/**
 * Statistics of the compiled-pattern cache.
 */
export interface PatternCacheStats {
  hits: number
  misses: number
  size: number
  capacity: number
}

/**
 * Tests one candidate string against one pattern.
 */
export type PatternTest = (candidate: string, pattern: string) => boolean

// =============================================================================
// LRU Cache
// =============================================================================

class PatternLRUCache {
  private cache = new Map<string, RegExp>()
  private hits = 0
  private misses = 0

  constructor(private readonly maxSize: number) {}

  get(key: string): RegExp | undefined {
    const value = this.cache.get(key)
    if (value === undefined) {
      this.misses++
      return undefined
    }
    this.hits++
    // Re-insert to mark as most recently used
    this.cache.delete(key)
    this.cache.set(key, value)
    return value
  }

  set(key: string, value: RegExp): void {
    this.cache.delete(key)
    if (this.cache.size >= this.maxSize) {
      const oldestKey = this.cache.keys().next().value
      if (oldestKey !== undefined) {
        this.cache.delete(oldestKey)
      }
    }
    this.cache.set(key, value)
  }

  get stats(): PatternCacheStats {
    return {
      hits: this.hits,
      misses: this.misses,
      size: this.cache.size,
      capacity: this.maxSize,
    }
  }

  clear(): void {
    this.cache.clear()
    this.hits = 0
    this.misses = 0
  }
}

const patternCache = new PatternLRUCache(PATTERN_CACHE_SIZE)

export function getPatternCacheStats(): PatternCacheStats {
  return patternCache.stats
}

export function clearPatternCache(): void {
  patternCache.clear()
}

// =============================================================================
// Compilation
// =============================================================================

const REGEX_SPECIAL = /[.*+?^${}()|[\]\\/]/g

function escapeRegex(text: string): string {
  return text.replace(REGEX_SPECIAL, '\\$&')
}

/**
 * Translate the body of a bracket expression, starting right after `[`.
 * Returns the regex class and the index of the closing `]`, or undefined
 * when the bracket is never closed (the `[` is then literal).
 */
function compileBracket(pattern: string, start: number): { source: string; end: number } | undefined {
  let i = start
  let negate = false
  if (pattern[i] === '!' || pattern[i] === '^') {
    negate = true
    i++
  }

  let body = ''
  let first = true
  while (i < pattern.length) {
    const char = pattern[i] ?? ''
    if (char === ']' && !first) {
      return { source: (negate ? '[^' : '[') + body + ']', end: i }
    }
    if (char === '\\' && i + 1 < pattern.length) {
      const escaped = pattern[i + 1] ?? ''
      body += escaped === '-' ? '\\-' : escapeRegex(escaped)
      i += 2
    } else {
      // '-' is not escaped so ranges survive
      body += escapeRegex(char)
      i++
    }
    first = false
  }
  return undefined
}

function compile(pattern: string, nocase: boolean): RegExp {
  let source = ''
  let i = 0

  while (i < pattern.length) {
    const char = pattern[i] ?? ''
    if (char === '*') {
      source += '[\\s\\S]*'
      // Consecutive stars collapse
      while (pattern[i + 1] === '*') i++
    } else if (char === '?') {
      source += '[\\s\\S]'
    } else if (char === '[') {
      const bracket = compileBracket(pattern, i + 1)
      if (bracket) {
        source += bracket.source
        i = bracket.end
      } else {
        source += '\\['
      }
    } else if (char === '\\' && i + 1 < pattern.length) {
      i++
      source += escapeRegex(pattern[i] ?? '')
    } else {
      source += escapeRegex(char)
    }
    i++
  }

  const flags = nocase ? 'i' : ''
  try {
    return new RegExp('^' + source + '$', flags)
  } catch (error) {
    // Reversed ranges such as [z-a] never match anything but the literal text
    if (!(error instanceof SyntaxError)) throw error
    return new RegExp('^' + escapeRegex(pattern) + '$', flags)
  }
}

/**
 * Compiled regular expression for a pattern, from the cache when present.
 */
export function patternToRegex(pattern: string, options: MatchOptions = {}): RegExp {
  const nocase = options.nocase ?? false
  const key = (nocase ? 'i:' : 's:') + pattern
  const cached = patternCache.get(key)
  if (cached) {
    return cached
  }
  const regex = compile(pattern, nocase)
  patternCache.set(key, regex)
  return regex
}

// =============================================================================
// Matching
// =============================================================================

/**
 * Whether the pattern is one of the match-everything forms (`*`, `**\/*`).
 */
export function isMatchAll(pattern: string): boolean {
  return MATCH_ALL_PATTERNS.includes(pattern)
}

/**
 * Match a candidate string against a shell pattern.
 *
 * @example
 * ```typescript
 * match('*.[ch]', 'main.c')                  // true
 * match('file?.txt', 'file10.txt')           // false
 * match('*.TS', 'a.ts', { nocase: true })  // true
 * ```
 */
export function match(pattern: string, candidate: string, options: MatchOptions = {}): boolean {
  if (isMatchAll(pattern)) {
    return true
  }
  if (pattern === candidate) {
    return true
  }
  return patternToRegex(pattern, options).test(candidate)
}

/**
 * Match a base name: equality or glob.
 */
export function matchName(name: string, pattern: string, options: MatchOptions = {}): boolean {
  return name === pattern || match(pattern, name, options)
}

const GLOB_LIKE = /[*?[.]/

/**
 * Match a path. Glob-looking patterns are matched against the whole path;
 * any other pattern is a substring test.
 *
 * @example
 * ```typescript
 * matchPath('sub/c.ts', 'sub')       // true
 * matchPath('lib/c.ts', 'sub')       // false
 * matchPath('sub/c.ts', '*.ts')     // true
 * matchPath('sub/c.ts', 'c.ts')     // false, glob against 'sub/c.ts'
 * ```
 */
export function matchPath(path: string, pattern: string, options: MatchOptions = {}): boolean {
  if (isMatchAll(pattern)) {
    return true
  }
  if (GLOB_LIKE.test(pattern)) {
    return match(pattern, path, options)
  }
  if (options.nocase) {
    return path.toLowerCase().includes(pattern.toLowerCase())
  }
  return path.includes(pattern)
}

/**
 * True when there are no patterns or any pattern matches.
 */
export function isInclude(candidate: string, patterns: readonly string[], test: PatternTest = matchName): boolean {
  if (patterns.length === 0) {
    return true
  }
  return patterns.some((pattern) => test(candidate, pattern))
}

/**
 * True when any pattern matches. An empty list excludes nothing.
 */
export function isExclude(candidate: string, patterns: readonly string[], test: PatternTest = matchName): boolean {
  return patterns.some((pattern) => test(candidate, pattern))
}

/**
 * Build a predicate that is true when any of the patterns match.
 *
 * @example
 * ```typescript
 * const isSource = createMatcher(['*.ts', '*.tsx'])
 * isSource('App.tsx')  // true
 * ```
 */
export function createMatcher(patterns: string | readonly string[], options: MatchOptions = {}): (candidate: string) => boolean {
  const list = typeof patterns === 'string' ? [patterns] : [...patterns]
  return (candidate) => list.some((pattern) => matchName(candidate, pattern, options))
}

/**
 * Normalize a pattern argument: strings are split on commas, every entry is
 * trimmed and empty entries are dropped.
 *
 * @example
 * ```typescript
 * splitPatterns('*.ts, *.tsx')   // ['*.ts', '*.tsx']
 * splitPatterns(['a', ' b,c '])  // ['a', 'b', 'c']
 * ```
 */
export function splitPatterns(patterns: string | readonly string[]): string[] {
  const list = typeof patterns === 'string' ? [patterns] : patterns
  return list
    .flatMap((value) => value.split(','))
    .map((value) => value.trim())
    .filter((value) => value.length > 0)
}
