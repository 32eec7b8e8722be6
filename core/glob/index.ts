/**
 * Glob pattern matching for fskit
 *
 * @module glob
 */

export {
  match,
  matchName,
  matchPath,
  isInclude,
  isExclude,
  isMatchAll,
  createMatcher,
  splitPatterns,
  patternToRegex,
  getPatternCacheStats,
  clearPatternCache,
  type MatchOptions,
  type PatternTest,
  type PatternCacheStats,
} from './match.js'
