/**
 * Filter stages of the file finder.
 *
 * A stage turns one async sequence of entries into another. The finder
 * chains them in a fixed order (mode, name, user filters, path) so every
 * entry is tested lazily as the consumer pulls it, and a rejected entry
 * never reaches the later, more expensive stages.
 *
 * @module find/stages
 */

import type { EntryFilter, FileEntry, FinderMode } from '../types.js'
import { isExclude, isInclude, matchName, matchPath } from '../glob/match.js'

/**
 * One step of the filter pipeline.
 */
export type Stage = (source: AsyncIterable<FileEntry>) => AsyncGenerator<FileEntry, void, undefined>

/**
 * Keep only the entries the predicate accepts.
 */
export function filterEntries(predicate: EntryFilter): Stage {
  return async function* (source) {
    for await (const entry of source) {
      if (await predicate(entry)) {
        yield entry
      }
    }
  }
}

/**
 * Files only, directories only, or everything (no stage).
 */
export function modeStage(mode: FinderMode): Stage | undefined {
  switch (mode) {
    case 'files':
      return filterEntries((entry) => !entry.isDirectory)
    case 'dirs':
      return filterEntries((entry) => entry.isDirectory)
    case 'all':
      return undefined
  }
}

/**
 * Reject base names matching `notNames`, then require one of `names`.
 */
export function nameStage(names: readonly string[], notNames: readonly string[]): Stage | undefined {
  if (names.length === 0 && notNames.length === 0) {
    return undefined
  }
  return filterEntries(
    (entry) => !isExclude(entry.name, notNames, matchName) && isInclude(entry.name, names, matchName)
  )
}

/**
 * Run user predicates in registration order; the first false wins.
 */
export function customStage(filters: readonly EntryFilter[]): Stage | undefined {
  if (filters.length === 0) {
    return undefined
  }
  return filterEntries(async (entry) => {
    for (const filter of filters) {
      if (!(await filter(entry))) {
        return false
      }
    }
    return true
  })
}

/**
 * Reject relative paths matching `notPaths`, then require one of `paths`.
 */
export function pathStage(paths: readonly string[], notPaths: readonly string[]): Stage | undefined {
  if (paths.length === 0 && notPaths.length === 0) {
    return undefined
  }
  return filterEntries(
    (entry) =>
      !isExclude(entry.relativePath, notPaths, matchPath) && isInclude(entry.relativePath, paths, matchPath)
  )
}

/**
 * Compose stages left to right. Missing stages are skipped.
 *
 * @example
 * ```typescript
 * const pipeline = buildPipeline([modeStage('files'), nameStage(['*.ts'], [])])
 * for await (const entry of pipeline(walk({ backend, root }))) {
 *   // ...
 * }
 * ```
 */
export function buildPipeline(stages: ReadonlyArray<Stage | undefined>): Stage {
  const active = stages.filter((stage): stage is Stage => stage !== undefined)
  return async function* (source) {
    let stream: AsyncIterable<FileEntry> = source
    for (const stage of active) {
      stream = stage(stream)
    }
    yield* stream
  }
}

/**
 * Yield every source in turn.
 */
export async function* concat<T>(...sources: Array<AsyncIterable<T>>): AsyncGenerator<T, void, undefined> {
  for (const source of sources) {
    yield* source
  }
}
