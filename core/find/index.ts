/**
 * File discovery for fskit
 *
 * @example
 * ```typescript
 * import { FileFinder } from 'fskit/find'
 *
 * const entries = await FileFinder.create().files().name('*.md').in('docs').toArray()
 * ```
 *
 * @module find
 */

export {
  FileFinder,
  type AppendItem,
  type AppendSource,
  type FileFinderOptions,
  type FinderInfo,
} from './finder.js'
export {
  buildPipeline,
  concat,
  customStage,
  filterEntries,
  modeStage,
  nameStage,
  pathStage,
  type Stage,
} from './stages.js'
