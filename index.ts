/**
 * fskit - filesystem utilities for Node.js
 *
 * @example
 * ```typescript
 * import { FileFinder, ModifyWatcher } from 'fskit'
 *
 * const sources = await FileFinder.create().files().name('*.ts').in('src').count()
 *
 * const watcher = new ModifyWatcher().watch('src').ext('ts')
 * if (await watcher.isChanged()) {
 *   console.log(`${watcher.getFileCount()} files, fingerprint changed`)
 * }
 * ```
 *
 * @packageDocumentation
 */

export * from './core/index.js'
export { createLogger, type Logger } from './utils/logger.js'
