/**
 * Directory change detection for fskit
 *
 * @module watch
 */

export { ModifyWatcher, type ModifyWatcherOptions } from './modify-watcher.js'
export { digest, hashFile } from './hash.js'
