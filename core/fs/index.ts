/**
 * File and directory helpers for fskit
 *
 * @module core/fs
 */

export {
  readAll,
  writeAll,
  mkdirSave,
  exists,
  assertIsFile,
  assertIsDir,
  copyFile,
  removeFile,
  type PathKind,
} from './file.js'
export {
  mkdirp,
  mkSubDirs,
  listDir,
  isEmptyDir,
  copyDir,
  removeDir,
  type CopyDirOptions,
  type RemoveDirOptions,
} from './dir.js'
