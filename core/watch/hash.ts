/**
 * Digest helpers for fingerprints.
 *
 * Output is always a lowercase hex string.
 *
 * @module watch/hash
 */

import { createHash } from 'node:crypto'
import type { FsBackend } from '../backend.js'
import { DEFAULT_HASH_ALGORITHM } from '../constants.js'
import { FileReadError, getErrorCode } from '../errors.js'
import type { HashAlgorithm } from '../types.js'

/**
 * Hex digest of a string (UTF-8) or raw bytes.
 *
 * @example
 * ```typescript
 * digest('hello')            // '5d41402abc4b2a76b9719d911017c592'
 * digest('hello', 'sha1')    // 'aaf4c61ddcc5e8a2dabede0f3b482cd9aea9434d'
 * ```
 */
export function digest(data: Uint8Array | string, algorithm: HashAlgorithm = DEFAULT_HASH_ALGORITHM): string {
  return createHash(algorithm).update(data).digest('hex')
}

/**
 * Hex digest of a file's content.
 *
 * @throws {FileReadError} If the file cannot be read
 */
export async function hashFile(
  backend: FsBackend,
  path: string,
  algorithm: HashAlgorithm = DEFAULT_HASH_ALGORITHM
): Promise<string> {
  let content: Uint8Array
  try {
    content = await backend.readFile(path)
  } catch (error) {
    throw new FileReadError(`Failed to read file: ${path}`, path, getErrorCode(error), error)
  }
  return digest(content, algorithm)
}
