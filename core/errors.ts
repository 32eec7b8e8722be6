/**
 * @fileoverview Error classes for fskit
 *
 * Two families live here:
 *
 * - POSIX-style {@link FSError} subclasses (`ENOENT`, `EACCES`, ...) raised by
 *   backends. Messages follow the Node.js fs convention
 *   `CODE: message, syscall 'path'`. `ENOENT` doubles as the "not found" kind.
 * - Library-level errors: {@link ConfigurationError} for misuse of a finder or
 *   watcher, and the {@link IOError} family for traversal and persistence
 *   failures. IOErrors always carry the offending path and wrap the original
 *   error as `cause`.
 *
 * @example
 * ```typescript
 * import { ENOENT, isEnoent } from './errors.js'
 *
 * throw new ENOENT('scandir', '/missing/dir')
 * // ENOENT: no such file or directory, scandir '/missing/dir'
 * ```
 *
 * @module errors
 */

// ============================================================================
// Error Code Definitions
// ============================================================================

/**
 * Maps POSIX error codes to their errno values and messages.
 */
const ERROR_CODES = {
  ENOENT: { errno: -2, message: 'no such file or directory' },
  EEXIST: { errno: -17, message: 'file already exists' },
  EISDIR: { errno: -21, message: 'illegal operation on a directory' },
  ENOTDIR: { errno: -20, message: 'not a directory' },
  EACCES: { errno: -13, message: 'permission denied' },
  EPERM: { errno: -1, message: 'operation not permitted' },
  ENOTEMPTY: { errno: -39, message: 'directory not empty' },
  EINVAL: { errno: -22, message: 'invalid argument' },
  ELOOP: { errno: -40, message: 'too many levels of symbolic links' },
  EBUSY: { errno: -16, message: 'resource busy or locked' },
  EMFILE: { errno: -24, message: 'too many open files' },
} as const

// ============================================================================
// Type Definitions
// ============================================================================

/**
 * Union type of all supported POSIX error codes.
 */
export type ErrorCode = keyof typeof ERROR_CODES

// ============================================================================
// Base Error Class
// ============================================================================

/**
 * Base class for all POSIX-style filesystem errors.
 *
 * @example
 * ```typescript
 * const error = new FSError('ENOENT', -2, 'no such file or directory', 'open', '/file.txt')
 * error.message  // "ENOENT: no such file or directory, open '/file.txt'"
 * ```
 */
export class FSError extends Error {
  /** POSIX error code string (e.g., 'ENOENT', 'EACCES') */
  code: string

  /** Numeric errno value (negative, following Node.js convention) */
  errno: number

  /** System call that triggered the error (e.g., 'open', 'scandir') */
  syscall?: string

  /** Source path involved in the operation */
  path?: string

  /** Destination path for copy-like operations */
  dest?: string

  constructor(code: string, errno: number, message: string, syscall?: string, path?: string, dest?: string) {
    const fullMessage = `${code}: ${message}${syscall ? `, ${syscall}` : ''}${path ? ` '${path}'` : ''}${dest ? ` -> '${dest}'` : ''}`
    super(fullMessage)
    this.name = 'FSError'
    this.code = code
    this.errno = errno
    this.syscall = syscall
    this.path = path
    this.dest = dest
  }
}

// ============================================================================
// Error Class Factory
// ============================================================================

/**
 * @internal
 */
function createErrorClass<T extends ErrorCode>(code: T) {
  const { errno, message } = ERROR_CODES[code]

  return class extends FSError {
    constructor(syscall?: string, path?: string, dest?: string) {
      super(code, errno, message, syscall, path, dest)
      this.name = code
    }
  }
}

// ============================================================================
// Specific Error Classes
// ============================================================================

/**
 * ENOENT - No such file or directory.
 *
 * Raised when a finder root, a watched directory or a copy source does not
 * exist.
 */
export class ENOENT extends createErrorClass('ENOENT') {}

/** EEXIST - File exists. */
export class EEXIST extends createErrorClass('EEXIST') {}

/** EISDIR - Expected a file, found a directory. */
export class EISDIR extends createErrorClass('EISDIR') {}

/** ENOTDIR - Expected a directory, found something else. */
export class ENOTDIR extends createErrorClass('ENOTDIR') {}

/** EACCES - Permission denied. */
export class EACCES extends createErrorClass('EACCES') {}

/** EPERM - Operation not permitted. */
export class EPERM extends createErrorClass('EPERM') {}

/** ENOTEMPTY - Directory not empty. */
export class ENOTEMPTY extends createErrorClass('ENOTEMPTY') {}

/**
 * EINVAL - Invalid argument.
 *
 * Used by the config factories for option values of the wrong type.
 */
export class EINVAL extends createErrorClass('EINVAL') {}

/** ELOOP - Too many levels of symbolic links. */
export class ELOOP extends createErrorClass('ELOOP') {}

/** EBUSY - Resource busy. */
export class EBUSY extends createErrorClass('EBUSY') {}

/** EMFILE - Too many open files. */
export class EMFILE extends createErrorClass('EMFILE') {}

// ============================================================================
// Library Errors
// ============================================================================

/**
 * Thrown when a finder or watcher is used before its minimum configuration
 * is in place (no roots, no watch directories). Not retryable.
 *
 * @example
 * ```typescript
 * await FileFinder.create().count()
 * // ConfigurationError: FileFinder: call in() or append() before iterating
 * ```
 */
export class ConfigurationError extends Error {
  /** Component that rejected its configuration */
  readonly component: string

  constructor(component: string, message: string) {
    super(`${component}: ${message}`)
    this.name = 'ConfigurationError'
    this.component = component
  }
}

/**
 * Base class for I/O failures surfaced by the library.
 *
 * Wraps the low-level error (usually an {@link FSError}) as `cause` and
 * keeps its code, so callers never need to inspect raw OS errors.
 */
export class IOError extends Error {
  /** The path that caused the error */
  readonly path: string
  /** The underlying error code (e.g., 'ENOENT', 'EACCES') */
  readonly code?: string

  constructor(message: string, path: string, code?: string, cause?: unknown) {
    super(message, { cause })
    this.name = 'IOError'
    this.path = path
    this.code = code
  }
}

/**
 * A directory could not be read during a walk.
 */
export class TraversalError extends IOError {
  constructor(message: string, path: string, code?: string, cause?: unknown) {
    super(message, path, code, cause)
    this.name = 'TraversalError'
  }
}

/**
 * A file could not be read.
 */
export class FileReadError extends IOError {
  constructor(message: string, path: string, code?: string, cause?: unknown) {
    super(message, path, code, cause)
    this.name = 'FileReadError'
  }
}

/**
 * A file could not be written.
 */
export class FileWriteError extends IOError {
  constructor(message: string, path: string, code?: string, cause?: unknown) {
    super(message, path, code, cause)
    this.name = 'FileWriteError'
  }
}

// ============================================================================
// Type Guards
// ============================================================================

export function isFSError(error: unknown): error is FSError {
  return error instanceof FSError
}

export function isEnoent(error: unknown): error is ENOENT {
  return error instanceof ENOENT
}

export function isEexist(error: unknown): error is EEXIST {
  return error instanceof EEXIST
}

export function isEnotdir(error: unknown): error is ENOTDIR {
  return error instanceof ENOTDIR
}

export function isEacces(error: unknown): error is EACCES {
  return error instanceof EACCES
}

export function isIOError(error: unknown): error is IOError {
  return error instanceof IOError
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Check if a value is one of the supported error codes.
 */
export function isErrorCode(code: unknown): code is ErrorCode {
  return typeof code === 'string' && Object.prototype.hasOwnProperty.call(ERROR_CODES, code)
}

/**
 * Get the error code from an error or any object carrying a `code` string.
 */
export function getErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code
  }
  return undefined
}

/**
 * Create an error instance for the given code.
 */
export function createError(code: ErrorCode, syscall?: string, path?: string, dest?: string): FSError {
  const ErrorClass = {
    ENOENT,
    EEXIST,
    EISDIR,
    ENOTDIR,
    EACCES,
    EPERM,
    ENOTEMPTY,
    EINVAL,
    ELOOP,
    EBUSY,
    EMFILE,
  }[code]

  return new ErrorClass(syscall, path, dest)
}

/**
 * Convert anything thrown by Node's fs module into an {@link FSError}.
 *
 * Known codes map onto their specific class; unknown codes become a plain
 * FSError that keeps the original code and message.
 *
 * @example
 * ```typescript
 * try {
 *   await fs.readdir(dir)
 * } catch (err) {
 *   throw toFSError(err, 'scandir', dir)  // ENOENT / EACCES / ...
 * }
 * ```
 */
export function toFSError(error: unknown, syscall: string, path: string, dest?: string): FSError {
  if (isFSError(error)) return error

  const code = getErrorCode(error)
  if (isErrorCode(code)) {
    return createError(code, syscall, path, dest)
  }

  const message = error instanceof Error ? error.message : String(error)
  return new FSError(code ?? 'EIO', -5, message, syscall, path, dest)
}

export const ALL_ERROR_CODES: readonly ErrorCode[] = Object.freeze(
  Object.keys(ERROR_CODES).filter(isErrorCode)
)
