/**
 * Core Layer - Errors
 *
 * Every failure the file handle reports carries a machine-readable `code`
 * so callers can branch without matching on messages.
 */

import type { FileIdentity, IdentityField } from './fileIdentity.js'

export type FileKeeperErrorCode =
  | 'INCOMPLETE_IDENTITY'
  | 'FILE_DELETED'
  | 'ENCODE_FAILED'
  | 'DECODE_FAILED'
  | 'HANDLE_DISPOSED'

export class FileKeeperError extends Error {
  readonly code: FileKeeperErrorCode

  constructor(code: FileKeeperErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'FileKeeperError'
    this.code = code
  }
}

// ============================================================================
// Identity
// ============================================================================

/** What the handle was trying to do when it found its identity incomplete. */
export type IdentityOperation = 'save' | 'watch' | 'path'

export class IncompleteIdentityError extends FileKeeperError {
  readonly missing: readonly IdentityField[]
  readonly operation: IdentityOperation

  constructor(missing: readonly IdentityField[], operation: IdentityOperation) {
    super('INCOMPLETE_IDENTITY', `The file ${missing.join(' and ')} must be set to initialise the ${operation}`)
    this.name = 'IncompleteIdentityError'
    this.missing = missing
    this.operation = operation
  }
}

/**
 * Delivered (not thrown) when the watched file disappears from its directory
 * without the handle being relocated.
 */
export class FileDeletedError extends FileKeeperError {
  readonly identity: FileIdentity

  constructor(identity: FileIdentity) {
    super(
      'FILE_DELETED',
      `The file ${identity.baseName}${identity.extension} was either deleted or moved from ${identity.directory}`
    )
    this.name = 'FileDeletedError'
    this.identity = { ...identity }
  }
}

// ============================================================================
// Serialization
// ============================================================================

export class EncodeError extends FileKeeperError {
  readonly format: string

  constructor(format: string, message: string, options?: { cause?: unknown }) {
    super('ENCODE_FAILED', `Cannot encode value as ${format}: ${message}`, options)
    this.name = 'EncodeError'
    this.format = format
  }
}

export class DecodeError extends FileKeeperError {
  readonly format: string

  constructor(format: string, message: string, options?: { cause?: unknown }) {
    super('DECODE_FAILED', `Cannot decode ${format} data: ${message}`, options)
    this.name = 'DecodeError'
    this.format = format
  }
}

// ============================================================================
// Lifecycle
// ============================================================================

export class HandleDisposedError extends FileKeeperError {
  constructor(operation: string) {
    super('HANDLE_DISPOSED', `Cannot ${operation}: the file handle has been disposed`)
    this.name = 'HandleDisposedError'
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value))
}
