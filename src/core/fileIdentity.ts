/**
 * Core Layer - File Identity
 *
 * The (directory, base name, extension) triple that decides where a handle
 * lives on disk. An empty string means the field is unset.
 *
 * The base name is everything before the FIRST dot of the file name while
 * the extension is only the LAST extension segment, so `a.b.tar.gz` becomes
 * `a` + `.gz`. Saving such an identity writes `a.gz`; this asymmetry is the
 * established naming rule and is kept as is.
 */

import { basename, dirname, extname, join } from 'node:path'
import { IncompleteIdentityError, type IdentityOperation } from './errors.js'

export type FileIdentity = {
  readonly directory: string
  readonly baseName: string
  readonly extension: string
}

/** Field names as they appear in error messages, in reporting order. */
export type IdentityField = 'name' | 'extension' | 'directory'

export const UNSET_IDENTITY: FileIdentity = Object.freeze({ directory: '', baseName: '', extension: '' })

export function deriveFromPath(path: string): FileIdentity {
  const fileName = basename(path)
  return {
    directory: dirname(path),
    baseName: fileName.split('.')[0] ?? '',
    extension: extname(path)
  }
}

export function missingFields(identity: FileIdentity): IdentityField[] {
  const missing: IdentityField[] = []
  if (!identity.baseName) missing.push('name')
  if (!identity.extension) missing.push('extension')
  if (!identity.directory) missing.push('directory')
  return missing
}

export function isComplete(identity: FileIdentity): boolean {
  return missingFields(identity).length === 0
}

/**
 * @throws IncompleteIdentityError naming every unset field
 */
export function assertComplete(identity: FileIdentity, operation: IdentityOperation): void {
  const missing = missingFields(identity)
  if (missing.length > 0) {
    throw new IncompleteIdentityError(missing, operation)
  }
}

export function toAbsolutePath(identity: FileIdentity, operation: IdentityOperation = 'path'): string {
  assertComplete(identity, operation)
  return join(identity.directory, identity.baseName + identity.extension)
}

export function sameIdentity(a: FileIdentity, b: FileIdentity): boolean {
  return a.directory === b.directory && a.baseName === b.baseName && a.extension === b.extension
}
