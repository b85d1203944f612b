/**
 * Infrastructure Layer - Filesystem File Store
 *
 * Byte access to real files through `node:fs/promises`. Errors such as
 * ENOENT for a missing parent directory or EACCES propagate unchanged.
 */

import { access, readFile, writeFile } from 'node:fs/promises'
import { constants } from 'node:fs'
import type { FileStore } from '../../core/ports/fileStore.js'

export class FsFileStore implements FileStore {
  async exists(path: string): Promise<boolean> {
    try {
      await access(path, constants.F_OK)
      return true
    } catch {
      return false
    }
  }

  async readBytes(path: string): Promise<Uint8Array> {
    return readFile(path)
  }

  async writeBytes(path: string, bytes: Uint8Array): Promise<void> {
    await writeFile(path, bytes)
  }
}
