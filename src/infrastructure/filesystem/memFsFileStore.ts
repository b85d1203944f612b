/**
 * Infrastructure Layer - In-Memory File Store
 *
 * memfs-backed store for handles that must not touch the real disk
 * (tests, previews). Same error behaviour as the real filesystem: writing
 * into a directory that does not exist fails with ENOENT.
 */

import { Volume } from 'memfs'
import type { FileStore } from '../../core/ports/fileStore.js'

export class MemFsFileStore implements FileStore {
  readonly volume: Volume

  constructor(volume: Volume = new Volume()) {
    this.volume = volume
  }

  /** Build a store pre-populated from `{ '/abs/path': 'content' }`. */
  static fromJSON(files: Record<string, string>): MemFsFileStore {
    return new MemFsFileStore(Volume.fromJSON(files))
  }

  async exists(path: string): Promise<boolean> {
    return this.volume.existsSync(path)
  }

  async readBytes(path: string): Promise<Uint8Array> {
    const data = await this.volume.promises.readFile(path)
    return typeof data === 'string' ? Buffer.from(data, 'utf8') : data
  }

  async writeBytes(path: string, bytes: Uint8Array): Promise<void> {
    await this.volume.promises.writeFile(path, bytes)
  }
}
