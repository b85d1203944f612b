/**
 * Core Layer - Ports
 *
 * Byte-level access to the file backing a handle.
 * Paths are absolute. Implementations never create missing directories.
 */

export interface FileStore {
  exists(path: string): Promise<boolean>
  readBytes(path: string): Promise<Uint8Array>
  /** Full overwrite, never append. */
  writeBytes(path: string, bytes: Uint8Array): Promise<void>
}
