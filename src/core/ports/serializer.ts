/**
 * Core Layer - Ports
 *
 * Serializer turns the value owned by a file handle into bytes and back.
 * The on-disk format is whatever the adapter defines; the core treats it
 * as opaque.
 */

export interface Serializer<T> {
  /** Short format id, e.g. `json`. */
  readonly format: string

  /**
   * @throws EncodeError when the value cannot be represented
   */
  encode(value: T): Uint8Array

  /**
   * @throws DecodeError when the bytes are not a valid encoding
   */
  decode(bytes: Uint8Array): T
}
