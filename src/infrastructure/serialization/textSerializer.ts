import type { Serializer } from '../../core/ports/serializer.js'
import { DecodeError } from '../../core/errors.js'

/** Plain UTF-8 text; rejects byte sequences that are not valid UTF-8. */
export class TextSerializer implements Serializer<string> {
  readonly format = 'text'
  readonly #decoder = new TextDecoder('utf-8', { fatal: true })
  readonly #encoder = new TextEncoder()

  encode(value: string): Uint8Array {
    return this.#encoder.encode(value)
  }

  decode(bytes: Uint8Array): string {
    try {
      return this.#decoder.decode(bytes)
    } catch (error) {
      throw new DecodeError(this.format, 'bytes are not valid UTF-8', { cause: error })
    }
  }
}
