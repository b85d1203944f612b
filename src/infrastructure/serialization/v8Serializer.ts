/**
 * Infrastructure Layer - V8 Serializer
 *
 * Structured-clone serialization from `node:v8`. Round-trips values JSON
 * cannot (Map, Set, Date, BigInt, typed arrays, cycles) but is tied to the
 * V8 wire format.
 */

import { deserialize, serialize } from 'node:v8'
import type { Serializer } from '../../core/ports/serializer.js'
import { DecodeError, EncodeError } from '../../core/errors.js'

export class V8Serializer<T = unknown> implements Serializer<T> {
  readonly format = 'v8'
  readonly #validate: (value: unknown) => T

  constructor(validate: (value: unknown) => T) {
    this.#validate = validate
  }

  static untyped(): V8Serializer<unknown> {
    return new V8Serializer((value) => value)
  }

  encode(value: T): Uint8Array {
    try {
      return serialize(value)
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      throw new EncodeError(this.format, reason, { cause: error })
    }
  }

  decode(bytes: Uint8Array): T {
    let value: unknown
    try {
      value = deserialize(bytes)
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      throw new DecodeError(this.format, reason, { cause: error })
    }
    return this.#validate(value)
  }
}
