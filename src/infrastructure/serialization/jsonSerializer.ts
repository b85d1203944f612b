/**
 * Infrastructure Layer - JSON Serializer
 *
 * UTF-8 JSON. With a zod schema, decoded values are validated so a handle
 * never holds data of the wrong shape.
 */

import type { z } from 'zod'
import type { Serializer } from '../../core/ports/serializer.js'
import { DecodeError, EncodeError } from '../../core/errors.js'

export type JsonSerializerOptions = {
  /** Indentation passed to JSON.stringify. */
  space?: number
}

export type JsonSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>

export class JsonSerializer<T = unknown> implements Serializer<T> {
  readonly format = 'json'
  readonly #validate: (value: unknown) => T
  readonly #space: number | undefined
  readonly #decoder = new TextDecoder('utf-8', { fatal: true })
  readonly #encoder = new TextEncoder()

  constructor(validate: (value: unknown) => T, opts: JsonSerializerOptions = {}) {
    this.#validate = validate
    this.#space = opts.space
  }

  /** Accepts any JSON document. */
  static untyped(opts?: JsonSerializerOptions): JsonSerializer<unknown> {
    return new JsonSerializer((value) => value, opts)
  }

  static withSchema<T>(schema: JsonSchema<T>, opts?: JsonSerializerOptions): JsonSerializer<T> {
    return new JsonSerializer((value) => {
      const result = schema.safeParse(value)
      if (result.success) return result.data
      const issues = result.error.issues
        .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`)
        .join('; ')
      throw new DecodeError('json', `schema mismatch (${issues})`, { cause: result.error })
    }, opts)
  }

  encode(value: T): Uint8Array {
    let text: string | undefined
    try {
      text = JSON.stringify(value, null, this.#space)
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      throw new EncodeError(this.format, reason, { cause: error })
    }
    if (text === undefined) {
      throw new EncodeError(this.format, `${typeof value} has no JSON representation`)
    }
    return this.#encoder.encode(text)
  }

  decode(bytes: Uint8Array): T {
    let parsed: unknown
    try {
      parsed = JSON.parse(this.#decoder.decode(bytes))
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      throw new DecodeError(this.format, reason, { cause: error })
    }
    return this.#validate(parsed)
  }
}
