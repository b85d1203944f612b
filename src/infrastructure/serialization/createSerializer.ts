import type { Serializer } from '../../core/ports/serializer.js'
import { EncodeError } from '../../core/errors.js'
import { JsonSerializer } from './jsonSerializer.js'
import { TextSerializer } from './textSerializer.js'
import { V8Serializer } from './v8Serializer.js'

export const SERIALIZER_FORMATS = ['json', 'v8', 'text'] as const

export type SerializerFormat = (typeof SERIALIZER_FORMATS)[number]

/**
 * Serializer for a configured format, typed for values whose shape is only
 * known at run time.
 */
export function createSerializer(format: SerializerFormat, opts: { space?: number } = {}): Serializer<unknown> {
  switch (format) {
    case 'json':
      return JsonSerializer.untyped({ space: opts.space })
    case 'v8':
      return V8Serializer.untyped()
    case 'text': {
      const text = new TextSerializer()
      return {
        format: text.format,
        encode: (value) => {
          if (typeof value !== 'string') {
            throw new EncodeError(text.format, `expected a string, got ${typeof value}`)
          }
          return text.encode(value)
        },
        decode: (bytes) => text.decode(bytes)
      }
    }
  }
}

/** Value a fresh handle holds before anything is set, per format. */
export function initialDataFor(format: SerializerFormat): unknown {
  return format === 'text' ? '' : null
}
