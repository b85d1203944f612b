export { JsonSerializer, type JsonSchema, type JsonSerializerOptions } from './jsonSerializer.js'
export { V8Serializer } from './v8Serializer.js'
export { TextSerializer } from './textSerializer.js'
export { SERIALIZER_FORMATS, createSerializer, initialDataFor, type SerializerFormat } from './createSerializer.js'
