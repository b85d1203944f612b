export { FileHandle } from './fileHandle.js'
export type { FileHandleDeps, FileHandleEvent, RelocationReason } from './fileHandle.js'
