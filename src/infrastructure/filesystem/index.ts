export { FsFileStore } from './fsFileStore.js'
export { MemFsFileStore } from './memFsFileStore.js'
