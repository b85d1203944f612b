import { beforeEach, describe, expect, test, vi } from 'vitest'
import { FileHandle, type FileHandleDeps, type FileHandleEvent } from '../../src/application/fileHandle.js'
import {
  DecodeError,
  EncodeError,
  HandleDisposedError,
  IncompleteIdentityError,
} from '../../src/core/errors.js'
import { UNSET_IDENTITY } from '../../src/core/fileIdentity.js'
import { MemFsFileStore } from '../../src/infrastructure/filesystem/memFsFileStore.js'
import { JsonSerializer } from '../../src/infrastructure/serialization/jsonSerializer.js'
import { TextSerializer } from '../../src/infrastructure/serialization/textSerializer.js'
import { InMemoryWatchSource } from '../../src/infrastructure/watch/inMemoryWatchSource.js'

describe('FileHandle', () => {
  let store: MemFsFileStore
  let watchSource: InMemoryWatchSource
  let deps: FileHandleDeps<string>

  const readText = (path: string) => store.volume.readFileSync(path, 'utf8')

  beforeEach(() => {
    store = new MemFsFileStore()
    store.volume.mkdirSync('/tmp/x', { recursive: true })
    store.volume.mkdirSync('/tmp/y', { recursive: true })
    watchSource = new InMemoryWatchSource()
    deps = { serializer: new TextSerializer(), store, watchSource, initialData: '' }
  })

  describe('construction', () => {
    test('without a path the handle is in-memory only', async () => {
      const handle = await FileHandle.create(deps)
      expect(handle.getIdentity()).toEqual(UNSET_IDENTITY)
      expect(handle.hasUnsavedChanges()).toBe(false)
      expect(handle.isWatching()).toBe(false)
      expect(handle.getData()).toBe('')
    })

    test('a nonexistent path is created with the current data', async () => {
      const handle = await FileHandle.create(deps, '/tmp/x/Foo.bar')

      expect(handle.getIdentity()).toEqual({ directory: '/tmp/x', baseName: 'Foo', extension: '.bar' })
      expect(store.volume.existsSync('/tmp/x/Foo.bar')).toBe(true)
      expect(readText('/tmp/x/Foo.bar')).toBe('')
      expect(handle.hasUnsavedChanges()).toBe(false)
      expect(handle.isWatching()).toBe(true)
      expect(watchSource.watchedDirectories()).toEqual(['/tmp/x'])
    })

    test('an existing path is loaded and marked clean', async () => {
      store.volume.writeFileSync('/tmp/x/notes.txt', 'remember the milk')

      const handle = await FileHandle.create(deps, '/tmp/x/notes.txt')

      expect(handle.getData()).toBe('remember the milk')
      expect(handle.hasUnsavedChanges()).toBe(false)
      expect(handle.getAbsolutePath()).toBe('/tmp/x/notes.txt')
      expect(watchSource.activeSubscriptionCount('/tmp/x')).toBe(1)
    })

    test('creating through open reports the save and the new location', async () => {
      const handle = new FileHandle(deps)
      const events: FileHandleEvent[] = []
      handle.events$.subscribe((event) => events.push(event))

      await handle.open('/tmp/x/Foo.bar')

      expect(events).toEqual([
        { type: 'saved', path: '/tmp/x/Foo.bar' },
        { type: 'relocated', from: null, to: '/tmp/x/Foo.bar', reason: 'saveAs' },
      ])
    })

    test('undecodable content fails with DecodeError and leaves the handle untouched', async () => {
      store.volume.writeFileSync('/tmp/x/state.json', '{"broken":')
      const handle = new FileHandle<unknown>({ ...deps, serializer: JsonSerializer.untyped(), initialData: null })

      await expect(handle.open('/tmp/x/state.json')).rejects.toThrow(DecodeError)
      expect(handle.getIdentity()).toEqual(UNSET_IDENTITY)
      expect(handle.getData()).toBeNull()
      expect(handle.isWatching()).toBe(false)
    })

    test('a failed create releases everything it acquired', async () => {
      store.volume.writeFileSync('/tmp/x/state.json', 'nope')

      await expect(
        FileHandle.create<unknown>({ ...deps, serializer: JsonSerializer.untyped(), initialData: null }, '/tmp/x/state.json')
      ).rejects.toThrow(DecodeError)
      expect(watchSource.activeSubscriptionCount()).toBe(0)
    })
  })

  describe('dirty tracking', () => {
    test('setData marks dirty and save clears it', async () => {
      const handle = await FileHandle.create(deps, '/tmp/x/Foo.bar')

      handle.setData('first')
      expect(handle.hasUnsavedChanges()).toBe(true)
      handle.setData('second')
      expect(handle.hasUnsavedChanges()).toBe(true)

      await handle.save()
      expect(handle.hasUnsavedChanges()).toBe(false)
      expect(readText('/tmp/x/Foo.bar')).toBe('second')
    })

    test('getData has no side effects', async () => {
      const handle = await FileHandle.create(deps, '/tmp/x/Foo.bar')
      handle.getData()
      expect(handle.hasUnsavedChanges()).toBe(false)
    })

    test('update applies a recipe to the current value', async () => {
      const handle = await FileHandle.create(deps, '/tmp/x/Foo.bar')
      handle.setData('a')
      await handle.save()

      handle.update((current) => `${current}b`)

      expect(handle.getData()).toBe('ab')
      expect(handle.hasUnsavedChanges()).toBe(true)
    })

    test('subclass mutators mark the handle dirty', async () => {
      class TodoFile extends FileHandle<string[]> {
        add(item: string): void {
          this.getData().push(item)
          this.markDirty()
        }
      }

      const todos = new TodoFile({
        serializer: new JsonSerializer((value) => (Array.isArray(value) ? value.map(String) : [])),
        store,
        watchSource,
        initialData: [],
      })
      await todos.saveAs('/tmp/x/todo.json')

      todos.add('write tests')
      expect(todos.hasUnsavedChanges()).toBe(true)

      await todos.save()
      expect(todos.hasUnsavedChanges()).toBe(false)
      expect(readText('/tmp/x/todo.json')).toBe('["write tests"]')
    })

    test('a mutation during an in-flight save keeps the handle dirty', async () => {
      const handle = await FileHandle.create(deps, '/tmp/x/Foo.bar')
      handle.setData('first')

      let signalStarted: () => void = () => undefined
      let releaseWrite: () => void = () => undefined
      const writeStarted = new Promise<void>((resolve) => {
        signalStarted = resolve
      })
      vi.spyOn(store, 'writeBytes').mockImplementationOnce(async () => {
        signalStarted()
        await new Promise<void>((resolve) => {
          releaseWrite = resolve
        })
      })

      const saving = handle.save()
      await writeStarted
      handle.setData('second')
      releaseWrite()
      await saving

      expect(handle.hasUnsavedChanges()).toBe(true)
    })
  })

  describe('save', () => {
    test('without identity fails before any I/O and keeps the dirty flag', async () => {
      const handle = new FileHandle(deps)
      const write = vi.spyOn(store, 'writeBytes')
      handle.setData('unsaved')

      await expect(handle.save()).rejects.toThrow(
        new IncompleteIdentityError(['name', 'extension', 'directory'], 'save')
      )
      expect(write).not.toHaveBeenCalled()
      expect(handle.hasUnsavedChanges()).toBe(true)
    })

    test('save then reopen in a fresh handle returns the data', async () => {
      const handle = await FileHandle.create(deps, '/tmp/x/Foo.bar')
      handle.setData('X')
      await handle.save()
      handle.dispose()

      const reopened = await FileHandle.create(deps, '/tmp/x/Foo.bar')
      expect(reopened.getData()).toBe('X')
      expect(reopened.hasUnsavedChanges()).toBe(false)
    })

    test('save overwrites instead of appending', async () => {
      const handle = await FileHandle.create(deps, '/tmp/x/Foo.bar')
      handle.setData('a long first version')
      await handle.save()
      handle.setData('short')
      await handle.save()
      expect(readText('/tmp/x/Foo.bar')).toBe('short')
    })

    test('an I/O failure leaves identity and dirty flag as they were, so retrying works', async () => {
      const handle = await FileHandle.create(deps, '/tmp/x/Foo.bar')
      handle.setData('precious')
      vi.spyOn(store, 'writeBytes').mockRejectedValueOnce(new Error('disk full'))

      await expect(handle.save()).rejects.toThrow('disk full')
      expect(handle.hasUnsavedChanges()).toBe(true)
      expect(handle.getAbsolutePath()).toBe('/tmp/x/Foo.bar')

      await handle.save()
      expect(handle.hasUnsavedChanges()).toBe(false)
      expect(readText('/tmp/x/Foo.bar')).toBe('precious')
    })

    test('an encode failure propagates and keeps the handle dirty', async () => {
      const handle = await FileHandle.create<unknown>(
        { ...deps, serializer: JsonSerializer.untyped(), initialData: null },
        '/tmp/x/state.json'
      )
      handle.setData({ id: 1n })

      await expect(handle.save()).rejects.toThrow(EncodeError)
      expect(handle.hasUnsavedChanges()).toBe(true)
      expect(readText('/tmp/x/state.json')).toBe('null')
    })
  })

  describe('saveAs', () => {
    test('writes to the new path and moves the subscription there', async () => {
      const handle = await FileHandle.create(deps, '/tmp/x/Foo.bar')
      const events: FileHandleEvent[] = []
      handle.events$.subscribe((event) => events.push(event))
      handle.setData('copy')

      await handle.saveAs('/tmp/y/Copy.txt')

      expect(readText('/tmp/y/Copy.txt')).toBe('copy')
      expect(readText('/tmp/x/Foo.bar')).toBe('')
      expect(handle.getAbsolutePath()).toBe('/tmp/y/Copy.txt')
      expect(watchSource.watchedDirectories()).toEqual(['/tmp/y'])
      expect(watchSource.activeSubscriptionCount()).toBe(1)
      expect(events).toEqual([
        { type: 'saved', path: '/tmp/y/Copy.txt' },
        { type: 'relocated', from: '/tmp/x/Foo.bar', to: '/tmp/y/Copy.txt', reason: 'saveAs' },
      ])
    })

    test('into a missing directory fails with the I/O error and changes nothing', async () => {
      const handle = await FileHandle.create(deps, '/tmp/x/Foo.bar')
      handle.setData('pending')

      await expect(handle.saveAs('/nowhere/Foo.bar')).rejects.toMatchObject({ code: 'ENOENT' })
      expect(handle.getAbsolutePath()).toBe('/tmp/x/Foo.bar')
      expect(handle.hasUnsavedChanges()).toBe(true)
      expect(watchSource.watchedDirectories()).toEqual(['/tmp/x'])
    })

    test('a path without an extension is rejected before writing', async () => {
      const handle = new FileHandle(deps)
      const write = vi.spyOn(store, 'writeBytes')

      await expect(handle.saveAs('/tmp/x/Makefile')).rejects.toThrow(
        'The file extension must be set to initialise the save'
      )
      expect(write).not.toHaveBeenCalled()
    })
  })

  describe('getAbsolutePath', () => {
    test('fails explicitly when identity is unset', () => {
      const handle = new FileHandle(deps)
      expect(() => handle.getAbsolutePath()).toThrow(IncompleteIdentityError)
      expect(() => handle.getAbsolutePath()).toThrow(
        'The file name and extension and directory must be set to initialise the path'
      )
    })
  })

  describe('dispose', () => {
    test('stops watching before returning and rejects later persistence', async () => {
      const handle = await FileHandle.create(deps, '/tmp/x/Foo.bar')

      handle.dispose()

      expect(watchSource.activeSubscriptionCount()).toBe(0)
      expect(handle.isWatching()).toBe(false)
      expect(handle.isDisposed()).toBe(true)
      await expect(handle.save()).rejects.toThrow(HandleDisposedError)
      await expect(handle.saveAs('/tmp/y/Foo.bar')).rejects.toThrow('Cannot save as: the file handle has been disposed')
      await expect(handle.recoverFromDelete('/tmp/y/Foo.bar')).rejects.toThrow(HandleDisposedError)
      expect(store.volume.existsSync('/tmp/y/Foo.bar')).toBe(false)
    })

    test('is idempotent', async () => {
      const handle = await FileHandle.create(deps, '/tmp/x/Foo.bar')
      handle.dispose()
      expect(() => handle.dispose()).not.toThrow()
    })

    test('a save queued before dispose does not run afterwards', async () => {
      const handle = await FileHandle.create(deps, '/tmp/x/Foo.bar')
      handle.setData('late')

      const saving = handle.save()
      handle.dispose()

      await expect(saving).rejects.toThrow(HandleDisposedError)
      expect(readText('/tmp/x/Foo.bar')).toBe('')
    })
  })
})
