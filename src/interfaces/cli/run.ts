import { resolve } from 'node:path'
import { inspect } from 'node:util'
import yargs from 'yargs'
import type { FileHandleEvent } from '../../application/fileHandle.js'
import type { FileStore, WatchSource } from '../../core/ports/index.js'
import { deriveFromPath, missingFields, toAbsolutePath } from '../../core/fileIdentity.js'
import { createApp, type App } from '../../app/createApp.js'
import { SERIALIZER_FORMATS, type SerializerFormat } from '../../infrastructure/serialization/createSerializer.js'
import type { IO } from './io.js'

type GlobalArgs = {
  workspace?: string
  format?: string
}

function isSerializerFormat(value: string): value is SerializerFormat {
  return SERIALIZER_FORMATS.some((format) => format === value)
}

function toFormat(value: string | undefined): SerializerFormat | undefined {
  if (value === undefined) return undefined
  if (!isSerializerFormat(value)) throw new Error(`Unknown format: ${value}`)
  return value
}

/**
 * CLI adapter: parse commands → drive a file handle
 *
 * Commands:
 * - identity <path>
 * - cat <path>
 * - write <path> [value]      (value read from stdin when omitted)
 * - watch <path>              (prints handle events until interrupted)
 */
export async function runCli(opts: {
  argv: string[]
  defaultWorkspace: string
  io: IO
  env?: NodeJS.ProcessEnv
  store?: FileStore
  watchSource?: WatchSource
}): Promise<number> {
  const { argv, io } = opts

  const withApp = async (args: GlobalArgs, fn: (app: App) => Promise<void>): Promise<void> => {
    const app = createApp({
      baseDir: resolve(args.workspace ?? opts.defaultWorkspace),
      env: opts.env,
      format: toFormat(args.format),
      store: opts.store,
      watchSource: opts.watchSource,
      onWarn: (message) => io.stderr(`${message}\n`),
    })
    try {
      await fn(app)
    } finally {
      app.dispose()
    }
  }

  const parser = yargs(argv)
    .scriptName('filekeeper')
    .option('workspace', { type: 'string', describe: 'Directory relative paths and filekeeper.json resolve against' })
    .option('format', { type: 'string', choices: SERIALIZER_FORMATS, describe: 'Serializer used for the file contents' })
    .command(
      'identity <path>',
      'Show how a path splits into directory, name and extension',
      (y) => y.positional('path', { type: 'string', demandOption: true }),
      (args) => {
        const absolutePath = resolve(args.workspace ?? opts.defaultWorkspace, args.path)
        const identity = deriveFromPath(absolutePath)
        io.stdout(`directory: ${identity.directory}\n`)
        io.stdout(`name: ${identity.baseName}\n`)
        io.stdout(`extension: ${identity.extension}\n`)
        const missing = missingFields(identity)
        if (missing.length > 0) {
          io.stdout(`missing: ${missing.join(', ')}\n`)
        } else {
          io.stdout(`path: ${toAbsolutePath(identity)}\n`)
        }
      }
    )
    .command(
      'cat <path>',
      'Print the data stored in a file',
      (y) => y.positional('path', { type: 'string', demandOption: true }),
      async (args) => {
        await withApp(args, async (app) => {
          const absolutePath = resolve(app.baseDir, args.path)
          if (!(await app.store.exists(absolutePath))) {
            throw new Error(`${absolutePath} does not exist`)
          }
          const handle = await app.openHandle(absolutePath)
          try {
            io.stdout(renderData(handle.getData(), app.config.serializer))
          } finally {
            handle.dispose()
          }
        })
      }
    )
    .command(
      'write <path> [value]',
      'Replace the data stored in a file (created when missing)',
      (y) =>
        y
          .positional('path', { type: 'string', demandOption: true })
          .positional('value', { type: 'string' }),
      async (args) => {
        const raw = args.value ?? (await io.readStdin())
        await withApp(args, async (app) => {
          const handle = await app.openHandle(args.path)
          try {
            handle.setData(parseValue(raw, app.config.serializer))
            await handle.save()
            io.stdout(`saved ${handle.getAbsolutePath()}\n`)
          } finally {
            handle.dispose()
          }
        })
      }
    )
    .command(
      'watch <path>',
      'Open a file and report renames, moves, edits and deletes until interrupted',
      (y) => y.positional('path', { type: 'string', demandOption: true }),
      async (args) => {
        await withApp(args, async (app) => {
          const handle = await app.openHandle(args.path)
          const subscription = handle.events$.subscribe((event) => io.stdout(`${describeEvent(event)}\n`))
          try {
            io.stdout(`watching ${handle.getAbsolutePath()}\n`)
            await (io.waitForInterrupt ? io.waitForInterrupt() : Promise.resolve())
            await handle.whenIdle()
          } finally {
            subscription.unsubscribe()
            handle.dispose()
          }
          io.stdout('stopped\n')
        })
      }
    )
    .demandCommand(1)
    .strict()
    .help()
    .exitProcess(false)
    .fail((message, error) => {
      throw error ?? new Error(message)
    })

  try {
    await parser.parseAsync()
    return 0
  } catch (err) {
    io.stderr(`Error: ${err instanceof Error ? err.message : String(err)}\n`)
    return 1
  }
}

// ============================================================================
// Rendering
// ============================================================================

function renderData(data: unknown, format: SerializerFormat): string {
  if (typeof data === 'string') return data.endsWith('\n') ? data : `${data}\n`
  if (format === 'json') return `${JSON.stringify(data, null, 2)}\n`
  return `${inspect(data, { depth: null })}\n`
}

/** JSON when the text parses as JSON, the raw string otherwise. Text format keeps it raw. */
function parseValue(raw: string, format: SerializerFormat): unknown {
  if (format === 'text') return raw
  try {
    const parsed: unknown = JSON.parse(raw)
    return parsed
  } catch {
    return raw
  }
}

export function describeEvent(event: FileHandleEvent): string {
  switch (event.type) {
    case 'saved': return `saved ${event.path}`
    case 'modified': return `modified ${event.path}`
    case 'relocated': return `relocated ${event.from ?? '(unsaved)'} -> ${event.to} (${event.reason})`
    case 'deleted': return `deleted: ${event.error.message}`
    case 'error': return `error: ${event.error.message}`
  }
}
