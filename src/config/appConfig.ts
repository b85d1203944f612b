import { readFileSync } from 'node:fs'
import { isAbsolute, resolve } from 'node:path'
import { z } from 'zod'
import { SERIALIZER_FORMATS, type SerializerFormat } from '../infrastructure/serialization/createSerializer.js'
import { DEFAULT_MOVE_WINDOW_MS } from '../infrastructure/watch/chokidarWatchSource.js'

export type WatchConfig = {
  moveWindowMs: number
  usePolling: boolean
  pollIntervalMs: number
}

export type AppConfig = {
  serializer: SerializerFormat
  watch: WatchConfig
}

export const CONFIG_FILE_NAME = 'filekeeper.json'

const WatchConfigSchema = z.object({
  moveWindowMs: z.number().int().min(0),
  usePolling: z.boolean(),
  pollIntervalMs: z.number().int().min(1),
}).strict()

const AppConfigSchema = z.object({
  serializer: z.enum(SERIALIZER_FORMATS),
  watch: WatchConfigSchema,
}).strict()

const AppConfigFileSchema = z.object({
  serializer: z.enum(SERIALIZER_FORMATS).optional(),
  watch: WatchConfigSchema.partial().optional(),
}).strict()

const EnvBooleanSchema = z.enum(['true', 'false', '1', '0']).transform((value) => value === 'true' || value === '1')
const EnvIntegerSchema = z.string().trim().regex(/^\d+$/u, 'expected a non-negative integer').transform(Number)

export function createDefaultAppConfig(): AppConfig {
  return {
    serializer: 'json',
    watch: {
      moveWindowMs: DEFAULT_MOVE_WINDOW_MS,
      usePolling: false,
      pollIntervalMs: 100,
    },
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
    .join('; ')
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

function readConfigFile(configPath: string, required: boolean): { input: unknown; sourceName: string } | null {
  const sourceName = `config file (${configPath})`
  let raw = ''
  try {
    raw = readFileSync(configPath, 'utf8')
  } catch (error) {
    if (!required && isMissingFile(error)) return null
    const reason = error instanceof Error ? error.message : String(error)
    throw new Error(`${sourceName} is unreadable: ${reason}`)
  }

  try {
    const input: unknown = JSON.parse(raw)
    return { input, sourceName }
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new Error(`${sourceName} is not valid JSON: ${reason}`)
  }
}

function parseEnvValue<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, env: NodeJS.ProcessEnv, name: string): T | undefined {
  const raw = env[name]
  if (raw === undefined || raw === '') return undefined
  const parsed = schema.safeParse(raw)
  if (!parsed.success) {
    throw new Error(`${name} is invalid: ${formatIssues(parsed.error)}`)
  }
  return parsed.data
}

/**
 * Resolve the effective configuration.
 *
 * Source priority (highest first):
 * 1. `FILEKEEPER_*` environment variables
 * 2. the file named by `FILEKEEPER_CONFIG`, else `<baseDir>/filekeeper.json`
 * 3. built-in defaults
 */
export function loadAppConfig(opts: { baseDir: string; env?: NodeJS.ProcessEnv }): AppConfig {
  const env = opts.env ?? process.env
  const defaults = createDefaultAppConfig()

  const explicitPath = env.FILEKEEPER_CONFIG?.trim()
  const configPath = explicitPath
    ? (isAbsolute(explicitPath) ? explicitPath : resolve(opts.baseDir, explicitPath))
    : resolve(opts.baseDir, CONFIG_FILE_NAME)
  const file = readConfigFile(configPath, Boolean(explicitPath))

  let fromFile: z.infer<typeof AppConfigFileSchema> = {}
  if (file) {
    const parsed = AppConfigFileSchema.safeParse(file.input)
    if (!parsed.success) {
      throw new Error(`${file.sourceName} validation failed: ${formatIssues(parsed.error)}`)
    }
    fromFile = parsed.data
  }

  const merged = {
    serializer:
      parseEnvValue(z.enum(SERIALIZER_FORMATS), env, 'FILEKEEPER_SERIALIZER')
      ?? fromFile.serializer
      ?? defaults.serializer,
    watch: {
      moveWindowMs:
        parseEnvValue(EnvIntegerSchema, env, 'FILEKEEPER_WATCH_MOVE_WINDOW_MS')
        ?? fromFile.watch?.moveWindowMs
        ?? defaults.watch.moveWindowMs,
      usePolling:
        parseEnvValue(EnvBooleanSchema, env, 'FILEKEEPER_WATCH_USE_POLLING')
        ?? fromFile.watch?.usePolling
        ?? defaults.watch.usePolling,
      pollIntervalMs:
        parseEnvValue(EnvIntegerSchema, env, 'FILEKEEPER_WATCH_POLL_INTERVAL_MS')
        ?? fromFile.watch?.pollIntervalMs
        ?? defaults.watch.pollIntervalMs,
    },
  }

  const result = AppConfigSchema.safeParse(merged)
  if (!result.success) {
    throw new Error(`configuration validation failed: ${formatIssues(result.error)}`)
  }
  return result.data
}
