import * as path from 'node:path'
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs'
import { parse, stringify } from 'yaml'
import { z } from 'zod'
import { createLogger, isLogLevel } from './logger.js'
import type { HearthConfig } from './types.js'

const log = createLogger('config')

const AGENT_DIR_NAME = '.hearth'
const CONFIG_FILENAME = 'config.yaml'

const DEFAULT_EMBEDDINGS_HOST = 'http://localhost:11434'
const DEFAULT_EMBEDDINGS_MODEL = 'nomic-embed-text'

const embeddingsSchema = z
  .object({
    host: z.string().url().default(DEFAULT_EMBEDDINGS_HOST),
    model: z.string().min(1).default(DEFAULT_EMBEDDINGS_MODEL),
  })
  .default({})

const memorySchema = z
  .object({
    dir: z.string().min(1).default('memory'),
    dbPath: z.string().min(1).default('data/memory.db'),
    chunkTokens: z.number().int().positive().default(2000),
    chunkOverlap: z.number().int().nonnegative().default(200),
    searchTopK: z.number().int().positive().default(5),
    // Weights are used as-is; they are not required to sum to 1
    vectorWeight: z.number().nonnegative().default(0.7),
    textWeight: z.number().nonnegative().default(0.3),
    watch: z.boolean().default(true),
    watchDebounceMs: z.number().int().nonnegative().default(5000),
    watchPolling: z.boolean().default(false),
    embeddings: embeddingsSchema,
  })
  .default({})

const configSchema = z.object({
  memory: memorySchema,
  log: z
    .object({
      level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    })
    .default({}),
})

type ParsedConfig = z.infer<typeof configSchema>

export function findAgentDir(): string {
  if (process.env.HEARTH_DIR) return path.resolve(process.env.HEARTH_DIR)

  // Walk up from cwd looking for an existing .hearth/ directory
  let dir = process.cwd()
  while (dir !== path.dirname(dir)) {
    const candidate = path.join(dir, AGENT_DIR_NAME)
    if (existsSync(candidate)) return candidate
    dir = path.dirname(dir)
  }
  // None found, default to the project root (where .git lives)
  dir = process.cwd()
  while (dir !== path.dirname(dir)) {
    if (existsSync(path.join(dir, '.git'))) {
      return path.join(dir, AGENT_DIR_NAME)
    }
    dir = path.dirname(dir)
  }
  return path.resolve(AGENT_DIR_NAME)
}

function toCamelCase(key: string): string {
  return key.replace(/_([a-z0-9])/g, (_, ch: string) => ch.toUpperCase())
}

/**
 * Accept snake_case keys (`db_path`, `chunk_tokens`) alongside camelCase.
 */
function normalizeKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(normalizeKeys)
  if (value === null || typeof value !== 'object') return value

  const result: Record<string, unknown> = {}
  for (const [key, inner] of Object.entries(value)) {
    result[toCamelCase(key)] = normalizeKeys(inner)
  }
  return result
}

function readYamlConfig(agentDir: string): unknown {
  const configPath = path.join(agentDir, CONFIG_FILENAME)
  if (!existsSync(configPath)) {
    return {}
  }
  try {
    return normalizeKeys(parse(readFileSync(configPath, 'utf-8')) ?? {})
  } catch (err) {
    log.warn(
      { configPath, err: err instanceof Error ? err.message : String(err) },
      'Could not parse config file, using defaults',
    )
    return {}
  }
}

function validateConfig(raw: unknown, agentDir: string): ParsedConfig {
  const result = configSchema.safeParse(raw)
  if (result.success) return result.data

  log.warn(
    {
      configPath: path.join(agentDir, CONFIG_FILENAME),
      issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    },
    'Invalid config, using defaults',
  )
  return configSchema.parse({})
}

/**
 * Load config.yaml from the agent directory, apply env overrides and
 * resolve relative paths against the agent directory.
 */
export function loadConfig(agentDir?: string): HearthConfig {
  const dir = agentDir ?? findAgentDir()
  const parsed = validateConfig(readYamlConfig(dir), dir)
  const env = process.env
  const memory = parsed.memory

  return {
    agentDir: dir,
    memory: {
      ...memory,
      dir: path.resolve(dir, env.HEARTH_MEMORY_DIR ?? memory.dir),
      dbPath: path.resolve(dir, env.HEARTH_MEMORY_DB_PATH ?? memory.dbPath),
      embeddings: {
        host: env.HEARTH_EMBEDDINGS_HOST ?? memory.embeddings.host,
        model: env.HEARTH_EMBEDDINGS_MODEL ?? memory.embeddings.model,
      },
    },
    log: {
      level: isLogLevel(env.HEARTH_LOG_LEVEL) ? env.HEARTH_LOG_LEVEL : parsed.log.level,
    },
  }
}

/**
 * Write config.yaml with every default spelled out, unless one exists.
 * Returns true when a file was written.
 */
export function writeDefaultConfig(agentDir: string): boolean {
  const configPath = path.join(agentDir, CONFIG_FILENAME)
  if (existsSync(configPath)) return false

  const defaults = configSchema.parse({})
  mkdirSync(agentDir, { recursive: true })
  writeFileSync(configPath, stringify(defaults, { lineWidth: 120 }), 'utf-8')
  return true
}
