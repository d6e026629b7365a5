#!/usr/bin/env node
import { loadConfig, writeDefaultConfig } from './config.js'
import { createLogger, setLogLevel } from './logger.js'
import { createStarterMemory } from './memory/init.js'
import { createMemoryManager, type MemoryManager } from './memory/memory-manager.js'
import type { SyncResult } from './memory/types.js'
import type { HearthConfig } from './types.js'

const log = createLogger('cli')

const USAGE = `Usage: hearth <command> [args]

Commands:
  init                    Create the agent directory, config.yaml and starter memory files
  sync                    Index new and changed memory files
  search <query> [--top n]  Hybrid search over memory
  context <query> [--top n] Print the memory section a prompt would get
  status                  Show index status
  rebuild                 Clear the index and sync from scratch
  watch                   Sync, then resync on change until interrupted`

interface ParsedArgs {
  command: string | undefined
  rest: string[]
  top: number | undefined
}

function parseArgs(argv: string[]): ParsedArgs {
  const [command, ...args] = argv
  const rest: string[] = []
  let top: number | undefined

  for (let i = 0; i < args.length; i++) {
    const arg = args[i]
    if (arg === undefined) continue
    if (arg === '--top') {
      const value = Number(args[i + 1])
      if (!Number.isInteger(value) || value <= 0) {
        throw new Error('--top needs a positive integer')
      }
      top = value
      i++
      continue
    }
    rest.push(arg)
  }

  return { command, rest, top }
}

function formatSyncResult(result: SyncResult): string {
  const lines = [
    `added: ${result.added}, updated: ${result.updated}, deleted: ${result.deleted}, unchanged: ${result.unchanged} (${result.duration}ms)`,
  ]
  for (const error of result.errors) {
    lines.push(`  skipped ${error}`)
  }
  return lines.join('\n')
}

async function withManager(config: HearthConfig, run: (memory: MemoryManager) => Promise<void>): Promise<void> {
  const memory = createMemoryManager(config.memory)
  try {
    await run(memory)
  } finally {
    await memory.close()
  }
}

function waitForShutdown(): Promise<string> {
  return new Promise((resolve) => {
    process.once('SIGINT', () => resolve('SIGINT'))
    process.once('SIGTERM', () => resolve('SIGTERM'))
  })
}

function requireQuery(args: ParsedArgs): string {
  const query = args.rest.join(' ').trim()
  if (!query) {
    throw new Error(`${args.command ?? 'command'} needs a query`)
  }
  return query
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2))
  const config = loadConfig()
  setLogLevel(config.log.level)

  switch (args.command) {
    case 'init': {
      const wroteConfig = writeDefaultConfig(config.agentDir)
      const written = await createStarterMemory(config.memory.dir)
      console.log(`Agent directory: ${config.agentDir}`)
      if (wroteConfig) console.log('  created config.yaml')
      for (const name of written) {
        console.log(`  created ${name}`)
      }
      return
    }

    case 'sync':
      await withManager(config, async (memory) => {
        console.log(formatSyncResult(await memory.sync()))
      })
      return

    case 'rebuild':
      await withManager(config, async (memory) => {
        console.log(formatSyncResult(await memory.rebuild()))
      })
      return

    case 'search': {
      const query = requireQuery(args)
      await withManager(config, async (memory) => {
        const results = await memory.search(query, args.top)
        if (results.length === 0) {
          console.log('No results.')
          return
        }
        for (const r of results) {
          console.log(`${r.score.toFixed(3)}  ${r.path}:${r.startLine}-${r.endLine}`)
          console.log(`  ${r.snippet.split('\n')[0] ?? ''}`)
        }
      })
      return
    }

    case 'context': {
      const query = requireQuery(args)
      await withManager(config, async (memory) => {
        console.log(await memory.getContext(query, args.top))
      })
      return
    }

    case 'status':
      await withManager(config, async (memory) => {
        const status = memory.getStatus()
        console.log(`Memory:     ${memory.memoryDir}`)
        console.log(`Index:      ${config.memory.dbPath}`)
        console.log(`Files:      ${status.filesIndexed}`)
        console.log(`Chunks:     ${status.totalChunks}`)
        console.log(`Cached:     ${status.cachedEmbeddings}`)
        console.log(`Model:      ${status.embeddingModel ?? '-'} (${status.dimensions ?? '?'} dims)`)
        console.log(`Keyword:    ${status.keywordSearch ? 'yes' : 'no'}`)
        console.log(`Vector:     ${status.vectorSearch ? 'yes' : 'no'}`)
        console.log(`Last sync:  ${status.lastSync ?? 'never'}`)
      })
      return

    case 'watch':
      await withManager(config, async (memory) => {
        console.log(formatSyncResult(await memory.sync()))
        memory.onSync((event) => {
          console.log(formatSyncResult(event.result))
        })
        memory.startWatching()
        const signal = await waitForShutdown()
        log.info({ signal }, 'Shutting down')
      })
      return

    default:
      console.log(USAGE)
      if (args.command !== undefined && args.command !== 'help') {
        process.exitCode = 1
      }
  }
}

main().catch((err: unknown) => {
  console.error('Error:', err instanceof Error ? err.message : String(err))
  process.exit(1)
})
