/**
 * Memory Directory Initialization
 * Creates the memory folder structure and starter files.
 *
 * @module memory/init
 */

import { existsSync } from 'node:fs'
import { mkdir, writeFile } from 'node:fs/promises'
import { join } from 'node:path'

export const DAILY_DIR_NAME = 'daily'

/**
 * Initialize the memory directory structure.
 */
export async function initMemoryDir(memoryDir: string): Promise<void> {
  await mkdir(join(memoryDir, DAILY_DIR_NAME), { recursive: true })
}

/**
 * Create a starter memory directory with template files. Existing files are
 * left alone. Returns the files that were written.
 */
export async function createStarterMemory(memoryDir: string): Promise<string[]> {
  await initMemoryDir(memoryDir)

  const starterFiles: Array<{ name: string; content: string }> = [
    {
      name: 'SOUL.md',
      content: `# Soul

Who the agent is and how it speaks. Included at the top of every prompt.

## Voice

- Direct and concise
- Says so when it does not know
`,
    },
    {
      name: 'USER.md',
      content: `# User

Facts about the person this agent works for.

## Preferences

- Add preferences here
`,
    },
    {
      name: 'MEMORY.md',
      content: `# Memory

Long-lived notes and decisions. Searchable like every other file here.

## Decisions

- Add decisions worth remembering here
`,
    },
  ]

  const written: string[] = []
  for (const { name, content } of starterFiles) {
    const path = join(memoryDir, name)
    if (!existsSync(path)) {
      await writeFile(path, content, 'utf-8')
      written.push(name)
    }
  }
  return written
}
