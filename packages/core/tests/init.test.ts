import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'node:fs'
import path from 'node:path'

import { createStarterMemory, initMemoryDir } from '../src/memory/init.js'
import { cleanDir, createTempDir, writeFile } from './helpers.js'

describe('memory directory bootstrap', () => {
  let tempDir: string
  let memoryDir: string

  beforeEach(() => {
    tempDir = createTempDir()
    memoryDir = path.join(tempDir, 'memory')
  })

  afterEach(() => {
    cleanDir(tempDir)
  })

  it('creates the root and the daily folder', async () => {
    await initMemoryDir(memoryDir)
    await initMemoryDir(memoryDir)

    expect(fs.statSync(path.join(memoryDir, 'daily')).isDirectory()).toBe(true)
  })

  it('writes the starter files once', async () => {
    expect(await createStarterMemory(memoryDir)).toEqual(['SOUL.md', 'USER.md', 'MEMORY.md'])
    expect(await createStarterMemory(memoryDir)).toEqual([])

    expect(fs.readFileSync(path.join(memoryDir, 'MEMORY.md'), 'utf-8')).toMatch(/^# Memory\n/)
  })

  it('leaves existing files alone', async () => {
    writeFile(memoryDir, 'SOUL.md', 'custom soul')

    expect(await createStarterMemory(memoryDir)).toEqual(['USER.md', 'MEMORY.md'])
    expect(fs.readFileSync(path.join(memoryDir, 'SOUL.md'), 'utf-8')).toBe('custom soul')
  })
})
