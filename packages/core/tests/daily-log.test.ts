import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'node:fs'
import path from 'node:path'

import { formatSessionEntry, logSession } from '../src/memory/daily-log.js'
import { cleanDir, createTempDir } from './helpers.js'

describe('logSession', () => {
  let tempDir: string
  let dailyDir: string

  beforeEach(() => {
    tempDir = createTempDir()
    dailyDir = path.join(tempDir, 'memory', 'daily')
  })

  afterEach(() => {
    cleanDir(tempDir)
  })

  it('creates the daily file named after the timestamp date', async () => {
    const filePath = await logSession(dailyDir, {
      timestamp: '2026-03-14T09:30:00',
      query: 'Which database?',
      response: 'PostgreSQL',
      decisions: ['Use PostgreSQL', 'Drop SQLite for tasks'],
    })

    expect(filePath).toBe(path.join(dailyDir, '2026-03-14.md'))
    expect(fs.readFileSync(filePath, 'utf-8')).toBe(
      '\n## 2026-03-14T09:30:00\n' +
        '**Query:** Which database?\n' +
        '**Response:** PostgreSQL\n' +
        '**Decisions:**\n' +
        '- Use PostgreSQL\n' +
        '- Drop SQLite for tasks\n' +
        '---\n',
    )
  })

  it('appends entries from the same day', async () => {
    const first = { timestamp: '2026-03-14T09:00:00', query: 'q1', response: 'r1' }
    const second = { timestamp: '2026-03-14T17:00:00', query: 'q2', response: 'r2' }

    await logSession(dailyDir, first)
    const filePath = await logSession(dailyDir, second)

    expect(fs.readFileSync(filePath, 'utf-8')).toBe(formatSessionEntry(first) + formatSessionEntry(second))
  })

  it('uses the current date when the timestamp has none', async () => {
    const filePath = await logSession(dailyDir, { timestamp: 'just now', query: 'q', response: 'r' })

    expect(path.basename(filePath)).toMatch(/^\d{4}-\d{2}-\d{2}\.md$/)
  })
})

describe('formatSessionEntry', () => {
  it('omits the decisions block when there are none', () => {
    expect(formatSessionEntry({ timestamp: 't', query: 'q', response: 'r', decisions: [] })).toBe(
      '\n## t\n**Query:** q\n**Response:** r\n---\n',
    )
  })
})
