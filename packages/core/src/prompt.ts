import type { MemoryManager } from './memory/memory-manager.js'
import { createLogger } from './logger.js'

const log = createLogger('prompt')

// Files read verbatim from the memory root, in prompt order
const IDENTITY_FILES = ['SOUL.md', 'USER.md']

// Per-file limit to prevent prompt bloat (~4 chars per token)
export const MAX_IDENTITY_FILE_CHARS = 8000

/** The part of the memory manager the prompt needs */
export type PromptMemory = Pick<MemoryManager, 'getContext' | 'getFileContent'>

export interface AssemblePromptOptions {
  /** Sections appended after the memory context, in order */
  extraSections?: string[]
  /** Results to pull into the memory context; manager default when unset */
  topK?: number
}

/**
 * Build the system prompt for one query: SOUL.md, USER.md, the relevant
 * memory for `query`, then any extra sections. Empty pieces are left out
 * and the rest are separated by blank lines.
 */
export async function assembleSystemPrompt(
  memory: PromptMemory,
  query: string,
  options: AssemblePromptOptions = {},
): Promise<string> {
  const sections: string[] = []

  for (const filename of IDENTITY_FILES) {
    const content = await memory.getFileContent(filename)
    if (!content || content.trim() === '') continue

    let text = content.trim()
    if (text.length > MAX_IDENTITY_FILE_CHARS) {
      log.warn({ filename, limit: MAX_IDENTITY_FILE_CHARS }, 'Identity file too large, truncating')
      text = text.substring(0, MAX_IDENTITY_FILE_CHARS) + '\n\n[... truncated ...]'
    }
    sections.push(text)
  }

  const context = await memory.getContext(query, options.topK)
  if (context.trim()) {
    sections.push(context.trim())
  }

  for (const section of options.extraSections ?? []) {
    if (section.trim()) {
      sections.push(section.trim())
    }
  }

  return sections.join('\n\n')
}
