// Public API for consumption by other packages

export * from './memory/index.js'

export { loadConfig, findAgentDir, writeDefaultConfig } from './config.js'
export type { HearthConfig, MemoryConfig, EmbeddingsConfig } from './types.js'

export { assembleSystemPrompt, MAX_IDENTITY_FILE_CHARS } from './prompt.js'
export type { AssemblePromptOptions, PromptMemory } from './prompt.js'

export { createLogger, setLogLevel, getLogLevel, isLogLevel } from './logger.js'
export type { LogLevel } from './logger.js'

export { Mutex } from './utils/mutex.js'
