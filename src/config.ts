import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'node:fs'
import { homedir } from 'node:os'
import path from 'node:path'
import { z } from 'zod'
import { createLogger, isLogLevel } from './logger.js'
import { ConfigError } from './errors.js'
import { buildInstructions } from './context/instructions.js'

const providerNameSchema = z.enum(['gemini', 'openai', 'openrouter', 'ollama', 'cerebras', 'anthropic'])
const overCapPolicySchema = z.enum(['retain', 'evict-lowest'])
const positiveInt = z.number().int().positive()

export type ProviderName = z.infer<typeof providerNameSchema>
export type OverCapPolicy = z.infer<typeof overCapPolicySchema>

export const recollectConfigSchema = z.object({
  llm: z.object({
    provider: providerNameSchema,
    model: z.string().min(1),
    searchModel: z.string().min(1),
    apiKey: z.string().optional(),
    baseUrl: z.string().url().optional(),
    requestTimeoutMs: positiveInt,
    maxOutputTokens: positiveInt
  }),
  context: z.object({
    maxMemoryChars: positiveInt,
    maxHistoryChars: positiveInt,
    maxTotalChars: positiveInt
  }),
  memory: z.object({
    maxActiveEntries: positiveInt,
    historyTurnLookback: positiveInt,
    duplicateThreshold: z.number().gt(0).max(1),
    // 0 disables the sweep
    duplicateSweepInterval: z.number().int().min(0),
    overCapPolicy: overCapPolicySchema
  }),
  skills: z.object({
    augmentation: z.array(z.string().min(1))
  }),
  storage: z.object({
    dbPath: z.string().min(1)
  }),
  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error'])
  })
}).superRefine((config, ctx) => {
  const { maxMemoryChars, maxHistoryChars, maxTotalChars } = config.context
  if (maxMemoryChars > maxTotalChars) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['context', 'maxMemoryChars'],
      message: 'cannot exceed context.maxTotalChars'
    })
  }
  if (maxHistoryChars > maxTotalChars) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['context', 'maxHistoryChars'],
      message: 'cannot exceed context.maxTotalChars'
    })
  }
})

export type RecollectConfig = z.infer<typeof recollectConfigSchema>

export const DEFAULT_BASE_URLS: Record<ProviderName, string | undefined> = {
  gemini: 'https://generativelanguage.googleapis.com/v1beta/openai/',
  openai: 'https://api.openai.com/v1',
  openrouter: 'https://openrouter.ai/api/v1',
  ollama: 'http://localhost:11434/v1',
  cerebras: 'https://api.cerebras.ai/v1',
  anthropic: undefined
}

export const DEFAULT_CONFIG: RecollectConfig = {
  llm: {
    provider: 'gemini',
    model: 'gemini-2.0-flash-lite',
    searchModel: 'gemini-2.0-flash',
    baseUrl: DEFAULT_BASE_URLS.gemini,
    requestTimeoutMs: 30_000,
    maxOutputTokens: 1024
  },
  context: {
    maxMemoryChars: 2000,
    maxHistoryChars: 4000,
    maxTotalChars: 9000
  },
  memory: {
    maxActiveEntries: 10,
    historyTurnLookback: 20,
    duplicateThreshold: 0.9,
    duplicateSweepInterval: 10,
    overCapPolicy: 'retain'
  },
  skills: {
    augmentation: ['web_search']
  },
  storage: {
    dbPath: '~/.recollect/memory.db'
  },
  logging: {
    level: 'info'
  }
}

export const CONFIG_DIR = path.join(homedir(), '.recollect')
export const CONFIG_PATH = path.join(CONFIG_DIR, 'config.json')

const log = createLogger('config')

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target }
  for (const key of Object.keys(source)) {
    const incoming = source[key]
    if (isRecord(incoming)) {
      const current = target[key]
      result[key] = deepMerge(isRecord(current) ? current : {}, incoming)
    } else {
      result[key] = incoming
    }
  }
  return result
}

function readConfigFile(configPath: string): Record<string, unknown> {
  if (!existsSync(configPath)) return {}
  try {
    const parsed: unknown = JSON.parse(readFileSync(configPath, 'utf-8'))
    if (isRecord(parsed)) return parsed
    log.error(`Ignoring ${configPath}: top level is not an object`)
  } catch (e) {
    log.error(`Failed to load config from ${configPath}:`, e)
  }
  return {}
}

export interface ConfigProblem {
  field: string
  message: string
}

/** Server skills each provider can run with a real tool behind them. */
export const AUGMENTATION_SUPPORT: Record<ProviderName, readonly string[]> = {
  gemini: ['web_search'],
  openai: ['web_search'],
  openrouter: [],
  ollama: [],
  cerebras: [],
  anthropic: []
}

const HOSTED_PROVIDERS: ProviderName[] = ['gemini', 'openai', 'openrouter', 'cerebras', 'anthropic']

function apiKeyEnvName(provider: ProviderName): string {
  if (provider === 'gemini') return 'GEMINI_API_KEY'
  if (provider === 'cerebras') return 'CEREBRAS_API_KEY'
  return 'OPENAI_API_KEY'
}

function toProblems(issues: z.ZodIssue[]): ConfigProblem[] {
  return issues.map(issue => ({ field: issue.path.join('.'), message: issue.message }))
}

export function describeProblems(problems: ConfigProblem[]): string {
  return problems.map(p => `${p.field}: ${p.message}`).join('\n')
}

/**
 * Defaults, overlaid with the config file, overlaid with environment variables.
 * Throws ConfigError when the result does not match the config schema.
 */
export function loadConfig(configPath: string = CONFIG_PATH): RecollectConfig {
  const file = readConfigFile(configPath)
  const result = recollectConfigSchema.safeParse(deepMerge(structuredClone(DEFAULT_CONFIG), file))
  if (!result.success) {
    const problems = toProblems(result.error.issues)
    throw new ConfigError(`${configPath}\n${describeProblems(problems)}`, problems)
  }
  const config = result.data

  // A provider switch without an explicit baseUrl gets that provider's endpoint
  if (isRecord(file.llm) && file.llm.provider !== undefined && file.llm.baseUrl === undefined) {
    config.llm.baseUrl = DEFAULT_BASE_URLS[config.llm.provider]
  }

  if (!config.llm.apiKey) {
    const envKey = process.env[apiKeyEnvName(config.llm.provider)]
    if (envKey) config.llm.apiKey = envKey
  }

  const envLevel = process.env.RECOLLECT_LOG_LEVEL
  if (envLevel && isLogLevel(envLevel)) {
    config.logging.level = envLevel
  }

  if (process.env.RECOLLECT_DB_PATH) {
    config.storage.dbPath = process.env.RECOLLECT_DB_PATH
  }

  return config
}

export function saveConfig(config: Record<string, unknown>, configPath: string = CONFIG_PATH): void {
  mkdirSync(path.dirname(configPath), { recursive: true })
  const merged = deepMerge(readConfigFile(configPath), config)
  writeFileSync(configPath, JSON.stringify(merged, null, 2))
}

export function resolveDbPath(dbPath: string): string {
  return dbPath === ':memory:' ? dbPath : dbPath.replace(/^~/, homedir())
}

/**
 * Everything that keeps the daemon from starting: schema violations first,
 * then a missing API key, server skills the provider has no tool for, and
 * response instructions that alone exceed the total context cap.
 */
export function validateConfig(input: unknown): ConfigProblem[] {
  const result = recollectConfigSchema.safeParse(input)
  if (!result.success) return toProblems(result.error.issues)
  const config = result.data
  const problems: ConfigProblem[] = []

  if (HOSTED_PROVIDERS.includes(config.llm.provider) && !config.llm.apiKey) {
    problems.push({
      field: 'llm.apiKey',
      message: `No API key for provider "${config.llm.provider}". Set ${apiKeyEnvName(config.llm.provider)} or llm.apiKey in ${CONFIG_PATH}.`
    })
  }

  const supported = AUGMENTATION_SUPPORT[config.llm.provider]
  for (const skill of config.skills.augmentation) {
    if (!supported.includes(skill)) {
      problems.push({
        field: 'skills.augmentation',
        message: `Provider "${config.llm.provider}" has no tool for server skill "${skill}"`
      })
    }
  }

  const instructions = buildInstructions({
    maxEntries: config.memory.maxActiveEntries,
    augmentationSkills: config.skills.augmentation
  })
  if (instructions.length > config.context.maxTotalChars) {
    problems.push({
      field: 'context.maxTotalChars',
      message: `Response instructions need ${instructions.length} chars, more than context.maxTotalChars (${config.context.maxTotalChars})`
    })
  }

  return problems
}
