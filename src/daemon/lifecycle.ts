import { mkdirSync } from 'node:fs'
import path from 'node:path'
import { SqliteMemoryStore } from '../storage/database.js'
import { ContextBudgeter } from '../context/budgeter.js'
import { buildInstructions } from '../context/instructions.js'
import { ModelGateway } from '../model/gateway.js'
import { MemoryReconciler } from '../memory/reconciler.js'
import { RequestOrchestrator } from './orchestrator.js'
import { createCompletionFn } from '../providers/llm.js'
import { describeProblems, loadConfig, resolveDbPath, validateConfig } from '../config.js'
import type { RecollectConfig } from '../config.js'
import type { CompleteFn } from '../model/gateway.js'
import { ConfigError } from '../errors.js'
import { createLogger, setLogLevel } from '../logger.js'

const log = createLogger('startup')

export interface WakeOptions {
  configPath?: string
  /** Replaces the provider-backed completion function. */
  complete?: CompleteFn
}

export class DaemonLifecycle {
  private state: { config: RecollectConfig; store: SqliteMemoryStore; orchestrator: RequestOrchestrator } | null = null

  get config(): RecollectConfig {
    return this.awake().config
  }

  get orchestrator(): RequestOrchestrator {
    return this.awake().orchestrator
  }

  async wake(options: WakeOptions = {}): Promise<void> {
    // 1. Load and validate config; loadConfig throws ConfigError on schema violations
    const config = loadConfig(options.configPath)
    setLogLevel(config.logging.level)

    const problems = validateConfig(config)
    if (problems.length > 0) {
      throw new ConfigError(describeProblems(problems), problems)
    }

    // 2. Open database
    const dbPath = resolveDbPath(config.storage.dbPath)
    if (dbPath !== ':memory:') {
      mkdirSync(path.dirname(dbPath), { recursive: true })
    }
    const store = new SqliteMemoryStore(dbPath)
    log.info(`Database: ${dbPath}`)

    // 3. Wire the turn pipeline
    const instructions = buildInstructions({
      maxEntries: config.memory.maxActiveEntries,
      augmentationSkills: config.skills.augmentation
    })

    const gateway = new ModelGateway({
      complete: options.complete ?? createCompletionFn(config.llm),
      augmentationSkills: config.skills.augmentation,
      timeoutMs: config.llm.requestTimeoutMs
    })

    const reconciler = new MemoryReconciler({
      store,
      maxActiveEntries: config.memory.maxActiveEntries,
      duplicateThreshold: config.memory.duplicateThreshold,
      duplicateSweepInterval: config.memory.duplicateSweepInterval,
      overCapPolicy: config.memory.overCapPolicy
    })

    const orchestrator = new RequestOrchestrator({
      store,
      budgeter: new ContextBudgeter(config.context),
      gateway,
      reconciler,
      instructions,
      maxActiveEntries: config.memory.maxActiveEntries,
      historyTurnLookback: config.memory.historyTurnLookback
    })

    log.info(`Model: ${config.llm.provider}/${config.llm.model} (search: ${config.llm.searchModel})`)
    log.info(`Context caps: memory ${config.context.maxMemoryChars}, history ${config.context.maxHistoryChars}, total ${config.context.maxTotalChars} chars`)

    this.state = { config, store, orchestrator }
  }

  async sleep(): Promise<void> {
    if (!this.state) return
    this.state.store.close()
    this.state = null
    log.info('Database closed')
  }

  private awake(): NonNullable<DaemonLifecycle['state']> {
    if (!this.state) {
      throw new Error('Daemon is asleep; call wake() first')
    }
    return this.state
  }
}
