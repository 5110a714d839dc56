import { ModelError } from '../errors.js'
import { createLogger } from '../logger.js'
import { KeyedLock } from './user-lock.js'
import type { ContextBudgeter, ContextStats } from '../context/budgeter.js'
import type { ModelGateway } from '../model/gateway.js'
import type { MemoryReconciler } from '../memory/reconciler.js'
import type { MemoryStore } from '../storage/store.js'
import type {
  ContextSnapshot,
  InteractionMeta,
  MemoryEntry,
  ModelReply,
  PatchSignal,
  TurnRecord,
  TurnResult
} from '../memory/types.js'

export interface OrchestratorConfig {
  store: MemoryStore
  budgeter: ContextBudgeter
  gateway: ModelGateway
  reconciler: MemoryReconciler
  /** Fixed response-contract instructions placed ahead of memory and history. */
  instructions: string
  maxActiveEntries: number
  historyTurnLookback: number
  lock?: KeyedLock
  now?: () => Date
}

export interface TurnOptions {
  patch?: PatchSignal
  abortSignal?: AbortSignal
}

export interface HistoryPage {
  turns: TurnRecord[]
  totalCount: number
  page: number
  pageSize: number
  totalPages: number
}

const log = createLogger('turn')

export class RequestOrchestrator {
  private store: MemoryStore
  private budgeter: ContextBudgeter
  private gateway: ModelGateway
  private reconciler: MemoryReconciler
  private instructions: string
  private maxActiveEntries: number
  private historyTurnLookback: number
  private lock: KeyedLock
  private now: () => Date
  private inFlight: number = 0
  private lastStats: ContextStats | null = null

  constructor(config: OrchestratorConfig) {
    this.store = config.store
    this.budgeter = config.budgeter
    this.gateway = config.gateway
    this.reconciler = config.reconciler
    this.instructions = config.instructions
    this.maxActiveEntries = config.maxActiveEntries
    this.historyTurnLookback = config.historyTurnLookback
    this.lock = config.lock ?? new KeyedLock()
    this.now = config.now ?? (() => new Date())
  }

  get inFlightTurns(): number {
    return this.inFlight
  }

  get lastContextStats(): ContextStats | null {
    return this.lastStats
  }

  /**
   * One user turn: snapshot, budget, model call, persist, reconcile. Turns for
   * the same user run one at a time. StorageError and ModelError propagate;
   * a failure while reconciling is logged and the reply is still returned.
   */
  async handleTurn(userId: string, text: string, options: TurnOptions = {}): Promise<TurnResult> {
    this.inFlight++
    try {
      return await this.lock.run(userId, () => this.runTurn(userId, text, options))
    } finally {
      this.inFlight--
    }
  }

  async history(userId: string, page: number = 1, pageSize: number = 10): Promise<HistoryPage> {
    const size = Math.max(1, Math.floor(pageSize))
    const current = Math.max(1, Math.floor(page))
    const [turns, totalCount] = await Promise.all([
      this.store.listTurns(userId, { limit: size, offset: (current - 1) * size }),
      this.store.countTurns(userId)
    ])
    return {
      turns,
      totalCount,
      page: current,
      pageSize: size,
      totalPages: Math.ceil(totalCount / size)
    }
  }

  async memory(userId: string): Promise<MemoryEntry[]> {
    return this.store.listActiveEntries(userId)
  }

  private async runTurn(userId: string, text: string, options: TurnOptions): Promise<TurnResult> {
    const { patch, abortSignal } = options
    throwIfAborted(abortSignal)

    const [entries, recentTurns] = await Promise.all([
      this.store.listActiveEntries(userId, this.maxActiveEntries),
      this.store.listRecentTurns(userId, this.historyTurnLookback)
    ])

    // A patch regenerates the latest reply, so that turn is not history for it
    const target = patch ? recentTurns[0] ?? null : null
    const turns = target ? recentTurns.slice(1) : recentTurns

    const context = this.budgeter.build({ instructions: this.instructions, entries, turns })
    this.lastStats = context.stats

    const prompt = patch ? patchPrompt(text, patch) : text
    const outcome = await this.gateway.respond(context.text, prompt, abortSignal)

    // Caller went away while the model was answering: abandon the writes
    throwIfAborted(abortSignal)

    const meta = interactionMeta(outcome.reply, outcome.augmentedWith)
    if (target) {
      await this.store.patchTurnReply(target.id, outcome.reply.replyText, meta)
      log.debug(`Patched reply of turn ${target.id} for user ${userId}`)
    } else {
      await this.store.appendTurn(userId, {
        userInput: text,
        assistantReply: outcome.reply.replyText,
        interactionMeta: meta
      }, this.now())
    }

    if (!outcome.fallback) {
      await this.reconcileInBackground(userId, outcome.reply, context.snapshot)
    }

    return {
      replyText: outcome.reply.replyText,
      continueListening: outcome.reply.continueListening,
      skills: outcome.reply.requestedSkills
    }
  }

  private async reconcileInBackground(userId: string, reply: ModelReply, snapshot: ContextSnapshot): Promise<void> {
    try {
      const report = await this.reconciler.reconcile(userId, reply, snapshot)
      log.debug(`Reconciled memory for user ${userId}: ${report.updated} updated, ${report.skipped} skipped, ${report.purged} purged, ${report.activeCount} active`)
    } catch (e) {
      const detail = e instanceof Error ? e.message : String(e)
      log.error(`Background error: memory reconciliation failed for user ${userId} after the turn was saved: ${detail}`)
    }
  }
}

function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new ModelError('Turn cancelled by caller')
  }
}

function patchPrompt(text: string, patch: PatchSignal): string {
  const base = patch.enrichedPrompt?.trim() || text
  const names = (patch.resolvableNames ?? []).map(name => name.trim()).filter(name => name !== '')
  return names.length > 0 ? `${base}\n\nResolvable names: ${names.join(', ')}` : base
}

function interactionMeta(reply: ModelReply, augmentedWith: string | null): InteractionMeta {
  return {
    relevantForContext: reply.newFact?.relevant ?? false,
    contextPriority: reply.newFact?.priority ?? 0,
    relevantInfo: reply.newFact?.text ?? '',
    augmentedWith
  }
}
