import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import type { Mock } from 'vitest'
import { RequestOrchestrator } from '../orchestrator.js'
import { SqliteMemoryStore } from '../../storage/database.js'
import { ContextBudgeter } from '../../context/budgeter.js'
import { ModelGateway } from '../../model/gateway.js'
import type { CompleteFn } from '../../model/gateway.js'
import { MemoryReconciler } from '../../memory/reconciler.js'
import { FALLBACK_REPLY_TEXT } from '../../model/reply.js'
import { ModelError } from '../../errors.js'

const INSTRUCTIONS = 'Reply with JSON.'

function modelJson(overrides: Record<string, unknown> = {}): string {
  return JSON.stringify({
    server_reply: 'Hello Ana!',
    app_params: [{ question: false }],
    interaction_params: { relevant_for_context: false, context_priority: 0, relevant_info: '' },
    ...overrides
  })
}

describe('RequestOrchestrator', () => {
  let store: SqliteMemoryStore
  let complete: Mock<CompleteFn>
  let reconciler: MemoryReconciler
  let orchestrator: RequestOrchestrator
  let clock: number

  beforeEach(() => {
    store = new SqliteMemoryStore(':memory:')
    complete = vi.fn<CompleteFn>().mockResolvedValue(modelJson())
    clock = Date.parse('2026-03-01T10:00:00Z')
    const now = () => new Date(clock += 60_000)
    reconciler = new MemoryReconciler({
      store,
      maxActiveEntries: 10,
      duplicateThreshold: 0.9,
      duplicateSweepInterval: 0,
      overCapPolicy: 'retain',
      now
    })
    orchestrator = new RequestOrchestrator({
      store,
      budgeter: new ContextBudgeter({ maxMemoryChars: 2000, maxHistoryChars: 4000, maxTotalChars: 9000 }),
      gateway: new ModelGateway({ complete, augmentationSkills: ['web_search'], timeoutMs: 1000 }),
      reconciler,
      instructions: INSTRUCTIONS,
      maxActiveEntries: 10,
      historyTurnLookback: 20,
      now
    })
  })

  afterEach(() => {
    store.close()
    vi.restoreAllMocks()
  })

  it('answers, saves the turn and remembers a relevant fact', async () => {
    complete.mockResolvedValueOnce(modelJson({
      server_reply: 'Nice to meet you, Ana. Anything else?',
      app_params: [{ question: true }],
      skills: [{ name: 'contacts', action: 'open', params: {} }],
      interaction_params: { relevant_for_context: true, context_priority: 40, relevant_info: "The user's name is Ana" }
    }))

    const result = await orchestrator.handleTurn('ana', "Hi, I'm Ana")

    expect(result).toEqual({
      replyText: 'Nice to meet you, Ana. Anything else?',
      continueListening: true,
      skills: [{ name: 'contacts', action: 'open', params: {} }]
    })
    expect(complete.mock.calls[0][0]).toMatchObject({ mode: 'structured', system: INSTRUCTIONS, prompt: "Hi, I'm Ana" })

    const turns = await store.listRecentTurns('ana', 5)
    expect(turns).toHaveLength(1)
    expect(turns[0].assistantReply).toBe('Nice to meet you, Ana. Anything else?')
    expect(turns[0].interactionMeta).toEqual({
      relevantForContext: true,
      contextPriority: 40,
      relevantInfo: "The user's name is Ana",
      augmentedWith: null
    })

    const memory = await orchestrator.memory('ana')
    expect(memory.map(e => [e.factText, e.priority])).toEqual([["The user's name is Ana", 40]])
  })

  it('sends memory and history, and applies updates by the numbers the model saw', async () => {
    await orchestrator.handleTurn('ana', 'first message')
    const at = new Date('2026-02-01T00:00:00Z')
    await store.upsertEntry({ id: 'low', userId: 'ana', factText: 'The user has a cat', priority: 10, createdAt: at, updatedAt: at })
    await store.upsertEntry({ id: 'high', userId: 'ana', factText: 'The user is called Ana', priority: 90, createdAt: at, updatedAt: at })

    complete.mockResolvedValueOnce(modelJson({ context_updates: [{ entry_number: 2, new_priority: 0 }] }))
    await orchestrator.handleTurn('ana', 'forget my cat')

    const system = complete.mock.calls[1][0].system
    expect(system).toContain('1. [2026-02-01T00:00:00.000Z | priority: 90] The user is called Ana')
    expect(system).toContain('2. [2026-02-01T00:00:00.000Z | priority: 10] The user has a cat')
    expect(system).toContain('User: first message (at ')
    const memory = await orchestrator.memory('ana')
    expect(memory.map(e => [e.id, e.priority])).toEqual([['high', 90]])
  })

  it('saves a fallback reply without touching memory', async () => {
    complete.mockResolvedValueOnce('not json at all')
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    const reconcile = vi.spyOn(reconciler, 'reconcile')

    const result = await orchestrator.handleTurn('ana', 'hello?')

    expect(result).toEqual({ replyText: FALLBACK_REPLY_TEXT, continueListening: false, skills: [] })
    expect(reconcile).not.toHaveBeenCalled()
    const [saved] = await store.listRecentTurns('ana', 1)
    expect(saved?.assistantReply).toBe(FALLBACK_REPLY_TEXT)
  })

  it('propagates model failures and saves nothing', async () => {
    complete.mockRejectedValueOnce(new Error('connection reset'))
    vi.spyOn(console, 'error').mockImplementation(() => {})

    await expect(orchestrator.handleTurn('ana', 'hello')).rejects.toBeInstanceOf(ModelError)
    expect(await store.countTurns('ana')).toBe(0)
  })

  it('abandons the writes when the caller goes away during the model call', async () => {
    const controller = new AbortController()
    complete.mockImplementationOnce(async () => {
      controller.abort()
      return modelJson({ interaction_params: { relevant_for_context: true, context_priority: 30, relevant_info: 'The user likes tea' } })
    })

    await expect(orchestrator.handleTurn('ana', 'I like tea', { abortSignal: controller.signal }))
      .rejects.toThrow('Turn cancelled by caller')
    expect(await store.countTurns('ana')).toBe(0)
    expect(await store.countActive('ana')).toBe(0)
  })

  it('still replies when reconciliation fails after the turn is saved', async () => {
    vi.spyOn(reconciler, 'reconcile').mockRejectedValueOnce(new Error('disk full'))
    const error = vi.spyOn(console, 'error').mockImplementation(() => {})

    const result = await orchestrator.handleTurn('ana', 'hello')

    expect(result.replyText).toBe('Hello Ana!')
    expect(await store.countTurns('ana')).toBe(1)
    expect(error).toHaveBeenCalledWith(
      '[turn] Background error: memory reconciliation failed for user ana after the turn was saved: disk full'
    )
  })

  it('patches the latest reply instead of appending', async () => {
    complete.mockResolvedValueOnce(modelJson({ server_reply: 'Who should I call?' }))
    await orchestrator.handleTurn('ana', 'call mom')

    complete.mockResolvedValueOnce(modelJson({ server_reply: 'Calling Mom now.' }))
    const result = await orchestrator.handleTurn('ana', 'call mom', {
      patch: { enrichedPrompt: 'call mom (contact id 42)', resolvableNames: ['Mom', ' '] }
    })

    expect(result.replyText).toBe('Calling Mom now.')
    const request = complete.mock.calls[1][0]
    expect(request.prompt).toBe('call mom (contact id 42)\n\nResolvable names: Mom')
    // The turn being regenerated is not shown as history
    expect(request.system).toBe(INSTRUCTIONS)

    const turns = await store.listRecentTurns('ana', 5)
    expect(turns).toHaveLength(1)
    expect(turns[0].userInput).toBe('call mom')
    expect(turns[0].assistantReply).toBe('Calling Mom now.')
  })

  it('appends when a patch arrives with no earlier turn', async () => {
    await orchestrator.handleTurn('ana', 'call mom', { patch: {} })

    expect(complete.mock.calls[0][0].prompt).toBe('call mom')
    expect(await store.countTurns('ana')).toBe(1)
  })

  it('serializes turns for the same user', async () => {
    await Promise.all([
      orchestrator.handleTurn('ana', 'first message'),
      orchestrator.handleTurn('ana', 'second message')
    ])

    expect(complete.mock.calls[1][0].system).toContain('User: first message (at ')
    expect(orchestrator.inFlightTurns).toBe(0)
  })

  it('pages history newest first', async () => {
    for (const text of ['one', 'two', 'three']) {
      await orchestrator.handleTurn('ana', text)
    }

    const page = await orchestrator.history('ana', 2, 2)

    expect(page.turns.map(t => t.userInput)).toEqual(['one'])
    expect(page).toMatchObject({ totalCount: 3, page: 2, pageSize: 2, totalPages: 2 })
  })
})
