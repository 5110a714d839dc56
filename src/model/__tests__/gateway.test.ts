import { describe, it, expect, vi } from 'vitest'
import { ModelGateway } from '../gateway.js'
import type { CompleteFn, CompletionRequest } from '../gateway.js'
import { FALLBACK_REPLY_TEXT, rawReplySchema } from '../reply.js'
import { AUGMENTED_INSTRUCTIONS } from '../../context/instructions.js'
import { ModelError } from '../../errors.js'

function structured(overrides: Record<string, unknown> = {}): string {
  return JSON.stringify({
    server_reply: 'Let me check.',
    interaction_params: { relevant_for_context: true, context_priority: 20, relevant_info: 'The user follows FC Porto' },
    context_updates: [{ entry_number: 1, new_priority: 70 }],
    ...overrides
  })
}

function gateway(complete: CompleteFn, timeoutMs = 1000): ModelGateway {
  return new ModelGateway({ complete, augmentationSkills: ['web_search'], timeoutMs })
}

/** Rejects once the call's signal aborts, the way a fetch-based client does. */
function hangUntilAborted(request: CompletionRequest): Promise<string> {
  return new Promise((_, reject) => {
    request.abortSignal.addEventListener('abort', () => reject(new Error('aborted')))
  })
}

describe('ModelGateway.generate', () => {
  it('parses structured output', async () => {
    const complete = vi.fn<CompleteFn>().mockResolvedValue(structured())
    const result = await gateway(complete).generate('system', 'hi', { mode: 'structured' })

    expect(result.kind).toBe('parsed')
    if (result.kind === 'parsed') {
      expect(result.fallback).toBe(false)
      expect(result.reply.replyText).toBe('Let me check.')
    }
  })

  it('returns raw text in augmented mode', async () => {
    const complete = vi.fn<CompleteFn>().mockResolvedValue('It is sunny.')
    const result = await gateway(complete).generate('system', 'weather?', { mode: 'augmented', skill: 'web_search' })

    expect(result).toEqual({ kind: 'raw', text: 'It is sunny.' })
    expect(complete.mock.calls[0][0].skill).toBe('web_search')
  })
})

describe('ModelGateway.respond', () => {
  it('falls back on empty output', async () => {
    const complete = vi.fn<CompleteFn>().mockResolvedValue('')
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})

    const outcome = await gateway(complete).respond('system', 'hi')

    expect(outcome.fallback).toBe(true)
    expect(outcome.reply.replyText).toBe(FALLBACK_REPLY_TEXT)
    expect(outcome.reply.continueListening).toBe(false)
    expect(outcome.reply.newFact).toBeNull()
    expect(warn).toHaveBeenCalledWith('[model] Malformed model reply: empty output; using fallback reply')
    warn.mockRestore()
  })

  it('makes one call when no server skill is requested', async () => {
    const complete = vi.fn<CompleteFn>().mockResolvedValue(structured())
    const outcome = await gateway(complete).respond('system', 'hi')

    expect(complete).toHaveBeenCalledTimes(1)
    expect(outcome.augmentedWith).toBeNull()
    expect(complete.mock.calls[0][0]).toMatchObject({ mode: 'structured', system: 'system', prompt: 'hi' })
  })

  it('sends the reply schema with the structured call only', async () => {
    const complete = vi.fn<CompleteFn>()
      .mockResolvedValueOnce(structured({ server_skill: { name: 'web_search', params: { query: 'Porto score' } } }))
      .mockResolvedValueOnce('Porto won 2-0.')

    await gateway(complete).respond('system', 'how did Porto do?')

    expect(complete.mock.calls[0][0].responseSchema).toBe(rawReplySchema)
    expect(complete.mock.calls[1][0].mode).toBe('augmented')
    expect(complete.mock.calls[1][0].responseSchema).toBeUndefined()
  })

  it('augments at most once and keeps the memory fields of the first reply', async () => {
    const complete = vi.fn<CompleteFn>()
      .mockResolvedValueOnce(structured({ server_skill: { name: 'web_search', params: { query: 'Porto score' } } }))
      .mockResolvedValueOnce(structured({ server_skill: { name: 'web_search' }, server_reply: 'still JSON?' }))

    const outcome = await gateway(complete).respond('system', 'how did Porto do?')

    expect(complete).toHaveBeenCalledTimes(2)
    const second = complete.mock.calls[1][0]
    expect(second.mode).toBe('augmented')
    expect(second.system).toBe(AUGMENTED_INSTRUCTIONS)
    expect(second.prompt).toBe('how did Porto do?\n\nSearch for: Porto score')

    expect(outcome.augmentedWith).toBe('web_search')
    expect(outcome.reply.serverSkill).toBeNull()
    expect(outcome.reply.priorityUpdates).toEqual([{ entryIndex: 1, newPriority: 70 }])
    expect(outcome.reply.newFact?.text).toBe('The user follows FC Porto')
  })

  it('derives continue listening from a trailing question mark', async () => {
    const complete = vi.fn<CompleteFn>()
      .mockResolvedValueOnce(structured({ server_skill: { name: 'web_search' } }))
      .mockResolvedValueOnce('They won 2-1. Want the scorers?  ')

    const outcome = await gateway(complete).respond('system', 'score?')

    expect(outcome.reply.replyText).toBe('They won 2-1. Want the scorers?')
    expect(outcome.reply.continueListening).toBe(true)
  })

  it('ignores server skills it does not know', async () => {
    const complete = vi.fn<CompleteFn>().mockResolvedValue(structured({ server_skill: { name: 'teleport' } }))
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})

    const outcome = await gateway(complete).respond('system', 'hi')

    expect(complete).toHaveBeenCalledTimes(1)
    expect(outcome.augmentedWith).toBeNull()
    expect(warn).toHaveBeenCalledWith('[model] Ignoring unknown server skill "teleport"')
    warn.mockRestore()
  })

  it('falls back when the augmented call returns nothing', async () => {
    const complete = vi.fn<CompleteFn>()
      .mockResolvedValueOnce(structured({ server_skill: { name: 'web_search' } }))
      .mockResolvedValueOnce('   ')
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})

    const outcome = await gateway(complete).respond('system', 'hi')

    expect(outcome.fallback).toBe(true)
    expect(outcome.reply.replyText).toBe(FALLBACK_REPLY_TEXT)
    warn.mockRestore()
  })

  it('wraps provider failures in ModelError', async () => {
    const complete = vi.fn<CompleteFn>().mockRejectedValue(new Error('503 Service Unavailable'))
    const error = vi.spyOn(console, 'error').mockImplementation(() => {})

    const failure = gateway(complete).respond('system', 'hi')

    await expect(failure).rejects.toBeInstanceOf(ModelError)
    await expect(failure).rejects.toThrow('Model call failed: 503 Service Unavailable')
    error.mockRestore()
  })

  it('reports a timeout as ModelError', async () => {
    const complete = vi.fn<CompleteFn>(hangUntilAborted)
    await expect(gateway(complete, 20).respond('system', 'hi')).rejects.toThrow('Model call timed out after 20ms')
  })

  it('reports caller cancellation as ModelError', async () => {
    const controller = new AbortController()
    const complete = vi.fn<CompleteFn>((request) => {
      const pending = hangUntilAborted(request)
      controller.abort()
      return pending
    })

    await expect(gateway(complete).respond('system', 'hi', controller.signal))
      .rejects.toThrow('Model call cancelled by caller')
  })
})
