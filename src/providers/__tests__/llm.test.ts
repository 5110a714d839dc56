import { describe, it, expect } from 'vitest'
import { createCompletionFn, createLLMProvider } from '../llm.js'
import { DEFAULT_BASE_URLS, DEFAULT_CONFIG } from '../../config.js'

describe('LLM Provider', () => {
  it('creates an OpenAI-compatible provider for gemini', () => {
    const provider = createLLMProvider({
      ...DEFAULT_CONFIG.llm,
      apiKey: 'test-key'
    })
    expect(provider).toBeDefined()
    expect(typeof provider.chat).toBe('function')
  })

  it('creates an OpenAI-compatible provider for openai', () => {
    const provider = createLLMProvider({
      ...DEFAULT_CONFIG.llm,
      provider: 'openai',
      baseUrl: 'https://api.openai.com/v1',
      apiKey: 'test-key'
    })
    expect(typeof provider.responses).toBe('function')
  })

  it('creates an OpenAI-compatible provider for ollama without a base URL override', () => {
    const provider = createLLMProvider({
      ...DEFAULT_CONFIG.llm,
      provider: 'ollama',
      baseUrl: undefined
    })
    expect(provider).toBeDefined()
  })

  it('creates an OpenAI-compatible provider for openrouter', () => {
    const provider = createLLMProvider({
      ...DEFAULT_CONFIG.llm,
      provider: 'openrouter',
      baseUrl: 'https://openrouter.ai/api/v1',
      apiKey: 'test-key'
    })
    expect(provider).toBeDefined()
  })

  it('throws for anthropic provider (not yet implemented)', () => {
    expect(() => createLLMProvider({
      ...DEFAULT_CONFIG.llm,
      provider: 'anthropic',
      apiKey: 'test-key'
    })).toThrow('Anthropic provider not yet implemented')
  })
})

describe('createCompletionFn', () => {
  it('returns a completion function without calling the endpoint', () => {
    const complete = createCompletionFn({ ...DEFAULT_CONFIG.llm, apiKey: 'test-key' })
    expect(typeof complete).toBe('function')
  })

  it('fails an augmented call the provider has no search tool for', async () => {
    const complete = createCompletionFn({ ...DEFAULT_CONFIG.llm, provider: 'ollama', baseUrl: DEFAULT_BASE_URLS.ollama })

    await expect(complete({
      mode: 'augmented',
      system: 'Answer briefly.',
      prompt: 'weather in Porto?',
      skill: 'web_search',
      abortSignal: new AbortController().signal
    })).rejects.toThrow('Provider "ollama" has no tool for server skill "web_search"')
  })

  it('refuses anthropic up front', () => {
    expect(() => createCompletionFn({ ...DEFAULT_CONFIG.llm, provider: 'anthropic', apiKey: 'test-key' }))
      .toThrow('Anthropic provider not yet implemented')
  })
})
