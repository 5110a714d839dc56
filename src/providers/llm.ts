import { createOpenAI } from '@ai-sdk/openai'
import { createGoogleGenerativeAI } from '@ai-sdk/google'
import { Output, generateText } from 'ai'
import { DEFAULT_BASE_URLS } from '../config.js'
import type { RecollectConfig } from '../config.js'
import type { CompleteFn, CompletionRequest } from '../model/gateway.js'

export function createLLMProvider(config: RecollectConfig['llm']) {
  // Gemini, Cerebras, OpenAI, Ollama, OpenRouter all speak the OpenAI-compatible format
  // Anthropic uses its own format, not yet implemented
  if (config.provider === 'anthropic') {
    throw new Error('Anthropic provider not yet implemented; install @ai-sdk/anthropic when needed')
  }

  return createOpenAI({
    apiKey: config.apiKey,
    baseURL: config.baseUrl || DEFAULT_BASE_URLS[config.provider],
    name: config.provider
  })
}

/**
 * The completion function behind ModelGateway. Structured calls go through
 * chat completions with the reply schema as response format. Web search runs
 * on the Responses API tool for OpenAI and on Google Search grounding for
 * Gemini; other providers have no search tool and fail the augmented call.
 */
export function createCompletionFn(config: RecollectConfig['llm']): CompleteFn {
  const provider = createLLMProvider(config)
  // Search grounding is only on Gemini's native API, not its OpenAI-compatible endpoint
  const google = config.provider === 'gemini' ? createGoogleGenerativeAI({ apiKey: config.apiKey }) : null

  return async (request: CompletionRequest): Promise<string> => {
    const common = {
      system: request.system,
      prompt: request.prompt,
      maxOutputTokens: config.maxOutputTokens,
      abortSignal: request.abortSignal
    }

    if (request.mode === 'augmented') {
      if (request.skill === 'web_search' && config.provider === 'openai') {
        const { text } = await generateText({
          ...common,
          model: provider.responses(config.searchModel),
          tools: { web_search_preview: provider.tools.webSearchPreview({}) }
        })
        return text
      }
      if (request.skill === 'web_search' && google) {
        const { text } = await generateText({
          ...common,
          model: google(config.searchModel),
          tools: { google_search: google.tools.googleSearch({}) }
        })
        return text
      }
      throw new Error(`Provider "${config.provider}" has no tool for server skill "${request.skill ?? '(none)'}"`)
    }

    const model = provider.chat(config.model)
    if (request.responseSchema) {
      // The raw text still goes back to the gateway, which owns parsing and the fallback
      const { text } = await generateText({
        ...common,
        model,
        experimental_output: Output.object({ schema: request.responseSchema })
      })
      return text
    }
    const { text } = await generateText({ ...common, model })
    return text
  }
}
