import { MalformedModelReply, ModelError } from '../errors.js'
import { createLogger } from '../logger.js'
import { AUGMENTED_INSTRUCTIONS } from '../context/instructions.js'
import { fallbackReply, parseModelReply, rawReplySchema } from './reply.js'
import type { ReplySchema } from './reply.js'
import type { ModelReply, Skill } from '../memory/types.js'

export type CompletionMode = 'structured' | 'augmented'

export interface CompletionRequest {
  mode: CompletionMode
  system: string
  prompt: string
  /** Shape the reply must take, structured mode only. */
  responseSchema?: ReplySchema
  /** Name of the secondary capability to enable, augmented mode only. */
  skill?: string
  abortSignal: AbortSignal
}

/** One call to the text-generation endpoint. Rejections become ModelError. */
export type CompleteFn = (request: CompletionRequest) => Promise<string>

export type GenerateResult =
  | { kind: 'parsed'; reply: ModelReply; fallback: boolean }
  | { kind: 'raw'; text: string }

export interface GatewayOutcome {
  reply: ModelReply
  fallback: boolean
  augmentedWith: string | null
}

export interface ModelGatewayConfig {
  complete: CompleteFn
  augmentationSkills: string[]
  timeoutMs: number
}

const log = createLogger('model')

export class ModelGateway {
  private complete: CompleteFn
  private augmentationSkills: Set<string>
  private timeoutMs: number

  constructor(config: ModelGatewayConfig) {
    this.complete = config.complete
    this.augmentationSkills = new Set(config.augmentationSkills)
    this.timeoutMs = config.timeoutMs
  }

  /**
   * A single model call. Structured calls parse into a ModelReply, falling
   * back to a fixed apology when the output is malformed; augmented calls
   * return the raw text.
   */
  async generate(
    system: string,
    prompt: string,
    options: { mode: CompletionMode; skill?: string; abortSignal?: AbortSignal }
  ): Promise<GenerateResult> {
    if (options.mode === 'augmented') {
      const text = await this.call({ mode: 'augmented', system, prompt, skill: options.skill }, options.abortSignal)
      return { kind: 'raw', text }
    }
    return { kind: 'parsed', ...await this.structured(system, prompt, options.abortSignal) }
  }

  /**
   * Structured call, plus at most one augmented call when the reply asks for
   * a known server skill. The augmented text is never inspected for further
   * skill requests.
   */
  async respond(system: string, prompt: string, abortSignal?: AbortSignal): Promise<GatewayOutcome> {
    const first = await this.structured(system, prompt, abortSignal)
    const skill = first.reply.serverSkill
    if (first.fallback || !skill) {
      return { ...first, augmentedWith: null }
    }
    if (!this.augmentationSkills.has(skill.name)) {
      log.warn(`Ignoring unknown server skill "${skill.name}"`)
      return { ...first, augmentedWith: null }
    }

    log.info(`Reply requested server skill "${skill.name}", running augmented call`)
    const raw = await this.call(
      { mode: 'augmented', system: AUGMENTED_INSTRUCTIONS, prompt: augmentedPrompt(prompt, skill), skill: skill.name },
      abortSignal
    )

    const text = raw.trim()
    if (text === '') {
      log.warn('Augmented call returned no text; using fallback reply')
      return { reply: fallbackReply(), fallback: true, augmentedWith: skill.name }
    }

    return {
      reply: {
        ...first.reply,
        replyText: text,
        continueListening: text.endsWith('?'),
        requestedSkills: [],
        serverSkill: null
      },
      fallback: false,
      augmentedWith: skill.name
    }
  }

  private async structured(
    system: string,
    prompt: string,
    abortSignal?: AbortSignal
  ): Promise<{ reply: ModelReply; fallback: boolean }> {
    const text = await this.call({ mode: 'structured', system, prompt, responseSchema: rawReplySchema }, abortSignal)
    try {
      return { reply: parseModelReply(text), fallback: false }
    } catch (e) {
      if (!(e instanceof MalformedModelReply)) throw e
      log.warn(`${e.message}; using fallback reply`)
      log.debug(`Raw model output: ${text}`)
      return { reply: fallbackReply(), fallback: true }
    }
  }

  private async call(request: Omit<CompletionRequest, 'abortSignal'>, callerSignal?: AbortSignal): Promise<string> {
    const timeout = AbortSignal.timeout(this.timeoutMs)
    const abortSignal = callerSignal ? AbortSignal.any([callerSignal, timeout]) : timeout

    try {
      return await this.complete({ ...request, abortSignal })
    } catch (e) {
      if (callerSignal?.aborted) {
        throw new ModelError('Model call cancelled by caller', e)
      }
      if (timeout.aborted) {
        throw new ModelError(`Model call timed out after ${this.timeoutMs}ms`, e)
      }
      const detail = e instanceof Error ? e.message : String(e)
      log.error(`Model call failed (${request.mode}): ${detail}`)
      throw new ModelError(`Model call failed: ${detail}`, e)
    }
  }
}

function augmentedPrompt(prompt: string, skill: Skill): string {
  const query = skill.params.query
  return typeof query === 'string' && query.trim() !== ''
    ? `${prompt}\n\nSearch for: ${query.trim()}`
    : prompt
}
