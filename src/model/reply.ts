import { z } from 'zod'
import { MalformedModelReply } from '../errors.js'
import { clampPriority } from '../memory/types.js'
import type { ModelReply, Skill } from '../memory/types.js'

const skillSchema = z.object({
  name: z.string().min(1),
  action: z.string().default(''),
  params: z.record(z.string(), z.unknown()).default({})
})

/** The JSON object the structured call is instructed to return. */
export const rawReplySchema = z.object({
  server_reply: z.string(),
  app_params: z.array(z.object({ question: z.boolean().optional() })).nullish(),
  skills: z.array(skillSchema).nullish(),
  server_skill: skillSchema.nullish(),
  interaction_params: z.object({
    relevant_for_context: z.boolean(),
    context_priority: z.number(),
    relevant_info: z.string()
  }),
  context_updates: z.array(z.object({
    entry_number: z.number(),
    new_priority: z.number()
  })).nullish()
})

export type RawReply = z.infer<typeof rawReplySchema>

/** A schema the endpoint can constrain structured output to. */
export type ReplySchema = z.ZodType<RawReply, z.ZodTypeDef, unknown>

export const FALLBACK_REPLY_TEXT = "Sorry, I couldn't process that just now. Could you try again?"

export function fallbackReply(): ModelReply {
  return {
    replyText: FALLBACK_REPLY_TEXT,
    continueListening: false,
    requestedSkills: [],
    serverSkill: null,
    priorityUpdates: [],
    newFact: null
  }
}

/** Models often wrap JSON in ```json fences even when told not to. */
export function stripCodeFences(text: string): string {
  return text.replace(/^\s*```(?:json)?\s*\n?/i, '').replace(/\n?```\s*$/i, '').trim()
}

function toSkill(raw: z.infer<typeof skillSchema>): Skill {
  return { name: raw.name, action: raw.action, params: raw.params }
}

/**
 * Strict parse of a structured reply. Throws MalformedModelReply for empty
 * output, invalid JSON, a missing required field or an empty reply text.
 */
export function parseModelReply(text: string): ModelReply {
  const cleaned = stripCodeFences(text)
  if (cleaned === '') {
    throw new MalformedModelReply('empty output')
  }

  let json: unknown
  try {
    json = JSON.parse(cleaned)
  } catch {
    throw new MalformedModelReply('output is not valid JSON')
  }

  const result = rawReplySchema.safeParse(json)
  if (!result.success) {
    const issue = result.error.issues[0]
    const where = issue && issue.path.length > 0 ? issue.path.join('.') : 'reply'
    throw new MalformedModelReply(`${where}: ${issue?.message ?? 'invalid'}`)
  }

  return toModelReply(result.data)
}

export function toModelReply(raw: RawReply): ModelReply {
  let replyText = raw.server_reply.trim()
  if (replyText.toLowerCase().startsWith('assistant:')) {
    replyText = replyText.slice('assistant:'.length).trim()
  }
  if (replyText === '') {
    throw new MalformedModelReply('server_reply is empty')
  }

  const params = raw.interaction_params
  const factText = params.relevant_info.trim()

  return {
    replyText,
    continueListening: (raw.app_params ?? []).some(p => p.question === true),
    requestedSkills: (raw.skills ?? []).map(toSkill),
    serverSkill: raw.server_skill ? toSkill(raw.server_skill) : null,
    priorityUpdates: (raw.context_updates ?? []).map(update => ({
      entryIndex: update.entry_number,
      newPriority: clampPriority(update.new_priority)
    })),
    newFact: factText === ''
      ? null
      : {
          text: factText,
          priority: clampPriority(params.context_priority, 1),
          relevant: params.relevant_for_context
        }
  }
}
