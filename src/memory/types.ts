/** A prioritized long-term fact about one user. Priority 0 marks it for purging. */
export interface MemoryEntry {
  id: string
  userId: string
  factText: string
  priority: number
  createdAt: Date
  updatedAt: Date
}

export interface InteractionMeta {
  relevantForContext: boolean
  contextPriority: number
  relevantInfo: string
  augmentedWith: string | null
}

export interface TurnRecord {
  id: string
  userId: string
  userInput: string
  assistantReply: string
  interactionMeta: InteractionMeta | null
  createdAt: Date
}

export interface Skill {
  name: string
  action: string
  params: Record<string, unknown>
}

/** `entryIndex` is the 1-based position in the snapshot the model saw, never a storage id. */
export interface PriorityUpdate {
  entryIndex: number
  newPriority: number
}

export interface NewFact {
  text: string
  priority: number
  relevant: boolean
}

export interface ModelReply {
  replyText: string
  continueListening: boolean
  requestedSkills: Skill[]
  serverSkill: Skill | null
  priorityUpdates: PriorityUpdate[]
  newFact: NewFact | null
}

/**
 * What was actually sent to the model for one turn: memory entries in the
 * order they were numbered, and turns oldest-first.
 */
export interface ContextSnapshot {
  entries: MemoryEntry[]
  turns: TurnRecord[]
}

export interface PatchSignal {
  enrichedPrompt?: string
  resolvableNames?: string[]
}

export interface TurnResult {
  replyText: string
  continueListening: boolean
  skills: Skill[]
}

export const MIN_PRIORITY = 0
export const MAX_PRIORITY = 100

export function clampPriority(value: number, min: number = MIN_PRIORITY): number {
  if (!Number.isFinite(value)) return min
  return Math.min(MAX_PRIORITY, Math.max(min, Math.round(value)))
}
