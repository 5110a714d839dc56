import type { MemoryEntry, TurnRecord, InteractionMeta } from '../memory/types.js'

export interface NewTurn {
  userInput: string
  assistantReply: string
  interactionMeta: InteractionMeta | null
}

export interface TurnPage {
  limit: number
  offset: number
}

/**
 * Durable per-user memory entries and turn history. Every method may reject
 * with a StorageError; callers treat that as fatal to the current turn.
 */
export interface MemoryStore {
  /** Entries with priority > 0, ordered by priority desc, then most recently updated. */
  listActiveEntries(userId: string, limit?: number): Promise<MemoryEntry[]>
  upsertEntry(entry: MemoryEntry): Promise<void>
  /** Returns false when the entry no longer exists. */
  setPriority(id: string, priority: number, at: Date): Promise<boolean>
  deleteEntry(id: string): Promise<boolean>
  purgeZeroPriority(userId: string): Promise<number>
  countActive(userId: string): Promise<number>

  appendTurn(userId: string, turn: NewTurn, at: Date): Promise<TurnRecord>
  /** Newest first. */
  listRecentTurns(userId: string, limit: number): Promise<TurnRecord[]>
  listTurns(userId: string, page: TurnPage): Promise<TurnRecord[]>
  countTurns(userId: string): Promise<number>
  patchTurnReply(turnId: string, assistantReply: string, interactionMeta: InteractionMeta | null): Promise<boolean>

  close(): void
}
