import { createLogger } from '../logger.js'
import type { MemoryEntry, TurnRecord, ContextSnapshot } from '../memory/types.js'

export interface BudgetLimits {
  maxMemoryChars: number
  maxHistoryChars: number
  maxTotalChars: number
}

export type ContextOverflow = 'none' | 'truncated' | 'instructions-only'

export interface ContextStats {
  entriesIncluded: number
  entriesDropped: number
  turnsIncluded: number
  turnsDropped: number
  memoryChars: number
  historyChars: number
  totalChars: number
}

export interface BudgetInput {
  instructions: string
  entries: MemoryEntry[]
  turns: TurnRecord[]
}

export interface BudgetedContext {
  text: string
  snapshot: ContextSnapshot
  overflow: ContextOverflow
  stats: ContextStats
}

export const MEMORY_HEADER = 'KEY CONTEXT FROM PREVIOUS IMPORTANT INTERACTIONS:\n'
export const HISTORY_HEADER = 'RECENT CONVERSATION HISTORY:\n'
export const TRUNCATION_MARKER = '\n\n[Context truncated to fit limits]'
const SECTION_SEPARATOR = '\n\n'

const log = createLogger('budget')

/** Active entries by priority desc; ties go to the most recently touched. */
export function rankEntries(entries: MemoryEntry[]): MemoryEntry[] {
  return entries
    .filter(entry => entry.priority > 0)
    .sort((a, b) => b.priority - a.priority || b.updatedAt.getTime() - a.updatedAt.getTime())
}

export function formatEntryLine(position: number, entry: MemoryEntry): string {
  return `${position}. [${entry.updatedAt.toISOString()} | priority: ${entry.priority}] ${entry.factText}\n`
}

export function formatTurn(turn: TurnRecord): string {
  let reply = turn.assistantReply
  if (reply.toLowerCase().startsWith('assistant:')) {
    reply = reply.slice('assistant:'.length).trim()
  }
  return `User: ${turn.userInput} (at ${turn.createdAt.toISOString()})\nAssistant: ${reply}\n\n`
}

interface Placed<T> {
  item: T
  chars: number
  end: number
}

export class ContextBudgeter {
  private limits: BudgetLimits

  constructor(limits: BudgetLimits) {
    this.limits = limits
  }

  build(input: BudgetInput): BudgetedContext {
    const ranked = rankEntries(input.entries)
    const memoryLines = this.selectMemory(ranked)
    const newestFirst = [...input.turns].sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
    const historyBlocks = this.selectHistory(newestFirst)

    // Assemble while recording where each entry and turn ends, so the
    // snapshot can be trimmed to exactly what survives truncation.
    let text = input.instructions
    const placedEntries: Placed<MemoryEntry>[] = []
    const placedTurns: Placed<TurnRecord>[] = []

    if (memoryLines.length > 0) {
      text += SECTION_SEPARATOR + MEMORY_HEADER
      for (const { item, line } of memoryLines) {
        text += line
        placedEntries.push({ item, chars: line.length, end: text.length })
      }
    }

    if (historyBlocks.length > 0) {
      text += SECTION_SEPARATOR + HISTORY_HEADER
      // Selected newest-first, read oldest-first
      for (const { item, line } of [...historyBlocks].reverse()) {
        text += line
        placedTurns.push({ item, chars: line.length, end: text.length })
      }
    }

    let overflow: ContextOverflow = 'none'
    let visibleUpTo = text.length

    if (text.length > this.limits.maxTotalChars) {
      const keep = this.limits.maxTotalChars - TRUNCATION_MARKER.length
      if (keep < input.instructions.length) {
        overflow = 'instructions-only'
        visibleUpTo = input.instructions.length
        text = input.instructions
        if (input.instructions.length > this.limits.maxTotalChars) {
          log.error(`Fixed instructions alone (${input.instructions.length} chars) exceed maxTotalChars (${this.limits.maxTotalChars}); sending instructions only`)
        } else {
          log.warn(`No room for memory or history within ${this.limits.maxTotalChars} chars; sending instructions only`)
        }
      } else {
        log.warn(`Total context too long (${text.length} chars), truncating to ${this.limits.maxTotalChars}`)
        overflow = 'truncated'
        visibleUpTo = keep
        text = text.slice(0, keep) + TRUNCATION_MARKER
      }
    }

    const entries = placedEntries.filter(p => p.end <= visibleUpTo)
    const turns = placedTurns.filter(p => p.end <= visibleUpTo)

    const stats: ContextStats = {
      entriesIncluded: entries.length,
      entriesDropped: ranked.length - entries.length,
      turnsIncluded: turns.length,
      turnsDropped: input.turns.length - turns.length,
      memoryChars: entries.reduce((sum, p) => sum + p.chars, 0),
      historyChars: turns.reduce((sum, p) => sum + p.chars, 0),
      totalChars: text.length
    }

    log.debug(`Context length: ${stats.totalChars} chars (~${Math.floor(stats.totalChars / 4)} tokens), ${stats.entriesIncluded} entries, ${stats.turnsIncluded} turns`)

    return {
      text,
      snapshot: {
        entries: entries.map(p => p.item),
        turns: turns.map(p => p.item)
      },
      overflow,
      stats
    }
  }

  /**
   * Whole lines in rank order until the next one would overflow. Everything
   * after the first line that does not fit is excluded too.
   */
  private selectMemory(ranked: MemoryEntry[]): { item: MemoryEntry; line: string }[] {
    const selected: { item: MemoryEntry; line: string }[] = []
    let used = 0
    for (const entry of ranked) {
      const line = formatEntryLine(selected.length + 1, entry)
      if (used + line.length > this.limits.maxMemoryChars) {
        log.debug(`Key context cut at ${used} chars, skipping ${ranked.length - selected.length} entries`)
        break
      }
      selected.push({ item: entry, line })
      used += line.length
    }
    return selected
  }

  private selectHistory(newestFirst: TurnRecord[]): { item: TurnRecord; line: string }[] {
    const selected: { item: TurnRecord; line: string }[] = []
    let used = 0
    for (const turn of newestFirst) {
      const block = formatTurn(turn)
      if (used + block.length > this.limits.maxHistoryChars) {
        log.debug(`Conversation history cut at ${used} chars`)
        break
      }
      selected.push({ item: turn, line: block })
      used += block.length
    }
    return selected
  }
}
