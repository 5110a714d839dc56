import type { WireEntry, WireTurn } from '../daemon/protocol.js'
import type { ContextStats } from '../context/budgeter.js'

export function formatUptime(ms: number): string {
  const seconds = Math.floor(ms / 1000)
  const minutes = Math.floor(seconds / 60)
  const hours = Math.floor(minutes / 60)
  const days = Math.floor(hours / 24)

  if (days > 0) {
    return `${days}d ${hours % 24}h ${minutes % 60}m`
  }
  if (hours > 0) {
    return `${hours}h ${minutes % 60}m ${seconds % 60}s`
  }
  if (minutes > 0) {
    return `${minutes}m ${seconds % 60}s`
  }
  return `${seconds}s`
}

export function formatEntry(position: number, entry: WireEntry): string {
  return `  ${String(position).padStart(2)}. [${entry.priority.toString().padStart(3)}] ${entry.factText}  (updated ${entry.updatedAt})`
}

export function formatHistoryTurn(turn: WireTurn): string {
  const via = turn.augmentedWith ? ` [via ${turn.augmentedWith}]` : ''
  return `  ${turn.createdAt}\n    You: ${turn.userInput}\n    Assistant${via}: ${turn.assistantReply}`
}

export function formatContextStats(stats: ContextStats | null): string {
  if (!stats) return 'no turns yet'
  return `${stats.totalChars} chars; ${stats.entriesIncluded} entries (${stats.entriesDropped} dropped), ${stats.turnsIncluded} turns (${stats.turnsDropped} dropped)`
}
