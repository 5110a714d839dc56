import { homedir } from 'node:os'
import path from 'node:path'
import { mkdirSync } from 'node:fs'
import { z } from 'zod'
import type { MemoryEntry, TurnRecord, TurnResult } from '../memory/types.js'
import type { ContextStats } from '../context/budgeter.js'

const RECOLLECT_DIR = path.join(homedir(), '.recollect')

function ensureRecollectDir(): void {
  mkdirSync(RECOLLECT_DIR, { recursive: true })
}

export function getSocketPath(): string {
  ensureRecollectDir()
  return path.join(RECOLLECT_DIR, 'recollect.sock')
}

export function getPidPath(): string {
  ensureRecollectDir()
  return path.join(RECOLLECT_DIR, 'recollect.pid')
}

const userIdSchema = z.string().trim().min(1)

export const daemonRequestSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('turn'),
    userId: userIdSchema,
    message: z.string().trim().min(1),
    patch: z.object({
      enrichedPrompt: z.string().optional(),
      resolvableNames: z.array(z.string()).optional()
    }).optional(),
    requestId: z.string().optional()
  }),
  z.object({
    type: z.literal('history'),
    userId: userIdSchema,
    page: z.number().int().positive().optional(),
    pageSize: z.number().int().positive().max(100).optional(),
    requestId: z.string().optional()
  }),
  z.object({ type: z.literal('memory'), userId: userIdSchema, requestId: z.string().optional() }),
  z.object({ type: z.literal('status'), requestId: z.string().optional() }),
  z.object({ type: z.literal('shutdown'), requestId: z.string().optional() })
])

export type DaemonRequest = z.infer<typeof daemonRequestSchema>

export type ErrorCode = 'storage' | 'model' | 'invalid' | 'internal'

export type DaemonResponse =
  | { type: 'turn-result'; data: TurnResult; requestId?: string }
  | { type: 'status'; data: DaemonStatus; requestId?: string }
  | { type: 'ok'; data?: unknown; requestId?: string }
  | { type: 'error'; code: ErrorCode; message: string; requestId?: string }

export interface DaemonStatus {
  uptime: number
  inFlightTurns: number
  model: string
  /** Budgeting outcome of the most recent turn, null before the first. */
  lastContext: ContextStats | null
}

/** Entries and turns as they travel over the socket: dates become ISO strings. */
export interface WireEntry {
  id: string
  factText: string
  priority: number
  createdAt: string
  updatedAt: string
}

export interface WireTurn {
  id: string
  userInput: string
  assistantReply: string
  augmentedWith: string | null
  createdAt: string
}

export interface WireHistoryPage {
  turns: WireTurn[]
  totalCount: number
  page: number
  pageSize: number
  totalPages: number
}

export function toWireEntry(entry: MemoryEntry): WireEntry {
  return {
    id: entry.id,
    factText: entry.factText,
    priority: entry.priority,
    createdAt: entry.createdAt.toISOString(),
    updatedAt: entry.updatedAt.toISOString()
  }
}

export function toWireTurn(turn: TurnRecord): WireTurn {
  return {
    id: turn.id,
    userInput: turn.userInput,
    assistantReply: turn.assistantReply,
    augmentedWith: turn.interactionMeta?.augmentedWith ?? null,
    createdAt: turn.createdAt.toISOString()
  }
}
