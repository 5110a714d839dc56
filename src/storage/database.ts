import BetterSqlite3 from 'better-sqlite3'
import { nanoid } from 'nanoid'
import { StorageError } from '../errors.js'
import type { MemoryEntry, TurnRecord, InteractionMeta } from '../memory/types.js'
import type { MemoryStore, NewTurn, TurnPage } from './store.js'

interface EntryRow {
  id: string
  user_id: string
  fact_text: string
  priority: number
  created_at: string
  updated_at: string
}

interface TurnRow {
  id: string
  user_id: string
  user_input: string
  assistant_reply: string
  interaction_meta: string | null
  created_at: string
}

const ENTRY_ORDER = 'priority DESC, updated_at DESC, rowid DESC'
const TURN_ORDER = 'created_at DESC, rowid DESC'

export class SqliteMemoryStore implements MemoryStore {
  private db: BetterSqlite3.Database

  constructor(dbPath: string) {
    try {
      this.db = new BetterSqlite3(dbPath)
      this.db.pragma('journal_mode = WAL')
      this.createTables()
    } catch (e) {
      throw new StorageError('open', e)
    }
  }

  private createTables(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS memory_entries (
        id TEXT PRIMARY KEY,
        user_id TEXT NOT NULL,
        fact_text TEXT NOT NULL CHECK (length(fact_text) > 0),
        priority INTEGER NOT NULL CHECK (priority BETWEEN 0 AND 100),
        created_at DATETIME NOT NULL,
        updated_at DATETIME NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_memory_entries_user_priority
        ON memory_entries (user_id, priority DESC, updated_at DESC);

      CREATE TABLE IF NOT EXISTS turns (
        id TEXT PRIMARY KEY,
        user_id TEXT NOT NULL,
        user_input TEXT NOT NULL,
        assistant_reply TEXT NOT NULL,
        interaction_meta JSON,
        created_at DATETIME NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_turns_user_created
        ON turns (user_id, created_at DESC);
    `)
  }

  private attempt<T>(operation: string, fn: () => T): Promise<T> {
    try {
      return Promise.resolve(fn())
    } catch (e) {
      return Promise.reject(new StorageError(operation, e))
    }
  }

  // --- Memory entries ---

  listActiveEntries(userId: string, limit?: number): Promise<MemoryEntry[]> {
    return this.attempt('listActiveEntries', () => {
      const sql = `SELECT * FROM memory_entries WHERE user_id = ? AND priority > 0 ORDER BY ${ENTRY_ORDER}`
      const rows = limit === undefined
        ? this.db.prepare(sql).all(userId) as EntryRow[]
        : this.db.prepare(`${sql} LIMIT ?`).all(userId, limit) as EntryRow[]
      return rows.map(deserializeEntry)
    })
  }

  upsertEntry(entry: MemoryEntry): Promise<void> {
    return this.attempt('upsertEntry', () => {
      this.db.prepare(`
        INSERT INTO memory_entries (id, user_id, fact_text, priority, created_at, updated_at)
        VALUES (?, ?, ?, ?, ?, ?)
        ON CONFLICT(id) DO UPDATE SET
          fact_text = excluded.fact_text,
          priority = excluded.priority,
          updated_at = excluded.updated_at
      `).run(
        entry.id,
        entry.userId,
        entry.factText,
        entry.priority,
        entry.createdAt.toISOString(),
        entry.updatedAt.toISOString()
      )
    })
  }

  setPriority(id: string, priority: number, at: Date): Promise<boolean> {
    return this.attempt('setPriority', () => {
      const result = this.db.prepare(
        'UPDATE memory_entries SET priority = ?, updated_at = ? WHERE id = ?'
      ).run(priority, at.toISOString(), id)
      return result.changes > 0
    })
  }

  deleteEntry(id: string): Promise<boolean> {
    return this.attempt('deleteEntry', () => {
      return this.db.prepare('DELETE FROM memory_entries WHERE id = ?').run(id).changes > 0
    })
  }

  purgeZeroPriority(userId: string): Promise<number> {
    return this.attempt('purgeZeroPriority', () => {
      return this.db.prepare('DELETE FROM memory_entries WHERE user_id = ? AND priority = 0').run(userId).changes
    })
  }

  countActive(userId: string): Promise<number> {
    return this.attempt('countActive', () => {
      const row = this.db.prepare(
        'SELECT COUNT(*) AS count FROM memory_entries WHERE user_id = ? AND priority > 0'
      ).get(userId) as { count: number }
      return row.count
    })
  }

  // --- Turns ---

  appendTurn(userId: string, turn: NewTurn, at: Date): Promise<TurnRecord> {
    return this.attempt('appendTurn', () => {
      const record: TurnRecord = {
        id: nanoid(),
        userId,
        userInput: turn.userInput,
        assistantReply: turn.assistantReply,
        interactionMeta: turn.interactionMeta,
        createdAt: at
      }
      this.db.prepare(`
        INSERT INTO turns (id, user_id, user_input, assistant_reply, interaction_meta, created_at)
        VALUES (?, ?, ?, ?, ?, ?)
      `).run(
        record.id,
        userId,
        record.userInput,
        record.assistantReply,
        record.interactionMeta ? JSON.stringify(record.interactionMeta) : null,
        at.toISOString()
      )
      return record
    })
  }

  listRecentTurns(userId: string, limit: number): Promise<TurnRecord[]> {
    return this.listTurns(userId, { limit, offset: 0 })
  }

  listTurns(userId: string, page: TurnPage): Promise<TurnRecord[]> {
    return this.attempt('listTurns', () => {
      const rows = this.db.prepare(
        `SELECT * FROM turns WHERE user_id = ? ORDER BY ${TURN_ORDER} LIMIT ? OFFSET ?`
      ).all(userId, page.limit, page.offset) as TurnRow[]
      return rows.map(deserializeTurn)
    })
  }

  countTurns(userId: string): Promise<number> {
    return this.attempt('countTurns', () => {
      const row = this.db.prepare('SELECT COUNT(*) AS count FROM turns WHERE user_id = ?').get(userId) as { count: number }
      return row.count
    })
  }

  patchTurnReply(turnId: string, assistantReply: string, interactionMeta: InteractionMeta | null): Promise<boolean> {
    return this.attempt('patchTurnReply', () => {
      const result = this.db.prepare(
        'UPDATE turns SET assistant_reply = ?, interaction_meta = ? WHERE id = ?'
      ).run(assistantReply, interactionMeta ? JSON.stringify(interactionMeta) : null, turnId)
      return result.changes > 0
    })
  }

  // --- Lifecycle ---

  close(): void {
    this.db.close()
  }
}

function deserializeEntry(row: EntryRow): MemoryEntry {
  return {
    id: row.id,
    userId: row.user_id,
    factText: row.fact_text,
    priority: row.priority,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at)
  }
}

function deserializeTurn(row: TurnRow): TurnRecord {
  return {
    id: row.id,
    userId: row.user_id,
    userInput: row.user_input,
    assistantReply: row.assistant_reply,
    interactionMeta: row.interaction_meta ? JSON.parse(row.interaction_meta) as InteractionMeta : null,
    createdAt: new Date(row.created_at)
  }
}
