import { nanoid } from 'nanoid'
import { createLogger } from '../logger.js'
import { findDuplicate, isDuplicateFact } from './similarity.js'
import { rankEntries } from '../context/budgeter.js'
import type { MemoryStore } from '../storage/store.js'
import type { OverCapPolicy } from '../config.js'
import type { ContextSnapshot, MemoryEntry, ModelReply } from './types.js'

export interface ReconcilerConfig {
  store: MemoryStore
  maxActiveEntries: number
  duplicateThreshold: number
  /** Run the full duplicate sweep every N reconciliations per user; 0 disables it. */
  duplicateSweepInterval: number
  overCapPolicy: OverCapPolicy
  now?: () => Date
}

export interface ReconcileReport {
  updated: number
  skipped: number
  inserted: MemoryEntry | null
  merged: MemoryEntry | null
  purged: number
  sweptDuplicates: number
  evicted: number
  activeCount: number
}

const log = createLogger('reconcile')

export class MemoryReconciler {
  private store: MemoryStore
  private config: Required<Omit<ReconcilerConfig, 'store'>>
  private reconcileCounts: Map<string, number> = new Map()

  constructor(config: ReconcilerConfig) {
    this.store = config.store
    this.config = {
      maxActiveEntries: config.maxActiveEntries,
      duplicateThreshold: config.duplicateThreshold,
      duplicateSweepInterval: config.duplicateSweepInterval,
      overCapPolicy: config.overCapPolicy,
      now: config.now ?? (() => new Date())
    }
  }

  /** Fold one model reply into the user's memory pool. */
  async reconcile(userId: string, reply: ModelReply, snapshot: ContextSnapshot): Promise<ReconcileReport> {
    const report: ReconcileReport = {
      updated: 0,
      skipped: 0,
      inserted: null,
      merged: null,
      purged: 0,
      sweptDuplicates: 0,
      evicted: 0,
      activeCount: 0
    }

    // 1. Priority updates, resolved against the positions the model saw
    for (const update of reply.priorityUpdates) {
      const entry = Number.isInteger(update.entryIndex) ? snapshot.entries[update.entryIndex - 1] : undefined
      if (!entry) {
        log.warn(`Invalid entry number ${update.entryIndex} for user ${userId} (snapshot has ${snapshot.entries.length} entries), skipping`)
        report.skipped++
        continue
      }
      const applied = await this.store.setPriority(entry.id, update.newPriority, this.config.now())
      if (applied) {
        report.updated++
        log.debug(`Entry ${update.entryIndex} (${entry.id}) for user ${userId} -> priority ${update.newPriority}`)
      } else {
        log.warn(`Entry ${update.entryIndex} (${entry.id}) for user ${userId} no longer exists, skipping`)
        report.skipped++
      }
    }

    // 2. New fact, merged into an equivalent active entry when there is one
    const fact = reply.newFact
    if (fact && fact.relevant && fact.text.trim() !== '') {
      const active = await this.store.listActiveEntries(userId)
      const duplicate = findDuplicate(fact.text, active, this.config.duplicateThreshold)
      const now = this.config.now()

      if (duplicate) {
        const merged: MemoryEntry = {
          ...duplicate,
          priority: Math.max(duplicate.priority, fact.priority),
          updatedAt: now
        }
        await this.store.upsertEntry(merged)
        report.merged = merged
        log.debug(`Merged new fact into entry ${duplicate.id} for user ${userId}`)
      } else {
        const entry: MemoryEntry = {
          id: nanoid(),
          userId,
          factText: fact.text.trim(),
          priority: fact.priority,
          createdAt: now,
          updatedAt: now
        }
        await this.store.upsertEntry(entry)
        report.inserted = entry
        log.debug(`Saved new fact for user ${userId}: ${entry.factText.slice(0, 50)}`)
      }
    }

    // 3. Eviction: zero-priority purge every time, duplicate sweep on a schedule
    report.purged = await this.store.purgeZeroPriority(userId)
    if (report.purged > 0) {
      log.debug(`Purged ${report.purged} zero-priority entries for user ${userId}`)
    }
    if (this.sweepDue(userId)) {
      report.sweptDuplicates = await this.sweepDuplicates(userId)
    }

    // 4. Count cap
    report.activeCount = await this.store.countActive(userId)
    if (report.activeCount > this.config.maxActiveEntries) {
      if (this.config.overCapPolicy === 'evict-lowest') {
        report.evicted = await this.evictBeyondCap(userId)
        report.activeCount -= report.evicted
      } else {
        log.warn(`User ${userId} has ${report.activeCount} active entries (cap ${this.config.maxActiveEntries}); retaining all until marked with priority 0`)
      }
    }

    return report
  }

  /**
   * Merges every active entry into a newer equivalent one. The survivor keeps
   * its id and takes the higher priority. Returns the number of entries removed.
   */
  async sweepDuplicates(userId: string): Promise<number> {
    const active = await this.store.listActiveEntries(userId)
    const newestFirst = [...active].sort((a, b) => b.updatedAt.getTime() - a.updatedAt.getTime())
    const survivors: MemoryEntry[] = []
    const changed = new Set<MemoryEntry>()
    let removed = 0

    for (const entry of newestFirst) {
      const keeper = survivors.find(s => isDuplicateFact(entry.factText, s.factText, this.config.duplicateThreshold))
      if (!keeper) {
        survivors.push(entry)
        continue
      }
      if (entry.priority > keeper.priority) {
        keeper.priority = entry.priority
        changed.add(keeper)
      }
      await this.store.deleteEntry(entry.id)
      removed++
    }

    for (const keeper of changed) {
      await this.store.upsertEntry(keeper)
    }

    if (removed > 0) {
      log.info(`Duplicate sweep removed ${removed} entries for user ${userId}`)
    }
    return removed
  }

  private sweepDue(userId: string): boolean {
    if (this.config.duplicateSweepInterval <= 0) return false
    const count = (this.reconcileCounts.get(userId) ?? 0) + 1
    this.reconcileCounts.set(userId, count)
    return count % this.config.duplicateSweepInterval === 0
  }

  private async evictBeyondCap(userId: string): Promise<number> {
    const ranked = rankEntries(await this.store.listActiveEntries(userId))
    const overflow = ranked.slice(this.config.maxActiveEntries)
    for (const entry of overflow) {
      await this.store.deleteEntry(entry.id)
    }
    log.info(`Evicted ${overflow.length} lowest-priority entries for user ${userId} (cap ${this.config.maxActiveEntries})`)
    return overflow.length
  }
}
