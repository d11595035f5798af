/**
 * Schedule Synchronization Workflow
 *
 * Every mutation runs the same five steps:
 *
 *   1. Stage    compute the rows to add or the target to remove
 *   2. Refetch  read the latest table; nothing fetched earlier is reused
 *   3. Merge    apply the staged change to that table
 *   4. Commit   write it back (refused without a credential)
 *   5. Report   return the outcome, optionally with the post-write state
 *
 * Nothing is retried. If another session writes between step 2 and the
 * store's token lookup in step 4, this write replaces theirs; the result's
 * `write.staleBase` flags when that happened.
 */

import { ConflictError, ParseError, TransportError, describeError } from './errors.js'
import { normalizeRecords, rowLabel } from './record.js'
import { PARSE_HINT, parseEvent, type DateResolver } from './parser.js'
import { expandRecurrence } from './recurrence.js'
import type {
  EventRecord,
  ManualEventInput,
  ScheduleStore,
  ScheduleTable,
  SyncAction,
  SyncFailure,
  SyncOutcome,
  VersionToken,
  WriteResult,
} from './types.js'

export const COMMIT_MESSAGES = {
  manual: 'Add event(s) via UI',
  parsed: 'Add event via NLP',
  delete: 'Delete event',
} as const

export interface ScheduleSyncOptions {
  /** Re-read the store after a successful write (default true) */
  refreshAfterWrite?: boolean
  /** Reference clock for natural-language dates */
  now?: () => Date
  resolveDate?: DateResolver
}

type Refetched =
  | { ok: true; table: ScheduleTable; token: VersionToken | null }
  | { ok: false; outcome: SyncOutcome }

export class ScheduleSync {
  private store: ScheduleStore
  private refreshAfterWrite: boolean
  private now: () => Date
  private resolveDate?: DateResolver

  constructor(store: ScheduleStore, options: ScheduleSyncOptions = {}) {
    this.store = store
    this.refreshAfterWrite = options.refreshAfterWrite ?? true
    this.now = options.now ?? (() => new Date())
    this.resolveDate = options.resolveDate
  }

  /**
   * Add a manually entered event, expanded by its recurrence.
   */
  async addManual(input: ManualEventInput): Promise<SyncOutcome> {
    const staged = expandRecurrence({
      startDate: input.date,
      name: input.name,
      activity: input.activity,
      time: input.time,
      mode: input.recurrence,
      count: input.repeatCount,
    })
    return this.addEvents(staged, COMMIT_MESSAGES.manual)
  }

  /**
   * Add an event described in free text.
   */
  async addParsed(text: string): Promise<SyncOutcome> {
    const parsed = parseEvent(text, { referenceDate: this.now(), resolveDate: this.resolveDate })
    if (!parsed) {
      const error = new ParseError(text, PARSE_HINT)
      console.log(`[ScheduleSync] ${error.message} (input: "${text}")`)
      return { status: 'rejected', action: 'add', reason: 'parse', hint: error.message }
    }
    return this.addEvents([parsed], COMMIT_MESSAGES.parsed)
  }

  /**
   * Append staged rows to the freshly fetched table and commit.
   */
  async addEvents(staged: EventRecord[], message: string): Promise<SyncOutcome> {
    const latest = await this.refetch('add')
    if (!latest.ok) return latest.outcome

    const merged = normalizeRecords([...latest.table, ...staged])
    return this.commit('add', merged, latest.token, message)
  }

  /**
   * Remove every row whose label equals `label`. Identical rows share a
   * label, so all of them go.
   */
  async deleteByLabel(label: string): Promise<SyncOutcome> {
    return this.deleteWhere(label, (rows) => rows.filter((row) => rowLabel(row) !== label))
  }

  /**
   * Remove the single row with this synthetic id.
   */
  async deleteById(id: string): Promise<SyncOutcome> {
    return this.deleteWhere(id, (rows) => rows.filter((row) => row.id !== id))
  }

  private async deleteWhere(
    target: string,
    remove: (rows: ScheduleTable) => ScheduleTable,
  ): Promise<SyncOutcome> {
    const latest = await this.refetch('delete')
    if (!latest.ok) return latest.outcome

    const remaining = remove(latest.table)
    if (remaining.length === latest.table.length) {
      console.log(`[ScheduleSync] No event matches "${target}"`)
      return { status: 'not-found', action: 'delete', target }
    }

    return this.commit('delete', normalizeRecords(remaining), latest.token, COMMIT_MESSAGES.delete)
  }

  private async refetch(action: SyncAction): Promise<Refetched> {
    if (!this.store.hasCredential) {
      // Read-only mode: still build a preview from the public mirror
      return { ok: true, table: await this.store.fetchMirror(), token: null }
    }

    try {
      const result = await this.store.fetch()
      if (result.table) {
        return { ok: true, table: result.table, token: result.token }
      }
      if (result.status === 404) {
        // Blob not created yet; the first write creates it
        return { ok: true, table: [], token: null }
      }
      return {
        ok: false,
        outcome: this.failure(action, 'fetch', `Could not read the latest schedule (status ${result.status})`, {
          statusCode: result.status,
        }),
      }
    } catch (err) {
      if (!(err instanceof TransportError)) throw err
      return { ok: false, outcome: this.failure(action, 'transport', err.message) }
    }
  }

  private async commit(
    action: SyncAction,
    merged: ScheduleTable,
    token: VersionToken | null,
    message: string,
  ): Promise<SyncOutcome> {
    if (!this.store.hasCredential) {
      return this.failure(action, 'missing-credential', 'Missing store credential; cannot write the schedule.', {
        preview: merged,
      })
    }

    let write: WriteResult
    try {
      write = await this.store.write(merged, token, message)
    } catch (err) {
      if (!(err instanceof TransportError)) throw err
      return this.failure(action, 'transport', err.message, { preview: merged })
    }

    if (!write.ok) {
      if (write.status === 409) {
        const conflict = new ConflictError(write.status, write.body)
        return this.failure(action, 'conflict', conflict.message, {
          preview: merged,
          statusCode: write.status,
          body: write.body,
        })
      }
      return this.failure(action, 'write-rejected', `Store rejected the write with status ${write.status}`, {
        preview: merged,
        statusCode: write.status,
        body: write.body,
      })
    }

    let latest: ScheduleTable | null = null
    if (this.refreshAfterWrite) {
      try {
        latest = (await this.store.fetch()).table
      } catch (err) {
        console.warn(`[ScheduleSync] Post-write refresh failed: ${describeError(err)}`)
      }
    }

    console.log(`[ScheduleSync] ${action} committed (${write.status}), ${merged.length} row(s) stored`)
    return { status: 'committed', action, preview: merged, write, latest }
  }

  private failure(
    action: SyncAction,
    error: SyncFailure,
    message: string,
    details: { preview?: ScheduleTable; statusCode?: number; body?: string } = {},
  ): SyncOutcome {
    console.error(`[ScheduleSync] ${action} failed (${error}): ${message}`)
    return {
      status: 'failed',
      action,
      error,
      message,
      preview: details.preview ?? null,
      statusCode: details.statusCode ?? null,
      body: details.body ?? null,
    }
  }
}
