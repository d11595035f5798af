/**
 * Schedule Types
 *
 * Core interfaces for the CSV-backed schedule and the remote store
 * that versions it.
 */

export const WEEKDAYS = [
  'Monday',
  'Tuesday',
  'Wednesday',
  'Thursday',
  'Friday',
  'Saturday',
  'Sunday',
] as const

export type Weekday = (typeof WEEKDAYS)[number]

/** Column headers as written to the CSV, in canonical order */
export const CANONICAL_COLUMNS = ['Date', 'Weekday', 'Name', 'Activity', 'Time'] as const

export type CanonicalColumn = (typeof CANONICAL_COLUMNS)[number]

/**
 * A single schedule entry.
 * `weekday` is always derived from `date` and never trusted from storage.
 */
export interface EventRecord {
  /** Calendar date as ISO YYYY-MM-DD, null when absent or unparsable */
  date: string | null

  weekday: Weekday | null

  /** Person the entry belongs to */
  name: string | null

  activity: string | null

  /** Free-text time label ("7pm", "morning"), not a parsed time of day */
  time: string | null
}

/**
 * An entry read back from the store.
 * `id` is synthetic: derived from the row's content and its occurrence
 * among identical rows, never persisted.
 */
export interface StoredEvent extends EventRecord {
  id: string
}

/** Rows in storage (append) order */
export type ScheduleTable = StoredEvent[]

/** Untyped table as decoded from CSV, before normalization */
export interface RawTable {
  columns: string[]
  rows: Array<Record<string, string | null | undefined>>
}

export type RecurrenceMode = 'None' | 'Daily' | 'Weekly'

/** Opaque revision identifier of the remote blob (the contents API "sha") */
export type VersionToken = string

// ─── Remote Store ───

/**
 * Explicit store configuration. Built once by the config loader and
 * handed to the client; the client reads nothing from the environment.
 */
export interface StoreConfig {
  /** "owner/name" */
  repo: string

  /** Blob path inside the repository */
  path: string

  branch: string

  apiBaseUrl: string

  /** Unauthenticated read-only mirror of the same content */
  mirrorBaseUrl: string

  /** API credential; null means read-only mode */
  token: string | null

  userAgent: string
}

export type FetchResult =
  | { table: ScheduleTable; token: VersionToken | null; status: number }
  | { table: null; token: null; status: number }

export interface LoadedSchedule {
  table: ScheduleTable
  token: VersionToken | null
  source: 'api' | 'mirror'
}

export interface WriteResult {
  /** True iff the store answered 200 or 201 */
  ok: boolean
  status: number
  /** Raw response text, kept verbatim for the operator */
  body: string
  /** Token attached to the PUT, re-resolved just before writing */
  tokenSent: VersionToken | null
  /** Token of the new revision, when the reply carries one */
  newToken: VersionToken | null
  /** The remote moved between the caller's fetch and this write */
  staleBase: boolean
}

/** Minimal fetch signature the store client depends on */
export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>

/**
 * Repository interface for the versioned schedule blob.
 * Allows swapping the hosted contents API for another versioned store
 * without touching the workflow.
 */
export interface ScheduleStore {
  readonly hasCredential: boolean

  /** Authoritative read; `{ table: null, token: null }` when the remote state is unknown */
  fetch(): Promise<FetchResult>

  /** Best-effort read for display, falling back to the public mirror */
  load(): Promise<LoadedSchedule>

  /** Read-only mirror; empty table on any failure */
  fetchMirror(): Promise<ScheduleTable>

  write(records: EventRecord[], knownToken: VersionToken | null, message: string): Promise<WriteResult>
}

// ─── Synchronization Workflow ───

export interface ManualEventInput {
  /** ISO YYYY-MM-DD */
  date: string
  name: string
  activity: string
  time: string
  recurrence: RecurrenceMode
  repeatCount: number
}

export type SyncAction = 'add' | 'delete'

export type SyncFailure = 'missing-credential' | 'fetch' | 'transport' | 'conflict' | 'write-rejected'

export type SyncOutcome =
  | {
      status: 'committed'
      action: SyncAction
      /** Table that was written */
      preview: ScheduleTable
      write: WriteResult
      /** Post-write state, when refreshed */
      latest: ScheduleTable | null
    }
  | {
      status: 'failed'
      action: SyncAction
      error: SyncFailure
      message: string
      preview: ScheduleTable | null
      statusCode: number | null
      body: string | null
    }
  | { status: 'rejected'; action: SyncAction; reason: 'parse'; hint: string }
  | { status: 'not-found'; action: 'delete'; target: string }
