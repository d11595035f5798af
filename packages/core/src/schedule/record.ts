/**
 * Event Record Model
 *
 * Normalizes loosely-typed tables into the canonical five-column schedule.
 * Nothing in here throws on malformed input: bad cells become null.
 */

import { createHash } from 'node:crypto'
import { DateTime } from 'luxon'
import {
  CANONICAL_COLUMNS,
  WEEKDAYS,
  type CanonicalColumn,
  type EventRecord,
  type RawTable,
  type ScheduleTable,
  type StoredEvent,
  type Weekday,
} from './types.js'

/** Index columns written by spreadsheet tools and dataframe libraries */
const INDEX_ARTIFACT = /^unnamed/i

const DATE_FORMATS = [
  'M/d/yyyy',
  'M/d/yy',
  'yyyy/M/d',
  'd LLL yyyy',
  'LLL d, yyyy',
  'LLLL d, yyyy',
  'LLL d yyyy',
  'LLLL d yyyy',
  'yyyy-MM-dd HH:mm',
]

const FIELD_BY_COLUMN: Record<CanonicalColumn, keyof EventRecord> = {
  Date: 'date',
  Weekday: 'weekday',
  Name: 'name',
  Activity: 'activity',
  Time: 'time',
}

export function emptyTable(): ScheduleTable {
  return []
}

/**
 * Parse a cell into an ISO calendar date (YYYY-MM-DD).
 * Returns null for empty or unrecognised values.
 */
export function parseCalendarDate(value: string | null | undefined): string | null {
  const text = value?.trim()
  if (!text) return null

  const candidates = [
    () => DateTime.fromISO(text, { setZone: true }),
    ...DATE_FORMATS.map((format) => () => DateTime.fromFormat(text, format, { locale: 'en-US' })),
    // Timestamps such as "2026-10-21 00:00:00" written by spreadsheet exports
    () => DateTime.fromSQL(text, { setZone: true }),
    () => DateTime.fromRFC2822(text, { setZone: true }),
  ]

  for (const attempt of candidates) {
    const parsed = attempt()
    if (parsed.isValid) {
      return parsed.toISODate()
    }
  }
  return null
}

/**
 * English weekday name of an ISO date, null when the date is null or invalid.
 */
export function weekdayOf(date: string | null): Weekday | null {
  if (!date) return null
  const parsed = DateTime.fromISO(date)
  if (!parsed.isValid) return null
  return WEEKDAYS[parsed.weekday - 1] ?? null
}

function cleanText(value: string | null | undefined): string | null {
  if (value === null || value === undefined) return null
  return value.trim().length === 0 ? null : value
}

/**
 * Display label used for delete-by-label selection.
 * Not unique: identical rows render identical labels.
 */
export function rowLabel(record: EventRecord): string {
  const show = (value: string | null) => value ?? ''
  return `${show(record.date)} | ${show(record.weekday)} | ${show(record.name)} - ${show(record.activity)} @ ${show(record.time)}`
}

/**
 * Attach synthetic ids. The id hashes the row's label and appends the
 * occurrence index of that label, so duplicates stay distinguishable and
 * re-reading the same content reproduces the same ids.
 */
export function assignIds(records: EventRecord[]): ScheduleTable {
  const seen = new Map<string, number>()
  return records.map((record) => {
    const label = rowLabel(record)
    const occurrence = seen.get(label) ?? 0
    seen.set(label, occurrence + 1)
    const hash = createHash('sha1').update(label).digest('hex').slice(0, 12)
    const stored: StoredEvent = {
      id: `${hash}-${occurrence}`,
      date: record.date,
      weekday: record.weekday,
      name: record.name,
      activity: record.activity,
      time: record.time,
    }
    return stored
  })
}

/**
 * Canonicalize typed records: dates re-parsed, weekdays recomputed,
 * blank text cells nulled, ids reassigned over the whole table.
 */
export function normalizeRecords(records: EventRecord[]): ScheduleTable {
  return assignIds(
    records.map((record) => {
      const date = parseCalendarDate(record.date)
      return {
        date,
        weekday: weekdayOf(date),
        name: cleanText(record.name),
        activity: cleanText(record.activity),
        time: cleanText(record.time),
      }
    }),
  )
}

/**
 * Normalize a raw table into the canonical schedule.
 *
 * Index-artifact columns ("Unnamed: 0") are dropped, headers are matched
 * case-insensitively, missing columns are filled with null and the stored
 * Weekday is discarded in favour of one computed from Date.
 */
export function normalize(raw: RawTable): ScheduleTable {
  const sourceColumn = new Map<CanonicalColumn, string>()

  for (const column of raw.columns) {
    const key = column.trim()
    if (INDEX_ARTIFACT.test(key)) continue
    const canonical = CANONICAL_COLUMNS.find((c) => c.toLowerCase() === key.toLowerCase())
    if (canonical && !sourceColumn.has(canonical)) {
      sourceColumn.set(canonical, column)
    }
  }

  const cell = (row: RawTable['rows'][number], column: CanonicalColumn): string | null => {
    const source = sourceColumn.get(column)
    return source === undefined ? null : cleanText(row[source])
  }

  const records: EventRecord[] = raw.rows.map((row) => {
    const record: EventRecord = {
      date: cell(row, 'Date'),
      weekday: null,
      name: cell(row, 'Name'),
      activity: cell(row, 'Activity'),
      time: cell(row, 'Time'),
    }
    return record
  })

  return normalizeRecords(records)
}

/** Field name for a canonical column header */
export function fieldFor(column: CanonicalColumn): keyof EventRecord {
  return FIELD_BY_COLUMN[column]
}
