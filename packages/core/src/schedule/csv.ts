/**
 * CSV codec for the persisted schedule.
 *
 * Header row is always `Date,Weekday,Name,Activity,Time`.
 */

import { parse } from 'csv-parse/sync'
import { stringify } from 'csv-stringify/sync'
import { DecodeError, describeError } from './errors.js'
import { fieldFor, parseCalendarDate, weekdayOf } from './record.js'
import { CANONICAL_COLUMNS, type EventRecord, type RawTable } from './types.js'

/**
 * Decode CSV text into a raw table of string cells.
 * Throws DecodeError when the text is not valid CSV.
 */
export function parseCsv(text: string): RawTable {
  let columns: string[] = []

  let parsed: unknown
  try {
    parsed = parse(text, {
      bom: true,
      columns: (header: string[]) => {
        columns = header
        return header
      },
      skip_empty_lines: true,
      relax_column_count: true,
    })
  } catch (err) {
    throw new DecodeError(`Could not parse schedule CSV: ${describeError(err)}`, err)
  }

  return { columns, rows: toRows(parsed) }
}

function toRows(parsed: unknown): RawTable['rows'] {
  if (!Array.isArray(parsed)) return []
  return parsed.map((item: unknown) => {
    const row: RawTable['rows'][number] = {}
    if (item !== null && typeof item === 'object') {
      for (const [key, cell] of Object.entries(item)) {
        row[key] = typeof cell === 'string' ? cell : undefined
      }
    }
    return row
  })
}

/**
 * Encode records as CSV. Dates are written as ISO strings (or empty) and
 * weekdays are recomputed from them.
 */
export function serializeCsv(records: EventRecord[]): string {
  const header = stringify([[...CANONICAL_COLUMNS]])
  if (records.length === 0) return header

  const lines = records.map((record) => {
    const date = parseCalendarDate(record.date)
    const row: EventRecord = { ...record, date, weekday: weekdayOf(date) }
    return CANONICAL_COLUMNS.map((column) => row[fieldFor(column)] ?? '')
  })

  return header + stringify(lines)
}
