/**
 * Display helpers: weekday filter, display ordering, the weekday × time
 * grid and delete options. Storage order is never changed by these.
 */

import { rowLabel } from './record.js'
import { WEEKDAYS, type ScheduleTable, type StoredEvent, type Weekday } from './types.js'

export const WEEKDAY_ORDER: readonly Weekday[] = WEEKDAYS

/** Grid column for rows without a date */
const NO_WEEKDAY = ''

export type WeekdayFilter = Weekday | 'All'

export interface WeekdayTimeGrid {
  /** Row keys, sorted */
  times: string[]
  /** Column keys in weekday order; '' collects rows without a date */
  weekdays: Array<Weekday | typeof NO_WEEKDAY>
  /** cells[time][weekday] = activities joined with ", " */
  cells: Record<string, Record<string, string>>
}

export interface LabelOption {
  id: string
  label: string
}

export function filterByWeekday(table: ScheduleTable, filter: WeekdayFilter): ScheduleTable {
  if (filter === 'All') return table
  return table.filter((row) => row.weekday === filter)
}

function weekdayRank(row: StoredEvent): number {
  return row.weekday === null ? WEEKDAY_ORDER.length : WEEKDAY_ORDER.indexOf(row.weekday)
}

function compareText(a: string, b: string): number {
  if (a === b) return 0
  return a < b ? -1 : 1
}

/**
 * Order for display: Monday..Sunday (undated rows last), then by the time
 * label compared as plain text. Returns a new array.
 */
export function sortForDisplay(table: ScheduleTable): ScheduleTable {
  return [...table].sort(
    (a, b) => weekdayRank(a) - weekdayRank(b) || compareText(a.time ?? '', b.time ?? ''),
  )
}

/**
 * Pivot rows into a time × weekday grid. Activities sharing a slot are
 * joined with ", " in the order the rows are given.
 */
export function pivotWeekdayTime(table: ScheduleTable): WeekdayTimeGrid {
  const cells: Record<string, Record<string, string[]>> = {}
  const presentDays = new Set<string>()

  for (const row of table) {
    const time = row.time ?? ''
    const day = row.weekday ?? NO_WEEKDAY
    presentDays.add(day)
    const slot = (cells[time] ??= {})
    const activities = (slot[day] ??= [])
    if (row.activity !== null) {
      activities.push(row.activity)
    }
  }

  const weekdays: WeekdayTimeGrid['weekdays'] = WEEKDAY_ORDER.filter((day) => presentDays.has(day))
  if (presentDays.has(NO_WEEKDAY)) {
    weekdays.push(NO_WEEKDAY)
  }

  const joined: WeekdayTimeGrid['cells'] = {}
  for (const [time, slot] of Object.entries(cells)) {
    joined[time] = {}
    for (const [day, activities] of Object.entries(slot)) {
      joined[time][day] = activities.join(', ')
    }
  }

  return {
    times: Object.keys(cells).sort(compareText),
    weekdays,
    cells: joined,
  }
}

export function labelOptions(table: ScheduleTable): LabelOption[] {
  return table.map((row) => ({ id: row.id, label: rowLabel(row) }))
}
