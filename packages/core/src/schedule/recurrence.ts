/**
 * Recurrence Expander
 *
 * Materializes a repeating entry into concrete dated rows.
 */

import { DateTime } from 'luxon'
import { weekdayOf } from './record.js'
import type { EventRecord, RecurrenceMode } from './types.js'

export const RECURRENCE_MODES = ['None', 'Daily', 'Weekly'] as const satisfies readonly RecurrenceMode[]

export interface RecurrenceInput {
  /** ISO YYYY-MM-DD */
  startDate: string
  name: string
  activity: string
  time: string
  mode: RecurrenceMode
  /** Exact number of rows to produce */
  count: number
}

const STEP: Record<RecurrenceMode, { days?: number; weeks?: number } | null> = {
  None: null,
  Daily: { days: 1 },
  Weekly: { weeks: 1 },
}

export function expandRecurrence(input: RecurrenceInput): EventRecord[] {
  const { startDate, name, activity, time, mode, count } = input

  if (!Number.isInteger(count) || count < 1) {
    throw new RangeError(`Repeat count must be a positive integer, got ${count}`)
  }

  const start = DateTime.fromISO(startDate)
  if (!start.isValid) {
    throw new RangeError(`Invalid start date: ${startDate}`)
  }

  const step = STEP[mode]
  const rows: EventRecord[] = []

  for (let i = 0; i < count; i++) {
    const current = step
      ? start.plus({ days: (step.days ?? 0) * i, weeks: (step.weeks ?? 0) * i })
      : start
    const date = current.toISODate()
    rows.push({ date, weekday: weekdayOf(date), name, activity, time })
  }

  return rows
}
