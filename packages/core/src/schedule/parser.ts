/**
 * Natural-language event parser
 *
 * Understands `add <activity> [on <date>] for <name> [at <time>]`.
 */

import * as chrono from 'chrono-node'
import { DateTime } from 'luxon'
import { weekdayOf } from './record.js'
import type { EventRecord } from './types.js'

export const PARSE_HINT = 'Could not parse input. Try: Add gym on Wednesday for Sam'

const EVENT_PATTERN = /add\s+(.+?)\s+(?:on\s+(.+?)\s+)?for\s+(.+?)(?:\s+at\s+(.+))?$/i

/** Resolves a date phrase ("today", "Friday", "2026-03-04") to a point in time */
export type DateResolver = (phrase: string, reference: Date) => Date | null

/**
 * Default resolver. `forwardDate` makes bare weekday names land on the
 * nearest such day on or after the reference date.
 */
export const chronoDateResolver: DateResolver = (phrase, reference) =>
  chrono.parseDate(phrase, reference, { forwardDate: true })

export interface ParseEventOptions {
  /** Defaults to now */
  referenceDate?: Date
  resolveDate?: DateResolver
}

/**
 * Parse free text into an event. Returns null when the text does not
 * match the grammar or the date phrase cannot be resolved.
 */
export function parseEvent(text: string, options: ParseEventOptions = {}): EventRecord | null {
  const match = EVENT_PATTERN.exec(text.trim())
  if (!match) return null

  const [, activityRaw, datePhraseRaw, nameRaw, timeRaw] = match
  const activity = activityRaw.trim()
  const datePhrase = datePhraseRaw?.trim() || 'today'
  const name = nameRaw.trim()
  const time = timeRaw?.trim() ?? ''

  const resolve = options.resolveDate ?? chronoDateResolver
  const resolved = resolve(datePhrase, options.referenceDate ?? new Date())
  if (!resolved) return null

  const date = DateTime.fromJSDate(resolved).toISODate()
  if (!date) return null

  return {
    date,
    weekday: weekdayOf(date),
    name,
    activity,
    time,
  }
}
