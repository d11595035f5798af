/**
 * Unit Tests: Natural-language parser
 */

import { describe, it, expect, vi } from 'vitest'
import { parseEvent, type DateResolver } from '../src/schedule/parser.js'

// Tuesday morning
const REFERENCE = new Date(2026, 9, 20, 9, 0)

describe('parseEvent', () => {
  it('parses activity, weekday phrase and name', () => {
    expect(parseEvent('Add gym on Wednesday for Priya', { referenceDate: REFERENCE })).toEqual({
      date: '2026-10-21',
      weekday: 'Wednesday',
      name: 'Priya',
      activity: 'gym',
      time: '',
    })
  })

  it('defaults the date to today and keeps the time phrase verbatim', () => {
    expect(parseEvent('add swimming for Ana at 5pm', { referenceDate: REFERENCE })).toEqual({
      date: '2026-10-20',
      weekday: 'Tuesday',
      name: 'Ana',
      activity: 'swimming',
      time: '5pm',
    })
  })

  it('matches keywords case-insensitively and allows multi-word activities', () => {
    expect(
      parseEvent('ADD piano lessons ON tomorrow FOR Leo AT 4:30 pm', { referenceDate: REFERENCE }),
    ).toEqual({
      date: '2026-10-21',
      weekday: 'Wednesday',
      name: 'Leo',
      activity: 'piano lessons',
      time: '4:30 pm',
    })
  })

  it('resolves calendar dates', () => {
    const event = parseEvent('Add yoga on November 3 for Mia', { referenceDate: REFERENCE })

    expect(event?.date).toBe('2026-11-03')
    expect(event?.weekday).toBe('Tuesday')
  })

  it('keeps everything after "for" as the name', () => {
    const event = parseEvent('Add chess on Friday for Sam and Ana', { referenceDate: REFERENCE })

    expect(event).toMatchObject({ date: '2026-10-23', weekday: 'Friday', name: 'Sam and Ana' })
  })

  it('returns null when the grammar does not match', () => {
    expect(parseEvent('walk the dog', { referenceDate: REFERENCE })).toBeNull()
    expect(parseEvent('add gym', { referenceDate: REFERENCE })).toBeNull()
  })

  it('returns null when the date phrase cannot be resolved', () => {
    expect(parseEvent('Add gym on blorptastic for Sam', { referenceDate: REFERENCE })).toBeNull()
  })

  it('passes "today" to the resolver when no date is given', () => {
    const resolveDate = vi.fn<DateResolver>(() => new Date(2026, 9, 22, 12, 0))

    const event = parseEvent('add gym for Sam', { referenceDate: REFERENCE, resolveDate })

    expect(resolveDate).toHaveBeenCalledWith('today', REFERENCE)
    expect(event?.date).toBe('2026-10-22')
  })

  it('returns null when the resolver gives up', () => {
    expect(parseEvent('add gym on Friday for Sam', { resolveDate: () => null })).toBeNull()
  })
})
