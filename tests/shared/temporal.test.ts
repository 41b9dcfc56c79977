import { Temporal } from '@js-temporal/polyfill'
import { Either } from 'effect'
import { describe, expect, it } from 'vitest'

import {
  compareDateTimes,
  isCalendarMonthDay,
  parseAssessmentDate,
  programYearOf,
  renderDateTime,
} from '@etl/shared/temporal.ts'
import { settle } from '../fixtures/tables.ts'

const parsed = (date: string, time?: string) => settle(Either.map(parseAssessmentDate(date, time), renderDateTime))

const at = (iso: string) => Temporal.PlainDateTime.from(iso)

describe('parseAssessmentDate', () => {
  it('reads ISO dates with and without a time of day', () => {
    expect(parsed('2024-03-01')).toEqual({ right: '2024-03-01T00:00:00' })
    expect(parsed('2024-03-01 14:05')).toEqual({ right: '2024-03-01T14:05:00' })
    expect(parsed('2024-3-1T14:05:09')).toEqual({ right: '2024-03-01T14:05:09' })
  })

  it('reads month/day/year dates with a 12-hour clock', () => {
    expect(parsed('3/1/2024')).toEqual({ right: '2024-03-01T00:00:00' })
    expect(parsed('3/1/2024 2:05 PM')).toEqual({ right: '2024-03-01T14:05:00' })
    expect(parsed('12/31/2023 12:30:15 am')).toEqual({ right: '2023-12-31T00:30:15' })
  })

  it('lets a separate time cell replace the time in the date cell', () => {
    expect(parsed('2024-03-01 08:00', '9:15 PM')).toEqual({ right: '2024-03-01T21:15:00' })
    expect(parsed(' 3/1/2024 ', ' ')).toEqual({ right: '2024-03-01T00:00:00' })
  })

  it('explains why a date cannot be read', () => {
    expect(parsed('   ')).toEqual({ left: 'Blank assessment date' })
    expect(parsed('March 1')).toEqual({ left: 'Unrecognized date "March 1"' })
    expect(parsed('2024-02-30')).toEqual({ left: 'Out-of-range date or time "2024-02-30"' })
    expect(parsed('2024-03-01', 'noon')).toEqual({ left: 'Unrecognized time "noon"' })
    expect(parsed('2024-03-01', '13:00 PM')).toEqual({ left: 'Hour 13 is not valid with PM' })
  })
})

describe('compareDateTimes', () => {
  it('orders by date then time', () => {
    const dates = [at('2024-03-01T10:00'), at('2023-12-31T23:59'), at('2024-03-01T09:00')]
    expect(dates.sort(compareDateTimes).map(renderDateTime)).toEqual([
      '2023-12-31T23:59:00',
      '2024-03-01T09:00:00',
      '2024-03-01T10:00:00',
    ])
  })
})

describe('programYearOf', () => {
  const october = { month: 10, day: 1 }

  it('labels by the calendar year the program year ends in', () => {
    expect(programYearOf(at('2024-10-01T00:00'), { start: october, label: 'end' })).toBe(2025)
    expect(programYearOf(at('2024-09-30T23:59'), { start: october, label: 'end' })).toBe(2024)
  })

  it('labels by the calendar year the program year starts in', () => {
    expect(programYearOf(at('2024-10-01T00:00'), { start: october, label: 'start' })).toBe(2024)
    expect(programYearOf(at('2024-09-30T23:59'), { start: october, label: 'start' })).toBe(2023)
  })

  it('uses the calendar year when the program year starts on January 1', () => {
    const january = { month: 1, day: 1 }
    expect(programYearOf(at('2024-06-01T00:00'), { start: january, label: 'end' })).toBe(2024)
    expect(programYearOf(at('2024-06-01T00:00'), { start: january, label: 'start' })).toBe(2024)
  })
})

describe('isCalendarMonthDay', () => {
  it('accepts only days every year has', () => {
    expect(isCalendarMonthDay(2, 28)).toBe(true)
    expect(isCalendarMonthDay(2, 29)).toBe(false)
    expect(isCalendarMonthDay(4, 31)).toBe(false)
  })
})
