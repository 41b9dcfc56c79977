import { Temporal } from '@js-temporal/polyfill'
import { Either } from 'effect'

import type { ProgramYearLabel } from './schemas.ts'

// ---------------------------------------------------------------------------
// Assessment date parsing
// ---------------------------------------------------------------------------

// 2024-03-01, 2024-03-01 14:05, 2024-03-01T14:05:09
const ISO_DATE = /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[ T](\d{1,2}):(\d{2})(?::(\d{2}))?)?$/

// 3/1/2024, 3/1/2024 2:05:09 PM
const US_DATE = /^(\d{1,2})\/(\d{1,2})\/(\d{4})(?:\s+(\d{1,2}):(\d{2})(?::(\d{2}))?\s*([AaPp][Mm])?)?$/

// 14:05, 2:05:09 PM
const TIME = /^(\d{1,2}):(\d{2})(?::(\d{2}))?\s*([AaPp][Mm])?$/

interface Clock {
  hour: number
  minute: number
  second: number
}

const MIDNIGHT: Clock = { hour: 0, minute: 0, second: 0 }

const toClock = (
  hour: string | undefined,
  minute: string | undefined,
  second: string | undefined,
  meridiem: string | undefined,
): Either.Either<Clock, string> => {
  if (hour === undefined || minute === undefined) return Either.right(MIDNIGHT)

  let h = Number.parseInt(hour, 10)
  if (meridiem !== undefined) {
    if (h < 1 || h > 12) return Either.left(`Hour ${h} is not valid with ${meridiem.toUpperCase()}`)
    h = (h % 12) + (meridiem.toLowerCase() === 'pm' ? 12 : 0)
  }

  return Either.right({
    hour: h,
    minute: Number.parseInt(minute, 10),
    second: second === undefined ? 0 : Number.parseInt(second, 10),
  })
}

interface DateFields extends Clock {
  year: number
  month: number
  day: number
}

const parseDatePart = (value: string): Either.Either<DateFields, string> => {
  const iso = value.match(ISO_DATE)
  if (iso) {
    const [, year, month, day, hour, minute, second] = iso
    return Either.map(toClock(hour, minute, second, undefined), (clock) => ({
      year: Number.parseInt(year, 10),
      month: Number.parseInt(month, 10),
      day: Number.parseInt(day, 10),
      ...clock,
    }))
  }

  const us = value.match(US_DATE)
  if (us) {
    const [, month, day, year, hour, minute, second, meridiem] = us
    return Either.map(toClock(hour, minute, second, meridiem), (clock) => ({
      year: Number.parseInt(year, 10),
      month: Number.parseInt(month, 10),
      day: Number.parseInt(day, 10),
      ...clock,
    }))
  }

  return Either.left(`Unrecognized date "${value}"`)
}

const parseTimePart = (value: string): Either.Either<Clock, string> => {
  const match = value.match(TIME)
  if (!match) return Either.left(`Unrecognized time "${value}"`)
  const [, hour, minute, second, meridiem] = match
  return toClock(hour, minute, second, meridiem)
}

/**
 * Parse an exported assessment date, optionally combined with a separate time
 * cell. When a time cell is given it replaces any time of day in the date cell.
 */
export const parseAssessmentDate = (
  date: string,
  time = '',
): Either.Either<Temporal.PlainDateTime, string> => {
  const dateText = date.trim()
  if (dateText === '') return Either.left('Blank assessment date')

  const timeText = time.trim()

  return Either.flatMap(parseDatePart(dateText), (fields) => {
    const clock: Either.Either<Clock, string> = timeText === '' ? Either.right(fields) : parseTimePart(timeText)

    return Either.flatMap(clock, ({ hour, minute, second }) =>
      Either.try({
        try: () =>
          Temporal.PlainDateTime.from(
            { year: fields.year, month: fields.month, day: fields.day, hour, minute, second },
            { overflow: 'reject' },
          ),
        catch: () => `Out-of-range date or time "${[dateText, timeText].join(' ').trim()}"`,
      }),
    )
  })
}

/** ISO rendering used for keys and output cells, e.g. 2024-03-01T14:05:00 */
export const renderDateTime = (value: Temporal.PlainDateTime): string =>
  value.toString({ smallestUnit: 'second' })

export const compareDateTimes = (a: Temporal.PlainDateTime, b: Temporal.PlainDateTime): number =>
  Temporal.PlainDateTime.compare(a, b)

// ---------------------------------------------------------------------------
// Program years
// ---------------------------------------------------------------------------

export interface ProgramYearStart {
  readonly month: number
  readonly day: number
}

export interface ProgramYearOptions {
  readonly start: ProgramYearStart
  /**
   * `end` names a program year after the calendar year it ends in (start 10/1:
   * 2024-10-01 belongs to 2025), `start` after the year it begins in.
   */
  readonly label: ProgramYearLabel
}

export const isCalendarMonthDay = (month: number, day: number): boolean =>
  Either.isRight(
    Either.try(() => Temporal.PlainDate.from({ year: 2001, month, day }, { overflow: 'reject' })),
  )

export const programYearOf = (value: Temporal.PlainDateTime, options: ProgramYearOptions): number => {
  const { month, day } = options.start
  if (month === 1 && day === 1) return value.year

  const boundary = Temporal.PlainDate.from({ year: value.year, month, day })
  const onOrAfterStart = Temporal.PlainDate.compare(value.toPlainDate(), boundary) >= 0

  if (options.label === 'end') return onOrAfterStart ? value.year + 1 : value.year
  return onOrAfterStart ? value.year : value.year - 1
}
