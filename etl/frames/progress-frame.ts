import { Option } from 'effect'

import { categoriesInProgramGrouping, questionsInCategory, type Dictionary } from '@etl/dictionary/dictionary.types.ts'
import { compareDateTimes, programYearOf, renderDateTime, type ProgramYearOptions } from '@etl/shared/temporal.ts'
import { TOTAL_ROLLUP } from '@etl/shared/schemas.ts'
import { compareText } from '@etl/shared/text.ts'
import { toNumeric, type CanonicalValue, type CellValue } from '@etl/shared/values.ts'
import { supersedes } from './wide-frame.ts'

import type { Temporal } from '@js-temporal/polyfill'
import type { LongFrameRow } from './long-frame.ts'

export const OVERALL = 'OVERALL'
export const CATEGORY_MEASURE_PREFIX = '__CAT__:'

export interface ProgressFrameRow {
  readonly subjectId: string
  readonly programGrouping: string
  /** A program year label, or `OVERALL`. */
  readonly programYear: string
  /** Question id, `__TOTAL__` or `__CAT__:<category or rollup>`. */
  readonly measure: string
  readonly startDate: Option.Option<Temporal.PlainDateTime>
  readonly endDate: Temporal.PlainDateTime
  readonly startValue: Option.Option<CanonicalValue>
  readonly endValue: Option.Option<CanonicalValue>
  readonly movement: Option.Option<number>
  readonly eligible: boolean
}

export interface ProgressFrameOptions {
  readonly programYear: ProgramYearOptions
  readonly rollups: Readonly<Record<string, ReadonlyArray<string>>>
}

interface ProgressWindow {
  readonly label: string
  readonly start: Option.Option<Temporal.PlainDateTime>
  readonly end: Temporal.PlainDateTime
}

interface Measure {
  readonly name: string
  /** Questions summed into the measure; a bare question is read as-is. */
  readonly questionIds: ReadonlyArray<string>
  readonly isSum: boolean
}

// ---------------------------------------------------------------------------
// Start and end assessments
// ---------------------------------------------------------------------------

/**
 * End is the latest assessment of a program year and start the earliest other
 * one. A year with a single assessment starts from the latest assessment of
 * the year before it, when there is one.
 */
const windowsOf = (dates: ReadonlyArray<Temporal.PlainDateTime>, options: ProgramYearOptions): Array<ProgressWindow> => {
  const byYear = new Map<number, Array<Temporal.PlainDateTime>>()
  for (const date of dates) {
    const year = programYearOf(date, options)
    const inYear = byYear.get(year)
    if (inYear) inYear.push(date)
    else byYear.set(year, [date])
  }

  const windows: Array<ProgressWindow> = []
  for (const year of [...byYear.keys()].sort((a, b) => a - b)) {
    const inYear = byYear.get(year) ?? []
    const end = inYear[inYear.length - 1]
    if (end === undefined) continue
    const previousYear = byYear.get(year - 1) ?? []
    const start = inYear.length > 1 ? Option.fromNullable(inYear[0]) : Option.fromNullable(previousYear[previousYear.length - 1])
    windows.push({ label: String(year), start, end })
  }

  const last = dates[dates.length - 1]
  if (last !== undefined) {
    windows.push({ label: OVERALL, start: dates.length > 1 ? Option.fromNullable(dates[0]) : Option.none(), end: last })
  }

  return windows
}

// ---------------------------------------------------------------------------
// Measures
// ---------------------------------------------------------------------------

const measuresOf = (
  dictionary: Dictionary,
  programGrouping: string,
  rollups: ProgressFrameOptions['rollups'],
): Array<Measure> => {
  const categories = categoriesInProgramGrouping(dictionary, programGrouping)
  const questionIds = categories.flatMap((category) => questionsInCategory(dictionary, category))

  const rollupMeasures = Object.entries(rollups).flatMap(([name, members]) => {
    const inGrouping = members.filter((member) => categories.includes(member))
    return inGrouping.length > 0
      ? [{
          name: `${CATEGORY_MEASURE_PREFIX}${name}`,
          questionIds: inGrouping.flatMap((member) => questionsInCategory(dictionary, member)),
          isSum: true,
        }]
      : []
  })

  return [
    ...questionIds.map((questionId) => ({ name: questionId, questionIds: [questionId], isSum: false })),
    { name: TOTAL_ROLLUP, questionIds, isSum: true },
    ...categories.map((category) => ({
      name: `${CATEGORY_MEASURE_PREFIX}${category}`,
      questionIds: questionsInCategory(dictionary, category),
      isSum: true,
    })),
    ...rollupMeasures,
  ]
}

const sumOf = (values: ReadonlyArray<CellValue>): Option.Option<number> => {
  const numbers = values.flatMap((value) => Option.toArray(toNumeric(value)))
  return numbers.length > 0 ? Option.some(numbers.reduce((total, n) => total + n, 0)) : Option.none()
}

// ---------------------------------------------------------------------------
// Frame
// ---------------------------------------------------------------------------

interface SubjectHistory {
  readonly subjectId: string
  readonly programGrouping: string
  /** Rendered date -> question id -> row that holds the cell. */
  readonly cells: Map<string, Map<string, LongFrameRow>>
  readonly dates: Array<Temporal.PlainDateTime>
}

/**
 * Start and end values per (subject, program grouping), per program year the
 * subject was assessed in and over all time, for every question of the
 * grouping plus category, rollup and total sums.
 */
export const buildProgressFrame = (
  longFrame: ReadonlyArray<LongFrameRow>,
  dictionary: Dictionary,
  options: ProgressFrameOptions,
): Array<ProgressFrameRow> => {
  const histories = new Map<string, SubjectHistory>()

  for (const row of longFrame) {
    const key = `${row.subjectId}\u0000${row.programGrouping}`
    let history = histories.get(key)
    if (!history) {
      history = { subjectId: row.subjectId, programGrouping: row.programGrouping, cells: new Map(), dates: [] }
      histories.set(key, history)
    }

    const dateKey = renderDateTime(row.assessmentDate)
    let onDate = history.cells.get(dateKey)
    if (!onDate) {
      onDate = new Map()
      history.cells.set(dateKey, onDate)
      history.dates.push(row.assessmentDate)
    }

    const current = onDate.get(row.questionId)
    if (current === undefined || supersedes(row, current, 'preferObserved')) onDate.set(row.questionId, row)
  }

  const out: Array<ProgressFrameRow> = []

  const ordered = [...histories.values()].sort(
    (a, b) => compareText(a.subjectId, b.subjectId) || compareText(a.programGrouping, b.programGrouping),
  )

  for (const history of ordered) {
    const dates = [...history.dates].sort(compareDateTimes)
    const measures = measuresOf(dictionary, history.programGrouping, options.rollups)

    const cellAt = (date: Temporal.PlainDateTime, questionId: string): CellValue =>
      Option.fromNullable(history.cells.get(renderDateTime(date))?.get(questionId)).pipe(
        Option.flatMap((row) => row.value),
      )

    const valueAt = (date: Option.Option<Temporal.PlainDateTime>, measure: Measure): Option.Option<CanonicalValue> =>
      Option.flatMap(date, (d) => {
        const values = measure.questionIds.map((questionId) => cellAt(d, questionId))
        if (measure.isSum) return sumOf(values)
        return values[0] ?? Option.none()
      })

    for (const span of windowsOf(dates, options.programYear)) {
      const eligible = dates.length >= 2 && Option.isSome(span.start)
      for (const measure of measures) {
        const startValue = valueAt(span.start, measure)
        const endValue = valueAt(Option.some(span.end), measure)
        const movement = Option.zipWith(toNumeric(startValue), toNumeric(endValue), (start, end) => end - start)
        out.push({
          subjectId: history.subjectId,
          programGrouping: history.programGrouping,
          programYear: span.label,
          measure: measure.name,
          startDate: span.start,
          endDate: span.end,
          startValue,
          endValue,
          movement,
          eligible,
        })
      }
    }
  }

  return out
}
