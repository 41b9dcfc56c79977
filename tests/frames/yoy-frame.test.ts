import { Option } from 'effect'
import { describe, expect, it } from 'vitest'

import { buildYoyFrame, withYearOverYearDeltas, type YoYRow, type YoyFrameOptions } from '@etl/frames/yoy-frame.ts'
import { longFrameOf, loadTestDictionary, twoQuestionRows, type DictionaryRowInput } from '../fixtures/tables.ts'

const calendarYears: YoyFrameOptions = {
  programYear: { start: { month: 1, day: 1 }, label: 'end' },
  metrics: ['mean'],
  rollups: {},
  includeTotal: false,
}

const singleQuestion = (valueType: string): Array<DictionaryRowInput> => [
  { question_id: 'q1', canonical_name: 'Q1', category: 'c', program_grouping: 'g', value_type: valueType },
]

const view = (row: YoYRow) => ({
  category: row.category,
  year: row.programYear,
  metric: row.metricName,
  value: row.value,
  prior: Option.getOrNull(row.priorProgramYearValue),
  delta: Option.getOrNull(row.delta),
  pctChange: Option.getOrNull(row.pctChange),
})

describe('withYearOverYearDeltas', () => {
  const series = (values: ReadonlyArray<readonly [number, number]>) =>
    withYearOverYearDeltas(
      values.map(([programYear, value]) => ({
        category: 'c',
        programGrouping: 'g',
        programYear,
        metricName: 'mean' as const,
        value,
      })),
    ).map(view)

  it('compares each year with the one before it', () => {
    expect(series([[2021, 10], [2022, 15], [2023, 12]]).map(({ delta, pctChange }) => [delta, pctChange])).toEqual([
      [null, null],
      [5, 0.5],
      [-3, -0.2],
    ])
  })

  it('omits the percentage change after a zero', () => {
    expect(series([[2021, 0], [2022, 4]])[1]).toMatchObject({ prior: 0, delta: 4, pctChange: null })
  })

  it('skips years without data', () => {
    expect(series([[2021, 8], [2023, 6]])[1]).toMatchObject({ prior: 8, delta: -2, pctChange: -0.25 })
  })

  it('divides by the magnitude of a negative prior value', () => {
    expect(series([[2021, -4], [2022, -2]])[1]).toMatchObject({ delta: 2, pctChange: 0.5 })
  })
})

describe('buildYoyFrame', () => {
  it('aggregates per program year and compares consecutive years', () => {
    const dictionary = loadTestDictionary(singleQuestion('numeric'))
    const longFrame = longFrameOf(
      dictionary,
      ['s-1', '2021-03-01', 'q1', '10'],
      ['s-2', '2022-03-01', 'q1', '15'],
      ['s-1', '2023-03-01', 'q1', '12'],
    )

    expect(buildYoyFrame(longFrame, dictionary, calendarYears).map(view)).toEqual([
      { category: 'c', year: 2021, metric: 'mean', value: 10, prior: null, delta: null, pctChange: null },
      { category: 'c', year: 2022, metric: 'mean', value: 15, prior: 10, delta: 5, pctChange: 0.5 },
      { category: 'c', year: 2023, metric: 'mean', value: 12, prior: 15, delta: -3, pctChange: -0.2 },
    ])
  })

  it('counts sentinels for shares and leaves them out of numeric metrics', () => {
    const dictionary = loadTestDictionary(twoQuestionRows())
    const longFrame = longFrameOf(dictionary, ['s', '2021-03-01', 'q1', '4'])

    const rows = buildYoyFrame(longFrame, dictionary, {
      ...calendarYears,
      metrics: ['pct_imputed', 'count', 'mean', 'sum', 'completion_rate', 'pct_unknown'],
    })

    expect(rows.map((row) => [row.metricName, row.value])).toEqual([
      ['count', 2],
      ['mean', 4],
      ['sum', 4],
      ['completion_rate', 0.5],
      ['pct_unknown', 0.5],
      ['pct_imputed', 0.5],
    ])
  })

  it('adds rollups and the grouping total after the dictionary categories', () => {
    const dictionary = loadTestDictionary([
      ...singleQuestion('numeric'),
      { question_id: 'q9', canonical_name: 'Q9', category: 'd', program_grouping: 'g', value_type: 'numeric' },
    ])
    const longFrame = longFrameOf(dictionary, ['s', '2021-03-01', 'q1', '2'], ['s', '2021-03-01', 'q9', '6'])

    const rows = buildYoyFrame(longFrame, dictionary, {
      ...calendarYears,
      metrics: ['sum'],
      rollups: { both: ['c', 'd'], only_d: ['d'] },
      includeTotal: true,
    })

    expect(rows.map((row) => [row.category, row.value])).toEqual([
      ['c', 2],
      ['d', 6],
      ['__TOTAL__', 8],
      ['both', 8],
      ['only_d', 6],
    ])
  })

  it('gives no numeric metric row without numeric input', () => {
    const dictionary = loadTestDictionary(singleQuestion('categorical'))
    const longFrame = longFrameOf(dictionary, ['s', '2021-03-01', 'q1', 'blue'])

    const rows = buildYoyFrame(longFrame, dictionary, { ...calendarYears, metrics: ['count', 'mean', 'sum'] })
    expect(rows.map((row) => [row.metricName, row.value])).toEqual([['count', 1]])
  })

  it('assigns program years from the configured start', () => {
    const dictionary = loadTestDictionary(singleQuestion('numeric'))
    const longFrame = longFrameOf(dictionary, ['s', '2024-09-30', 'q1', '1'], ['s', '2024-10-01', 'q1', '3'])

    const byEnd = buildYoyFrame(longFrame, dictionary, {
      ...calendarYears,
      programYear: { start: { month: 10, day: 1 }, label: 'end' },
    })
    const byStart = buildYoyFrame(longFrame, dictionary, {
      ...calendarYears,
      programYear: { start: { month: 10, day: 1 }, label: 'start' },
    })

    expect(byEnd.map((row) => [row.programYear, row.value])).toEqual([
      [2024, 1],
      [2025, 3],
    ])
    expect(byStart.map((row) => [row.programYear, row.value])).toEqual([
      [2023, 1],
      [2024, 3],
    ])
  })

  it('returns nothing for an empty long frame', () => {
    expect(buildYoyFrame([], loadTestDictionary(), calendarYears)).toEqual([])
  })
})
