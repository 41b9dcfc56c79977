import pl from 'nodejs-polars'
import { Option } from 'effect'
import { z } from 'zod'

import { TOTAL_ROLLUP, YOY_METRICS, type YoyMetric } from '@etl/shared/schemas.ts'
import { programYearOf, type ProgramYearOptions } from '@etl/shared/temporal.ts'
import { compareText } from '@etl/shared/text.ts'
import { toNumeric } from '@etl/shared/values.ts'

import type { Dictionary } from '@etl/dictionary/dictionary.types.ts'
import type { LongFrameRow } from './long-frame.ts'

export interface YoYRow {
  /** Category, configured rollup or `__TOTAL__`. */
  readonly category: string
  readonly programGrouping: string
  readonly programYear: number
  readonly metricName: YoyMetric
  readonly value: number
  readonly priorProgramYearValue: Option.Option<number>
  readonly delta: Option.Option<number>
  readonly pctChange: Option.Option<number>
}

export interface YoyFrameOptions {
  readonly programYear: ProgramYearOptions
  readonly metrics: ReadonlyArray<YoyMetric>
  /** Rollup name -> member categories. */
  readonly rollups: Readonly<Record<string, ReadonlyArray<string>>>
  readonly includeTotal: boolean
}

// ---------------------------------------------------------------------------
// Group statistics
// ---------------------------------------------------------------------------

const GroupStatsSchema = z.object({
  category: z.string(),
  program_grouping: z.string(),
  program_year: z.coerce.number().int(),
  n_total: z.coerce.number(),
  n_sentinel: z.coerce.number(),
  n_imputed: z.coerce.number(),
  n_numeric: z.coerce.number(),
  numeric_sum: z.coerce.number(),
})
type GroupStats = z.infer<typeof GroupStatsSchema>

/** Every aggregation target a category feeds: itself, its rollups and the total. */
const targetsOf = (category: string, options: YoyFrameOptions): Array<string> => {
  const rollups = Object.entries(options.rollups)
    .filter(([, members]) => members.includes(category))
    .map(([name]) => name)
  return [category, ...rollups, ...(options.includeTotal ? [TOTAL_ROLLUP] : [])]
}

const groupStats = (longFrame: ReadonlyArray<LongFrameRow>, options: YoyFrameOptions): Array<GroupStats> => {
  const category: Array<string> = []
  const programGrouping: Array<string> = []
  const programYear: Array<string> = []
  const sentinel: Array<number> = []
  const imputed: Array<number> = []
  const numericN: Array<number> = []
  const numericValue: Array<number> = []

  for (const row of longFrame) {
    const year = String(programYearOf(row.assessmentDate, options.programYear))
    const numeric = toNumeric(row.value)
    for (const target of targetsOf(row.category, options)) {
      category.push(target)
      programGrouping.push(row.programGrouping)
      programYear.push(year)
      sentinel.push(Option.isNone(row.value) ? 1 : 0)
      imputed.push(row.isImputed ? 1 : 0)
      numericN.push(Option.isSome(numeric) ? 1 : 0)
      numericValue.push(Option.getOrElse(numeric, () => 0))
    }
  }

  if (category.length === 0) return []

  const df = pl.DataFrame({
    category,
    program_grouping: programGrouping,
    program_year: programYear,
    sentinel,
    imputed,
    numeric_n: numericN,
    numeric_value: numericValue,
  })

  const stats = df
    .groupBy('category', 'program_grouping', 'program_year')
    .agg(
      pl.col('sentinel').count().alias('n_total'),
      pl.col('sentinel').sum().alias('n_sentinel'),
      pl.col('imputed').sum().alias('n_imputed'),
      pl.col('numeric_n').sum().alias('n_numeric'),
      pl.col('numeric_value').sum().alias('numeric_sum'),
    )

  return z.array(GroupStatsSchema).parse(stats.toRecords())
}

const metricValue = (metric: YoyMetric, stats: GroupStats): Option.Option<number> => {
  switch (metric) {
    case 'count':
      return Option.some(stats.n_total)
    case 'mean':
      return stats.n_numeric > 0 ? Option.some(stats.numeric_sum / stats.n_numeric) : Option.none()
    case 'sum':
      return stats.n_numeric > 0 ? Option.some(stats.numeric_sum) : Option.none()
    case 'completion_rate':
      return Option.some((stats.n_total - stats.n_imputed) / stats.n_total)
    case 'pct_unknown':
      return Option.some(stats.n_sentinel / stats.n_total)
    case 'pct_imputed':
      return Option.some(stats.n_imputed / stats.n_total)
  }
}

// ---------------------------------------------------------------------------
// Year-over-year deltas
// ---------------------------------------------------------------------------

export type YoYValueRow = Omit<YoYRow, 'priorProgramYearValue' | 'delta' | 'pctChange'>

/**
 * Compare each row with the nearest earlier program year of its
 * (category, program grouping, metric) series. Output keeps input order.
 */
export const withYearOverYearDeltas = (rows: ReadonlyArray<YoYValueRow>): Array<YoYRow> => {
  const series = new Map<string, Array<YoYValueRow>>()
  for (const row of rows) {
    const key = JSON.stringify([row.category, row.programGrouping, row.metricName])
    const members = series.get(key)
    if (members) members.push(row)
    else series.set(key, [row])
  }

  const prior = new Map<YoYValueRow, number>()
  for (const members of series.values()) {
    const ordered = [...members].sort((a, b) => a.programYear - b.programYear)
    ordered.forEach((row, i) => {
      const previous = ordered[i - 1]
      if (previous !== undefined && previous.programYear < row.programYear) prior.set(row, previous.value)
    })
  }

  return rows.map((row) => {
    const priorValue = Option.fromNullable(prior.get(row))
    const delta = Option.map(priorValue, (p) => row.value - p)
    const pctChange = Option.flatMap(priorValue, (p) =>
      p === 0 ? Option.none() : Option.map(delta, (d) => d / Math.abs(p)),
    )
    return { ...row, priorProgramYearValue: priorValue, delta, pctChange }
  })
}

// ---------------------------------------------------------------------------
// Frame
// ---------------------------------------------------------------------------

const metricOrder = (metric: YoyMetric) => YOY_METRICS.indexOf(metric)

/**
 * Aggregate the long frame per (category, program grouping, program year).
 * Sentinels count toward count-based metrics and never toward numeric ones;
 * categorical values are not numeric.
 */
export const buildYoyFrame = (
  longFrame: ReadonlyArray<LongFrameRow>,
  dictionary: Dictionary,
  options: YoyFrameOptions,
): Array<YoYRow> => {
  const metrics = [...new Set(options.metrics)].sort((a, b) => metricOrder(a) - metricOrder(b))
  const categoryRank = new Map(dictionary.categories.map((category, i) => [category, i]))
  const rankOf = (category: string) => categoryRank.get(category) ?? dictionary.categories.length

  const stats = groupStats(longFrame, options).sort(
    (a, b) =>
      rankOf(a.category) - rankOf(b.category) ||
      compareText(a.category, b.category) ||
      compareText(a.program_grouping, b.program_grouping) ||
      a.program_year - b.program_year,
  )

  const rows: Array<YoYValueRow> = []
  for (const group of stats) {
    for (const metricName of metrics) {
      const value = metricValue(metricName, group)
      if (Option.isNone(value)) continue
      rows.push({
        category: group.category,
        programGrouping: group.program_grouping,
        programYear: group.program_year,
        metricName,
        value: value.value,
      })
    }
  }

  return withYearOverYearDeltas(rows)
}
