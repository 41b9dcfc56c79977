import { Option } from 'effect'

import { renderDateTime } from '@etl/shared/temporal.ts'
import { renderCell, renderOptionalNumber, renderValue } from '@etl/shared/values.ts'
import { wideCell, type WideFrame } from './wide-frame.ts'

import type { RejectedRow } from '@etl/normalize/normalize-rows.ts'
import type { Table } from '@etl/shared/table.ts'
import type { LongFrameRow } from './long-frame.ts'
import type { ProgressFrameRow } from './progress-frame.ts'
import type { YoYRow } from './yoy-frame.ts'

export const LONG_FRAME_COLUMNS = [
  'subject_id',
  'assessment_date',
  'question_id',
  'category',
  'program_grouping',
  'value',
  'is_imputed',
  'imputation_method',
] as const

export const WIDE_FRAME_KEY_COLUMNS = ['subject_id', 'assessment_date', 'category', 'program_grouping'] as const

export const YOY_FRAME_COLUMNS = [
  'category',
  'program_grouping',
  'program_year',
  'metric_name',
  'value',
  'prior_program_year_value',
  'delta',
  'pct_change',
] as const

export const PROGRESS_FRAME_COLUMNS = [
  'subject_id',
  'program_grouping',
  'program_year',
  'measure',
  'start_date',
  'end_date',
  'start_value',
  'end_value',
  'movement',
  'eligible',
] as const

export const REJECTED_ROWS_COLUMNS = [
  'source_table',
  'sequence',
  'subject_id',
  'assessment_date',
  'question_id',
  'raw_value',
  'reason',
  'detail',
] as const

const table = <C extends string>(
  columns: ReadonlyArray<C>,
  rows: ReadonlyArray<Record<C, string>>,
): Table => ({ columns, rows })

export const longFrameToTable = (rows: ReadonlyArray<LongFrameRow>, sentinel: string): Table =>
  table(
    LONG_FRAME_COLUMNS,
    rows.map((row) => ({
      subject_id: row.subjectId,
      assessment_date: renderDateTime(row.assessmentDate),
      question_id: row.questionId,
      category: row.category,
      program_grouping: row.programGrouping,
      value: renderCell(row.value, sentinel),
      is_imputed: renderValue(row.isImputed),
      imputation_method: row.imputationMethod,
    })),
  )

export const wideFrameToTable = (frame: WideFrame, sentinel: string): Table => ({
  columns: [...WIDE_FRAME_KEY_COLUMNS, ...frame.columns],
  rows: frame.rows.map((row) => ({
    subject_id: row.subjectId,
    assessment_date: renderDateTime(row.assessmentDate),
    category: row.categories.join('|'),
    program_grouping: row.programGroupings.join('|'),
    ...Object.fromEntries(frame.columns.map((questionId) => [questionId, renderCell(wideCell(row, questionId), sentinel)])),
  })),
})

export const yoyFrameToTable = (rows: ReadonlyArray<YoYRow>): Table =>
  table(
    YOY_FRAME_COLUMNS,
    rows.map((row) => ({
      category: row.category,
      program_grouping: row.programGrouping,
      program_year: String(row.programYear),
      metric_name: row.metricName,
      value: String(row.value),
      prior_program_year_value: renderOptionalNumber(row.priorProgramYearValue),
      delta: renderOptionalNumber(row.delta),
      pct_change: renderOptionalNumber(row.pctChange),
    })),
  )

const renderOptionalDate = Option.match({ onNone: () => '', onSome: renderDateTime })
const renderOptionalValue = Option.match({ onNone: () => '', onSome: renderValue })

export const progressFrameToTable = (rows: ReadonlyArray<ProgressFrameRow>): Table =>
  table(
    PROGRESS_FRAME_COLUMNS,
    rows.map((row) => ({
      subject_id: row.subjectId,
      program_grouping: row.programGrouping,
      program_year: row.programYear,
      measure: row.measure,
      start_date: renderOptionalDate(row.startDate),
      end_date: renderDateTime(row.endDate),
      start_value: renderOptionalValue(row.startValue),
      end_value: renderOptionalValue(row.endValue),
      movement: renderOptionalNumber(row.movement),
      eligible: renderValue(row.eligible),
    })),
  )

export const rejectedRowsToTable = (rejected: ReadonlyArray<RejectedRow>): Table =>
  table(
    REJECTED_ROWS_COLUMNS,
    rejected.map(({ row, reason, detail }) => ({
      source_table: row.sourceTable,
      sequence: String(row.sequence),
      subject_id: row.subjectId,
      assessment_date: [row.assessmentDate, row.assessmentTime].filter((part) => part !== '').join(' '),
      question_id: row.questionId,
      raw_value: row.rawValue,
      reason,
      detail,
    })),
  )
