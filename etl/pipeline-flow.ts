import { Data, Effect, Option } from 'effect'

import { lookupQuestion, type Dictionary } from '@etl/dictionary/dictionary.types.ts'
import { loadDictionary } from '@etl/dictionary/load-dictionary.ts'
import { buildLongFrame } from '@etl/frames/long-frame.ts'
import { buildProgressFrame } from '@etl/frames/progress-frame.ts'
import {
  longFrameToTable,
  progressFrameToTable,
  rejectedRowsToTable,
  wideFrameToTable,
  yoyFrameToTable,
} from '@etl/frames/serialize.ts'
import { buildWideFrame } from '@etl/frames/wide-frame.ts'
import { buildYoyFrame } from '@etl/frames/yoy-frame.ts'
import { imputeRecords, resolveCategoryDefaults } from '@etl/impute/impute-records.ts'
import { REJECTION_REASONS, type RejectionReason } from '@etl/normalize/coerce-value.ts'
import { countRejections, normalizeRows } from '@etl/normalize/normalize-rows.ts'
import { extractRawRows, type NamedTable } from '@etl/normalize/raw-rows.ts'
import { PipelineConfigError, type PipelineConfig } from '@etl/shared/config.ts'
import { TableStore } from '@etl/shared/table-store.ts'

import type { Table } from '@etl/shared/table.ts'

export class AggregationError extends Data.TaggedError('AggregationError')<{
  message: string
  step: string
  cause?: unknown
}> {}

export interface PipelineInputs {
  readonly dictionary: Table
  readonly rawExports: ReadonlyArray<NamedTable>
}

export interface PipelineReport {
  readonly rawRows: number
  readonly normalizedRecords: number
  readonly rejectedRows: number
  readonly rejectionsByReason: Readonly<Record<RejectionReason, number>>
  readonly longFrameRows: number
  readonly wideFrameRows: number
  readonly wideFrameCollisions: number
  readonly yoyFrameRows: number
  readonly progressFrameRows: number
}

export interface PipelineOutputs {
  /** Output table name -> table, in the order they are written. */
  readonly tables: ReadonlyMap<string, Table>
  readonly report: PipelineReport
}

const checkSentinel = (dictionary: Dictionary, sentinel: string) => {
  const clashing = dictionary.questionIds.filter((questionId) =>
    Option.exists(lookupQuestion(dictionary, questionId), (entry) =>
      Option.exists(entry.validRange, (range) => range._tag === 'OneOf' && range.values.includes(sentinel)),
    ),
  )
  return clashing.length > 0
    ? Effect.fail(
        new PipelineConfigError({
          message: `Sentinel "${sentinel}" is a valid value of ${clashing.join(', ')}`,
          source: 'sentinel',
        }),
      )
    : Effect.void
}

/** A rollup may not share a name with a category; members the dictionary lacks are only warned about. */
const checkRollups = (dictionary: Dictionary, rollups: PipelineConfig['rollups']) =>
  Effect.forEach(Object.entries(rollups), ([name, members]) =>
    Effect.gen(function* () {
      if (dictionary.categories.includes(name)) {
        return yield* Effect.fail(
          new PipelineConfigError({ message: `Rollup "${name}" has the name of a dictionary category`, source: 'rollups' }),
        )
      }
      const unknown = members.filter((member) => !dictionary.categories.includes(member))
      if (unknown.length > 0) {
        yield* Effect.logWarning(`Rollup "${name}" names unknown categories: ${unknown.join(', ')}`)
      }
    }),
  )

/**
 * Turn one snapshot of the input tables into every output table. Pure apart
 * from logging: nothing is written here.
 */
export const buildOutputs = (inputs: PipelineInputs, config: PipelineConfig) =>
  Effect.gen(function* () {
    // Step 1: Reference data and defaults
    const dictionary = yield* loadDictionary(inputs.dictionary)
    const defaults = yield* resolveCategoryDefaults(dictionary, config.categoryDefaults)
    yield* checkRollups(dictionary, config.rollups)
    yield* checkSentinel(dictionary, config.sentinel)

    // Step 2: Raw rows to typed records
    const rawRows = yield* extractRawRows(inputs.rawExports, config.rawColumns)
    const { records, rejected, assessments } = normalizeRows(rawRows, dictionary, config.sentinel)
    if (rejected.length > 0) {
      yield* Effect.logWarning(`Rejected ${rejected.length} of ${rawRows.length} raw rows`)
    }

    // Step 3: Imputation and frames
    const longFrame = buildLongFrame(imputeRecords(records, dictionary, defaults, assessments))
    const wideFrame = buildWideFrame(longFrame, dictionary, { tieBreak: config.wideFrameTieBreak })
    if (wideFrame.collisions > 0) {
      yield* Effect.logWarning(
        `Resolved ${wideFrame.collisions} duplicate observations in ${wideFrame.collisionCells.length} wide-frame cells`,
      )
    }

    const programYear = { start: config.programYearStart, label: config.programYearLabel }
    const yoyFrame = yield* Effect.try({
      try: () =>
        buildYoyFrame(longFrame, dictionary, {
          programYear,
          metrics: config.metrics,
          rollups: config.rollups,
          includeTotal: config.includeTotalRollup,
        }),
      catch: (error) =>
        new AggregationError({
          message: `YoY aggregation failed: ${error instanceof Error ? error.message : String(error)}`,
          step: 'yoy',
          cause: error,
        }),
    })
    const progressFrame = buildProgressFrame(longFrame, dictionary, { programYear, rollups: config.rollups })

    // Step 4: Serialize
    const { tables: names, sentinel } = config
    const tables = new Map<string, Table>([
      [names.longFrame, longFrameToTable(longFrame, sentinel)],
      [names.wideFrame, wideFrameToTable(wideFrame, sentinel)],
      [names.yoyFrame, yoyFrameToTable(yoyFrame)],
      [names.progressFrame, progressFrameToTable(progressFrame)],
      [names.rejectedRows, rejectedRowsToTable(rejected)],
    ])

    const report: PipelineReport = {
      rawRows: rawRows.length,
      normalizedRecords: records.length,
      rejectedRows: rejected.length,
      rejectionsByReason: countRejections(rejected),
      longFrameRows: longFrame.length,
      wideFrameRows: wideFrame.rows.length,
      wideFrameCollisions: wideFrame.collisions,
      yoyFrameRows: yoyFrame.length,
      progressFrameRows: progressFrame.length,
    }

    return { tables, report } satisfies PipelineOutputs
  })

export const formatPipelineReport = (report: PipelineReport): string => {
  const rejections = REJECTION_REASONS.filter((reason) => report.rejectionsByReason[reason] > 0)
    .map((reason) => `${reason}=${report.rejectionsByReason[reason]}`)
    .join(', ')

  return [
    `Raw rows: ${report.rawRows} (${report.normalizedRecords} normalized, ${report.rejectedRows} rejected)`,
    ...(rejections ? [`Rejections: ${rejections}`] : []),
    `Long frame: ${report.longFrameRows} rows`,
    `Wide frame: ${report.wideFrameRows} rows, ${report.wideFrameCollisions} collisions resolved`,
    `YoY frame: ${report.yoyFrameRows} rows`,
    `Progress frame: ${report.progressFrameRows} rows`,
  ].join('\n')
}

/**
 * One run: read every input, build every output, then replace all output
 * tables together. A failure before the final write leaves the store as it was.
 */
export const runPipeline = (config: PipelineConfig) =>
  Effect.gen(function* () {
    const store = yield* TableStore

    const dictionary = yield* store.read(config.tables.dictionary)
    const rawExports = yield* Effect.forEach(config.tables.rawExports, (name) =>
      Effect.map(store.read(name), (table): NamedTable => ({ name, table })),
    )

    const { tables, report } = yield* buildOutputs({ dictionary, rawExports }, config)

    yield* store.replaceAll(tables)
    yield* Effect.log(`Wrote ${tables.size} tables: ${[...tables.keys()].join(', ')}`)

    return report
  }).pipe(Effect.withLogSpan('pipeline'))
